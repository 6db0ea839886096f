import { describe, it, expect } from 'vitest';
import { logger, createDocumentLogger } from '../../src/infrastructure/logger.js';

describe('logger', () => {
  it('has service name configured', () => {
    expect(logger.bindings().name).toBe('income-extraction');
  });
});

describe('createDocumentLogger', () => {
  it('creates child logger with documentId', () => {
    const child = createDocumentLogger('doc-123');
    expect(child.bindings().documentId).toBe('doc-123');
  });

  it('includes documentKind when provided', () => {
    const child = createDocumentLogger('doc-123', 'w2');
    const bindings = child.bindings();
    expect(bindings.documentId).toBe('doc-123');
    expect(bindings.documentKind).toBe('w2');
  });

  it('omits documentKind when not provided', () => {
    const child = createDocumentLogger('doc-123');
    expect(child.bindings().documentKind).toBeUndefined();
  });
});
