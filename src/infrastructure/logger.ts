import pino from 'pino';
import type { DocumentKind } from '../domain/types.js';

export const logger = pino({
  name: 'income-extraction',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createDocumentLogger(documentId: string, documentKind?: DocumentKind) {
  return logger.child({
    documentId,
    ...(documentKind !== undefined && { documentKind }),
  });
}
