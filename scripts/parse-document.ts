import 'dotenv/config';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import { documentKindSchema } from '../src/domain/schemas.js';
import { DOCUMENT_KINDS } from '../src/domain/types.js';
import { logger } from '../src/infrastructure/logger.js';
import { parseDocument } from '../src/services/pipeline/index.js';

const log = logger.child({ module: 'parse-document' });

function printUsage(): never {
  console.error('Usage: npm run parse -- <pdf-path> <document-kind> [--out <dir>]');
  console.error(`  document-kind: ${DOCUMENT_KINDS.join(' | ')}`);
  console.error('Example: npm run parse -- ./samples/sample-paystub.pdf paystub --out ./results');
  process.exit(1);
}

function readArgs(argv: string[]): { pdfPath: string; kindArg: string; outDir?: string } {
  const positional: string[] = [];
  let outDir: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--out') {
      outDir = argv[i + 1];
      i++;
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  const [pdfPath, kindArg] = positional;
  if (!pdfPath || !kindArg) printUsage();
  return { pdfPath, kindArg, ...(outDir !== undefined && { outDir }) };
}

async function main(): Promise<void> {
  const { pdfPath, kindArg, outDir } = readArgs(process.argv.slice(2));

  const kind = documentKindSchema.safeParse(kindArg.toLowerCase().replace('-', ''));
  if (!kind.success) {
    console.error(`Unknown document kind: ${kindArg}`);
    printUsage();
  }

  const absolutePath = resolve(pdfPath);
  const record = await parseDocument(absolutePath, kind.data);

  if ('error' in record) {
    log.error({ pdfPath: absolutePath, error: record.error }, 'Parsing failed');
  } else {
    log.info(
      {
        pdfPath: absolutePath,
        documentKind: kind.data,
        confidence: record.confidence_score,
        visionUsed: record.processing_metadata.gpt_vision_used,
        warningCount: record.validation_warnings.length,
      },
      'Parsing finished',
    );
  }

  const json = JSON.stringify(record, null, 2);
  console.log(json);

  if (outDir) {
    const target = resolve(outDir);
    await mkdir(target, { recursive: true });
    const outPath = join(target, `${basename(absolutePath, extname(absolutePath))}.json`);
    await writeFile(outPath, `${json}\n`);
    log.info({ outPath }, 'Result written');
  }

  if ('error' in record) process.exit(1);
}

main().catch((error: unknown) => {
  log.error({ error }, 'Unhandled error');
  console.error(error);
  process.exit(1);
});
