import { mkdir, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { SAMPLE_DOCUMENTS, buildSamplePdf } from '../test/fixtures/sample-documents.js';

async function main(): Promise<void> {
  const outDir = resolve(process.argv[2] ?? 'samples');
  await mkdir(outDir, { recursive: true });

  for (const [name, sample] of Object.entries(SAMPLE_DOCUMENTS)) {
    const outPath = resolve(outDir, `${name}.pdf`);
    await writeFile(outPath, await buildSamplePdf(sample));
    console.log(`Created: ${outPath}`);
  }
}

main().catch(console.error);
