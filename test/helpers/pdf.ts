import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { SAMPLE_DOCUMENTS, buildSamplePdf, type SampleName } from '../fixtures/sample-documents.js';

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'income-extraction-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeSamplePdf(dir: string, name: SampleName): Promise<string> {
  const path = join(dir, `${name}.pdf`);
  await writeFile(path, await buildSamplePdf(SAMPLE_DOCUMENTS[name]));
  return path;
}

/** A blank one-page PDF: it passes the input check, and fake engines supply the content. */
export async function writeStubPdf(dir: string, name = 'stub.pdf'): Promise<string> {
  const path = join(dir, name);
  const pdf = await PDFDocument.create();
  pdf.addPage();
  await writeFile(path, await pdf.save());
  return path;
}

export async function writeTextFile(dir: string, name: string, content: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, content);
  return path;
}
