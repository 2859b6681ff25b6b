/**
 * Submit a document and its primary extraction to the document-qa queue.
 * Usage: npm run enqueue -- <document.pdf> <pages.json> [tables.json]
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { getDocumentQaQueue } from '../src/lib/queue/queues';
import { documentQaJobSchema } from '../src/lib/validation/job';

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf8'));
}

async function enqueue() {
  const [documentPath, pagesPath, tablesPath] = process.argv.slice(2);
  if (!documentPath || !pagesPath) {
    console.error('Usage: npm run enqueue -- <document.pdf> <pages.json> [tables.json]');
    process.exit(1);
  }

  const data = documentQaJobSchema.parse({
    documentPath: resolve(documentPath),
    pages: await readJson(pagesPath),
    tables: tablesPath ? await readJson(tablesPath) : undefined,
  });

  const queue = getDocumentQaQueue();
  const job = await queue.add('document', data);
  console.log(`[Enqueue] Job ${job.id} queued for ${data.documentPath} (${data.pages.length} pages)`);
  await queue.close();
}

enqueue().catch((err: unknown) => {
  console.error('[Enqueue] Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
