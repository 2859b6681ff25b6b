import { PDFDocument } from 'pdf-lib';
import { describe, expect, it } from 'vitest';
import { extractSinglePage } from './page-splitter';

async function buildPdf(widths: number[]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  for (const width of widths) {
    doc.addPage([width, 400]);
  }
  return doc.save();
}

describe('page-splitter', () => {
  it('extracts the requested page only', async () => {
    const single = await extractSinglePage(await buildPdf([200, 300, 400]), 1);
    const loaded = await PDFDocument.load(single);
    expect(loaded.getPageCount()).toBe(1);
    expect(loaded.getPage(0).getWidth()).toBe(300);
  });

  it('rejects an index past the last page', async () => {
    await expect(extractSinglePage(await buildPdf([200]), 1)).rejects.toThrow(
      'Page 1 is out of range (document has 1 pages)'
    );
  });
});
