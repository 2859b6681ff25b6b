/**
 * Cut single pages out of a PDF so a re-extraction only pays for the page it needs.
 */

import { PDFDocument } from 'pdf-lib';

/**
 * Build a one-page PDF holding page `pageIndex` (zero-based) of the source.
 */
export async function extractSinglePage(pdfBytes: Uint8Array, pageIndex: number): Promise<Uint8Array> {
  const source = await PDFDocument.load(pdfBytes, { ignoreEncryption: true });
  const pageCount = source.getPageCount();

  if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= pageCount) {
    throw new RangeError(`Page ${pageIndex} is out of range (document has ${pageCount} pages)`);
  }

  const target = await PDFDocument.create();
  const [copied] = await target.copyPages(source, [pageIndex]);
  if (!copied) {
    throw new Error(`Failed to copy page ${pageIndex}`);
  }
  target.addPage(copied);
  return target.save();
}
