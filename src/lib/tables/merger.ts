/**
 * Stitches table fragments into logical tables across consecutive pages and
 * renders them as markdown.
 */

import type { TableFragment, TablesByPage } from '@/types/tables';
import { validateNumericalContinuity, type ContinuityOptions } from './continuity';

export interface MergeOptions extends ContinuityOptions {
  /** Allow merging fragments with different headers when the balance carries over */
  numericalValidation?: boolean;
}

export class MergedTable {
  readonly rows: string[][] = [];
  readonly startPage: number;
  private lastPage: number;

  constructor(
    readonly headers: string[],
    pageNumber: number
  ) {
    this.startPage = pageNumber;
    this.lastPage = pageNumber;
  }

  get endPage(): number {
    return this.lastPage;
  }

  addRows(rows: readonly string[][], pageNumber: number): void {
    this.rows.push(...rows.map((row) => [...row]));
    this.lastPage = Math.max(this.lastPage, pageNumber);
  }

  /** Widest of the header and every row */
  get columnCount(): number {
    return this.rows.reduce((max, row) => Math.max(max, row.length), this.headers.length);
  }

  toMarkdown(): string {
    if (this.headers.length === 0 && this.rows.length === 0) return '';

    const width = this.columnCount;
    const headers = [...this.headers];
    while (headers.length < width) {
      headers.push(`Col${headers.length + 1}`);
    }

    const pageLabel =
      this.startPage === this.endPage
        ? `**Table from Page ${this.startPage}**`
        : `**Table from Pages ${this.startPage}-${this.endPage}**`;

    const lines = [
      `${pageLabel}\n`,
      `| ${headers.join(' | ')} |`,
      `| ${headers.map(() => '---').join(' | ')} |`,
    ];

    for (const row of this.rows) {
      const cells = row.slice(0, width);
      while (cells.length < width) cells.push('');
      lines.push(`| ${cells.join(' | ')} |`);
    }

    return lines.join('\n');
  }
}

/**
 * Cell contents of each row, in column order.
 */
export function fragmentRows(fragment: TableFragment): string[][] {
  const rows: string[][] = [];
  for (let rowIndex = 0; rowIndex < fragment.rowCount; rowIndex++) {
    rows.push(
      fragment.cells
        .filter((cell) => cell.row === rowIndex)
        .sort((a, b) => a.col - b.col)
        .map((cell) => cell.content.trim())
    );
  }
  return rows;
}

export function hasTaggedHeaders(fragment: TableFragment): boolean {
  return fragment.cells.some((cell) => cell.isHeader === true);
}

interface FragmentParts {
  /** Tagged header cells, or the first row when nothing is tagged */
  header: string[];
  /** Every row after the header row */
  body: string[][];
  /** Every row, header row included */
  all: string[][];
  tagged: boolean;
}

function splitFragment(fragment: TableFragment): FragmentParts {
  const all = fragmentRows(fragment);
  const tagged = hasTaggedHeaders(fragment);
  const header = tagged
    ? fragment.cells
        .filter((cell) => cell.isHeader === true)
        .sort((a, b) => a.col - b.col)
        .map((cell) => cell.content.trim())
    : (all[0] ?? []);

  return { header, body: all.slice(1), all, tagged };
}

export function headersMatch(a: readonly string[], b: readonly string[]): boolean {
  if (a.length === 0 || a.length !== b.length) return false;
  return a.every((header, index) => header.trim().toLowerCase() === (b[index] ?? '').trim().toLowerCase());
}

export class TableMerger {
  constructor(private readonly options: MergeOptions = {}) {}

  /**
   * Fold fragments into logical tables, pages in ascending order:
   * 1. nothing open → start a table
   * 2. header row equals the open table's headers → append the rows after it
   * 3. nothing tagged as header → continuation, append every row
   * 4. headers differ but the balance carries over → append the data rows
   * 5. otherwise close the open table and start a new one
   */
  mergeAcrossPages(tablesByPage: TablesByPage): MergedTable[] {
    const merged: MergedTable[] = [];
    let current: MergedTable | null = null;
    let fragmentCount = 0;

    const pages = [...tablesByPage.keys()].sort((a, b) => a - b);
    for (const pageNumber of pages) {
      for (const fragment of tablesByPage.get(pageNumber) ?? []) {
        fragmentCount++;
        const { header, body, all, tagged } = splitFragment(fragment);
        if (all.length === 0) continue;

        if (current === null) {
          current = new MergedTable(header, pageNumber);
          current.addRows(body, pageNumber);
          continue;
        }

        if (headersMatch(current.headers, header)) {
          console.log(`[TableMerger] Page ${pageNumber}: same headers, merging with previous table`);
          current.addRows(body, pageNumber);
          continue;
        }

        if (!tagged) {
          console.log(`[TableMerger] Page ${pageNumber}: no headers, treating as continuation`);
          current.addRows(all, pageNumber);
          continue;
        }

        const lastRow = current.rows.at(-1);
        const firstRow = body[0];
        if (
          this.options.numericalValidation !== false &&
          lastRow !== undefined &&
          firstRow !== undefined &&
          validateNumericalContinuity(lastRow, firstRow, this.options)
        ) {
          console.log(`[TableMerger] Page ${pageNumber}: balance continues despite header mismatch, merging`);
          current.addRows(body, pageNumber);
          continue;
        }

        merged.push(current);
        current = new MergedTable(header, pageNumber);
        current.addRows(body, pageNumber);
      }
    }

    if (current !== null) merged.push(current);

    console.log(`[TableMerger] Merged ${fragmentCount} tables into ${merged.length} logical table(s)`);
    return merged;
  }
}

/**
 * Render one fragment on its own, without merging.
 */
export function renderFragment(fragment: TableFragment): string {
  const { header, body } = splitFragment(fragment);
  const table = new MergedTable(header, fragment.pageNumber);
  table.addRows(body, fragment.pageNumber);
  return table.toMarkdown();
}
