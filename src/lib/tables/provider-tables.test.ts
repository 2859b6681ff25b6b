import { describe, expect, it } from 'vitest';
import { extractTableMarkdown, groupTablesByPage, parseProviderTables } from './provider-tables';

const payload = [
  {
    rowCount: 2,
    columnCount: 2,
    cells: [
      { kind: 'columnHeader', rowIndex: 0, columnIndex: 1, content: 'Amount' },
      { kind: 'columnHeader', rowIndex: 0, columnIndex: 0, content: 'Date' },
      { rowIndex: 1, columnIndex: 0, content: ' 01/03 ' },
      { rowIndex: 1, columnIndex: 1, content: '100.00' },
    ],
    boundingRegions: [{ pageNumber: 2 }],
  },
  {
    rowCount: 1,
    columnCount: 1,
    cells: [{ rowIndex: 0, columnIndex: 0, content: 'orphan' }],
  },
  {
    rowCount: 2,
    columnCount: 2,
    cells: [
      { kind: 'columnHeader', rowIndex: 0, columnIndex: 0, content: 'Date' },
      { kind: 'columnHeader', rowIndex: 0, columnIndex: 1, content: 'Amount' },
      { rowIndex: 1, columnIndex: 0, content: '02/03' },
      { rowIndex: 1, columnIndex: 1, content: '50.00' },
    ],
    boundingRegions: [{ pageNumber: 3 }],
  },
];

describe('parseProviderTables', () => {
  it('converts cells and skips tables without a page', () => {
    const fragments = parseProviderTables(payload);

    expect(fragments.map((fragment) => fragment.pageNumber)).toEqual([2, 3]);
    expect(fragments[0]?.cells[0]).toEqual({
      row: 0,
      col: 1,
      rowSpan: 1,
      colSpan: 1,
      content: 'Amount',
      isHeader: true,
    });
    expect(fragments[0]?.cells[2]?.isHeader).toBe(false);
  });

  it('rejects malformed payloads', () => {
    expect(() => parseProviderTables([{ rowCount: -1, columnCount: 2 }])).toThrow();
    expect(() => parseProviderTables({ tables: [] })).toThrow();
  });
});

describe('groupTablesByPage', () => {
  it('keys fragments by page number', () => {
    const grouped = groupTablesByPage(parseProviderTables(payload));
    expect([...grouped.keys()]).toEqual([2, 3]);
    expect(grouped.get(2)).toHaveLength(1);
  });
});

describe('extractTableMarkdown', () => {
  const fragments = parseProviderTables(payload);

  it('merges across pages', () => {
    expect(extractTableMarkdown(fragments, { merge: true })).toEqual({
      markdown: [
        [
          '**Table from Pages 2-3**',
          '',
          '| Date | Amount |',
          '| --- | --- |',
          '| 01/03 | 100.00 |',
          '| 02/03 | 50.00 |',
        ].join('\n'),
      ],
      metadata: { tableCount: 2, mergedTableCount: 1, merged: true },
    });
  });

  it('renders each table separately when merging is off', () => {
    const result = extractTableMarkdown(fragments, { merge: false });
    expect(result.metadata).toEqual({ tableCount: 2, merged: false });
    expect(result.markdown[0]).toBe(
      ['**Table from Page 2**', '', '| Date | Amount |', '| --- | --- |', '| 01/03 | 100.00 |'].join('\n')
    );
    expect(result.markdown).toHaveLength(2);
  });

  it('reports no tables for an empty list', () => {
    expect(extractTableMarkdown([], { merge: true })).toEqual({
      markdown: [],
      metadata: { tableCount: 0, merged: false },
    });
  });
});
