export interface TableCell {
  row: number;
  col: number;
  rowSpan: number;
  colSpan: number;
  content: string;
  /** Set when the provider tagged the cell as a column header */
  isHeader?: boolean;
}

/** One table as extracted from a single page. */
export interface TableFragment {
  rowCount: number;
  colCount: number;
  cells: TableCell[];
  /** One-based page number the provider reported for the table */
  pageNumber: number;
}

export type TablesByPage = Map<number, TableFragment[]>;

export interface TableRenderMetadata {
  tableCount: number;
  mergedTableCount?: number;
  merged: boolean;
}

export interface RenderedTables {
  markdown: string[];
  metadata: TableRenderMetadata;
}
