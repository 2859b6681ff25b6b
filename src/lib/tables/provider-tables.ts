/**
 * Parsing layout-analysis table payloads (rowIndex/columnIndex cells with
 * bounding regions) into fragments, grouping them by page and rendering.
 */

import { z } from 'zod';
import type { RenderedTables, TableFragment, TablesByPage } from '@/types/tables';
import { TableMerger, renderFragment, type MergeOptions } from './merger';

export const providerCellSchema = z.object({
  kind: z.string().optional(),
  rowIndex: z.number().int().min(0),
  columnIndex: z.number().int().min(0),
  rowSpan: z.number().int().min(1).default(1),
  columnSpan: z.number().int().min(1).default(1),
  content: z.string().default(''),
});

export const providerTableSchema = z.object({
  rowCount: z.number().int().min(0),
  columnCount: z.number().int().min(0),
  cells: z.array(providerCellSchema).default([]),
  boundingRegions: z.array(z.object({ pageNumber: z.number().int().min(1) })).optional(),
});

export const providerTablesSchema = z.array(providerTableSchema);

export type ProviderTable = z.infer<typeof providerTableSchema>;

/**
 * Validate a raw table list and convert it to fragments. Tables without a
 * page reference are skipped.
 */
export function parseProviderTables(raw: unknown): TableFragment[] {
  const tables = providerTablesSchema.parse(raw);
  const fragments: TableFragment[] = [];

  for (const table of tables) {
    const region = table.boundingRegions?.[0];
    if (!region) {
      console.warn('[TableMerger] Table has no bounding regions, skipping');
      continue;
    }

    fragments.push({
      rowCount: table.rowCount,
      colCount: table.columnCount,
      pageNumber: region.pageNumber,
      cells: table.cells.map((cell) => ({
        row: cell.rowIndex,
        col: cell.columnIndex,
        rowSpan: cell.rowSpan,
        colSpan: cell.columnSpan,
        content: cell.content,
        isHeader: cell.kind === 'columnHeader',
      })),
    });
  }

  return fragments;
}

export function groupTablesByPage(fragments: readonly TableFragment[]): TablesByPage {
  const byPage: TablesByPage = new Map();
  for (const fragment of fragments) {
    const list = byPage.get(fragment.pageNumber) ?? [];
    list.push(fragment);
    byPage.set(fragment.pageNumber, list);
  }
  return byPage;
}

export interface ExtractTablesOptions extends MergeOptions {
  merge: boolean;
}

/**
 * Render fragments as markdown tables, merged across pages or one per fragment.
 */
export function extractTableMarkdown(
  fragments: readonly TableFragment[],
  options: ExtractTablesOptions
): RenderedTables {
  if (fragments.length === 0) {
    return { markdown: [], metadata: { tableCount: 0, merged: false } };
  }

  const byPage = groupTablesByPage(fragments);

  if (options.merge) {
    const merged = new TableMerger(options).mergeAcrossPages(byPage);
    return {
      markdown: merged.map((table) => table.toMarkdown()).filter(Boolean),
      metadata: { tableCount: fragments.length, mergedTableCount: merged.length, merged: true },
    };
  }

  const markdown: string[] = [];
  for (const pageNumber of [...byPage.keys()].sort((a, b) => a - b)) {
    for (const fragment of byPage.get(pageNumber) ?? []) {
      const rendered = renderFragment(fragment);
      if (rendered) markdown.push(rendered);
    }
  }
  return { markdown, metadata: { tableCount: fragments.length, merged: false } };
}
