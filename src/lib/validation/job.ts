/**
 * One document-QA run: cross-validate the pages, patch them, and merge the
 * provider tables. Used by the queue worker; collaborators are passed in.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { SecondaryExtractor } from '@/lib/ai/page-extractor';
import type { AppConfig } from '@/lib/config';
import { extractTableMarkdown, parseProviderTables } from '@/lib/tables/provider-tables';
import type { RenderedTables } from '@/types/tables';
import {
  PROBLEM_NAMES,
  type AggregatedValidationSummary,
  type CrossValidationReport,
  type Page,
  type ValidationSummary,
} from '@/types/validation';
import { ValidationOrchestrator } from './orchestrator';
import { aggregateValidationSummaries, applyReplacements, summarizeValidation } from './report';

export const documentQaJobSchema = z.object({
  documentPath: z.string().min(1),
  pages: z
    .array(z.object({ index: z.number().int().min(0), text: z.string() }))
    .min(1, 'At least one page is required'),
  hasQuery: z.boolean().default(false),
  promptProfile: z.enum(['default', 'finance']).default('default'),
  enabledProblems: z.array(z.enum(PROBLEM_NAMES)).optional(),
  tables: z.unknown().optional(),
  mergeTables: z.boolean().default(true),
  /** Validate the pages in consecutive runs of this many pages */
  chunkSize: z.number().int().min(1).optional(),
});

export type DocumentQaJobData = z.input<typeof documentQaJobSchema>;

export interface DocumentQaResult {
  pages: Page[];
  validation: ValidationSummary;
  /** One report per validated chunk, in page order */
  reports: CrossValidationReport[];
  chunkSummary: AggregatedValidationSummary | null;
  tables: RenderedTables | null;
}

export interface DocumentQaDeps {
  config: AppConfig;
  extractor: SecondaryExtractor | null;
  readDocument?: (path: string) => Promise<Uint8Array>;
  onProgress?: (percent: number) => Promise<void>;
}

function chunkPages(pages: readonly Page[], size: number): Page[][] {
  const chunks: Page[][] = [];
  for (let start = 0; start < pages.length; start += size) {
    chunks.push(pages.slice(start, start + size));
  }
  return chunks;
}

export async function processDocumentQaJob(
  rawData: unknown,
  deps: DocumentQaDeps
): Promise<DocumentQaResult> {
  const data = documentQaJobSchema.parse(rawData);
  const readDocument = deps.readDocument ?? ((path: string) => readFile(path));
  const progress = deps.onProgress ?? (async () => {});

  console.log(`[DocumentQA] ${data.documentPath}: ${data.pages.length} pages`);

  // 1. Load the source document for re-extraction
  const documentBytes = await readDocument(data.documentPath);
  await progress(10);

  // 2. Cross-validate, chunk by chunk
  const orchestrator = new ValidationOrchestrator({
    extractor: deps.extractor,
    config: deps.config.validation,
  });
  const chunks = chunkPages(data.pages, data.chunkSize ?? data.pages.length);
  const reports: CrossValidationReport[] = [];
  for (const chunk of chunks) {
    reports.push(
      await orchestrator.crossValidatePages(chunk, documentBytes, {
        hasQuery: data.hasQuery,
        enabledProblems: data.enabledProblems,
        promptProfile: data.promptProfile,
      })
    );
  }
  await progress(70);

  // 3. Patch pages
  let pages: Page[] = data.pages;
  for (const report of reports) {
    pages = applyReplacements(pages, report);
  }
  const chunkSummary = aggregateValidationSummaries(reports.map(summarizeValidation));
  const validation: ValidationSummary = chunkSummary
    ? { enabled: true, status: chunkSummary.status }
    : { enabled: false, status: 'passed' };
  if (chunks.length > 1) {
    console.log(
      `[DocumentQA] ${data.documentPath}: ${chunkSummary?.chunksValidated ?? 0}/${chunks.length} chunks validated`
    );
  }

  // 4. Tables
  let tables: RenderedTables | null = null;
  if (data.tables !== undefined) {
    const fragments = parseProviderTables(data.tables);
    tables = extractTableMarkdown(fragments, {
      merge: data.mergeTables,
      numericalValidation: deps.config.tables.numericalValidation,
      balanceTolerance: deps.config.tables.balanceTolerance,
      maxBalanceChangeRatio: deps.config.tables.maxBalanceChangeRatio,
    });
  }
  await progress(100);

  console.log(`[DocumentQA] ${data.documentPath}: validation ${validation.status}`);
  return { pages, validation, reports, chunkSummary, tables };
}
