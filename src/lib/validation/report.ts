/**
 * Turning a cross-validation report into something a caller can act on.
 */

import type {
  AggregatedValidationSummary,
  CrossValidationReport,
  Page,
  ValidationStatus,
  ValidationSummary,
} from '@/types/validation';

/** Higher wins when several chunks of one document are combined */
const STATUS_PRIORITY: Record<ValidationStatus, number> = {
  passed: 0,
  warnings: 1,
  problems_fixed: 2,
};

export function classifyValidationStatus(report: CrossValidationReport): ValidationStatus {
  if (report.problemPages.length > 0) return 'problems_fixed';
  if (report.failedValidations.length > 0) return 'warnings';
  return 'passed';
}

/**
 * A run with no validation performed is still `passed`, but `enabled: false`
 * tells the caller nothing was checked.
 */
export function summarizeValidation(report: CrossValidationReport): ValidationSummary {
  return {
    enabled: report.validationPerformed,
    status: classifyValidationStatus(report),
  };
}

/**
 * Return a new page list with every replacement text from the report applied.
 * Pages without a replacement are returned as-is.
 */
export function applyReplacements(pages: readonly Page[], report: CrossValidationReport): Page[] {
  const replacements = new Map<number, string>();
  for (const result of report.results) {
    if (result.outcome !== 'error' && result.replacementText !== undefined) {
      replacements.set(result.pageNumber, result.replacementText);
    }
  }

  return pages.map((page) => {
    const replacement = replacements.get(page.index);
    if (replacement === undefined) return page;
    console.log(`[Validation] Page ${page.index}: replacing extracted text with secondary extraction`);
    return { index: page.index, text: replacement };
  });
}

/**
 * Combine per-chunk summaries of one document. Chunks that were not
 * validated (null) are ignored; returns null when none were.
 */
export function aggregateValidationSummaries(
  summaries: ReadonlyArray<ValidationSummary | null>
): AggregatedValidationSummary | null {
  const validated = summaries.filter(
    (summary): summary is ValidationSummary => summary !== null && summary.enabled
  );
  if (validated.length === 0) return null;

  const statusBreakdown: Record<ValidationStatus, number> = {
    passed: 0,
    warnings: 0,
    problems_fixed: 0,
  };
  let status: ValidationStatus = 'passed';

  for (const summary of validated) {
    statusBreakdown[summary.status]++;
    if (STATUS_PRIORITY[summary.status] > STATUS_PRIORITY[status]) {
      status = summary.status;
    }
  }

  return {
    enabled: true,
    status,
    chunksValidated: validated.length,
    statusBreakdown,
  };
}
