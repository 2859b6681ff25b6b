import { describe, expect, it } from 'vitest';
import type { CrossValidationReport, Page } from '@/types/validation';
import {
  aggregateValidationSummaries,
  applyReplacements,
  classifyValidationStatus,
  summarizeValidation,
} from './report';

function report(overrides: Partial<CrossValidationReport> = {}): CrossValidationReport {
  return {
    totalPages: 3,
    validatedPages: 0,
    problemPages: [],
    failedValidations: [],
    results: [],
    totalTimeMs: 12,
    estimatedCost: 0,
    validationPerformed: true,
    ...overrides,
  };
}

describe('classifyValidationStatus', () => {
  it('prefers problems_fixed over warnings', () => {
    expect(classifyValidationStatus(report({ problemPages: [1], failedValidations: [1, 2] }))).toBe(
      'problems_fixed'
    );
    expect(classifyValidationStatus(report({ failedValidations: [2] }))).toBe('warnings');
    expect(classifyValidationStatus(report())).toBe('passed');
  });
});

describe('summarizeValidation', () => {
  it('marks a skipped run as not enabled but passed', () => {
    expect(summarizeValidation(report({ validationPerformed: false }))).toEqual({
      enabled: false,
      status: 'passed',
    });
  });
});

describe('applyReplacements', () => {
  const pages: Page[] = [
    { index: 0, text: 'original 0' },
    { index: 1, text: 'original 1' },
    { index: 2, text: 'original 2' },
  ];

  it('swaps in replacement text without touching the input', () => {
    const patched = applyReplacements(
      pages,
      report({
        results: [
          {
            outcome: 'replaced',
            pageNumber: 0,
            hadProblem: true,
            passed: false,
            similarityScore: 0,
            problems: ['empty_tables'],
            replacementText: 'fixed 0',
            processingTimeMs: 5,
          },
          {
            outcome: 'sampled',
            pageNumber: 1,
            hadProblem: false,
            passed: true,
            similarityScore: 0.99,
            problems: [],
            processingTimeMs: 5,
          },
          {
            outcome: 'error',
            pageNumber: 2,
            hadProblem: true,
            passed: false,
            similarityScore: 0,
            problems: ['garbled_text'],
            error: 'timeout',
            processingTimeMs: 5,
          },
        ],
      })
    );

    expect(patched.map((page) => page.text)).toEqual(['fixed 0', 'original 1', 'original 2']);
    expect(pages[0]?.text).toBe('original 0');
    expect(patched[1]).toBe(pages[1]);
  });
});

describe('aggregateValidationSummaries', () => {
  it('returns null when no chunk was validated', () => {
    expect(aggregateValidationSummaries([null, { enabled: false, status: 'passed' }])).toBeNull();
  });

  it('takes the most severe status and counts each', () => {
    expect(
      aggregateValidationSummaries([
        { enabled: true, status: 'passed' },
        null,
        { enabled: true, status: 'warnings' },
        { enabled: true, status: 'passed' },
      ])
    ).toEqual({
      enabled: true,
      status: 'warnings',
      chunksValidated: 3,
      statusBreakdown: { passed: 2, warnings: 1, problems_fixed: 0 },
    });

    expect(
      aggregateValidationSummaries([
        { enabled: true, status: 'problems_fixed' },
        { enabled: true, status: 'warnings' },
      ])?.status
    ).toBe('problems_fixed');
  });
});
