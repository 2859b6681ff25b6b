/**
 * Cross-validation of a primary extraction against a secondary extractor.
 *
 * 1. Detect problems on every page (bounded fan-out)
 * 2. Queue every problem page, plus clean pages on the sampling cadence
 * 3. Re-extract queued pages (separate bounded fan-out, per-page timeout)
 * 4. Problem pages are replaced outright; sampled pages are replaced only
 *    when similarity falls below the threshold
 *
 * A failure on one page is recorded on that page's result and never fails
 * the run.
 */

import type { ValidationConfig } from '@/lib/config';
import type { SecondaryExtractor } from '@/lib/ai/page-extractor';
import { imagePagePrompts } from '@/lib/ai/prompts/page-extraction';
import type {
  CrossValidationReport,
  DetectedProblem,
  Page,
  ProblemName,
  PromptProfile,
  ValidationResult,
} from '@/types/validation';
import { mapWithConcurrency, withTimeout, yieldToEventLoop } from './concurrency';
import { ProblemDetector } from './problem-detector';
import { SimilarityCalculator } from './similarity';

/** Rough cost model for the report */
const AVG_TOKENS_PER_PAGE = 500;
const COST_PER_1K_TOKENS = 0.01;

export interface ValidationOrchestratorDeps {
  extractor: SecondaryExtractor | null;
  config: ValidationConfig;
  detector?: ProblemDetector;
  similarity?: SimilarityCalculator;
  /** Source of the per-run sampling offset, in [0, 1) */
  random?: () => number;
}

export interface CrossValidateOptions {
  /** Query filtering is active upstream; enables sample validation of clean pages */
  hasQuery: boolean;
  /** Overrides the configured problem list for this run */
  enabledProblems?: readonly ProblemName[];
  promptProfile?: PromptProfile;
}

interface PageDetection {
  page: Page;
  hadProblem: boolean;
  problems: DetectedProblem[];
}

export function estimateValidationCost(validatedPages: number): number {
  return (validatedPages * AVG_TOKENS_PER_PAGE * COST_PER_1K_TOKENS) / 1000;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ValidationOrchestrator {
  private readonly extractor: SecondaryExtractor | null;
  private readonly config: ValidationConfig;
  private readonly detector: ProblemDetector;
  private readonly similarity: SimilarityCalculator;
  private readonly random: () => number;

  constructor(deps: ValidationOrchestratorDeps) {
    this.extractor = deps.extractor;
    this.config = deps.config;
    this.detector = deps.detector ?? new ProblemDetector();
    this.similarity = deps.similarity ?? new SimilarityCalculator(deps.config.similarityMethod);
    this.random = deps.random ?? Math.random;
  }

  /**
   * Whether a clean page lands on this run's sampling cadence.
   */
  shouldSamplePage(pageIndex: number, hasQuery: boolean, sampleOffset: number): boolean {
    if (!hasQuery) return false;
    return (pageIndex - sampleOffset) % this.config.sampleRate === 0;
  }

  async crossValidatePages(
    pages: readonly Page[],
    documentBytes: Uint8Array,
    options: CrossValidateOptions
  ): Promise<CrossValidationReport> {
    const startedAt = Date.now();

    if (!this.config.enabled) {
      return this.skippedReport(pages.length, startedAt, 'Cross-validation disabled');
    }
    if (!this.extractor) {
      console.warn('[Validation] No secondary extractor available, skipping cross-validation');
      return this.skippedReport(pages.length, startedAt, 'No secondary extractor configured');
    }
    const extractor = this.extractor;

    const enabled = options.enabledProblems ?? this.config.enabledProblems;
    const profile = options.promptProfile ?? 'default';
    const sampleOffset = Math.floor(this.random() * this.config.sampleRate);

    console.log(
      `[Validation] Checking ${pages.length} pages with ${enabled.length} detectors (${extractor.name}, sample offset ${sampleOffset})`
    );

    // 1. Detection
    const detections = await mapWithConcurrency(
      pages,
      this.config.detectionConcurrency,
      async (page): Promise<PageDetection> => {
        await yieldToEventLoop();
        const { hasProblem, problems } = this.detector.hasAnyProblem(page.text, enabled);
        return { page, hadProblem: hasProblem, problems };
      }
    );

    // 2. Worklist
    const worklist: PageDetection[] = [];
    const problemPages: number[] = [];
    for (const detection of detections) {
      if (detection.hadProblem) {
        problemPages.push(detection.page.index);
        console.log(`[Validation] Page ${detection.page.index}: problems found: ${detection.problems.join(', ')}`);
        worklist.push(detection);
      } else if (
        !this.config.skipSampleIfClean &&
        this.shouldSamplePage(detection.page.index, options.hasQuery, sampleOffset)
      ) {
        worklist.push(detection);
      }
    }

    console.log(`[Validation] Re-extracting ${worklist.length} pages...`);

    // 3-5. Re-extraction and scoring
    const results = await mapWithConcurrency(
      worklist,
      this.config.extractionConcurrency,
      (detection) => this.validatePage(extractor, detection, documentBytes, profile)
    );
    results.sort((a, b) => a.pageNumber - b.pageNumber);
    problemPages.sort((a, b) => a - b);

    const failedValidations = results.filter((result) => !result.passed).map((result) => result.pageNumber);
    const totalTimeMs = Date.now() - startedAt;
    const estimatedCost = estimateValidationCost(results.length);

    const share = pages.length > 0 ? ((results.length / pages.length) * 100).toFixed(1) : '0.0';
    console.log(
      `[Validation] Done: ${results.length}/${pages.length} pages validated (${share}%), ` +
        `${problemPages.length} problem pages, ${failedValidations.length} failed, ` +
        `${totalTimeMs}ms, est. $${estimatedCost.toFixed(4)}`
    );

    return {
      totalPages: pages.length,
      validatedPages: results.length,
      problemPages,
      failedValidations,
      results,
      totalTimeMs,
      estimatedCost,
      validationPerformed: true,
      sampleOffset,
    };
  }

  private async validatePage(
    extractor: SecondaryExtractor,
    { page, hadProblem, problems }: PageDetection,
    documentBytes: Uint8Array,
    profile: PromptProfile
  ): Promise<ValidationResult> {
    const startedAt = Date.now();

    try {
      const prompts = problems.includes('markdown_images') ? imagePagePrompts(profile) : undefined;
      const altText = await withTimeout(
        extractor.extractPage(documentBytes, page.index, prompts),
        this.config.pageTimeoutMs,
        `Page ${page.index} re-extraction`
      );

      if (hadProblem) {
        return {
          outcome: 'replaced',
          pageNumber: page.index,
          hadProblem: true,
          passed: false,
          similarityScore: 0,
          problems,
          replacementText: altText,
          processingTimeMs: Date.now() - startedAt,
        };
      }

      const score = this.similarity.similarity(page.text, altText);
      const passed = score >= this.config.similarityThreshold;
      if (!passed) {
        console.warn(
          `[Validation] Page ${page.index}: similarity ${(score * 100).toFixed(1)}% below threshold`
        );
      }

      return {
        outcome: 'sampled',
        pageNumber: page.index,
        hadProblem: false,
        passed,
        similarityScore: score,
        problems,
        replacementText: passed ? undefined : altText,
        processingTimeMs: Date.now() - startedAt,
      };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Validation] Page ${page.index} failed:`, message);
      return {
        outcome: 'error',
        pageNumber: page.index,
        hadProblem,
        passed: false,
        similarityScore: 0,
        problems,
        error: message,
        processingTimeMs: Date.now() - startedAt,
      };
    }
  }

  private skippedReport(totalPages: number, startedAt: number, reason: string): CrossValidationReport {
    return {
      totalPages,
      validatedPages: 0,
      problemPages: [],
      failedValidations: [],
      results: [],
      totalTimeMs: Date.now() - startedAt,
      estimatedCost: 0,
      validationPerformed: false,
      skippedReason: reason,
    };
  }
}
