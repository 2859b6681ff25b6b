/**
 * Types shared by problem detection, cross-validation and reporting.
 */

export interface Page {
  /** Zero-based page index within the document (or chunk) */
  index: number;
  text: string;
}

export const PROBLEM_NAMES = [
  'empty_tables',
  'low_content_density',
  'missing_numbers',
  'inconsistent_columns',
  'repeated_characters',
  'garbled_text',
  'header_only_tables',
  'very_short_pages',
  'missing_keywords',
  'malformed_structure',
  'duplicate_content',
  'unknown_characters',
  'repetitive_numbers',
  'markdown_images',
] as const;

export type ProblemName = (typeof PROBLEM_NAMES)[number];

/** `empty_content` is only reported for pages with no text at all. */
export type DetectedProblem = ProblemName | 'empty_content';

export type ProblemSet = Partial<Record<ProblemName, boolean>>;

export const SIMILARITY_METHODS = ['number_frequency', 'levenshtein'] as const;
export type SimilarityMethod = (typeof SIMILARITY_METHODS)[number];

export type PromptProfile = 'default' | 'finance';

interface ValidationResultBase {
  /** Zero-based page index */
  pageNumber: number;
  problems: DetectedProblem[];
  processingTimeMs: number;
}

/** Page flagged by detection; its text is always replaced by the secondary extraction. */
export interface ReplacedResult extends ValidationResultBase {
  outcome: 'replaced';
  hadProblem: true;
  passed: false;
  similarityScore: 0;
  replacementText: string;
}

/** Clean page picked by sampling and compared against the secondary extraction. */
export interface SampledResult extends ValidationResultBase {
  outcome: 'sampled';
  hadProblem: false;
  passed: boolean;
  similarityScore: number;
  /** Set only when the page failed the similarity threshold */
  replacementText?: string;
}

/** Secondary extraction failed or timed out; the original text is kept. */
export interface ErroredResult extends ValidationResultBase {
  outcome: 'error';
  hadProblem: boolean;
  passed: false;
  similarityScore: 0;
  error: string;
}

export type ValidationResult = ReplacedResult | SampledResult | ErroredResult;

export interface CrossValidationReport {
  totalPages: number;
  validatedPages: number;
  problemPages: number[];
  failedValidations: number[];
  results: ValidationResult[];
  totalTimeMs: number;
  estimatedCost: number;
  validationPerformed: boolean;
  skippedReason?: string;
  sampleOffset?: number;
}

export type ValidationStatus = 'passed' | 'problems_fixed' | 'warnings';

export interface ValidationSummary {
  enabled: boolean;
  status: ValidationStatus;
}

export interface AggregatedValidationSummary extends ValidationSummary {
  chunksValidated: number;
  statusBreakdown: Record<ValidationStatus, number>;
}
