/**
 * Runtime configuration, parsed once from the environment.
 *
 * Components never read `process.env` themselves: they receive the relevant
 * section of {@link AppConfig} from whoever constructs them.
 */

import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { PROBLEM_NAMES, SIMILARITY_METHODS, type ProblemName } from '@/types/validation';

export const DEFAULT_ENABLED_PROBLEMS: readonly ProblemName[] = [
  'empty_tables',
  'low_content_density',
  'missing_numbers',
  'inconsistent_columns',
  'garbled_text',
  'missing_keywords',
  'repetitive_numbers',
];

export const DEFAULT_MODELS = {
  gemini: 'gemini-2.5-flash',
  anthropic: 'claude-sonnet-4-5-20250929',
} as const;

const envBoolean = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return fallback;
      const normalized = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
      if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
      return z.NEVER;
    });

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  ENABLE_CROSS_VALIDATION: envBoolean(true),
  VALIDATION_PROVIDER: z.enum(['gemini', 'anthropic']).default('gemini'),
  GOOGLE_AI_API_KEY: optionalSecret,
  GEMINI_MODEL: z.string().min(1).default(DEFAULT_MODELS.gemini),
  ANTHROPIC_API_KEY: optionalSecret,
  ANTHROPIC_MODEL: z.string().min(1).default(DEFAULT_MODELS.anthropic),
  VALIDATION_SAMPLE_RATE: z.coerce.number().int().min(1).default(5),
  VALIDATION_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.95),
  VALIDATION_SIMILARITY_METHOD: z.string().default('number_frequency'),
  VALIDATION_SKIP_SAMPLE_IF_CLEAN: envBoolean(true),
  VALIDATION_PROBLEMS_ENABLED: z.string().default(DEFAULT_ENABLED_PROBLEMS.join(',')),
  VALIDATION_DETECTION_CONCURRENCY: z.coerce.number().int().min(1).default(availableParallelism()),
  VALIDATION_EXTRACTION_CONCURRENCY: z.coerce.number().int().min(1).default(8),
  VALIDATION_PAGE_TIMEOUT_MS: z.coerce.number().int().min(1).default(120_000),
  TABLE_NUMERICAL_VALIDATION: envBoolean(true),
  TABLE_BALANCE_TOLERANCE: z.coerce.number().min(0).default(0.01),
  TABLE_MAX_BALANCE_CHANGE: z.coerce.number().positive().default(0.5),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
});

export interface ValidationConfig {
  enabled: boolean;
  sampleRate: number;
  similarityThreshold: number;
  similarityMethod: (typeof SIMILARITY_METHODS)[number];
  skipSampleIfClean: boolean;
  enabledProblems: readonly ProblemName[];
  /**
   * Pages checked between event-loop yields. Detection runs on the main
   * thread, so this bounds interleaving rather than CPU parallelism.
   */
  detectionConcurrency: number;
  extractionConcurrency: number;
  pageTimeoutMs: number;
}

export interface TableConfig {
  numericalValidation: boolean;
  balanceTolerance: number;
  maxBalanceChangeRatio: number;
}

export interface ProviderConfig {
  provider: 'gemini' | 'anthropic';
  geminiApiKey?: string;
  geminiModel: string;
  anthropicApiKey?: string;
  anthropicModel: string;
}

export interface AppConfig {
  validation: ValidationConfig;
  tables: TableConfig;
  providers: ProviderConfig;
  redisUrl: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

function isProblemName(name: string): name is ProblemName {
  return (PROBLEM_NAMES as readonly string[]).includes(name);
}

function isSimilarityMethod(name: string): name is ValidationConfig['similarityMethod'] {
  return (SIMILARITY_METHODS as readonly string[]).includes(name);
}

/**
 * Parse a comma-separated list of problem names. `all` enables every detector;
 * unknown names are dropped with a warning.
 */
export function parseProblemList(raw: string): ProblemName[] {
  const names = raw
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);

  if (names.some((name) => name.toLowerCase() === 'all')) {
    return [...PROBLEM_NAMES];
  }

  const enabled: ProblemName[] = [];
  for (const name of names) {
    if (!isProblemName(name)) {
      console.warn(`[Config] Unknown problem pattern "${name}", ignoring`);
      continue;
    }
    if (!enabled.includes(name)) enabled.push(name);
  }
  return enabled;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;

  let similarityMethod: ValidationConfig['similarityMethod'] = 'number_frequency';
  if (isSimilarityMethod(vars.VALIDATION_SIMILARITY_METHOD)) {
    similarityMethod = vars.VALIDATION_SIMILARITY_METHOD;
  } else {
    console.warn(
      `[Config] Unknown similarity method "${vars.VALIDATION_SIMILARITY_METHOD}", using number_frequency`
    );
  }

  const config: AppConfig = {
    validation: {
      enabled: vars.ENABLE_CROSS_VALIDATION,
      sampleRate: vars.VALIDATION_SAMPLE_RATE,
      similarityThreshold: vars.VALIDATION_SIMILARITY_THRESHOLD,
      similarityMethod,
      skipSampleIfClean: vars.VALIDATION_SKIP_SAMPLE_IF_CLEAN,
      enabledProblems: Object.freeze(parseProblemList(vars.VALIDATION_PROBLEMS_ENABLED)),
      detectionConcurrency: vars.VALIDATION_DETECTION_CONCURRENCY,
      extractionConcurrency: vars.VALIDATION_EXTRACTION_CONCURRENCY,
      pageTimeoutMs: vars.VALIDATION_PAGE_TIMEOUT_MS,
    },
    tables: {
      numericalValidation: vars.TABLE_NUMERICAL_VALIDATION,
      balanceTolerance: vars.TABLE_BALANCE_TOLERANCE,
      maxBalanceChangeRatio: vars.TABLE_MAX_BALANCE_CHANGE,
    },
    providers: {
      provider: vars.VALIDATION_PROVIDER,
      geminiApiKey: vars.GOOGLE_AI_API_KEY,
      geminiModel: vars.GEMINI_MODEL,
      anthropicApiKey: vars.ANTHROPIC_API_KEY,
      anthropicModel: vars.ANTHROPIC_MODEL,
    },
    redisUrl: vars.REDIS_URL,
  };

  return Object.freeze(config);
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
