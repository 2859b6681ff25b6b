/**
 * Heuristic quality checks over a page of extracted markdown.
 *
 * Each detector is a pure predicate over the page text. Only the detectors
 * named in the enabled list run, so a narrower list is cheaper.
 */

import { z } from 'zod';
import keywordsFile from '@/data/domain-keywords.json';
import type { DetectedProblem, Page, ProblemName, ProblemSet } from '@/types/validation';
import { extractNumbers as defaultExtractNumbers } from './content-normalizer';

type Detector = (text: string) => boolean;

export type NumberExtractor = (text: string) => string[];

const keywordsSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
});

const DOMAIN_KEYWORDS: readonly string[] = keywordsSchema
  .parse(keywordsFile)
  .keywords.map((keyword) => keyword.toLowerCase());

const EMPTY_TABLE_ROWS = /(?:\|\s*\|\s*\|[^\n]*\n){5,}/;
const REPEATED_CHARACTER = /(.)\1{9,}/g;
const ALLOWED_REPEATS = new Set([' ', '-', '_', '=', '*']);
const COMMON_PUNCTUATION = new Set(' \n\t.,;:!?-()[]{}"\'/\\|');
const UNKNOWN_GLYPHS = new Set(['□', '�', '☐', '▯', '▢', '▣']);
const STANDALONE_QUESTION_MARK = /\s\?\s/g;
const REPEATED_TABLE_NUMBER = /\|\s*(\d+(?:[.,]\d+)?)\s*\|(?:\s*\1\s*\|){2,}/;
const REPEATED_TEXT_NUMBER = /\b(\d+(?:[.,]\d+)?)\s+(?:\1\s+){2,}/;
/**
 * Rows treated as separator candidates by malformed_structure. A single `-`
 * is not enough: data rows with negative amounts would qualify.
 */
const SEPARATOR_MARKER = '---';
const MARKDOWN_IMAGE = /!\[([^\]]*)\]\(([^)]+)\)/;

/** Thresholds */
const MIN_ALPHANUMERIC = 100;
const MIN_TABLE_ROWS_FOR_NUMBERS = 5;
const MAX_SPECIAL_RATIO = 0.2;
const MIN_PAGE_LENGTH = 200;
const MIN_LENGTH_FOR_KEYWORDS = 500;
const MIN_VALID_SEPARATOR_RATIO = 0.7;
const MIN_DUPLICATE_LENGTH = 50;
const MIN_DUPLICATE_COUNT = 3;
const MAX_UNKNOWN_RATIO = 0.05;

function isAlphanumeric(char: string): boolean {
  return /[\p{L}\p{N}]/u.test(char);
}

function countAlphanumeric(text: string): number {
  return text.match(/[\p{L}\p{N}]/gu)?.length ?? 0;
}

function tableLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.startsWith('|'));
}

function countChar(text: string, char: string): number {
  return text.split(char).length - 1;
}

export class ProblemDetector {
  private readonly detectors: Record<ProblemName, Detector>;

  constructor(private readonly extractNumbers: NumberExtractor = defaultExtractNumbers) {
    this.detectors = {
      empty_tables: (text) => EMPTY_TABLE_ROWS.test(text),
      low_content_density: (text) => countAlphanumeric(text) < MIN_ALPHANUMERIC,
      missing_numbers: (text) => this.detectMissingNumbers(text),
      inconsistent_columns: detectInconsistentColumns,
      repeated_characters: detectRepeatedCharacters,
      garbled_text: detectGarbledText,
      header_only_tables: detectHeaderOnlyTables,
      very_short_pages: (text) => text.trim().length < MIN_PAGE_LENGTH,
      missing_keywords: detectMissingKeywords,
      malformed_structure: detectMalformedStructure,
      duplicate_content: detectDuplicateContent,
      unknown_characters: detectUnknownCharacters,
      repetitive_numbers: (text) =>
        REPEATED_TABLE_NUMBER.test(text) || REPEATED_TEXT_NUMBER.test(text),
      markdown_images: (text) => MARKDOWN_IMAGE.test(text),
    } satisfies Record<ProblemName, Detector>;
  }

  /**
   * Run the enabled detectors. The result has exactly one entry per enabled name.
   */
  detectAll(text: string, enabled: readonly ProblemName[]): ProblemSet {
    const problems: ProblemSet = {};
    for (const name of enabled) {
      problems[name] = this.detectors[name](text);
    }
    return problems;
  }

  /** Names of the enabled detectors that fired. */
  detect(text: string, enabled: readonly ProblemName[]): Set<ProblemName> {
    const found = new Set<ProblemName>();
    for (const name of enabled) {
      if (this.detectors[name](text)) found.add(name);
    }
    return found;
  }

  hasAnyProblem(
    text: string,
    enabled: readonly ProblemName[]
  ): { hasProblem: boolean; problems: DetectedProblem[] } {
    if (!text) {
      return { hasProblem: true, problems: ['empty_content'] };
    }
    const problems = [...this.detect(text, enabled)];
    return { hasProblem: problems.length > 0, problems };
  }

  detectBatch(
    pages: readonly Page[],
    enabled: readonly ProblemName[]
  ): Map<number, DetectedProblem[]> {
    const results = new Map<number, DetectedProblem[]>();
    for (const page of pages) {
      results.set(page.index, this.hasAnyProblem(page.text, enabled).problems);
    }

    const flagged = [...results.values()].filter((problems) => problems.length > 0).length;
    console.log(`[ProblemDetector] ${flagged}/${pages.length} pages flagged`);
    return results;
  }

  private detectMissingNumbers(text: string): boolean {
    const estimatedRows = countChar(text, '|') / 4;
    if (estimatedRows < MIN_TABLE_ROWS_FOR_NUMBERS) return false;
    return this.extractNumbers(text).length === 0;
  }
}

function detectInconsistentColumns(text: string): boolean {
  const lines = tableLines(text);
  if (lines.length < 3) return false;
  const counts = new Set(lines.map((line) => countChar(line, '|') - 1));
  // One extra count is tolerated for the separator row
  return counts.size > 2;
}

function detectRepeatedCharacters(text: string): boolean {
  for (const match of text.matchAll(REPEATED_CHARACTER)) {
    if (!ALLOWED_REPEATS.has(match[1] ?? '')) return true;
  }
  return false;
}

function detectGarbledText(text: string): boolean {
  if (!text) return false;
  let alphanumeric = 0;
  let special = 0;
  for (const char of text) {
    if (isAlphanumeric(char)) alphanumeric++;
    else if (!COMMON_PUNCTUATION.has(char)) special++;
  }
  if (alphanumeric === 0) return true;
  return special / alphanumeric > MAX_SPECIAL_RATIO;
}

function detectHeaderOnlyTables(text: string): boolean {
  const lines = tableLines(text);
  if (lines.length < 2) return false;
  const separatorIndex = lines.findIndex((line) => line.includes('---'));
  if (separatorIndex === -1) return false;
  return lines.length - separatorIndex - 1 <= 1;
}

function detectMissingKeywords(text: string): boolean {
  if (text.length < MIN_LENGTH_FOR_KEYWORDS) return false;
  const lower = text.toLowerCase();
  return !DOMAIN_KEYWORDS.some((keyword) => lower.includes(keyword));
}

function detectMalformedStructure(text: string): boolean {
  const lines = tableLines(text);
  if (lines.length < 2) return false;

  for (const separator of lines.filter((line) => line.includes(SEPARATOR_MARKER))) {
    const cells = separator
      .split('|')
      .map((cell) => cell.trim())
      .filter(Boolean);
    if (cells.length === 0) continue;
    const valid = cells.filter((cell) => /^[- ]+$/.test(cell)).length;
    if (valid / cells.length < MIN_VALID_SEPARATOR_RATIO) return true;
  }
  return false;
}

function detectDuplicateContent(text: string): boolean {
  const paragraphs = text
    .split('\n\n')
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);
  if (paragraphs.length < MIN_DUPLICATE_COUNT) return false;

  const counts = new Map<string, number>();
  for (const paragraph of paragraphs) {
    counts.set(paragraph, (counts.get(paragraph) ?? 0) + 1);
  }
  for (const [paragraph, count] of counts) {
    if (count >= MIN_DUPLICATE_COUNT && paragraph.length > MIN_DUPLICATE_LENGTH) return true;
  }
  return false;
}

function detectUnknownCharacters(text: string): boolean {
  const chars = [...text];
  if (chars.length === 0) return false;
  let unknown = chars.filter((char) => UNKNOWN_GLYPHS.has(char)).length;
  unknown += text.match(STANDALONE_QUESTION_MARK)?.length ?? 0;
  return unknown / chars.length > MAX_UNKNOWN_RATIO;
}
