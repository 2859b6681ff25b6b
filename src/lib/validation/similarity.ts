/**
 * Similarity scores in [0, 1] between two extractions of the same page.
 */

import { distance } from 'fastest-levenshtein';
import type { SimilarityMethod } from '@/types/validation';
import { extractNumbers, normalizeForComparison } from './content-normalizer';

/** Quick estimates above this skip the full comparison */
const QUICK_EXIT_THRESHOLD = 0.95;
/** Relative length difference beyond which the quick estimate gives up */
const QUICK_MAX_LENGTH_DIFF = 0.05;

function clamp(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function frequencies(values: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

/**
 * Jaccard similarity of whitespace-separated word sets, or 0 when the texts
 * differ in length by more than 5%. Only used as an early exit.
 */
export function quickEstimate(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  if (Math.abs(a.length - b.length) / Math.max(a.length, b.length) > QUICK_MAX_LENGTH_DIFF) {
    return 0;
  }

  const wordsA = new Set(a.split(/\s+/).filter(Boolean));
  const wordsB = new Set(b.split(/\s+/).filter(Boolean));
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }
  const union = wordsA.size + wordsB.size - intersection;
  return union > 0 ? intersection / union : 0;
}

/**
 * Cosine similarity between the number frequency vectors of both texts.
 * Text and formatting are ignored entirely.
 */
export function numberFrequencySimilarity(a: string, b: string): number {
  const freqA = frequencies(extractNumbers(a));
  const freqB = frequencies(extractNumbers(b));

  if (freqA.size === 0 && freqB.size === 0) return 1;
  if (freqA.size === 0 || freqB.size === 0) return 0;

  // Fixed key order keeps the floating-point sums identical for (a, b) and (b, a)
  const keys = [...new Set([...freqA.keys(), ...freqB.keys()])].sort();

  let dot = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;
  for (const key of keys) {
    const x = freqA.get(key) ?? 0;
    const y = freqB.get(key) ?? 0;
    dot += x * y;
    magnitudeA += x * x;
    magnitudeB += y * y;
  }

  if (magnitudeA === 0 || magnitudeB === 0) return 0;
  return clamp(dot / (Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB)));
}

/**
 * 1 - normalized edit distance over letters and digits only.
 */
export function levenshteinSimilarity(a: string, b: string): number {
  const normalizedA = normalizeForComparison(a);
  const normalizedB = normalizeForComparison(b);

  if (!normalizedA && !normalizedB) return 1;
  if (!normalizedA || !normalizedB) return 0;

  const maxLength = Math.max(normalizedA.length, normalizedB.length);
  return clamp(1 - distance(normalizedA, normalizedB) / maxLength);
}

export function fullSimilarity(a: string, b: string, method: SimilarityMethod): number {
  switch (method) {
    case 'number_frequency':
      return numberFrequencySimilarity(a, b);
    case 'levenshtein':
      return levenshteinSimilarity(a, b);
  }
}

export class SimilarityCalculator {
  constructor(private readonly method: SimilarityMethod = 'number_frequency') {}

  similarity(a: string, b: string): number {
    const quick = quickEstimate(a, b);
    if (quick > QUICK_EXIT_THRESHOLD) return quick;
    return fullSimilarity(a, b, this.method);
  }
}
