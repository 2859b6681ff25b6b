import { describe, expect, it } from 'vitest';
import {
  SimilarityCalculator,
  fullSimilarity,
  levenshteinSimilarity,
  numberFrequencySimilarity,
  quickEstimate,
} from './similarity';

describe('quickEstimate', () => {
  it('is 1 for identical text', () => {
    expect(quickEstimate('net income 4,200', 'net income 4,200')).toBe(1);
  });

  it('is 0 when either side is empty', () => {
    expect(quickEstimate('', 'something')).toBe(0);
    expect(quickEstimate('something', '')).toBe(0);
  });

  it('gives up when lengths differ by more than five percent', () => {
    expect(quickEstimate('a', 'a b c d')).toBe(0);
  });

  it('computes Jaccard over word sets', () => {
    // {alpha, beta, gamma} vs {alpha, beta, delta}: 2 shared of 4
    expect(quickEstimate('alpha beta gamma', 'alpha beta delta')).toBe(0.5);
  });
});

describe('numberFrequencySimilarity', () => {
  it('ignores surrounding text and language', () => {
    const score = numberFrequencySimilarity(
      'Revenue: 1,234,567 ILS in 2024',
      'הכנסה: 1,234,567 ש״ח בשנת 2024'
    );
    expect(score).toBeCloseTo(1, 10);
  });

  it('ignores number formatting conventions', () => {
    const score = numberFrequencySimilarity(
      'Total: 1,234,567.89 for year 2024',
      'Sum: 1.234.567,89 in 2024'
    );
    expect(score).toBeCloseTo(1, 10);
  });

  it('treats a single misread digit as a different number', () => {
    expect(numberFrequencySimilarity('Assets: 1,234,567', 'Assets: 1,234,557')).toBe(0);
    // The shared 500,000 keeps half the vector aligned
    expect(
      numberFrequencySimilarity(
        'Assets: 1,234,567 and Debt: 500,000',
        'Assets: 1,234,557 and Debt: 500,000'
      )
    ).toBeCloseTo(0.5, 10);
  });

  it('scores a partially missing row between 0 and 1', () => {
    const score = numberFrequencySimilarity(
      'Q1: 100, Q2: 200, Q3: 300, Q4: 400',
      'Q1: 100, Q2: 200, Q4: 400'
    );
    // Quarter labels count too: 6 shared of vectors sized 8 and 6
    expect(score).toBeCloseTo(6 / Math.sqrt(48), 10);
    expect(score).toBeGreaterThan(0);
    expect(score).toBeLessThan(1);
  });

  it('handles texts without numbers', () => {
    expect(numberFrequencySimilarity('no numbers', 'none here either')).toBe(1);
    expect(numberFrequencySimilarity('no numbers', 'but 42 here')).toBe(0);
  });

  it('is exactly symmetric', () => {
    const a = '10 20 20 30 1,500.25 7';
    const b = '20 30 30 40 7 7 1500.25';
    expect(numberFrequencySimilarity(a, b)).toBe(numberFrequencySimilarity(b, a));
  });
});

describe('levenshteinSimilarity', () => {
  it('compares letters and digits only', () => {
    expect(levenshteinSimilarity('A-B-C', 'abc')).toBe(1);
    expect(levenshteinSimilarity('abc', 'abd')).toBeCloseTo(2 / 3, 10);
  });

  it('handles empty normalized text', () => {
    expect(levenshteinSimilarity('', '')).toBe(1);
    expect(levenshteinSimilarity('| --- |', '...')).toBe(1);
    expect(levenshteinSimilarity('abc', '---')).toBe(0);
  });

  it('is symmetric', () => {
    expect(levenshteinSimilarity('kitten', 'sitting')).toBe(
      levenshteinSimilarity('sitting', 'kitten')
    );
  });
});

describe('SimilarityCalculator', () => {
  it('scores identical text as 1 with either method', () => {
    const text = '| Date | Amount |\n| 01/03 | 1,000.00 |';
    expect(new SimilarityCalculator('number_frequency').similarity(text, text)).toBe(1);
    expect(new SimilarityCalculator('levenshtein').similarity(text, text)).toBe(1);
  });

  it('scores two empty pages as identical', () => {
    expect(new SimilarityCalculator().similarity('', '')).toBe(1);
  });

  it('falls through to the configured method when the quick estimate is low', () => {
    const a = 'Balance 1,000 on 2024';
    const b = 'Saldo 1.000 in 2024';
    expect(new SimilarityCalculator('number_frequency').similarity(a, b)).toBe(
      fullSimilarity(a, b, 'number_frequency')
    );
  });
});
