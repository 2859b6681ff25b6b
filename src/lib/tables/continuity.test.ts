import { describe, expect, it } from 'vitest';
import { rowNumbers, validateNumericalContinuity } from './continuity';

describe('rowNumbers', () => {
  it('takes the last number as the balance and records numeric columns', () => {
    const numbers = rowNumbers(['05/03', 'Salary', '2,500.00', '', '3,500.00']);
    expect(numbers.values).toEqual([5, 3, 2500, 3500]);
    expect([...numbers.positions]).toEqual([0, 2, 4]);
    expect(numbers.balance).toBe(3500);
  });

  it('reports no balance for a row without numbers', () => {
    expect(rowNumbers(['Opening', '']).balance).toBeNull();
  });
});

describe('validateNumericalContinuity', () => {
  it('rejects rows without numbers', () => {
    expect(validateNumericalContinuity(['a', 'b'], ['1', '2'])).toBe(false);
    expect(validateNumericalContinuity(['1', '2'], ['a', 'b'])).toBe(false);
  });

  it('accepts an unchanged balance within tolerance', () => {
    expect(validateNumericalContinuity(['x', '1,000.00'], ['y', '1,000.005'])).toBe(true);
  });

  it('accepts a moderate balance change', () => {
    // 1000 → 1400 is a 40% move
    expect(validateNumericalContinuity(['x', '1,000.00'], ['y', '1,400.00'])).toBe(true);
  });

  it('rejects a balance jump of 200%', () => {
    expect(validateNumericalContinuity(['x', '1,000.00'], ['y', '3,000.00'])).toBe(false);
  });

  it('does not fall back to column alignment once a nonzero balance moved too far', () => {
    expect(validateNumericalContinuity(['1', '2', '1000'], ['1', '2', '5000'])).toBe(false);
  });

  it('honours an overridden change ratio', () => {
    expect(
      validateNumericalContinuity(['x', '1000'], ['y', '3000'], { maxBalanceChangeRatio: 2.5 })
    ).toBe(true);
  });

  it('accepts a bounded balance after a zero balance', () => {
    expect(validateNumericalContinuity(['x', '0.00'], ['y', '25,000.00'])).toBe(true);
  });

  it('falls back to column alignment for a large balance after zero', () => {
    expect(validateNumericalContinuity(['1', '', '0'], ['2', '', '5,000,000'])).toBe(true);
    expect(validateNumericalContinuity(['', '', '0'], ['7', '8', '5,000,000'])).toBe(false);
  });
});
