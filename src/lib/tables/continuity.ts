/**
 * Numeric continuity between the last row of one table fragment and the
 * first row of the next: do they read as one running ledger?
 */

import { extractNumbers } from '@/lib/validation/content-normalizer';

export const DEFAULT_BALANCE_TOLERANCE = 0.01;
/** A single step that moves the running balance by this share or more is not a continuation */
export const DEFAULT_MAX_BALANCE_CHANGE_RATIO = 0.5;
/** Upper bound for a first balance following a zero balance */
export const DEFAULT_ZERO_BALANCE_CEILING = 1_000_000;
/** Share of numeric column positions that must line up in the structural fallback */
export const DEFAULT_MIN_COLUMN_OVERLAP = 0.5;

export interface ContinuityOptions {
  balanceTolerance?: number;
  maxBalanceChangeRatio?: number;
  zeroBalanceCeiling?: number;
  minColumnOverlap?: number;
}

export interface RowNumbers {
  values: number[];
  /** Indices of the cells holding at least one number */
  positions: Set<number>;
  /** Last number in the row, conventionally the running balance */
  balance: number | null;
}

export function rowNumbers(row: readonly string[]): RowNumbers {
  const values: number[] = [];
  const positions = new Set<number>();

  row.forEach((cell, index) => {
    for (const token of extractNumbers(cell.trim())) {
      const value = Number.parseFloat(token);
      if (Number.isFinite(value)) {
        values.push(value);
        positions.add(index);
      }
    }
  });

  return { values, positions, balance: values.at(-1) ?? null };
}

export function validateNumericalContinuity(
  previousRow: readonly string[],
  currentRow: readonly string[],
  options: ContinuityOptions = {}
): boolean {
  const tolerance = options.balanceTolerance ?? DEFAULT_BALANCE_TOLERANCE;
  const maxChange = options.maxBalanceChangeRatio ?? DEFAULT_MAX_BALANCE_CHANGE_RATIO;
  const zeroCeiling = options.zeroBalanceCeiling ?? DEFAULT_ZERO_BALANCE_CEILING;
  const minOverlap = options.minColumnOverlap ?? DEFAULT_MIN_COLUMN_OVERLAP;

  const previous = rowNumbers(previousRow);
  const current = rowNumbers(currentRow);

  if (previous.balance === null || current.balance === null) {
    return false;
  }

  const difference = Math.abs(current.balance - previous.balance);
  if (difference <= tolerance) {
    return true;
  }

  if (previous.balance !== 0) {
    const change = difference / Math.abs(previous.balance);
    if (change >= maxChange) {
      console.log(
        `[TableMerger] Balance change too large (${previous.balance} → ${current.balance}, ${(change * 100).toFixed(1)}%)`
      );
    }
    return change < maxChange;
  }

  if (Math.abs(current.balance) < zeroCeiling) {
    return true;
  }

  // Structural fallback: numbers sit in the same columns
  let overlap = 0;
  for (const position of previous.positions) {
    if (current.positions.has(position)) overlap++;
  }
  const total = Math.max(previous.positions.size, current.positions.size);
  return total > 0 && overlap / total >= minOverlap;
}
