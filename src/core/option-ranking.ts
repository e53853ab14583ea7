import { SelectorError } from './selector-errors.js';

/**
 * Ascending total order over scheduling values.
 * +Infinity sorts after every finite value; NaN ties with NaN and sorts last.
 */
export function compareSchedulingValues(a: number, b: number): number {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) return aNaN === bNaN ? 0 : aNaN ? 1 : -1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Option indices ordered by value. Exact ties keep option order. */
export function rankIndices(values: readonly number[]): number[] {
  const indices = values.map((_, i) => i);
  // Array.prototype.sort is stable
  return indices.sort((i, j) => compareSchedulingValues(values[i], values[j]));
}

/** Reorder options by their values, lowest first */
export function sortOptions<T>(options: readonly T[], values: readonly number[]): T[] {
  if (options.length !== values.length) {
    throw new SelectorError(
      'InvalidConfiguration',
      `Expected ${options.length} values, got ${values.length}`,
    );
  }
  return rankIndices(values).map(i => options[i]);
}
