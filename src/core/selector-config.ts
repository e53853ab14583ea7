import type { RandomSource } from './seeded-random.js';

export const DEFAULT_HETEROGENEITY = 0.1;
export const DEFAULT_ACCENT = 1.0;

/**
 * Per-decision configuration. Each field is optional and, when given,
 * replaces the whole matrix or vector.
 */
export interface SelectorConfig {
  /** M rows of N non-negative weights; weights[d][o] is option o's priority at decision d */
  weights?: number[][];
  /** M rows of N perturbation draws, normally uniform in [0, 1) */
  randoms?: number[][];
  /** Length M; scales the random term of each decision */
  heterogeneities?: number[];
  /** Length M; scales the debt charged at each decision */
  accents?: number[];
}

export type ResolvedSelectorConfig = Required<SelectorConfig>;

/** Uniform weights, fresh random draws, default heterogeneity and accent */
export function createDefaultConfig(
  optionCount: number,
  size: number,
  random: RandomSource,
): ResolvedSelectorConfig {
  const weights: number[][] = [];
  const randoms: number[][] = [];
  for (let d = 0; d < size; d++) {
    weights.push(new Array<number>(optionCount).fill(1 / optionCount));
    const row: number[] = [];
    for (let o = 0; o < optionCount; o++) row.push(random());
    randoms.push(row);
  }
  return {
    weights,
    randoms,
    heterogeneities: new Array<number>(size).fill(DEFAULT_HETEROGENEITY),
    accents: new Array<number>(size).fill(DEFAULT_ACCENT),
  };
}

/** Validate config dimensions and values. Returns array of error strings (empty = valid). */
export function validateSelectorConfig(
  config: SelectorConfig,
  optionCount: number,
  size: number,
): string[] {
  const errors: string[] = [];

  if (config.weights) {
    checkMatrix(errors, 'weights', config.weights, optionCount, size);
    config.weights.forEach((row, d) => row.forEach((w, o) => {
      if (Number.isFinite(w) && w < 0) errors.push(`weights[${d}][${o}]: must be non-negative, got ${w}`);
    }));
  }
  if (config.randoms) checkMatrix(errors, 'randoms', config.randoms, optionCount, size);
  if (config.heterogeneities) checkVector(errors, 'heterogeneities', config.heterogeneities, size);
  if (config.accents) checkVector(errors, 'accents', config.accents, size);

  return errors;
}

/** Copy every provided field so callers can't mutate engine state through their arrays */
export function cloneConfig(config: SelectorConfig): SelectorConfig {
  const out: SelectorConfig = {};
  if (config.weights) out.weights = config.weights.map(row => [...row]);
  if (config.randoms) out.randoms = config.randoms.map(row => [...row]);
  if (config.heterogeneities) out.heterogeneities = [...config.heterogeneities];
  if (config.accents) out.accents = [...config.accents];
  return out;
}

function checkVector(errors: string[], name: string, values: number[], size: number): void {
  if (values.length !== size) {
    errors.push(`${name}: expected ${size} entries, got ${values.length}`);
  }
  values.forEach((v, d) => {
    if (!Number.isFinite(v)) errors.push(`${name}[${d}]: must be a finite number, got ${v}`);
  });
}

function checkMatrix(
  errors: string[],
  name: string,
  rows: number[][],
  optionCount: number,
  size: number,
): void {
  if (rows.length !== size) {
    errors.push(`${name}: expected ${size} rows, got ${rows.length}`);
  }
  rows.forEach((row, d) => {
    if (row.length !== optionCount) {
      errors.push(`${name}[${d}]: expected ${optionCount} entries, got ${row.length}`);
    }
    row.forEach((v, o) => {
      if (!Number.isFinite(v)) errors.push(`${name}[${d}][${o}]: must be a finite number, got ${v}`);
    });
  });
}
