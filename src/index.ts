export { Selector } from './core/selector.js';
export type { AcceptPredicate, ChargeMode, SelectorInit } from './core/selector.js';
export {
  DEFAULT_ACCENT,
  DEFAULT_HETEROGENEITY,
  createDefaultConfig,
  validateSelectorConfig,
} from './core/selector-config.js';
export type { SelectorConfig, ResolvedSelectorConfig } from './core/selector-config.js';
export { SelectorError, isSelectorError } from './core/selector-errors.js';
export type { SelectorErrorCode } from './core/selector-errors.js';
export { compareSchedulingValues, rankIndices, sortOptions } from './core/option-ranking.js';
export { SeededRandom } from './core/seeded-random.js';
export type { RandomSource } from './core/seeded-random.js';
