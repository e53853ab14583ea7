import type { RandomSource } from './seeded-random.js';
import {
  SelectorConfig,
  ResolvedSelectorConfig,
  createDefaultConfig,
  validateSelectorConfig,
  cloneConfig,
} from './selector-config.js';
import { SelectorError } from './selector-errors.js';
import { rankIndices, sortOptions } from './option-ranking.js';

/** Whether an option may be chosen at a decision. `index` is the option's canonical index. */
export type AcceptPredicate<T> = (option: T, decision: number, index: number) => boolean;

/**
 * Which statistic a decision charges.
 * - `option`: the chosen option's own statistic.
 * - `rank`: the statistic whose index equals the chosen option's position in the
 *   ranked list. Kept to reproduce sequences produced by that older rule.
 */
export type ChargeMode = 'option' | 'rank';

export interface SelectorInit<T> {
  /** Source for the default randoms matrix (default Math.random) */
  random?: RandomSource;
  accept?: AcceptPredicate<T>;
  /** Overrides applied on top of the defaults */
  config?: SelectorConfig;
  charge?: ChargeMode;
}

const acceptAll = (): boolean => true;

/**
 * Picks one option per decision so that, over many decisions, each option is
 * chosen in proportion to its weight.
 *
 * Every option carries a running debt (`statistics`). At each decision the
 * option with the lowest `debt + expected increment` wins, pays its increment,
 * and then every participating option's debt is lowered by the decision's
 * normalization value. Decisions run strictly in order since each one reads
 * the debts the previous one settled.
 *
 * Statistics persist across `populateChoices` calls, so a second run keeps
 * paying off the first run's debts. Call `reset()` for an independent run.
 *
 * `charge: 'rank'` reproduces the older sequences (e.g. `['a','b','b']` for three uniform options).
 */
export class Selector<T> {
  private readonly opts: readonly T[];
  private readonly decisionCount: number;
  private readonly accept: AcceptPredicate<T>;
  private readonly charge: ChargeMode;
  private config: ResolvedSelectorConfig;
  private stats: number[];
  private chosen: T[] = [];
  private chosenIndices: number[] = [];

  constructor(options: readonly T[], size: number, init: SelectorInit<T> = {}) {
    if (options.length === 0) {
      throw new SelectorError('InvalidConfiguration', 'Selector needs at least one option');
    }
    if (!Number.isInteger(size) || size < 0) {
      throw new SelectorError('InvalidConfiguration', `Size must be a non-negative integer, got ${size}`);
    }

    this.opts = [...options];
    this.decisionCount = size;
    this.accept = init.accept ?? acceptAll;
    this.charge = init.charge ?? 'option';
    this.config = createDefaultConfig(options.length, size, init.random ?? Math.random);
    this.stats = new Array<number>(options.length).fill(0);

    if (init.config) this.configure(init.config);
  }

  get options(): readonly T[] {
    return this.opts;
  }

  /** Number of decisions */
  get size(): number {
    return this.decisionCount;
  }

  get weights(): readonly (readonly number[])[] {
    return this.config.weights;
  }

  get randoms(): readonly (readonly number[])[] {
    return this.config.randoms;
  }

  get heterogeneities(): readonly number[] {
    return this.config.heterogeneities;
  }

  get accents(): readonly number[] {
    return this.config.accents;
  }

  /** Running fairness debt per option */
  get statistics(): readonly number[] {
    return this.stats;
  }

  get choices(): readonly T[] {
    return this.chosen;
  }

  /** Canonical option index of each choice */
  get choiceIndices(): readonly number[] {
    return this.chosenIndices;
  }

  /** Replace any of the per-decision matrices/vectors. Throws without applying anything if invalid. */
  configure(config: SelectorConfig): void {
    const errors = validateSelectorConfig(config, this.opts.length, this.decisionCount);
    if (errors.length > 0) {
      throw new SelectorError('InvalidConfiguration', `Invalid selector config:\n  ${errors.join('\n  ')}`);
    }
    this.config = { ...this.config, ...cloneConfig(config) };
  }

  /** Zero the statistics and clear the choices */
  reset(): void {
    this.stats = new Array<number>(this.opts.length).fill(0);
    this.chosen = [];
    this.chosenIndices = [];
  }

  /** Debt an option pays when chosen at a decision */
  trueIncrement(decision: number, option: number): number {
    this.checkCell(decision, option);
    const weight = this.config.weights[decision][option];
    if (weight <= 0) {
      throw new SelectorError(
        'DegenerateWeight',
        `Option ${option} has zero weight at decision ${decision} and cannot be charged`,
        decision,
      );
    }
    return this.config.accents[decision] / weight;
  }

  /** Increment plus the random perturbation. Zero weight means infinite cost. */
  expectedIncrement(decision: number, option: number): number {
    this.checkCell(decision, option);
    const weight = this.config.weights[decision][option];
    if (weight <= 0) return Infinity;
    const { accents, heterogeneities, randoms } = this.config;
    return (accents[decision] + heterogeneities[decision] * randoms[decision][option]) / weight;
  }

  normalizationValue(decision: number): number {
    this.checkDecision(decision);
    const total = this.config.weights[decision].reduce((s, w) => s + w, 0);
    return this.config.accents[decision] / total;
  }

  schedulingValues(decision: number): number[] {
    this.checkDecision(decision);
    return this.valuesAgainst(decision, this.stats);
  }

  sortOptions(values: readonly number[]): T[] {
    return sortOptions(this.opts, values);
  }

  /**
   * Choose an option for every decision, in order. Replaces previous choices.
   * If some decision has no acceptable option the call throws and leaves
   * statistics and choices as they were.
   */
  populateChoices(): readonly T[] {
    const stats = [...this.stats];
    const chosen: T[] = [];
    const chosenIndices: number[] = [];

    for (let d = 0; d < this.decisionCount; d++) {
      const values = this.valuesAgainst(d, stats);
      const ranked = rankIndices(values);
      const position = ranked.findIndex(
        o => Number.isFinite(values[o]) && this.accept(this.opts[o], d, o),
      );
      if (position < 0) {
        throw new SelectorError('NoAcceptableOption', `No acceptable option at decision ${d}`, d);
      }

      const picked = ranked[position];
      chosen.push(this.opts[picked]);
      chosenIndices.push(picked);

      const row = this.config.weights[d];
      const charged = this.charge === 'rank' ? position : picked;
      // In rank mode the charged slot can hold a zero-weight option; it pays nothing
      if (row[charged] > 0) stats[charged] += this.trueIncrement(d, charged);

      const normalization = this.normalizationValue(d);
      for (let o = 0; o < stats.length; o++) {
        if (row[o] > 0) stats[o] -= normalization;
      }
    }

    this.stats = stats;
    this.chosen = chosen;
    this.chosenIndices = chosenIndices;
    return this.chosen;
  }

  /** Distance between the highest and lowest debt */
  statisticsSpread(): number {
    return Math.max(...this.stats) - Math.min(...this.stats);
  }

  private checkDecision(decision: number): void {
    if (!Number.isInteger(decision) || decision < 0 || decision >= this.decisionCount) {
      throw new SelectorError(
        'InvalidConfiguration',
        `Decision ${decision} out of range [0, ${this.decisionCount})`,
      );
    }
  }

  private checkCell(decision: number, option: number): void {
    this.checkDecision(decision);
    if (!Number.isInteger(option) || option < 0 || option >= this.opts.length) {
      throw new SelectorError(
        'InvalidConfiguration',
        `Option ${option} out of range [0, ${this.opts.length})`,
        decision,
      );
    }
  }

  private valuesAgainst(decision: number, stats: readonly number[]): number[] {
    return stats.map((s, o) => s + this.expectedIncrement(decision, o));
  }
}
