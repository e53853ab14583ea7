/**
 * Feed CLI library — argument parsing and reporting, kept apart from the
 * entry point so it can be tested.
 */
import { parseArgs } from 'node:util';

import { Selector } from '../src/core/selector.js';
import type { ChargeMode } from '../src/core/selector.js';
import type { SelectorConfig } from '../src/core/selector-config.js';
import { SeededRandom } from '../src/core/seeded-random.js';

export const DEFAULT_FEED_SIZE = 10;

export interface FeedSettings {
  options: string[];
  size: number;
  seed?: number;
  /** One weight per option, reused for every decision */
  weights?: number[];
  heterogeneity?: number;
  accent?: number;
  charge: ChargeMode;
}

export interface FeedResult {
  options: string[];
  choices: string[];
  counts: number[];
  statistics: number[];
  spread: number;
}

// ============================================================
// Arguments
// ============================================================

export function parseFeedArgs(argv: string[]): FeedSettings {
  const { values } = parseArgs({
    args: argv,
    options: {
      options: { type: 'string', short: 'o' },
      size: { type: 'string', short: 'n' },
      seed: { type: 'string', short: 's' },
      weights: { type: 'string', short: 'w' },
      heterogeneity: { type: 'string' },
      accent: { type: 'string' },
      charge: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });

  if (!values.options) throw new Error('Missing --options (comma-separated list)');
  const options = splitList(values.options);
  if (options.length === 0) throw new Error('--options must name at least one option');

  const size = values.size === undefined ? DEFAULT_FEED_SIZE : parseNumber('size', values.size);
  if (!Number.isInteger(size) || size < 0) throw new Error(`--size must be a non-negative integer, got ${values.size}`);

  const settings: FeedSettings = { options, size, charge: parseCharge(values.charge) };

  if (values.seed !== undefined) settings.seed = parseNumber('seed', values.seed);
  if (values.weights !== undefined) {
    settings.weights = splitList(values.weights).map(w => parseNumber('weights', w));
    if (settings.weights.length !== options.length) {
      throw new Error(`--weights needs ${options.length} values, got ${settings.weights.length}`);
    }
  }
  if (values.heterogeneity !== undefined) settings.heterogeneity = parseNumber('heterogeneity', values.heterogeneity);
  if (values.accent !== undefined) settings.accent = parseNumber('accent', values.accent);

  return settings;
}

function splitList(raw: string): string[] {
  return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseNumber(flag: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(n)) throw new Error(`--${flag} expects a number, got "${raw}"`);
  return n;
}

function parseCharge(raw: string | undefined): ChargeMode {
  if (raw === undefined || raw === 'option') return 'option';
  if (raw === 'rank') return 'rank';
  throw new Error(`--charge must be "option" or "rank", got "${raw}"`);
}

// ============================================================
// Running
// ============================================================

export function feedConfig(settings: FeedSettings): SelectorConfig {
  const { size } = settings;
  const config: SelectorConfig = {};
  const { weights } = settings;
  if (weights) config.weights = Array.from({ length: size }, () => [...weights]);
  if (settings.heterogeneity !== undefined) config.heterogeneities = new Array<number>(size).fill(settings.heterogeneity);
  if (settings.accent !== undefined) config.accents = new Array<number>(size).fill(settings.accent);
  return config;
}

export function runFeed(settings: FeedSettings): FeedResult {
  const random = settings.seed === undefined ? undefined : new SeededRandom(settings.seed).source();
  const selector = new Selector(settings.options, settings.size, {
    random,
    config: feedConfig(settings),
    charge: settings.charge,
  });
  const choices = [...selector.populateChoices()];

  return {
    options: settings.options,
    choices,
    counts: countChoices(settings.options, choices),
    statistics: [...selector.statistics],
    spread: selector.statisticsSpread(),
  };
}

/** Occurrences of each option, in option order */
export function countChoices<T>(options: readonly T[], choices: readonly T[]): number[] {
  return options.map(option => choices.filter(c => c === option).length);
}

// ============================================================
// Reporting
// ============================================================

export function formatFeedReport(result: FeedResult): string[] {
  const total = result.choices.length;
  const lines = [`Choices (${total}): ${result.choices.join(' ')}`];
  result.options.forEach((option, i) => {
    const count = result.counts[i];
    const share = total === 0 ? 0 : (100 * count) / total;
    lines.push(`  ${option}: ${count} (${share.toFixed(1)}%), debt ${result.statistics[i].toFixed(3)}`);
  });
  lines.push(`Debt spread: ${result.spread.toFixed(3)}`);
  return lines;
}
