import { describe, it, expect } from 'vitest';
import {
  parseFeedArgs,
  feedConfig,
  runFeed,
  countChoices,
  formatFeedReport,
  DEFAULT_FEED_SIZE,
} from '../../scripts/feed-lib.js';
import type { FeedResult } from '../../scripts/feed-lib.js';

// ============================================================
// parseFeedArgs
// ============================================================

describe('parseFeedArgs', () => {
  it('applies defaults', () => {
    expect(parseFeedArgs(['--options', 'a,b,c'])).toEqual({
      options: ['a', 'b', 'c'],
      size: DEFAULT_FEED_SIZE,
      charge: 'option',
    });
  });

  it('reads every flag', () => {
    const settings = parseFeedArgs([
      '--options', 'x, y',
      '--size', '6',
      '--seed', '42',
      '--weights', '2,1',
      '--heterogeneity', '0.2',
      '--accent', '1.5',
      '--charge', 'rank',
    ]);
    expect(settings).toEqual({
      options: ['x', 'y'],
      size: 6,
      seed: 42,
      weights: [2, 1],
      heterogeneity: 0.2,
      accent: 1.5,
      charge: 'rank',
    });
  });

  it('accepts short flags', () => {
    const settings = parseFeedArgs(['-o', 'a,b', '-n', '3', '-s', '1', '-w', '1,1']);
    expect(settings.options).toEqual(['a', 'b']);
    expect(settings.size).toBe(3);
    expect(settings.seed).toBe(1);
    expect(settings.weights).toEqual([1, 1]);
  });

  it('requires options', () => {
    expect(() => parseFeedArgs(['--size', '3'])).toThrow('Missing --options');
  });

  it('rejects an empty option list', () => {
    expect(() => parseFeedArgs(['--options', ' , '])).toThrow('--options must name at least one option');
  });

  it('rejects a fractional size', () => {
    expect(() => parseFeedArgs(['--options', 'a', '--size=2.5'])).toThrow('--size must be a non-negative integer, got 2.5');
  });

  it('rejects non-numeric values', () => {
    expect(() => parseFeedArgs(['--options', 'a', '--seed', 'abc'])).toThrow('--seed expects a number, got "abc"');
  });

  it('requires one weight per option', () => {
    expect(() => parseFeedArgs(['--options', 'a,b', '--weights', '1'])).toThrow('--weights needs 2 values, got 1');
  });

  it('rejects unknown charge modes', () => {
    expect(() => parseFeedArgs(['--options', 'a', '--charge', 'both'])).toThrow('--charge must be "option" or "rank", got "both"');
  });

  it('rejects unknown flags', () => {
    expect(() => parseFeedArgs(['--options', 'a', '--verbose'])).toThrow();
  });
});

// ============================================================
// feedConfig / runFeed
// ============================================================

describe('feedConfig', () => {
  it('expands single values to every decision', () => {
    const config = feedConfig({ options: ['a', 'b'], size: 2, weights: [3, 1], accent: 2, charge: 'option' });
    expect(config).toEqual({ weights: [[3, 1], [3, 1]], accents: [2, 2] });
  });

  it('leaves unset fields out', () => {
    expect(feedConfig({ options: ['a'], size: 4, charge: 'option' })).toEqual({});
  });
});

describe('runFeed', () => {
  it('visits every option once over a full uniform cycle', () => {
    const result = runFeed({ options: ['a', 'b', 'c'], size: 3, seed: 1, charge: 'option' });
    expect(result.choices).toHaveLength(3);
    expect(result.counts).toEqual([1, 1, 1]);
    expect(result.spread).toBeCloseTo(0, 10);
  });

  it('is deterministic for a seed', () => {
    const settings = { options: ['a', 'b', 'c'], size: 25, seed: 9, weights: [3, 2, 1], charge: 'option' as const };
    expect(runFeed(settings).choices).toEqual(runFeed(settings).choices);
  });

  it('never picks a zero-weight option', () => {
    const result = runFeed({ options: ['a', 'b'], size: 5, weights: [1, 0], charge: 'option' });
    expect(result.choices).toEqual(['a', 'a', 'a', 'a', 'a']);
    expect(result.counts).toEqual([5, 0]);
    expect(result.statistics).toEqual([0, 0]);
  });

  it('surfaces selector errors', () => {
    expect(() => runFeed({ options: ['a', 'b'], size: 2, weights: [0, 0], charge: 'option' }))
      .toThrow('No acceptable option at decision 0');
  });
});

// ============================================================
// countChoices / formatFeedReport
// ============================================================

describe('countChoices', () => {
  it('counts in option order', () => {
    expect(countChoices(['a', 'b', 'c'], ['c', 'a', 'c'])).toEqual([1, 0, 2]);
  });
});

describe('formatFeedReport', () => {
  it('lists choices, shares and debts', () => {
    const result: FeedResult = {
      options: ['a', 'b'],
      choices: ['a', 'b', 'a', 'a'],
      counts: [3, 1],
      statistics: [0.5, -1.25],
      spread: 1.75,
    };
    expect(formatFeedReport(result)).toEqual([
      'Choices (4): a b a a',
      '  a: 3 (75.0%), debt 0.500',
      '  b: 1 (25.0%), debt -1.250',
      'Debt spread: 1.750',
    ]);
  });

  it('handles an empty feed', () => {
    const result: FeedResult = { options: ['a'], choices: [], counts: [0], statistics: [0], spread: 0 };
    expect(formatFeedReport(result)).toEqual([
      'Choices (0): ',
      '  a: 0 (0.0%), debt 0.000',
      'Debt spread: 0.000',
    ]);
  });
});
