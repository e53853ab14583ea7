import { describe, it, expect } from 'vitest';
import { Selector, SeededRandom, SelectorError, DEFAULT_ACCENT, DEFAULT_HETEROGENEITY } from '../src/index.js';

describe('package entry', () => {
  it('exposes a working selector', () => {
    const rng = new SeededRandom(1);
    const s = new Selector(['a', 'b', 'c'], 3, { random: rng.source() });
    expect([...s.populateChoices()].sort()).toEqual(['a', 'b', 'c']);
    expect(s.accents).toEqual([DEFAULT_ACCENT, DEFAULT_ACCENT, DEFAULT_ACCENT]);
    expect(s.heterogeneities[0]).toBe(DEFAULT_HETEROGENEITY);
  });

  it('exposes the error type', () => {
    expect(() => new Selector([], 1)).toThrow(SelectorError);
  });
});
