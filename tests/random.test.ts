import { describe, expect, it } from 'vitest';
import {
  SeededRandom,
  createRandom,
  exponential,
  normal,
  pick,
  randomInt,
  randomSeed,
  shuffle,
  uniform,
  type RandomSource,
} from '../src/utils/random';

function fixed(values: number[]): RandomSource {
  let index = 0;
  return { next: () => values[index++ % values.length] };
}

describe('SeededRandom', () => {
  it('repeats a sequence for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const c = new SeededRandom(43);
    const first = Array.from({ length: 5 }, () => a.next());

    expect(Array.from({ length: 5 }, () => b.next())).toEqual(first);
    expect(Array.from({ length: 5 }, () => c.next())).not.toEqual(first);
  });

  it('stays in [0, 1)', () => {
    const rng = createRandom(0);
    for (let i = 0; i < 1000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('does not get stuck for the seed that maps to zero state', () => {
    const rng = new SeededRandom(0x9e3779b9);
    expect(rng.next()).not.toBe(0);
  });
});

describe('draw helpers', () => {
  it('scales uniform and integer draws', () => {
    expect(uniform(fixed([0.25]), 2, 6)).toBe(3);
    expect(randomInt(fixed([0.99]), 1, 3)).toBe(3);
    expect(randomInt(fixed([0]), 1, 3)).toBe(1);
  });

  it('draws an exponential with the given mean', () => {
    expect(exponential(fixed([0]), 2)).toBeCloseTo(0, 12);
    expect(exponential(fixed([0.5]), 2)).toBeCloseTo(2 * Math.LN2, 12);
  });

  it('centres normal draws on the mean', () => {
    // u1 = 1 - 0 gives z = 0
    expect(normal(fixed([0, 0.3]), 1.5, 2)).toBe(1.5);
  });

  it('picks and shuffles without losing items', () => {
    expect(pick(fixed([0.5]), ['a', 'b', 'c'])).toBe('b');
    expect(() => pick(fixed([0.5]), [])).toThrow('Cannot pick from an empty list');

    const items = [1, 2, 3, 4, 5];
    const shuffled = shuffle(createRandom(3), items);
    expect([...shuffled].sort()).toEqual(items);
    expect(items).toEqual([1, 2, 3, 4, 5]);
  });

  it('draws uint32 seeds', () => {
    expect(randomSeed(fixed([0.5]))).toBe(0x80000000);
    expect(randomSeed(fixed([0]))).toBe(0);
  });
});
