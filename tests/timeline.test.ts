import { describe, expect, it } from 'vitest';
import {
  findChannelOverlaps,
  roundHalfUp,
  samplesToCover,
  samplesToSeconds,
  sceneEnd,
  secondsToSamples,
} from '../src/utils/timeline';

describe('sample conversion', () => {
  it('rounds half up', () => {
    expect(roundHalfUp(2.5)).toBe(3);
    expect(roundHalfUp(-2.5)).toBe(-2);
    expect(roundHalfUp(2.4999)).toBe(2);
  });

  it('converts seconds to samples and back', () => {
    expect(secondsToSamples(0.1 + 0.2, 10)).toBe(3);
    expect(secondsToSamples(1.25, 16000)).toBe(20000);
    expect(samplesToSeconds(20000, 16000)).toBe(1.25);
  });

  it('covers a duration with whole samples', () => {
    expect(samplesToCover(0.1 + 0.2, 10)).toBe(3);
    expect(samplesToCover(0.31, 10)).toBe(4);
    expect(samplesToCover(0, 10)).toBe(0);
  });
});

describe('findChannelOverlaps', () => {
  it('reports spans that intersect on the same channel', () => {
    const spans = [
      { start: 0, end: 3, channel: 0 },
      { start: 2, end: 4, channel: 1 },
      { start: 2.5, end: 5, channel: 0 },
      { start: 3, end: 6, channel: 1 },
    ];

    expect(findChannelOverlaps(spans)).toEqual([
      { channel: 0, first: 0, second: 2, amount: 0.5 },
      { channel: 1, first: 1, second: 3, amount: 1 },
    ]);
  });

  it('treats touching spans as disjoint', () => {
    expect(
      findChannelOverlaps([
        { start: 0, end: 1, channel: 0 },
        { start: 1, end: 2, channel: 0 },
      ])
    ).toEqual([]);
  });

  it('compares against the longest span so far', () => {
    const spans = [
      { start: 0, end: 10, channel: 0 },
      { start: 1, end: 2, channel: 0 },
      { start: 5, end: 6, channel: 0 },
    ];

    expect(findChannelOverlaps(spans)).toEqual([
      { channel: 0, first: 0, second: 1, amount: 1 },
      { channel: 0, first: 0, second: 2, amount: 1 },
    ]);
  });
});

describe('sceneEnd', () => {
  it('is the latest end', () => {
    expect(sceneEnd([{ end: 3 }, { end: 7.5 }, { end: 2 }])).toBe(7.5);
    expect(sceneEnd([])).toBe(0);
  });
});
