import { afterEach, describe, expect, it, vi } from 'vitest';
import { resolveSceneConfig, sceneConfigFromEnv } from '../src/config/scene.config';
import {
  RandomTurnPolicy,
  RoundRobinTurnPolicy,
  createTurnTakingPolicy,
} from '../src/services/scene/turn-taking';
import { ConfigError } from '../src/utils/errors';
import { createRandom } from '../src/utils/random';

const limits = { minTurn: 1, maxTurn: 4, maxOverlap: 0.5, maxGap: 0.5 };

describe('createTurnTakingPolicy', () => {
  it('builds the configured policy', () => {
    expect(createTurnTakingPolicy(resolveSceneConfig())).toBeInstanceOf(RandomTurnPolicy);
    expect(createTurnTakingPolicy(resolveSceneConfig({ policy: 'round-robin' }))).toBeInstanceOf(RoundRobinTurnPolicy);
  });

  it('carries the configured limits', () => {
    const policy = createTurnTakingPolicy(resolveSceneConfig({ minTurn: 2, maxTurn: 5, maxOverlap: 1, maxGap: 0.25 }));
    expect(policy.limits).toEqual({ minTurn: 2, maxTurn: 5, maxOverlap: 1, maxGap: 0.25 });
  });
});

describe('turn lengths and gaps', () => {
  it('draws turn lengths between the limits', () => {
    const policy = new RandomTurnPolicy(limits, { kind: 'normal', mean: 0, std: 0.25 });
    const rng = createRandom(4);
    for (let i = 0; i < 200; i++) {
      const length = policy.turnLength(rng);
      expect(length).toBeGreaterThanOrEqual(1);
      expect(length).toBeLessThan(4);
    }
  });

  it('clamps gaps to the overlap and gap limits', () => {
    const policy = new RandomTurnPolicy(limits, { kind: 'uniform', min: -2, max: 2 });
    const rng = createRandom(9);
    const gaps = Array.from({ length: 200 }, () => policy.gap(rng));

    gaps.forEach((gap) => {
      expect(gap).toBeGreaterThanOrEqual(-0.5);
      expect(gap).toBeLessThanOrEqual(0.5);
    });
    expect(gaps).toContain(-0.5);
    expect(gaps).toContain(0.5);
  });
});

describe('speaker schedules', () => {
  it('picks only from the offered candidates', () => {
    const policy = new RandomTurnPolicy(limits, { kind: 'normal', mean: 0, std: 0.25 });
    const rng = createRandom(1);
    const schedule = policy.startConversation([1, 2, 3], rng);

    for (let i = 0; i < 50; i++) {
      expect([2, 3]).toContain(schedule.next([2, 3]));
    }
    expect(schedule.next([3])).toBe(3);
  });

  it('cycles through a fixed order and skips unavailable speakers', () => {
    const policy = new RoundRobinTurnPolicy(limits, { kind: 'normal', mean: 0, std: 0.25 });
    const schedule = policy.startConversation([1, 2, 3], createRandom(6));

    const first = schedule.next([1, 2, 3]);
    const second = schedule.next([1, 2, 3]);
    const third = schedule.next([1, 2, 3]);
    expect(new Set([first, second, third])).toEqual(new Set([1, 2, 3]));
    expect(schedule.next([1, 2, 3])).toBe(first);
    // `second` unavailable: the turn passes to `third`
    expect(schedule.next([first, third])).toBe(third);
    expect(schedule.next([1, 2, 3])).toBe(first);
  });
});

describe('scene config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('fills in defaults', () => {
    expect(resolveSceneConfig()).toEqual({
      seed: 0,
      sampleRate: 16000,
      policy: 'random',
      minTurn: 1,
      maxTurn: 8,
      maxOverlap: 0.5,
      maxGap: 0.5,
      gap: { kind: 'normal', mean: 0, std: 0.25 },
    });
  });

  it('requires overlap below the shortest turn', () => {
    expect(() => resolveSceneConfig({ minTurn: 1, maxOverlap: 1 })).toThrow(
      'Invalid scene config: maxOverlap: maxOverlap must be < minTurn'
    );
  });

  it('requires maxTurn of at least minTurn', () => {
    expect(() => resolveSceneConfig({ minTurn: 2, maxTurn: 1 })).toThrow(
      'Invalid scene config: maxTurn: maxTurn must be >= minTurn'
    );
  });

  it('rejects an inverted uniform gap range', () => {
    expect(() => resolveSceneConfig({ gap: { kind: 'uniform', min: 0.3, max: 0.1 } })).toThrow(ConfigError);
  });

  it('reads overrides from the environment', () => {
    vi.stubEnv('SCENE_SEED', '12');
    vi.stubEnv('SCENE_POLICY', 'round-robin');
    vi.stubEnv('SCENE_MAX_GAP', '0.75');

    expect(sceneConfigFromEnv()).toEqual({
      seed: 12,
      sampleRate: 16000,
      policy: 'round-robin',
      minTurn: 1,
      maxTurn: 8,
      maxOverlap: 0.5,
      maxGap: 0.75,
    });
  });

  it('rejects an unknown policy name', () => {
    vi.stubEnv('SCENE_POLICY', 'loudest-first');
    expect(() => sceneConfigFromEnv()).toThrow('Unknown SCENE_POLICY "loudest-first"');
  });
});
