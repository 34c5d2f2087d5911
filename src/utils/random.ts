/**
 * Seeded randomness for scene generation and noise synthesis.
 *
 * Nothing in generation or rendering touches Math.random: every random draw
 * goes through an injected RandomSource so a seed reproduces a scene exactly.
 */

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

const GOLDEN_GAMMA = 0x9e3779b9;

/** XorShift32 generator. */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // XorShift never leaves the all-zero state
    this.state = ((seed ^ GOLDEN_GAMMA) >>> 0) || GOLDEN_GAMMA;
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state / 0x100000000;
  }
}

export function createRandom(seed: number): RandomSource {
  return new SeededRandom(seed);
}

/** Uniform float in [min, max). */
export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + (max - min) * rng.next();
}

/** Uniform integer in [min, max] inclusive. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return Math.floor(rng.next() * (max - min + 1)) + min;
}

/** Gaussian draw (Box-Muller). */
export function normal(rng: RandomSource, mean: number, std: number): number {
  const u1 = 1 - rng.next();
  const u2 = rng.next();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + std * z;
}

/** Exponential draw with the given mean. */
export function exponential(rng: RandomSource, mean: number): number {
  return -mean * Math.log(1 - rng.next());
}

export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.floor(rng.next() * items.length)];
}

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(rng: RandomSource, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng.next() * (i + 1));
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}

/** Draw a uint32 suitable for seeding a child generator. */
export function randomSeed(rng: RandomSource): number {
  return Math.floor(rng.next() * 0x100000000) >>> 0;
}
