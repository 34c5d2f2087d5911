// ===========================================================================
// Turn-taking policies
//
// A policy decides three things for a conversation: who speaks next (from
// the candidates the generator offers), how long they want to speak, and
// the gap before they start. The generator owns the hard rules (nobody
// speaks twice in a row, everyone is seated once, the last turn lands on
// the boundary); the policy only fills in the choices.
// ===========================================================================

import type { GapDistribution, SceneConfig, TurnPolicyName } from '../../config/scene.config';
import type { SpeakerId } from '../../types/structure.types';
import { normal, pick, shuffle, uniform, type RandomSource } from '../../utils/random';

/** Bounds shared by every policy, in seconds. */
export interface TurnLimits {
  minTurn: number;
  maxTurn: number;
  maxOverlap: number;
  maxGap: number;
}

/** Per-conversation speaker choice. */
export interface SpeakerSchedule {
  /**
   * Choose the next speaker. `candidates` is never empty, never contains the
   * previous speaker, and holds only unseated speakers while any remain.
   */
  next(candidates: readonly SpeakerId[]): SpeakerId;
}

export interface TurnTakingPolicy {
  readonly name: string;
  readonly limits: TurnLimits;
  startConversation(speakers: readonly SpeakerId[], rng: RandomSource): SpeakerSchedule;
  /** Desired turn length in seconds. */
  turnLength(rng: RandomSource): number;
  /** Seconds between the previous turn's end and the next start; negative overlaps. */
  gap(rng: RandomSource): number;
}

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

abstract class BaseTurnTakingPolicy implements TurnTakingPolicy {
  abstract readonly name: string;

  constructor(
    readonly limits: TurnLimits,
    private readonly gapDistribution: GapDistribution
  ) {}

  abstract startConversation(speakers: readonly SpeakerId[], rng: RandomSource): SpeakerSchedule;

  turnLength(rng: RandomSource): number {
    return uniform(rng, this.limits.minTurn, this.limits.maxTurn);
  }

  gap(rng: RandomSource): number {
    const raw =
      this.gapDistribution.kind === 'normal'
        ? normal(rng, this.gapDistribution.mean, this.gapDistribution.std)
        : uniform(rng, this.gapDistribution.min, this.gapDistribution.max);
    return Math.min(this.limits.maxGap, Math.max(-this.limits.maxOverlap, raw));
  }
}

// ---------------------------------------------------------------------------
// Policies
// ---------------------------------------------------------------------------

/** Uniform choice among the candidates. */
export class RandomTurnPolicy extends BaseTurnTakingPolicy {
  readonly name = 'random';

  startConversation(_speakers: readonly SpeakerId[], rng: RandomSource): SpeakerSchedule {
    return {
      next: (candidates) => pick(rng, candidates),
    };
  }
}

/**
 * Speakers take turns in a fixed order, shuffled once per conversation.
 * A candidate filter that skips someone moves on to the next in order.
 */
export class RoundRobinTurnPolicy extends BaseTurnTakingPolicy {
  readonly name = 'round-robin';

  startConversation(speakers: readonly SpeakerId[], rng: RandomSource): SpeakerSchedule {
    const order = shuffle(rng, speakers);
    let position = 0;
    return {
      next: (candidates) => {
        for (let step = 0; step < order.length; step++) {
          const index = (position + step) % order.length;
          if (candidates.includes(order[index])) {
            position = index + 1;
            return order[index];
          }
        }
        // Candidates outside the shuffled order: take the first one
        return candidates[0];
      },
    };
  }
}

export function createTurnTakingPolicy(config: SceneConfig): TurnTakingPolicy {
  const limits: TurnLimits = {
    minTurn: config.minTurn,
    maxTurn: config.maxTurn,
    maxOverlap: config.maxOverlap,
    maxGap: config.maxGap,
  };
  const name: TurnPolicyName = config.policy;
  switch (name) {
    case 'random':
      return new RandomTurnPolicy(limits, config.gap);
    case 'round-robin':
      return new RoundRobinTurnPolicy(limits, config.gap);
  }
}
