/**
 * Builds structure trees for cafe-style sessions: several tables talking in
 * parallel, where larger tables alternate between one whole-table
 * conversation and two side conversations.
 */

import type { ConversationNode, SpeakerId, SplitterNode, StructureNode } from '../../types/structure.types';
import { ConfigError } from '../../utils/errors';
import { exponential, shuffle, type RandomSource } from '../../utils/random';

/** Splits a duration (whole seconds) into consecutive block durations. */
export type Segmenter = (duration: number) => number[];

export interface ExponentialSegmenterOptions {
  /** Mean block length in seconds */
  halfLife: number;
  /** Shortest block; a shorter remainder is folded into the block before it */
  minDuration: number;
}

/**
 * Block lengths drawn from an exponential distribution with a floor,
 * always summing to the requested duration. Only a duration below the
 * floor yields a block below it.
 */
export function exponentialSegmenter(options: ExponentialSegmenterOptions, rng: RandomSource): Segmenter {
  return (duration) => {
    const durations: number[] = [];
    let endTime = 0;
    while (endTime < duration) {
      let segment = Math.max(Math.floor(exponential(rng, options.halfLife)), Math.ceil(options.minDuration));
      segment = Math.max(1, Math.min(duration - endTime, segment));
      durations.push(segment);
      endTime += segment;
    }
    const last = durations[durations.length - 1];
    if (durations.length > 1 && last < options.minDuration) {
      durations.pop();
      durations[durations.length - 1] += last;
    }
    return durations;
  };
}

/** Consecutive speaker ids per table, e.g. [2, 3] -> [[1, 2], [3, 4, 5]]. */
export function makeSpeakerGroups(tableSizes: readonly number[]): SpeakerId[][] {
  const groups: SpeakerId[][] = [];
  let next = 1;
  for (const size of tableSizes) {
    groups.push(Array.from({ length: size }, (_, index) => next + index));
    next += size;
  }
  return groups;
}

/** One conversation, or parallel conversations under a splitter. */
export function makeConversationSegment(
  speakerGroups: readonly (readonly SpeakerId[])[],
  duration: number
): ConversationNode | SplitterNode {
  const conversations = speakerGroups.map((speakers): ConversationNode => ({
    type: 'conversation',
    speakers: [...speakers],
    duration,
  }));
  if (conversations.length === 1) {
    return conversations[0];
  }
  return { type: 'splitter', elements: conversations };
}

/**
 * Conversation pattern for one table. Tables with fewer than four speakers
 * (or no segmenter) hold one conversation throughout; larger tables
 * alternate between everyone together and two random subgroups.
 */
export function makeTable(
  speakers: readonly SpeakerId[],
  duration: number,
  rng: RandomSource,
  segmenter?: Segmenter
): StructureNode {
  if (speakers.length < 4 || !segmenter) {
    return makeConversationSegment([speakers], duration);
  }

  const durations = segmenter(duration);
  const speakerGroups: SpeakerId[][][] = [];
  while (speakerGroups.length < durations.length) {
    speakerGroups.push([[...speakers]]);
    const shuffled = shuffle(rng, speakers);
    speakerGroups.push([shuffled.slice(0, 2), shuffled.slice(2)]);
  }

  return {
    type: 'sequence',
    speakers: [...speakers],
    elements: durations.map((blockDuration, index) => makeConversationSegment(speakerGroups[index], blockDuration)),
  };
}

/** Every table talking in parallel for `duration` seconds. */
export function makeParallelConversations(
  tableSizes: readonly number[],
  duration: number,
  rng: RandomSource,
  segmenter?: Segmenter
): StructureNode {
  if (tableSizes.length === 0) {
    throw new ConfigError('At least one table is required');
  }
  const small = tableSizes.find((size) => !Number.isInteger(size) || size < 2);
  if (small !== undefined) {
    throw new ConfigError(`Every table needs at least 2 speakers, got ${small}`, { tableSizes: [...tableSizes] });
  }

  const groups = makeSpeakerGroups(tableSizes);
  const tables = groups.map((speakers) => makeTable(speakers, duration, rng, segmenter));
  return {
    type: 'sequence',
    speakers: groups.flat(),
    elements: [{ type: 'splitter', elements: tables }],
  };
}
