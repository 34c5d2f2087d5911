// ===========================================================================
// Scene Generator
//
// Walks a structure tree depth-first and turns it into a flat, time-ordered
// list of scene segments.
//
//   sequence      children back to back on one timeline
//   splitter      children start together; done when the longest is done
//   conversation  expanded into turns that fill the duration exactly
//   noise         one generator segment on the noise channel
//   pause         advances time, emits nothing
//
// Each visit receives an immutable context (cursor, active speakers, last
// speaker, node path) and returns its end time, last speaker and the
// segments it produced, so splitter branches never share state. Cursors are integer sample counts on the
// configured grid; seconds only appear in the emitted segments.
//
// Example: sequence [pause 20, conversation {1,2,3} 120]
//
//   ch0: [        |██ 1 ██|      |██ 1 ██|         ]
//   ch1: [        |       |██ 2 ██|     |██ 2 ██|  ]
//   ch2: [        |     |██ 3 ██|              |██ 3 ██]
//        0        20                                140
// ===========================================================================

import { logger } from '../../config/logger';
import { resolveSceneConfig, type SceneConfig, type SceneConfigInput } from '../../config/scene.config';
import { freezeSegment, summarizeScene, type BabbleClip, type SceneSegment } from '../../types/scene.types';
import {
  DEFAULT_BABBLE_SPEAKERS,
  collectSpeakers,
  type ConversationNode,
  type NoiseNode,
  type SequenceNode,
  type SpeakerId,
  type SplitterNode,
  type StructureNode,
} from '../../types/structure.types';
import {
  ConfigError,
  DurationConflictError,
  InsufficientSourceMaterialError,
  StructureFormatError,
} from '../../utils/errors';
import { createRandom, pick, randomSeed, type RandomSource } from '../../utils/random';
import { findChannelOverlaps, samplesToSeconds, secondsToSamples } from '../../utils/timeline';
import type { ClipSource } from './clip-pool.service';
import { createTurnTakingPolicy, type TurnTakingPolicy } from './turn-taking';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GenerateOptions {
  /** Supplies source clips for conversation turns */
  clipSource: ClipSource;
  config?: SceneConfigInput;
  /** Defaults to a generator seeded with `config.seed` */
  random?: RandomSource;
  /** Defaults to the policy named by `config.policy` */
  policy?: TurnTakingPolicy;
}

interface GenerationContext {
  /** Sample at which this node starts */
  readonly cursor: number;
  /** Speakers allowed to take part; null means unrestricted */
  readonly scope: ReadonlySet<SpeakerId> | null;
  /** Speaker of the turn just before this node, if it ended in speech */
  readonly previous?: SpeakerId;
  /** Location of the node in the tree, for error messages */
  readonly path: string;
}

interface GenerationResult {
  /** Sample at which this node ends */
  readonly end: number;
  /** Speaker of the node's final turn; undefined when it ends in noise or silence */
  readonly previous?: SpeakerId;
  readonly segments: readonly SceneSegment[];
}

/** Turn limits converted to the sample grid. */
interface SampleLimits {
  minTurn: number;
  maxOverlap: number;
  maxGap: number;
}

// ---------------------------------------------------------------------------
// Walker (one per generate call)
// ---------------------------------------------------------------------------

class SceneWalker {
  private readonly limits: SampleLimits;

  constructor(
    private readonly config: SceneConfig,
    private readonly rng: RandomSource,
    private readonly policy: TurnTakingPolicy,
    private readonly clipSource: ClipSource,
    private readonly channels: ReadonlyMap<SpeakerId, number>,
    private readonly noiseChannel: number
  ) {
    this.limits = {
      minTurn: this.toSamples(policy.limits.minTurn),
      maxOverlap: this.toSamples(policy.limits.maxOverlap),
      maxGap: this.toSamples(policy.limits.maxGap),
    };
    if (this.limits.minTurn < 1 || this.limits.maxOverlap >= this.limits.minTurn) {
      throw new ConfigError('Turn limits need minTurn of at least one sample and maxOverlap below minTurn', {
        ...this.limits,
      });
    }
  }

  visit(node: StructureNode, ctx: GenerationContext): GenerationResult {
    switch (node.type) {
      case 'pause':
        return { end: ctx.cursor + this.toSamples(node.duration), segments: [] };
      case 'noise':
        return this.visitNoise(node, ctx);
      case 'sequence':
        return this.visitSequence(node, ctx);
      case 'splitter':
        return this.visitSplitter(node, ctx);
      case 'conversation':
        return this.visitConversation(node, ctx);
      default: {
        const unreachable: never = node;
        throw new StructureFormatError(ctx.path, `unhandled node ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private visitNoise(node: NoiseNode, ctx: GenerationContext): GenerationResult {
    const length = this.toSamples(node.duration);
    if (length === 0) {
      return { end: ctx.cursor, segments: [] };
    }
    const { colour, level } = node.params;
    const seed = node.params.seed ?? randomSeed(this.rng);
    const segment = freezeSegment({
      start: this.toSeconds(ctx.cursor),
      end: this.toSeconds(ctx.cursor + length),
      channel: node.params.channel ?? this.noiseChannel,
      payload: {
        kind: 'generator',
        params:
          colour === 'babble'
            ? {
                generator: 'babble',
                level,
                seed,
                nSpeakers: node.params.nSpeakers ?? DEFAULT_BABBLE_SPEAKERS,
                clips: this.babbleClips(node, ctx, length),
              }
            : { generator: 'noise', colour, level, seed },
      },
    });
    return { end: ctx.cursor + length, segments: [segment] };
  }

  /** Clips from the source speakers until the speech stream covers its base duration. */
  private babbleClips(node: NoiseNode, ctx: GenerationContext, length: number): BabbleClip[] {
    const sources = node.params.sources ?? [];
    if (sources.length === 0) {
      throw new StructureFormatError(ctx.path, 'babble needs at least one source speaker');
    }
    const target = node.params.baseDuration !== undefined ? this.toSamples(node.params.baseDuration) : 2 * length;
    const clips: BabbleClip[] = [];
    let total = 0;
    while (total < target) {
      const speaker = pick(this.rng, sources);
      const clip = this.clipSource.nextClip(speaker, 0);
      if (!clip) {
        throw new InsufficientSourceMaterialError(ctx.path, speaker, 0);
      }
      clips.push({ path: clip.path, clipOffset: clip.offset, duration: clip.duration });
      total += Math.max(1, this.toSamples(clip.duration));
    }
    return clips;
  }

  private visitSequence(node: SequenceNode, ctx: GenerationContext): GenerationResult {
    const scope = node.speakers ? this.narrowScope(node.speakers, ctx.scope) : ctx.scope;
    let cursor = ctx.cursor;
    let previous = ctx.previous;
    const segments: SceneSegment[] = [];
    node.elements.forEach((element, index) => {
      const result = this.visit(element, { cursor, scope, previous, path: `${ctx.path}.elements[${index}]` });
      cursor = result.end;
      previous = result.previous;
      segments.push(...result.segments);
    });
    return { end: cursor, previous, segments };
  }

  private visitSplitter(node: SplitterNode, ctx: GenerationContext): GenerationResult {
    let end = ctx.cursor;
    let previous: SpeakerId | undefined;
    const segments: SceneSegment[] = [];
    node.elements.forEach((element, index) => {
      // Every branch restarts from the splitter's entry cursor
      const result = this.visit(element, { ...ctx, path: `${ctx.path}.elements[${index}]` });
      if (index === 0 || result.end > end) {
        previous = result.previous;
      }
      end = Math.max(end, result.end);
      segments.push(...result.segments);
    });
    // The branch that finishes last decides who spoke last
    return { end, previous, segments };
  }

  /**
   * Expand a conversation into turns covering exactly [cursor, cursor + duration).
   *
   * `frontier` is the latest turn end so far. Each turn starts at
   * frontier + gap (gap in [-maxOverlap, maxGap]) but never before the same
   * speaker's previous turn ended. Before a turn is placed the walker keeps
   * enough time in reserve to seat every unseated speaker, so a conversation
   * that passes the minimum-duration check always completes.
   */
  private visitConversation(node: ConversationNode, ctx: GenerationContext): GenerationResult {
    const speakers = this.narrowScope(node.speakers, ctx.scope);
    if (speakers.size < 2) {
      throw new StructureFormatError(
        ctx.path,
        `only ${speakers.size} of speakers ${node.speakers.join(', ')} are active in the enclosing sequence`
      );
    }
    const { minTurn, maxGap, maxOverlap } = this.limits;
    const duration = this.toSamples(node.duration);
    const minimum = speakers.size * minTurn + (speakers.size - 1) * maxGap;
    if (duration < minimum) {
      throw new DurationConflictError(ctx.path, node.duration, this.toSeconds(minimum));
    }

    const order = [...speakers];
    const schedule = this.policy.startConversation(order, this.rng);
    const start = ctx.cursor;
    const end = start + duration;
    const lastEnd = new Map<SpeakerId, number>();
    const unseated = new Set<SpeakerId>(order);
    const segments: SceneSegment[] = [];
    // Nobody opens a conversation straight after their own turn in the previous block
    let previous = ctx.previous;
    let frontier = start;

    while (frontier < end) {
      const candidates = (unseated.size > 0 ? order.filter((s) => unseated.has(s)) : order).filter(
        (s) => s !== previous
      );
      const speaker = schedule.next(candidates);
      if (!candidates.includes(speaker)) {
        throw new ConfigError(`Turn-taking policy ${this.policy.name} chose speaker ${speaker} outside the candidates`, {
          path: ctx.path,
          speaker,
          candidates,
        });
      }

      const gap = segments.length === 0 ? 0 : this.drawGap();
      const turnStart = Math.max(start, frontier + gap, lastEnd.get(speaker) ?? start);
      const remaining = end - turnStart;
      const unseatedAfter = unseated.has(speaker) ? unseated.size - 1 : unseated.size;
      const reserve = Math.max(1, unseatedAfter) * (minTurn + maxGap);
      const wanted = Math.max(minTurn, this.toSamples(this.policy.turnLength(this.rng)));

      // Final turn: stretch or cut it so the conversation ends on its boundary
      const length =
        unseatedAfter === 0 && remaining - wanted < reserve ? remaining : Math.min(wanted, remaining - reserve);

      const clip = this.clipSource.nextClip(speaker, this.toSeconds(length));
      if (!clip) {
        throw new InsufficientSourceMaterialError(ctx.path, speaker, this.toSeconds(length));
      }

      const turnEnd = turnStart + length;
      segments.push(
        freezeSegment({
          start: this.toSeconds(turnStart),
          end: this.toSeconds(turnEnd),
          channel: this.channelFor(speaker),
          speaker,
          payload: { kind: 'file', path: clip.path, clipOffset: clip.offset },
        })
      );

      lastEnd.set(speaker, turnEnd);
      unseated.delete(speaker);
      previous = speaker;
      frontier = Math.max(frontier, turnEnd);
    }

    logger.debug('Conversation expanded', {
      path: ctx.path,
      speakers: order,
      turns: segments.length,
      maxOverlap: this.toSeconds(maxOverlap),
    });
    return { end, previous, segments };
  }

  /** A node's own speakers restrict the enclosing scope; they never add to it. */
  private narrowScope(speakers: readonly SpeakerId[], scope: ReadonlySet<SpeakerId> | null): ReadonlySet<SpeakerId> {
    return new Set(scope ? speakers.filter((speaker) => scope.has(speaker)) : speakers);
  }

  private drawGap(): number {
    const gap = this.toSamples(this.policy.gap(this.rng));
    return Math.min(this.limits.maxGap, Math.max(-this.limits.maxOverlap, gap));
  }

  private channelFor(speaker: SpeakerId): number {
    return this.channels.get(speaker) ?? speaker - 1;
  }

  private toSamples(seconds: number): number {
    return secondsToSamples(seconds, this.config.sampleRate);
  }

  private toSeconds(samples: number): number {
    return samplesToSeconds(samples, this.config.sampleRate);
  }
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

function compareSegments(a: SceneSegment, b: SceneSegment): number {
  return a.start - b.start || a.channel - b.channel || a.end - b.end;
}

class SceneGeneratorService {
  /**
   * Generate the scene for a structure tree.
   *
   * The same tree, config and random source always give the same list,
   * ordered by start time, then channel, then end time.
   */
  generate(root: StructureNode, options: GenerateOptions): SceneSegment[] {
    const config = resolveSceneConfig(options.config);
    const rng = options.random ?? createRandom(config.seed);
    const policy = options.policy ?? createTurnTakingPolicy(config);
    const channels = this.resolveChannels(config);
    const noiseChannel = config.noiseChannel ?? this.defaultNoiseChannel(root, channels);

    logger.info('Scene generator: starting', {
      sampleRate: config.sampleRate,
      seed: config.seed,
      policy: policy.name,
      noiseChannel,
    });

    const walker = new SceneWalker(config, rng, policy, options.clipSource, channels, noiseChannel);
    const result = walker.visit(root, { cursor: 0, scope: null, path: '$' });
    const segments = [...result.segments].sort(compareSegments);

    const overlaps = findChannelOverlaps(segments);
    if (overlaps.length > 0) {
      // Only reachable when one channel is used by concurrent splitter branches
      logger.warn('Scene has overlapping segments on a shared channel', {
        count: overlaps.length,
        channels: [...new Set(overlaps.map((overlap) => overlap.channel))],
      });
    }

    const summary = summarizeScene(segments);
    logger.info('Scene generator: done', {
      segments: summary.segments,
      duration: samplesToSeconds(result.end, config.sampleRate),
      channels: summary.channels.length,
    });
    return segments;
  }

  private resolveChannels(config: SceneConfig): Map<SpeakerId, number> {
    const channels = new Map<SpeakerId, number>();
    for (const [speaker, channel] of Object.entries(config.channelMap ?? {})) {
      channels.set(Number(speaker), channel);
    }
    return channels;
  }

  private defaultNoiseChannel(root: StructureNode, channels: ReadonlyMap<SpeakerId, number>): number {
    const speakerChannels = collectSpeakers(root).map((speaker) => channels.get(speaker) ?? speaker - 1);
    return speakerChannels.length > 0 ? Math.max(...speakerChannels) + 1 : 0;
  }
}

export const sceneGenerator = new SceneGeneratorService();

export function generate(root: StructureNode, options: GenerateOptions): SceneSegment[] {
  return sceneGenerator.generate(root, options);
}

export default sceneGenerator;
