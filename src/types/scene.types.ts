import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { SceneFormatError } from '../utils/errors';
import { SYNTHETIC_COLOURS, type SpeakerId, type SyntheticColour } from './structure.types';

// ---------------------------------------------------------------------------
// Segment payloads
// ---------------------------------------------------------------------------
export const SEGMENT_KINDS = ['file', 'generator'] as const;
export type SegmentKind = (typeof SEGMENT_KINDS)[number];

export const GENERATOR_KINDS = ['noise', 'babble'] as const;
export type GeneratorKind = (typeof GENERATOR_KINDS)[number];

/** Copy samples from a source clip, starting `clipOffset` seconds into it. */
export interface FileRef {
  kind: 'file';
  path: string;
  clipOffset: number;
}

/** Noise parameters with the seed fixed at generation time. */
export interface NoiseGeneratorParams {
  generator: 'noise';
  colour: SyntheticColour;
  level: number;
  seed: number;
}

/** A stretch of source speech feeding a babble stream. */
export interface BabbleClip {
  path: string;
  /** Seconds into the file */
  clipOffset: number;
  /** Seconds */
  duration: number;
}

/**
 * Babble: `clips` are concatenated into a speech stream and `nSpeakers`
 * windows of it, at offsets drawn from `seed`, are summed.
 */
export interface BabbleGeneratorParams {
  generator: 'babble';
  level: number;
  seed: number;
  nSpeakers: number;
  clips: BabbleClip[];
}

export type GeneratorParams = NoiseGeneratorParams | BabbleGeneratorParams;

export interface GeneratorRef {
  kind: 'generator';
  params: GeneratorParams;
}

export type SegmentPayload = FileRef | GeneratorRef;

/** One placed audio event. Times are absolute seconds, `end > start`. */
export interface SceneSegment {
  readonly start: number;
  readonly end: number;
  /** Zero-based output channel */
  readonly channel: number;
  /** Structure speaker that produced the segment (file segments only) */
  readonly speaker?: SpeakerId;
  readonly payload: Readonly<SegmentPayload>;
}

// ---------------------------------------------------------------------------
// Scene file format
// ---------------------------------------------------------------------------

const SeedSchema = z.number().int().nonnegative().max(0xffffffff);

const NoiseEntryParamsSchema = z.object({
  generator: z.literal('noise'),
  colour: z.enum(SYNTHETIC_COLOURS),
  level: z.number().finite().nonnegative(),
  seed: SeedSchema,
});

const BabbleEntryParamsSchema = z.object({
  generator: z.literal('babble'),
  level: z.number().finite().nonnegative(),
  seed: SeedSchema,
  n_speakers: z.number().int().positive(),
  clips: z
    .array(
      z.object({
        path: z.string().min(1),
        clip_offset: z.number().finite().nonnegative().default(0),
        duration: z.number().finite().positive(),
      })
    )
    .min(1),
});

const GeneratorParamsSchema = z.discriminatedUnion('generator', [NoiseEntryParamsSchema, BabbleEntryParamsSchema]);
type GeneratorEntryParams = z.infer<typeof GeneratorParamsSchema>;

const EntryBaseSchema = z.object({
  start: z.number().finite().nonnegative(),
  end: z.number().finite().nonnegative(),
  channel: z.number().int().nonnegative(),
  speaker: z.number().int().positive().optional(),
});

const FileEntrySchema = EntryBaseSchema.extend({
  kind: z.literal('file'),
  path: z.string().min(1),
  clip_offset: z.number().finite().nonnegative().default(0),
});

const GeneratorEntrySchema = EntryBaseSchema.extend({
  kind: z.literal('generator'),
  generator_params: GeneratorParamsSchema,
});

export const SceneEntrySchema = z
  .discriminatedUnion('kind', [FileEntrySchema, GeneratorEntrySchema])
  .refine((entry) => entry.end > entry.start, { message: 'end must be after start', path: ['end'] });

export type SceneFileEntry = z.infer<typeof SceneEntrySchema>;

export function toSceneEntry(segment: SceneSegment): SceneFileEntry {
  const base = {
    start: segment.start,
    end: segment.end,
    channel: segment.channel,
    ...(segment.speaker !== undefined ? { speaker: segment.speaker } : {}),
  };
  const payload = segment.payload;
  if (payload.kind === 'file') {
    return { ...base, kind: 'file', path: payload.path, clip_offset: payload.clipOffset };
  }
  return { ...base, kind: 'generator', generator_params: toGeneratorEntry(payload.params) };
}

function toGeneratorEntry(params: GeneratorParams): GeneratorEntryParams {
  if (params.generator === 'noise') {
    return { ...params };
  }
  return {
    generator: 'babble',
    level: params.level,
    seed: params.seed,
    n_speakers: params.nSpeakers,
    clips: params.clips.map((clip) => ({ path: clip.path, clip_offset: clip.clipOffset, duration: clip.duration })),
  };
}

function fromGeneratorEntry(entry: GeneratorEntryParams): GeneratorParams {
  if (entry.generator === 'noise') {
    return { ...entry };
  }
  return {
    generator: 'babble',
    level: entry.level,
    seed: entry.seed,
    nSpeakers: entry.n_speakers,
    clips: entry.clips.map((clip) => ({ path: clip.path, clipOffset: clip.clip_offset, duration: clip.duration })),
  };
}

export function fromSceneEntry(entry: SceneFileEntry): SceneSegment {
  const base = {
    start: entry.start,
    end: entry.end,
    channel: entry.channel,
    ...(entry.speaker !== undefined ? { speaker: entry.speaker } : {}),
  };
  if (entry.kind === 'file') {
    return freezeSegment({ ...base, payload: { kind: 'file', path: entry.path, clipOffset: entry.clip_offset } });
  }
  return freezeSegment({ ...base, payload: { kind: 'generator', params: fromGeneratorEntry(entry.generator_params) } });
}

export function freezeSegment(segment: SceneSegment): SceneSegment {
  Object.freeze(segment.payload);
  return Object.freeze(segment);
}

/** Validate a parsed scene document (an array of entries). */
export function parseScene(raw: unknown): SceneSegment[] {
  if (!Array.isArray(raw)) {
    throw new SceneFormatError('Scene must be an array of segments');
  }
  return raw.map((item, index) => {
    const result = SceneEntrySchema.safeParse(item);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new SceneFormatError(`Invalid scene segment ${index}: ${field}${issue.message}`, { segmentIndex: index });
    }
    return fromSceneEntry(result.data);
  });
}

export function serializeScene(segments: readonly SceneSegment[]): string {
  return JSON.stringify(segments.map(toSceneEntry), null, 2);
}

export function writeSceneFile(filePath: string, segments: readonly SceneSegment[]): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, `${serializeScene(segments)}\n`, 'utf8');
}

export function readSceneFile(filePath: string): SceneSegment[] {
  const text = fs.readFileSync(filePath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SceneFormatError(`Invalid JSON in ${filePath}: ${reason}`);
  }
  return parseScene(raw);
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export interface ChannelSummary {
  channel: number;
  segments: number;
  /** Seconds of placed audio on the channel */
  activeTime: number;
}

export interface SceneSummary {
  segments: number;
  duration: number;
  channels: ChannelSummary[];
}

export function summarizeScene(segments: readonly SceneSegment[]): SceneSummary {
  const channels = new Map<number, ChannelSummary>();
  let duration = 0;
  for (const segment of segments) {
    duration = Math.max(duration, segment.end);
    const entry = channels.get(segment.channel) ?? { channel: segment.channel, segments: 0, activeTime: 0 };
    entry.segments += 1;
    entry.activeTime += segment.end - segment.start;
    channels.set(segment.channel, entry);
  }
  return {
    segments: segments.length,
    duration,
    channels: [...channels.values()].sort((a, b) => a.channel - b.channel),
  };
}
