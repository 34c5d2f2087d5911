import fs from 'fs';
import { z } from 'zod';
import { logger } from '../../config/logger';
import { ConfigError } from '../../utils/errors';
import type { SpeakerId } from '../../types/structure.types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A usable stretch of a source recording. */
export interface ClipRef {
  /** Path relative to the audio root */
  path: string;
  /** Seconds into the file where the clip begins */
  offset: number;
  /** Clip length in seconds */
  duration: number;
}

/** Where the generator gets source material for each turn. */
export interface ClipSource {
  /** Next available clip for `speaker` lasting at least `minDuration` seconds. */
  nextClip(speaker: SpeakerId, minDuration: number): ClipRef | undefined;
}

export const ClipIndexEntrySchema = z.object({
  /** Dataset speaker label */
  speaker: z.union([z.string().min(1), z.number().int()]).transform((value) => String(value)),
  path: z.string().min(1),
  duration: z.number().finite().positive(),
  offset: z.number().finite().nonnegative().default(0),
});

export type ClipIndexEntry = z.output<typeof ClipIndexEntrySchema>;
export type ClipIndexEntryInput = z.input<typeof ClipIndexEntrySchema>;

interface SpeakerClips {
  clips: ClipRef[];
  cursor: number;
}

// ---------------------------------------------------------------------------
// Pool
// ---------------------------------------------------------------------------

/**
 * Hands out each dataset speaker's clips in path order, wrapping around when
 * the list is exhausted and skipping clips that are too short.
 *
 * Structure speaker k draws from dataset speaker `assignments[k - 1]`, or the
 * speaker labelled `String(k)` when no assignment list is given.
 */
export class SpeakerClipPool implements ClipSource {
  private readonly speakers = new Map<string, SpeakerClips>();

  constructor(
    entries: readonly ClipIndexEntryInput[],
    private readonly assignments?: readonly string[]
  ) {
    entries.forEach((raw, index) => {
      const result = ClipIndexEntrySchema.safeParse(raw);
      if (!result.success) {
        const issue = result.error.issues[0];
        throw new ConfigError(`Invalid clip index entry ${index}: ${issue.path.join('.')}: ${issue.message}`, {
          entryIndex: index,
        });
      }
      const entry = result.data;
      const existing = this.speakers.get(entry.speaker);
      const clip: ClipRef = { path: entry.path, offset: entry.offset, duration: entry.duration };
      if (existing) {
        existing.clips.push(clip);
      } else {
        this.speakers.set(entry.speaker, { clips: [clip], cursor: 0 });
      }
    });

    for (const state of this.speakers.values()) {
      state.clips.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : a.offset - b.offset));
    }
  }

  datasetSpeaker(speaker: SpeakerId): string {
    if (this.assignments) {
      const assigned = this.assignments[speaker - 1];
      if (assigned === undefined) {
        throw new ConfigError(`No dataset speaker assigned to structure speaker ${speaker}`, { speaker });
      }
      return assigned;
    }
    return String(speaker);
  }

  nextClip(speaker: SpeakerId, minDuration: number): ClipRef | undefined {
    const label = this.datasetSpeaker(speaker);
    const state = this.speakers.get(label);
    if (!state) {
      return undefined;
    }

    const count = state.clips.length;
    for (let step = 0; step < count; step++) {
      const index = (state.cursor + step) % count;
      const clip = state.clips[index];
      if (clip.duration >= minDuration) {
        if (index + 1 >= count) {
          logger.debug('Clip pool wrapped for speaker', { speaker, datasetSpeaker: label });
        }
        state.cursor = (index + 1) % count;
        return clip;
      }
    }
    return undefined;
  }

  /** Total seconds of material for a structure speaker. */
  availableDuration(speaker: SpeakerId): number {
    const state = this.speakers.get(this.datasetSpeaker(speaker));
    return state ? state.clips.reduce((total, clip) => total + clip.duration, 0) : 0;
  }
}

export function loadClipIndex(filePath: string): ClipIndexEntryInput[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  if (!Array.isArray(raw)) {
    throw new ConfigError(`Clip index ${filePath} must be a JSON array`, { filePath });
  }
  return raw.map((item, index) => {
    const result = ClipIndexEntrySchema.safeParse(item);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConfigError(
        `Invalid clip index entry ${index} in ${filePath}: ${issue.path.join('.')}: ${issue.message}`,
        { filePath, entryIndex: index }
      );
    }
    return result.data;
  });
}
