import type { ClipReader } from '../src/services/audio/scene-renderer.service';
import { SpeakerClipPool, type ClipIndexEntryInput } from '../src/services/scene/clip-pool.service';

/** One long clip per speaker, labelled by structure speaker id. */
export function longClipPool(speakers: number[], duration = 600): SpeakerClipPool {
  const entries: ClipIndexEntryInput[] = speakers.map((speaker) => ({
    speaker,
    path: `speaker${speaker}/long.flac`,
    duration,
  }));
  return new SpeakerClipPool(entries);
}

/** Serves clips from memory; data is already at the render sample rate. */
export class InMemoryClipReader implements ClipReader {
  readonly requests: { path: string; offset: number; length: number }[] = [];

  constructor(
    private readonly clips: Record<string, Float32Array>,
    private readonly fallback?: (length: number) => Float32Array
  ) {}

  async read(path: string, offset: number, length: number): Promise<Float32Array> {
    this.requests.push({ path, offset, length });
    const clip = this.clips[path];
    if (!clip) {
      if (this.fallback) {
        return this.fallback(length);
      }
      throw new Error(`Unknown clip ${path}`);
    }
    return clip.slice(offset, offset + length);
  }
}

export function ramp(values: number[]): Float32Array {
  return Float32Array.from(values);
}
