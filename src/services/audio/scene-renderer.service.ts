// ===========================================================================
// Scene Renderer
//
// Materialises a scene segment list into a channels x samples buffer:
//
//   1. Allocate ceil(maxEnd * rate) zeroed samples per channel
//   2. Resolve every segment to [round(start * rate), round(end * rate))
//      and check it fits the buffer before any audio is read
//   3. Fill each range from its source clip or its noise generator,
//      overwriting what is there
//
// Segments are independent, so clip reads run a few at a time and the
// result does not depend on the order they finish in.
// ===========================================================================

import { logger } from '../../config/logger';
import type { SceneSegment } from '../../types/scene.types';
import { ConfigError, RenderTargetError } from '../../utils/errors';
import { sceneEnd, samplesToCover, secondsToSamples } from '../../utils/timeline';
import { synthesizeBabble } from './babble-generator';
import { synthesizeNoise } from './noise-generator';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Reads mono source audio resampled to the render rate. */
export interface ClipReader {
  /**
   * Read up to `length` samples from `path`, starting `offset` samples in.
   * May return fewer samples when the clip ends early.
   */
  read(path: string, offset: number, length: number, sampleRate: number): Promise<Float32Array>;
}

export interface SampleBuffer {
  sampleRate: number;
  /** Samples per channel */
  length: number;
  channels: Float32Array[];
}

export interface RenderOptions {
  /** Required when the scene has file or babble segments */
  clipReader?: ClipReader;
  /** Clip reads in flight at once */
  concurrency?: number;
}

/** A segment resolved onto the sample grid. */
interface PlacedSegment {
  index: number;
  segment: SceneSegment;
  startSample: number;
  endSample: number;
}

const DEFAULT_CONCURRENCY = 4;

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

class SceneRendererService {
  async render(
    segments: readonly SceneSegment[],
    channelCount: number,
    sampleRate: number,
    options: RenderOptions = {}
  ): Promise<SampleBuffer> {
    if (!Number.isInteger(channelCount) || channelCount < 0) {
      throw new ConfigError(`channelCount must be a non-negative integer, got ${channelCount}`);
    }
    if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
      throw new ConfigError(`sampleRate must be a positive integer, got ${sampleRate}`);
    }
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));

    const length = samplesToCover(sceneEnd(segments), sampleRate);
    const placed = this.place(segments, channelCount, length, sampleRate);

    if (placed.some((p) => readsClips(p.segment)) && !options.clipReader) {
      throw new ConfigError('A clipReader is required to render file and babble segments');
    }

    logger.info('Scene renderer: starting', {
      segments: segments.length,
      channels: channelCount,
      samples: length,
      sampleRate,
    });

    const buffer: SampleBuffer = {
      sampleRate,
      length,
      channels: Array.from({ length: channelCount }, () => new Float32Array(length)),
    };

    for (let i = 0; i < placed.length; i += concurrency) {
      const batch = placed.slice(i, i + concurrency);
      await Promise.all(batch.map((item) => this.fill(buffer, item, options.clipReader)));
    }

    logger.info('Scene renderer: done', { duration: length / sampleRate });
    return buffer;
  }

  /** Resolve every segment to sample indices; fails before any audio is touched. */
  private place(
    segments: readonly SceneSegment[],
    channelCount: number,
    length: number,
    sampleRate: number
  ): PlacedSegment[] {
    const placed: PlacedSegment[] = [];
    segments.forEach((segment, index) => {
      if (!Number.isInteger(segment.channel) || segment.channel < 0 || segment.channel >= channelCount) {
        throw new RenderTargetError(index, `channel ${segment.channel} is outside 0..${channelCount - 1}`);
      }
      const startSample = secondsToSamples(segment.start, sampleRate);
      const endSample = secondsToSamples(segment.end, sampleRate);
      if (startSample < 0 || endSample > length || endSample < startSample) {
        throw new RenderTargetError(index, `samples [${startSample}, ${endSample}) fall outside [0, ${length})`);
      }
      if (endSample > startSample) {
        placed.push({ index, segment, startSample, endSample });
      }
    });
    return placed;
  }

  private async fill(buffer: SampleBuffer, item: PlacedSegment, clipReader: ClipReader | undefined): Promise<void> {
    const count = item.endSample - item.startSample;
    const payload = item.segment.payload;
    let samples: Float32Array;

    if (payload.kind === 'generator') {
      const params = payload.params;
      if (params.generator === 'noise') {
        samples = synthesizeNoise(params, count);
      } else {
        samples = await synthesizeBabble(params, count, buffer.sampleRate, this.requireReader(clipReader));
      }
    } else {
      const offset = secondsToSamples(payload.clipOffset, buffer.sampleRate);
      samples = await this.requireReader(clipReader).read(payload.path, offset, count, buffer.sampleRate);
      if (samples.length < count) {
        logger.warn('Source clip shorter than its segment; padding with silence', {
          segmentIndex: item.index,
          path: payload.path,
          expected: count,
          received: samples.length,
        });
      }
    }

    buffer.channels[item.segment.channel].set(
      samples.length > count ? samples.subarray(0, count) : samples,
      item.startSample
    );
  }

  private requireReader(clipReader: ClipReader | undefined): ClipReader {
    if (!clipReader) {
      throw new ConfigError('A clipReader is required to render file and babble segments');
    }
    return clipReader;
  }
}

function readsClips(segment: SceneSegment): boolean {
  return segment.payload.kind === 'file' || segment.payload.params.generator === 'babble';
}

export const sceneRenderer = new SceneRendererService();

export function render(
  segments: readonly SceneSegment[],
  channelCount: number,
  sampleRate: number,
  options: RenderOptions = {}
): Promise<SampleBuffer> {
  return sceneRenderer.render(segments, channelCount, sampleRate, options);
}

/** Channels needed to hold every segment of a scene. */
export function requiredChannels(segments: readonly SceneSegment[]): number {
  return segments.reduce((max, segment) => Math.max(max, segment.channel + 1), 0);
}

export default sceneRenderer;
