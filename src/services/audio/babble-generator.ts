import type { BabbleGeneratorParams } from '../../types/scene.types';
import { createRandom, randomInt } from '../../utils/random';
import { secondsToSamples } from '../../utils/timeline';
import { rms, scaleToRms } from './noise-generator';
import type { ClipReader } from './scene-renderer.service';

/**
 * Concatenate the babble clips into one speech stream, each clip normalised
 * to unit RMS so no single utterance dominates the mix.
 */
export async function makeBaseStream(
  params: BabbleGeneratorParams,
  reader: ClipReader,
  sampleRate: number
): Promise<Float32Array> {
  const parts = await Promise.all(
    params.clips.map((clip) =>
      reader.read(
        clip.path,
        secondsToSamples(clip.clipOffset, sampleRate),
        secondsToSamples(clip.duration, sampleRate),
        sampleRate
      )
    )
  );

  const base = new Float32Array(parts.reduce((total, part) => total + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    const level = rms(part);
    base.set(level > 0 ? part.map((sample) => sample / level) : part, offset);
    offset += part.length;
  }
  return base;
}

/**
 * Sum `nSpeakers` windows of the base stream at seeded offsets. Windows
 * wrap around the end of the stream.
 */
export function mixSpeakers(base: Float32Array, nSpeakers: number, length: number, seed: number): Float32Array {
  const babble = new Float32Array(length);
  if (base.length === 0) {
    return babble;
  }
  const rng = createRandom(seed);
  for (let voice = 0; voice < nSpeakers; voice += 1) {
    const start = randomInt(rng, 0, base.length - 1);
    for (let i = 0; i < length; i += 1) {
      babble[i] += base[(start + i) % base.length];
    }
  }
  return babble;
}

export async function synthesizeBabble(
  params: BabbleGeneratorParams,
  length: number,
  sampleRate: number,
  reader: ClipReader
): Promise<Float32Array> {
  const base = await makeBaseStream(params, reader, sampleRate);
  return scaleToRms(mixSpeakers(base, params.nSpeakers, length, params.seed), params.level);
}
