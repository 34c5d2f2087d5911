import type { NoiseGeneratorParams } from '../../types/scene.types';
import { createRandom } from '../../utils/random';

/**
 * Synthesise `length` samples of seeded noise scaled to the requested RMS.
 * The same params always give the same samples.
 */
export function synthesizeNoise(params: NoiseGeneratorParams, length: number): Float32Array {
  const rng = createRandom(params.seed);
  const data = new Float32Array(length);
  const pink = params.colour === 'pink' ? pinkFilter() : undefined;
  for (let i = 0; i < length; i += 1) {
    const white = rng.next() * 2 - 1;
    data[i] = pink ? pink(white) : white;
  }
  return scaleToRms(data, params.level);
}

/**
 * Paul Kellet's refined pink filter: a sum of first-order sections that
 * approximates a -3 dB/octave slope across the audio band.
 */
function pinkFilter(): (white: number) => number {
  let b0 = 0;
  let b1 = 0;
  let b2 = 0;
  let b3 = 0;
  let b4 = 0;
  let b5 = 0;
  let b6 = 0;
  return (white) => {
    b0 = 0.99886 * b0 + white * 0.0555179;
    b1 = 0.99332 * b1 + white * 0.0750759;
    b2 = 0.969 * b2 + white * 0.153852;
    b3 = 0.8665 * b3 + white * 0.3104856;
    b4 = 0.55 * b4 + white * 0.5329522;
    b5 = -0.7616 * b5 - white * 0.016898;
    const out = b0 + b1 + b2 + b3 + b4 + b5 + b6 + white * 0.5362;
    b6 = white * 0.115926;
    return out;
  };
}

export function rms(data: Float32Array): number {
  if (data.length === 0) {
    return 0;
  }
  let sum = 0;
  for (let i = 0; i < data.length; i += 1) {
    sum += data[i] * data[i];
  }
  return Math.sqrt(sum / data.length);
}

/** Scale in place so the RMS equals `level`; silence stays silent. */
export function scaleToRms(data: Float32Array, level: number): Float32Array {
  const current = rms(data);
  if (current === 0) {
    return data;
  }
  const gain = level / current;
  for (let i = 0; i < data.length; i += 1) {
    data[i] *= gain;
  }
  return data;
}
