import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { writeRenderedAudio } from '../src/services/audio/audio-writer.service';
import { makeBaseStream, mixSpeakers, synthesizeBabble } from '../src/services/audio/babble-generator';
import { rms, synthesizeNoise } from '../src/services/audio/noise-generator';
import { encodeWav, toInt16 } from '../src/services/audio/wav-encoder';
import type { BabbleGeneratorParams } from '../src/types/scene.types';
import { createRandom, randomInt } from '../src/utils/random';
import { InMemoryClipReader } from './helpers';

/** Mean squared first difference over mean square: about 2 for white noise, lower for low-heavy spectra. */
function differenceRatio(samples: Float32Array): number {
  let diff = 0;
  for (let i = 1; i < samples.length; i++) {
    diff += (samples[i] - samples[i - 1]) ** 2;
  }
  return diff / (samples.length - 1) / rms(samples) ** 2;
}

describe('synthesizeNoise', () => {
  it('scales white noise to the requested RMS', () => {
    const samples = synthesizeNoise({ generator: 'noise', colour: 'white', level: 0.2, seed: 1 }, 4000);

    expect(samples).toHaveLength(4000);
    expect(rms(samples)).toBeCloseTo(0.2, 5);
  });

  it('scales pink noise to the requested RMS', () => {
    const samples = synthesizeNoise({ generator: 'noise', colour: 'pink', level: 0.05, seed: 1 }, 4000);
    expect(rms(samples)).toBeCloseTo(0.05, 5);
  });

  it('gives pink noise more low-frequency energy than white', () => {
    const white = synthesizeNoise({ generator: 'noise', colour: 'white', level: 0.1, seed: 2 }, 20000);
    const pink = synthesizeNoise({ generator: 'noise', colour: 'pink', level: 0.1, seed: 2 }, 20000);

    expect(differenceRatio(white)).toBeGreaterThan(1.8);
    expect(differenceRatio(pink)).toBeLessThan(1);
  });

  it('is reproducible from its params', () => {
    const params = { generator: 'noise', colour: 'white', level: 0.1, seed: 77 } as const;

    expect(synthesizeNoise(params, 100)).toEqual(synthesizeNoise(params, 100));
    expect(synthesizeNoise({ ...params, seed: 78 }, 100)).not.toEqual(synthesizeNoise(params, 100));
  });

  it('returns silence at level zero and nothing for zero length', () => {
    const silent = synthesizeNoise({ generator: 'noise', colour: 'white', level: 0, seed: 1 }, 10);

    expect(silent).toHaveLength(10);
    expect(rms(silent)).toBe(0);
    expect(synthesizeNoise({ generator: 'noise', colour: 'white', level: 0.1, seed: 1 }, 0)).toHaveLength(0);
  });
});

describe('babble', () => {
  function babbleParams(seed: number): BabbleGeneratorParams {
    return {
      generator: 'babble',
      level: 0.1,
      seed,
      nSpeakers: 3,
      clips: [
        { path: 'voice/a.flac', clipOffset: 0, duration: 2 },
        { path: 'voice/b.flac', clipOffset: 0.5, duration: 1 },
      ],
    };
  }

  function voiceReader(): InMemoryClipReader {
    return new InMemoryClipReader({
      'voice/a.flac': Float32Array.from({ length: 200 }, (_, i) => Math.sin(i * 0.37)),
      'voice/b.flac': Float32Array.from({ length: 150 }, (_, i) => 3 * Math.sin(i * 0.11)),
    });
  }

  it('normalises each clip before joining them', async () => {
    const reader = new InMemoryClipReader({
      loud: Float32Array.from([4, -4]),
      quiet: Float32Array.from([0.5, -0.5, 9]),
      silent: Float32Array.from([0, 0]),
    });
    const params: BabbleGeneratorParams = {
      generator: 'babble',
      level: 0.1,
      seed: 1,
      nSpeakers: 2,
      clips: [
        { path: 'loud', clipOffset: 0, duration: 0.2 },
        { path: 'silent', clipOffset: 0, duration: 0.2 },
        { path: 'quiet', clipOffset: 0, duration: 0.2 },
      ],
    };

    const base = await makeBaseStream(params, reader, 10);

    expect(Array.from(base)).toEqual([1, -1, 0, 0, 1, -1]);
  });

  it('sums windows that wrap around the stream', () => {
    const base = Float32Array.from([1, 2, 3, 4]);
    const start = randomInt(createRandom(7), 0, 3);

    expect(Array.from(mixSpeakers(base, 1, 6, 7))).toEqual(
      Array.from({ length: 6 }, (_, i) => base[(start + i) % 4])
    );
    expect(Array.from(mixSpeakers(new Float32Array(0), 3, 2, 7))).toEqual([0, 0]);
  });

  it('scales the mix to the requested RMS', async () => {
    const reader = voiceReader();
    const samples = await synthesizeBabble(babbleParams(3), 120, 100, reader);

    expect(samples).toHaveLength(120);
    expect(rms(samples)).toBeCloseTo(0.1, 5);
    expect(reader.requests).toEqual([
      { path: 'voice/a.flac', offset: 0, length: 200 },
      { path: 'voice/b.flac', offset: 50, length: 100 },
    ]);
  });

  it('is reproducible from its seed', async () => {
    const first = await synthesizeBabble(babbleParams(3), 120, 100, voiceReader());
    const again = await synthesizeBabble(babbleParams(3), 120, 100, voiceReader());
    const reseeded = await synthesizeBabble(babbleParams(4), 120, 100, voiceReader());

    expect(again).toEqual(first);
    expect(reseeded).not.toEqual(first);
  });
});

describe('encodeWav', () => {
  it('writes a 16-bit PCM header and interleaved samples', () => {
    const wav = encodeWav({
      sampleRate: 8000,
      length: 2,
      channels: [Float32Array.from([0, 1]), Float32Array.from([-1, 0.5])],
    });

    expect(wav.length).toBe(44 + 8);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(36 + 8);
    expect(wav.toString('ascii', 8, 16)).toBe('WAVEfmt ');
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(2);
    expect(wav.readUInt32LE(24)).toBe(8000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt16LE(32)).toBe(4);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString('ascii', 36, 40)).toBe('data');
    expect(wav.readUInt32LE(40)).toBe(8);
    expect([wav.readInt16LE(44), wav.readInt16LE(46), wav.readInt16LE(48), wav.readInt16LE(50)]).toEqual([
      0, -32768, 32767, 16384,
    ]);
  });

  it('clips samples outside [-1, 1]', () => {
    expect(toInt16(1.5)).toBe(32767);
    expect(toInt16(-3)).toBe(-32768);
    expect(toInt16(-0.5)).toBe(-16384);
  });
});

describe('writeRenderedAudio', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rendered-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const buffer = { sampleRate: 8000, length: 3, channels: [Float32Array.from([0.25, -0.25, 0])] };

  it('writes WAV output directly', async () => {
    const outputPath = path.join(dir, 'out', 'scene.wav');

    await expect(writeRenderedAudio(buffer, outputPath)).resolves.toBe(outputPath);
    expect(fs.readFileSync(outputPath).equals(encodeWav(buffer))).toBe(true);
  });

  it('rejects an unsupported extension', async () => {
    await expect(writeRenderedAudio(buffer, path.join(dir, 'scene.mp3'))).rejects.toThrow(
      'Unsupported output format ".mp3" (expected wav, flac)'
    );
  });
});
