/**
 * Sample buffer to WAV encoder.
 *
 * WAV format: RIFF header + fmt chunk + data chunk, 16-bit PCM, any number
 * of interleaved channels.
 */

import type { SampleBuffer } from './scene-renderer.service';

const HEADER_BYTES = 44;
const BITS_PER_SAMPLE = 16;

export function encodeWav(buffer: SampleBuffer): Buffer {
  const numChannels = buffer.channels.length;
  const bytesPerSample = BITS_PER_SAMPLE / 8;
  const blockAlign = numChannels * bytesPerSample;
  const byteRate = buffer.sampleRate * blockAlign;
  const dataSize = buffer.length * blockAlign;

  const wav = Buffer.alloc(HEADER_BYTES + dataSize);

  // RIFF chunk descriptor
  wav.write('RIFF', 0, 'ascii');
  wav.writeUInt32LE(36 + dataSize, 4); // File size - 8
  wav.write('WAVE', 8, 'ascii');

  // fmt sub-chunk
  wav.write('fmt ', 12, 'ascii');
  wav.writeUInt32LE(16, 16); // Subchunk1Size (16 for PCM)
  wav.writeUInt16LE(1, 20); // AudioFormat (1 = PCM)
  wav.writeUInt16LE(numChannels, 22);
  wav.writeUInt32LE(buffer.sampleRate, 24);
  wav.writeUInt32LE(byteRate, 28);
  wav.writeUInt16LE(blockAlign, 32);
  wav.writeUInt16LE(BITS_PER_SAMPLE, 34);

  // data sub-chunk
  wav.write('data', 36, 'ascii');
  wav.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < buffer.length; i++) {
    for (let ch = 0; ch < numChannels; ch++) {
      wav.writeInt16LE(toInt16(buffer.channels[ch][i]), HEADER_BYTES + (i * numChannels + ch) * bytesPerSample);
    }
  }

  return wav;
}

export function toInt16(sample: number): number {
  const clamped = Math.max(-1, Math.min(1, sample));
  return Math.round(clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff);
}
