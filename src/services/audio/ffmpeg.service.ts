import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import { PassThrough } from 'stream';
import { promisify } from 'util';
import { logger } from '../../config/logger';
import type { ClipReader } from './scene-renderer.service';

const unlinkAsync = promisify(fs.unlink);

export const OUTPUT_FORMATS = ['wav', 'flac'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const BYTES_PER_SAMPLE = 4; // f32le

class FFmpegService {
  /**
   * Decode part of an audio file to mono 32-bit float samples at `sampleRate`.
   * Returns at most `length` samples; fewer if the file ends first.
   */
  async readSamples(filePath: string, offset: number, length: number, sampleRate: number): Promise<Float32Array> {
    if (!fs.existsSync(filePath)) {
      throw new Error(`Source clip not found: ${filePath}`);
    }

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      const output = new PassThrough();
      let settled = false;

      const command = ffmpeg(filePath)
        .seekInput(offset / sampleRate)
        .duration(length / sampleRate)
        .audioChannels(1)
        .audioFrequency(sampleRate)
        .audioCodec('pcm_f32le')
        .format('f32le');

      const fail = (err: Error, stopProcess: boolean) => {
        if (settled) return;
        settled = true;
        output.destroy();
        if (stopProcess) {
          command.kill('SIGKILL');
        }
        logger.error('FFmpeg decode error:', { filePath, message: err.message });
        reject(err);
      };

      output.on('data', (chunk: Buffer) => chunks.push(chunk));
      output.on('end', () => {
        if (settled) return;
        settled = true;
        resolve(this.toFloat32(Buffer.concat(chunks), length));
      });
      output.on('error', (err: Error) => fail(err, true));

      command.on('error', (err: Error) => fail(err, false)).pipe(output, { end: true });
    });
  }

  /**
   * Transcode a rendered file (e.g. WAV to FLAC) keeping every channel.
   */
  async transcode(inputPath: string, outputPath: string, format: OutputFormat): Promise<string> {
    return new Promise((resolve, reject) => {
      const command = ffmpeg(inputPath);
      if (format === 'flac') {
        command.audioCodec('flac');
      } else {
        command.audioCodec('pcm_s16le');
      }

      command
        .format(format)
        .on('start', (commandLine: string) => {
          logger.debug('FFmpeg transcode started:', { commandLine });
        })
        .on('end', () => {
          logger.info('Transcode completed:', { outputPath });
          resolve(outputPath);
        })
        .on('error', (err: Error) => {
          logger.error('FFmpeg transcode error:', { message: err.message });
          reject(err);
        })
        .save(outputPath);
    });
  }

  /**
   * Clean up temporary files
   */
  async cleanupFile(filePath: string): Promise<void> {
    try {
      if (fs.existsSync(filePath)) {
        await unlinkAsync(filePath);
        logger.debug('Cleaned up file:', { filePath });
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Error cleaning up file:', { filePath, message });
    }
  }

  private toFloat32(bytes: Buffer, maxSamples: number): Float32Array {
    const count = Math.min(maxSamples, Math.floor(bytes.length / BYTES_PER_SAMPLE));
    const samples = new Float32Array(count);
    for (let i = 0; i < count; i++) {
      samples[i] = bytes.readFloatLE(i * BYTES_PER_SAMPLE);
    }
    return samples;
  }
}

const ffmpegService = new FFmpegService();

/** ClipReader that decodes clips below an audio root through FFmpeg. */
export class FfmpegClipReader implements ClipReader {
  constructor(private readonly audioRoot: string) {}

  read(clipPath: string, offset: number, length: number, sampleRate: number): Promise<Float32Array> {
    return ffmpegService.readSamples(path.resolve(this.audioRoot, clipPath), offset, length, sampleRate);
  }
}

export default ffmpegService;
