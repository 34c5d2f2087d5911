import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import { ConfigError } from '../../utils/errors';
import ffmpegService, { OUTPUT_FORMATS, type OutputFormat } from './ffmpeg.service';
import type { SampleBuffer } from './scene-renderer.service';
import { encodeWav } from './wav-encoder';

function outputFormatFor(outputPath: string): OutputFormat {
  const extension = path.extname(outputPath).slice(1).toLowerCase();
  const format = OUTPUT_FORMATS.find((candidate) => candidate === extension);
  if (!format) {
    throw new ConfigError(`Unsupported output format ".${extension}" (expected ${OUTPUT_FORMATS.join(', ')})`, {
      outputPath,
    });
  }
  return format;
}

/**
 * Write a rendered buffer as one channel per speaker/noise source. WAV is
 * written directly; other formats go through a temporary WAV and FFmpeg.
 */
export async function writeRenderedAudio(buffer: SampleBuffer, outputPath: string): Promise<string> {
  const format = outputFormatFor(outputPath);
  const outputDir = path.dirname(outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const wav = encodeWav(buffer);
  if (format === 'wav') {
    await fs.promises.writeFile(outputPath, wav);
    logger.info('Rendered audio written', { outputPath, channels: buffer.channels.length, samples: buffer.length });
    return outputPath;
  }

  const tempPath = path.join(outputDir, `scene_render_${uuidv4().slice(0, 8)}.wav`);
  try {
    await fs.promises.writeFile(tempPath, wav);
    return await ffmpegService.transcode(tempPath, outputPath, format);
  } finally {
    await ffmpegService.cleanupFile(tempPath);
  }
}
