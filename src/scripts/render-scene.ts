/**
 * Render a scene file into a multichannel audio file.
 *
 * Run: npm run render-scene -- --scene scene.json --output scene.wav [--audio-root ./data/clips]
 *      [--channels 13] [--sample-rate 16000]
 */
import path from 'path';
import { envNumber, envString, loadEnv, parseArgValue, requireArg } from '../config/env';
loadEnv();

import { logger } from '../config/logger';
import { writeRenderedAudio } from '../services/audio/audio-writer.service';
import { FfmpegClipReader } from '../services/audio/ffmpeg.service';
import { render, requiredChannels } from '../services/audio/scene-renderer.service';
import { readSceneFile } from '../types/scene.types';
import { SceneError } from '../utils/errors';

async function main(): Promise<void> {
  const scenePath = path.resolve(requireArg('--scene'));
  const outputPath = path.resolve(requireArg('--output'));
  const audioRoot = path.resolve(parseArgValue('--audio-root') ?? envString('AUDIO_ROOT', '.'));
  const sampleRate = Number(parseArgValue('--sample-rate') ?? envNumber('SCENE_SAMPLE_RATE', 16000));

  const segments = readSceneFile(scenePath);
  const channelCount = Number(parseArgValue('--channels') ?? requiredChannels(segments));

  const buffer = await render(segments, channelCount, sampleRate, {
    clipReader: new FfmpegClipReader(audioRoot),
  });
  await writeRenderedAudio(buffer, outputPath);
}

main().catch((error: unknown) => {
  if (error instanceof SceneError) {
    logger.error(error.message, { code: error.code, ...error.details });
  } else {
    logger.error('Failed to render scene', { message: error instanceof Error ? error.message : String(error) });
  }
  process.exit(1);
});
