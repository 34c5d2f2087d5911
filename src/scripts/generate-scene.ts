/**
 * Instantiate a structure file into a scene file.
 *
 * Run: npm run generate-scene -- --structure structure.json --clips clips.json --output scene.json
 *      [--speakers 150,3240,5463] [--seed 0]
 */
import path from 'path';
import { loadEnv, parseArgValue, requireArg } from '../config/env';
loadEnv();

import { logger } from '../config/logger';
import { sceneConfigFromEnv } from '../config/scene.config';
import { SpeakerClipPool, loadClipIndex } from '../services/scene/clip-pool.service';
import { generate } from '../services/scene/scene-generator.service';
import { summarizeScene, writeSceneFile } from '../types/scene.types';
import { parseStructureFile } from '../types/structure.types';
import { SceneError } from '../utils/errors';

function main(): void {
  const structurePath = path.resolve(requireArg('--structure'));
  const clipIndexPath = path.resolve(requireArg('--clips'));
  const outputPath = path.resolve(requireArg('--output'));
  const speakers = parseArgValue('--speakers')
    ?.split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  const seedArg = parseArgValue('--seed');

  const config = sceneConfigFromEnv();
  if (seedArg !== undefined) {
    config.seed = Number(seedArg);
  }

  logger.info(`Instantiating ${structurePath} to make ${outputPath}`);
  const structure = parseStructureFile(structurePath);
  const clipSource = new SpeakerClipPool(loadClipIndex(clipIndexPath), speakers);
  const segments = generate(structure, { clipSource, config });

  writeSceneFile(outputPath, segments);
  logger.info('Scene written', { outputPath, ...summarizeScene(segments) });
}

try {
  main();
} catch (error) {
  if (error instanceof SceneError) {
    logger.error(error.message, { code: error.code, ...error.details });
  } else {
    logger.error('Failed to generate scene', { message: error instanceof Error ? error.message : String(error) });
  }
  process.exit(1);
}
