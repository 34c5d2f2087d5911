/**
 * Build a random cafe-session structure: parallel tables, larger tables
 * alternating between one conversation and two side conversations.
 *
 * Run: npm run build-structure -- --output structure.json --tables 4,4,4 --duration 1800 --seed 0
 */
import fs from 'fs';
import path from 'path';
import { loadEnv, parseArgValue, requireArg } from '../config/env';
loadEnv();

import { logger } from '../config/logger';
import { exponentialSegmenter, makeParallelConversations } from '../services/structure/structure-builder.service';
import { createRandom } from '../utils/random';

function parseNumberList(value: string): number[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
    .map(Number);
}

function main(): void {
  const outputPath = path.resolve(requireArg('--output'));
  const tableSizes = parseNumberList(parseArgValue('--tables') ?? '4,4,4');
  const duration = Number(parseArgValue('--duration') ?? 1800);
  const seed = Number(parseArgValue('--seed') ?? 0);
  const halfLife = Number(parseArgValue('--half-life') ?? 600);
  const minDuration = Number(parseArgValue('--min-duration') ?? 30);
  const segment = !process.argv.includes('--no-segment');

  const rng = createRandom(seed);
  const segmenter = segment ? exponentialSegmenter({ halfLife, minDuration }, rng) : undefined;
  const structure = makeParallelConversations(tableSizes, duration, rng, segmenter);

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, `${JSON.stringify(structure, null, 2)}\n`, 'utf8');
  logger.info('Structure written', { outputPath, tableSizes, duration, seed, segment });
}

try {
  main();
} catch (error) {
  logger.error('Failed to build structure', { message: error instanceof Error ? error.message : String(error) });
  process.exit(1);
}
