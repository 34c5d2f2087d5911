export { generate, sceneGenerator, type GenerateOptions } from './services/scene/scene-generator.service';
export {
  render,
  requiredChannels,
  sceneRenderer,
  type ClipReader,
  type RenderOptions,
  type SampleBuffer,
} from './services/audio/scene-renderer.service';
export {
  SpeakerClipPool,
  loadClipIndex,
  type ClipIndexEntry,
  type ClipIndexEntryInput,
  type ClipRef,
  type ClipSource,
} from './services/scene/clip-pool.service';
export {
  RandomTurnPolicy,
  RoundRobinTurnPolicy,
  createTurnTakingPolicy,
  type SpeakerSchedule,
  type TurnLimits,
  type TurnTakingPolicy,
} from './services/scene/turn-taking';
export {
  exponentialSegmenter,
  makeConversationSegment,
  makeParallelConversations,
  makeSpeakerGroups,
  makeTable,
  type Segmenter,
} from './services/structure/structure-builder.service';
export { FfmpegClipReader } from './services/audio/ffmpeg.service';
export { writeRenderedAudio } from './services/audio/audio-writer.service';
export { encodeWav } from './services/audio/wav-encoder';
export { synthesizeNoise } from './services/audio/noise-generator';
export { synthesizeBabble } from './services/audio/babble-generator';
export {
  resolveSceneConfig,
  sceneConfigFromEnv,
  type SceneConfig,
  type SceneConfigInput,
} from './config/scene.config';
export * from './types/structure.types';
export * from './types/scene.types';
export * from './utils/errors';
export { SeededRandom, createRandom, type RandomSource } from './utils/random';
export { findChannelOverlaps, roundHalfUp, samplesToCover, secondsToSamples } from './utils/timeline';
