// ===========================================================================
// Scene errors
//
// Every failure surfaced by parsing, generation or rendering is a SceneError
// with a stable `code` and a `details` object locating the cause (node path
// in the structure tree, or segment index in the scene).
// ===========================================================================

export type SceneErrorCode =
  | 'STRUCTURE_FORMAT'
  | 'DURATION_CONFLICT'
  | 'INSUFFICIENT_SOURCE_MATERIAL'
  | 'RENDER_TARGET'
  | 'SCENE_FORMAT'
  | 'CONFIG';

export class SceneError extends Error {
  readonly code: SceneErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: SceneErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Malformed or incomplete structure tree. */
export class StructureFormatError extends SceneError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super('STRUCTURE_FORMAT', `Invalid structure at ${path}: ${reason}`, { path });
    this.path = path;
  }
}

/** A conversation is too short to seat every speaker at least once. */
export class DurationConflictError extends SceneError {
  readonly path: string;

  constructor(path: string, requested: number, minimum: number) {
    super(
      'DURATION_CONFLICT',
      `Conversation at ${path} requests ${requested}s but needs at least ${minimum}s`,
      { path, requested, minimum }
    );
    this.path = path;
  }
}

/** No clip of adequate length exists for a required turn. */
export class InsufficientSourceMaterialError extends SceneError {
  readonly path: string;

  constructor(path: string, speaker: number, minLength: number) {
    super(
      'INSUFFICIENT_SOURCE_MATERIAL',
      `No clip of at least ${minLength}s available for speaker ${speaker} (at ${path})`,
      { path, speaker, minLength }
    );
    this.path = path;
  }
}

/** A segment resolves outside the allocated sample buffer. */
export class RenderTargetError extends SceneError {
  readonly segmentIndex: number;

  constructor(segmentIndex: number, reason: string) {
    super('RENDER_TARGET', `Segment ${segmentIndex}: ${reason}`, { segmentIndex });
    this.segmentIndex = segmentIndex;
  }
}

export class SceneFormatError extends SceneError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('SCENE_FORMAT', message, details);
  }
}

export class ConfigError extends SceneError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('CONFIG', message, details);
  }
}
