import fs from 'fs';
import { z } from 'zod';
import { StructureFormatError } from '../utils/errors';

// ---------------------------------------------------------------------------
// Node kinds
// ---------------------------------------------------------------------------
export const NODE_TYPES = ['sequence', 'splitter', 'conversation', 'noise', 'pause'] as const;
export type NodeType = (typeof NODE_TYPES)[number];

/** Colours synthesised from a seed alone. */
export const SYNTHETIC_COLOURS = ['white', 'pink'] as const;
export type SyntheticColour = (typeof SYNTHETIC_COLOURS)[number];

/** `babble` mixes several offset copies of a speech stream built from source clips. */
export const NOISE_COLOURS = [...SYNTHETIC_COLOURS, 'babble'] as const;
export type NoiseColour = (typeof NOISE_COLOURS)[number];

export const DEFAULT_BABBLE_SPEAKERS = 20;

/** Structure speakers are numbered from 1. */
export type SpeakerId = number;

export interface NoiseParams {
  colour: NoiseColour;
  /** Target RMS level of the synthesised signal */
  level: number;
  /** Fixed seed; drawn from the generator's random source when absent */
  seed?: number;
  /** Overrides the configured noise channel */
  channel?: number;
  /** Babble only: clip-pool speakers whose clips make up the speech stream */
  sources?: SpeakerId[];
  /** Babble only: number of overlapping voices */
  nSpeakers?: number;
  /** Babble only: seconds of speech stream to draw windows from; twice the node duration by default */
  baseDuration?: number;
}

export interface SequenceNode {
  type: 'sequence';
  /** Narrows the active speakers for every child; inherits when absent */
  speakers?: SpeakerId[];
  elements: StructureNode[];
}

export interface SplitterNode {
  type: 'splitter';
  elements: StructureNode[];
}

export interface ConversationNode {
  type: 'conversation';
  speakers: SpeakerId[];
  /** Seconds */
  duration: number;
}

export interface NoiseNode {
  type: 'noise';
  duration: number;
  params: NoiseParams;
}

export interface PauseNode {
  type: 'pause';
  duration: number;
}

export type StructureNode = SequenceNode | SplitterNode | ConversationNode | NoiseNode | PauseNode;

// ---------------------------------------------------------------------------
// Zod schemas (per node, children are validated recursively by parseNode)
// ---------------------------------------------------------------------------
const SpeakerIdSchema = z.number().int().positive();
const DurationSchema = z.number().finite().nonnegative();
const ElementsSchema = z.array(z.unknown()).min(1, 'elements must not be empty');

export const NoiseParamsSchema = z
  .object({
    colour: z.enum(NOISE_COLOURS).default('white'),
    level: z.number().finite().nonnegative().default(0.05),
    seed: z.number().int().nonnegative().max(0xffffffff).optional(),
    channel: z.number().int().nonnegative().optional(),
    sources: z.array(SpeakerIdSchema).min(1).optional(),
    nSpeakers: z.number().int().positive().optional(),
    baseDuration: z.number().finite().positive().optional(),
  })
  .refine((value) => value.colour !== 'babble' || value.sources !== undefined, {
    message: 'babble needs at least one source speaker',
    path: ['sources'],
  });

const SequenceSchema = z.object({
  speakers: z.array(SpeakerIdSchema).optional(),
  elements: ElementsSchema,
});

const SplitterSchema = z.object({
  elements: ElementsSchema,
});

const ConversationSchema = z
  .object({
    speakers: z.array(SpeakerIdSchema),
    duration: DurationSchema,
  })
  .refine((value) => new Set(value.speakers).size >= 2, {
    message: 'a conversation needs at least 2 distinct speakers',
    path: ['speakers'],
  });

const NoiseSchema = z.object({
  duration: DurationSchema,
  params: NoiseParamsSchema.default({}),
});

const PauseSchema = z.object({
  duration: DurationSchema,
});

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNodeType(value: unknown): value is NodeType {
  return typeof value === 'string' && (NODE_TYPES as readonly string[]).includes(value);
}

function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown, path: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new StructureFormatError(path, `${field}${issue.message}`);
  }
  return result.data;
}

function dedupe(speakers: SpeakerId[]): SpeakerId[] {
  return [...new Set(speakers)];
}

function parseElements(elements: unknown[], path: string): StructureNode[] {
  return elements.map((element, index) => parseNode(element, `${path}.elements[${index}]`));
}

function parseNode(raw: unknown, path: string): StructureNode {
  if (!isRecord(raw)) {
    throw new StructureFormatError(path, 'node must be an object');
  }
  const type = raw.type;
  if (!isNodeType(type)) {
    throw new StructureFormatError(path, `unrecognised node type ${JSON.stringify(type)}`);
  }

  switch (type) {
    case 'sequence': {
      const fields = validate(SequenceSchema, raw, path);
      return {
        type,
        ...(fields.speakers ? { speakers: dedupe(fields.speakers) } : {}),
        elements: parseElements(fields.elements, path),
      };
    }
    case 'splitter': {
      const fields = validate(SplitterSchema, raw, path);
      return { type, elements: parseElements(fields.elements, path) };
    }
    case 'conversation': {
      const fields = validate(ConversationSchema, raw, path);
      return { type, speakers: dedupe(fields.speakers), duration: fields.duration };
    }
    case 'noise': {
      const fields = validate(NoiseSchema, raw, path);
      return { type, duration: fields.duration, params: fields.params };
    }
    case 'pause': {
      const fields = validate(PauseSchema, raw, path);
      return { type, duration: fields.duration };
    }
  }
}

/**
 * Parse and validate a structure tree. Validation is structural only: the
 * same speaker may appear in concurrent splitter branches.
 */
export function parseStructure(raw: unknown): StructureNode {
  return parseNode(raw, '$');
}

export function parseStructureFile(filePath: string): StructureNode {
  const text = fs.readFileSync(filePath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StructureFormatError('$', `invalid JSON in ${filePath}: ${reason}`);
  }
  return parseStructure(raw);
}

// ---------------------------------------------------------------------------
// Tree queries
// ---------------------------------------------------------------------------

/** Every speaker named anywhere in the tree, ascending. */
export function collectSpeakers(node: StructureNode): SpeakerId[] {
  const found = new Set<SpeakerId>();
  const visit = (current: StructureNode): void => {
    switch (current.type) {
      case 'sequence':
        current.speakers?.forEach((speaker) => found.add(speaker));
        current.elements.forEach(visit);
        break;
      case 'splitter':
        current.elements.forEach(visit);
        break;
      case 'conversation':
        current.speakers.forEach((speaker) => found.add(speaker));
        break;
      case 'noise':
      case 'pause':
        break;
    }
  };
  visit(node);
  return [...found].sort((a, b) => a - b);
}

/** Declared duration in seconds: explicit, or the sum/max of children. */
export function declaredDuration(node: StructureNode): number {
  switch (node.type) {
    case 'sequence':
      return node.elements.reduce((total, element) => total + declaredDuration(element), 0);
    case 'splitter':
      return node.elements.reduce((max, element) => Math.max(max, declaredDuration(element)), 0);
    case 'conversation':
    case 'noise':
    case 'pause':
      return node.duration;
  }
}
