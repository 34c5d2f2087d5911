import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import { envNumber, envString } from './env';

// ---------------------------------------------------------------------------
// Turn-taking policy names
// ---------------------------------------------------------------------------
export const TURN_POLICIES = ['random', 'round-robin'] as const;
export type TurnPolicyName = (typeof TURN_POLICIES)[number];

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

/**
 * Distribution of the time between one turn's end and the next turn's start.
 * Negative draws are overlaps; every draw is clamped to [-maxOverlap, maxGap].
 */
export const GapDistributionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('normal'),
    mean: z.number().finite().default(0),
    std: z.number().finite().nonnegative().default(0.25),
  }),
  z.object({
    kind: z.literal('uniform'),
    min: z.number().finite(),
    max: z.number().finite(),
  }),
]);
export type GapDistribution = z.infer<typeof GapDistributionSchema>;

export const SceneConfigSchema = z
  .object({
    /** Seed for every random draw made during generation */
    seed: z.number().int().nonnegative().default(0),
    /** Generation grid; segment times are multiples of 1/sampleRate */
    sampleRate: z.number().int().positive().default(16000),
    policy: z.enum(TURN_POLICIES).default('random'),
    /** Shortest turn, seconds */
    minTurn: z.number().finite().positive().default(1),
    /** Longest turn the policy asks for (the final turn may stretch past it) */
    maxTurn: z.number().finite().positive().default(8),
    maxOverlap: z.number().finite().nonnegative().default(0.5),
    maxGap: z.number().finite().nonnegative().default(0.5),
    gap: GapDistributionSchema.default({ kind: 'normal', mean: 0, std: 0.25 }),
    /** Structure speaker id -> output channel; speaker k defaults to channel k-1 */
    channelMap: z.record(z.string().regex(/^\d+$/), z.number().int().nonnegative()).optional(),
    /** Defaults to the channel after the last speaker channel */
    noiseChannel: z.number().int().nonnegative().optional(),
  })
  .superRefine((value, ctx) => {
    if (value.maxTurn < value.minTurn) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maxTurn'], message: 'maxTurn must be >= minTurn' });
    }
    if (value.maxOverlap >= value.minTurn) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maxOverlap'], message: 'maxOverlap must be < minTurn' });
    }
    if (value.gap.kind === 'uniform' && value.gap.max < value.gap.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['gap', 'max'], message: 'gap.max must be >= gap.min' });
    }
  });

export type SceneConfigInput = z.input<typeof SceneConfigSchema>;
export type SceneConfig = z.output<typeof SceneConfigSchema>;

export function resolveSceneConfig(input: SceneConfigInput = {}): SceneConfig {
  const result = SceneConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`Invalid scene config: ${issue.path.join('.')}: ${issue.message}`, {
      path: issue.path.join('.'),
    });
  }
  return result.data;
}

/** Scene config overrides taken from SCENE_* environment variables. */
export function sceneConfigFromEnv(): SceneConfigInput {
  const defaults = resolveSceneConfig();
  const policyName = envString('SCENE_POLICY', defaults.policy);
  const policy = TURN_POLICIES.find((name) => name === policyName);
  if (!policy) {
    throw new ConfigError(`Unknown SCENE_POLICY "${policyName}"`, { policy: policyName });
  }
  return {
    seed: envNumber('SCENE_SEED', defaults.seed),
    sampleRate: envNumber('SCENE_SAMPLE_RATE', defaults.sampleRate),
    policy,
    minTurn: envNumber('SCENE_MIN_TURN', defaults.minTurn),
    maxTurn: envNumber('SCENE_MAX_TURN', defaults.maxTurn),
    maxOverlap: envNumber('SCENE_MAX_OVERLAP', defaults.maxOverlap),
    maxGap: envNumber('SCENE_MAX_GAP', defaults.maxGap),
  };
}
