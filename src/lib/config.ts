import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';
import type { RankConfig, ScoreWeights } from '@/types';

export const WEIGHT_SUM_TOLERANCE = 1e-6;

export const DEFAULT_WEIGHTS: Readonly<ScoreWeights> = {
  semantic: 0.55,
  keyword: 0.25,
  recency: 0.1,
  popularity: 0.1,
};

export const DEFAULT_RANK_CONFIG: Readonly<RankConfig> = {
  weights: DEFAULT_WEIGHTS,
  top_n: 20,
  recency_horizon_days: 90,
  recency_decay: 'linear',
  embedding_timeout_ms: 5000,
  embedding_concurrency: 8,
};

const weightSchema = z.number().finite().min(0, 'must be >= 0');
const positiveInt = z.number().int('must be an integer').positive('must be > 0');

const weightsSchema = z
  .object({
    semantic: weightSchema,
    keyword: weightSchema,
    recency: weightSchema,
    popularity: weightSchema,
  })
  .strict()
  .refine((w) => Math.abs(w.semantic + w.keyword + w.recency + w.popularity - 1) <= WEIGHT_SUM_TOLERANCE, {
    message: 'must sum to 1.0',
  });

const rankConfigSchema = z
  .object({
    weights: weightsSchema,
    top_n: positiveInt,
    recency_horizon_days: positiveInt,
    recency_decay: z.enum(['linear', 'exponential', 'step']),
    embedding_timeout_ms: positiveInt,
    embedding_concurrency: positiveInt,
  })
  .strict();

export type RankConfigOverrides = Partial<Omit<RankConfig, 'weights'>> & {
  weights?: Partial<ScoreWeights>;
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path} ${issue.message}` : issue.message;
  });
}

/**
 * Validates a complete configuration. Invalid values are rejected, never corrected.
 */
export function validateRankConfig(config: unknown): RankConfig {
  const parsed = rankConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid ranking configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

export function validateWeights(weights: ScoreWeights): ScoreWeights {
  const parsed = weightsSchema.safeParse(weights);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid score weights', formatIssues(parsed.error));
  }
  return parsed.data;
}

export function resolveRankConfig(overrides: RankConfigOverrides = {}): RankConfig {
  return validateRankConfig({
    ...DEFAULT_RANK_CONFIG,
    ...overrides,
    weights: { ...DEFAULT_RANK_CONFIG.weights, ...(overrides.weights ?? {}) },
  });
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError('Invalid ranking configuration', [`${name} is not a number: "${raw}"`]);
  }
  return value;
}

function readWeights(env: Env): ScoreWeights | undefined {
  const raw = env.RANK_WEIGHTS;
  if (raw === undefined || raw.trim() === '') return undefined;
  const parts = raw.split(',').map((p) => Number(p.trim()));
  if (parts.length !== 4 || parts.some((p) => !Number.isFinite(p))) {
    throw new ConfigurationError('Invalid ranking configuration', [
      `RANK_WEIGHTS must be four numbers "semantic,keyword,recency,popularity": "${raw}"`,
    ]);
  }
  const [semantic, keyword, recency, popularity] = parts;
  return { semantic, keyword, recency, popularity };
}

/**
 * Defaults, then RANK_* environment variables, then explicit overrides.
 */
export function loadRankConfig(overrides: RankConfigOverrides = {}, env: Env = process.env): RankConfig {
  const decay = env.RANK_RECENCY_DECAY?.trim();
  const fromEnv: RankConfigOverrides = {};

  const topN = readNumber(env, 'RANK_TOP_N');
  if (topN !== undefined) fromEnv.top_n = topN;
  const horizon = readNumber(env, 'RANK_RECENCY_HORIZON_DAYS');
  if (horizon !== undefined) fromEnv.recency_horizon_days = horizon;
  const timeout = readNumber(env, 'RANK_EMBEDDING_TIMEOUT_MS');
  if (timeout !== undefined) fromEnv.embedding_timeout_ms = timeout;
  const concurrency = readNumber(env, 'RANK_EMBEDDING_CONCURRENCY');
  if (concurrency !== undefined) fromEnv.embedding_concurrency = concurrency;

  const merged = {
    ...DEFAULT_RANK_CONFIG,
    ...fromEnv,
    ...(decay ? { recency_decay: decay } : {}),
    ...overrides,
    weights: { ...(readWeights(env) ?? DEFAULT_RANK_CONFIG.weights), ...(overrides.weights ?? {}) },
  };
  return validateRankConfig(merged);
}
