import { differenceInDays, isValid, parseISO } from 'date-fns';
import { normalizeSkills } from '@/lib/skills';
import { tokenize } from '@/lib/text';
import type { JobRecord, RecencyDecayName, SubScores } from '@/types';

export const RECENCY_FALLBACK = 0.5;
export const NEUTRAL_POPULARITY = 0.5;

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

// 0 when either vector has zero norm or the lengths differ.
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return dot / denom;
}

// Below-orthogonal values carry no useful signal for matching, so they floor to 0.
export function semanticSimilarity(a: readonly number[] | null, b: readonly number[] | null): number {
  if (!a || !b) return 0;
  return clamp01(cosineSimilarity(a, b));
}

/**
 * Terms a job is matched on: its normalized skills plus the tokens of its title.
 */
export function jobTerms(job: Pick<JobRecord, 'raw_skills' | 'title'>): Set<string> {
  return new Set([...normalizeSkills(job.raw_skills), ...tokenize(job.title)]);
}

export function keywordOverlap(terms: ReadonlySet<string>, resumeSkills: ReadonlySet<string>): number {
  if (terms.size === 0) return 0;
  let hits = 0;
  for (const term of terms) {
    if (resumeSkills.has(term)) hits++;
  }
  return hits / terms.size;
}

// Maps a posting's age in whole days onto [0,1]; must not increase with age.
export type RecencyDecay = (ageDays: number, horizonDays: number) => number;

export const RECENCY_DECAYS: Record<RecencyDecayName, RecencyDecay> = {
  linear: (age, horizon) => 1 - age / horizon,
  // Half-life of a quarter horizon, cut to 0 at the horizon.
  exponential: (age, horizon) => (age >= horizon ? 0 : Math.pow(0.5, age / (horizon / 4))),
  step: (age) => {
    if (age <= 1) return 1;
    if (age <= 7) return 0.8;
    if (age <= 30) return 0.6;
    return 0.3;
  },
};

// Records normally carry ISO strings; epoch millis and Date objects from untyped callers are accepted too.
export function parsePostedDate(value: unknown): Date | null {
  let date: Date;
  if (typeof value === 'string') date = parseISO(value.trim());
  else if (typeof value === 'number') date = new Date(value);
  else if (value instanceof Date) date = value;
  else return null;
  return isValid(date) ? date : null;
}

export function recencyWeight(
  postedDate: string | null,
  now: Date,
  options: { horizonDays: number; decay?: RecencyDecayName | RecencyDecay }
): number {
  const posted = parsePostedDate(postedDate);
  if (!posted) return RECENCY_FALLBACK;

  const decay =
    typeof options.decay === 'function' ? options.decay : RECENCY_DECAYS[options.decay ?? 'linear'];
  const ageDays = Math.max(0, differenceInDays(now, posted));
  return clamp01(decay(ageDays, options.horizonDays));
}

// Pluggable popularity signal. No reliable signal exists yet, so every job gets the neutral value.
export type PopularityScorer = (job: JobRecord) => number;

export const neutralPopularity: PopularityScorer = () => NEUTRAL_POPULARITY;

export function popularityScore(job: JobRecord, scorer: PopularityScorer = neutralPopularity): number {
  try {
    return clamp01(scorer(job));
  } catch (error) {
    console.warn(`[scoring] popularity scorer failed for job ${job.id}, using neutral value:`, error);
    return NEUTRAL_POPULARITY;
  }
}

export interface SubScoreInput {
  job: JobRecord;
  resumeEmbedding: readonly number[] | null;
  jobEmbedding: readonly number[] | null;
  resumeSkills: ReadonlySet<string>;
  now: Date;
  horizonDays: number;
  decay?: RecencyDecayName | RecencyDecay;
  popularity?: PopularityScorer;
}

export function computeSubScores(input: SubScoreInput): SubScores {
  return {
    semantic_similarity: semanticSimilarity(input.resumeEmbedding, input.jobEmbedding),
    keyword_overlap: keywordOverlap(jobTerms(input.job), input.resumeSkills),
    recency_weight: recencyWeight(input.job.posted_date, input.now, {
      horizonDays: input.horizonDays,
      decay: input.decay,
    }),
    popularity_score: popularityScore(input.job, input.popularity),
  };
}
