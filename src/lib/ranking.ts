import { getEmbeddingProvider, type EmbeddingProvider } from '@/lib/ai';
import { mapWithConcurrency, withTimeout } from '@/lib/concurrency';
import { DEFAULT_RANK_CONFIG, DEFAULT_WEIGHTS, validateRankConfig } from '@/lib/config';
import { dedupe } from '@/lib/dedupe';
import { InputError, errorMessage } from '@/lib/errors';
import { withResumeEmbedding } from '@/lib/ingest';
import { normalizeSkills } from '@/lib/skills';
import {
  clamp01,
  computeSubScores,
  parsePostedDate,
  type PopularityScorer,
  type RecencyDecay,
} from '@/lib/scoring';
import type {
  JobRecord,
  RankConfig,
  RankOutcome,
  RankedJob,
  ResumeProfile,
  ScoreWeights,
  SkippedJob,
  SubScores,
} from '@/types';

export interface RankOptions {
  provider?: EmbeddingProvider;
  now?: Date;
  popularity?: PopularityScorer;
  // Overrides config.recency_decay with a custom curve.
  decay?: RecencyDecay;
  signal?: AbortSignal;
}

export function fuseScores(parts: SubScores, weights: ScoreWeights = DEFAULT_WEIGHTS): number {
  return clamp01(
    weights.semantic * clamp01(parts.semantic_similarity) +
      weights.keyword * clamp01(parts.keyword_overlap) +
      weights.recency * clamp01(parts.recency_weight) +
      weights.popularity * clamp01(parts.popularity_score)
  );
}

function postedTime(job: JobRecord): number {
  return parsePostedDate(job.posted_date)?.getTime() ?? Number.NEGATIVE_INFINITY;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Total order: higher final score, then more recent posting (unknown dates last),
 * then job id, then fingerprint.
 */
export function compareRanked(a: RankedJob, b: RankedJob): number {
  const byScore = b.score.final_score - a.score.final_score;
  if (byScore !== 0) return byScore;

  const ta = postedTime(a.job);
  const tb = postedTime(b.job);
  if (ta !== tb) return tb > ta ? 1 : -1;

  return compareCodeUnits(a.job.id, b.job.id) || compareCodeUnits(a.job.fingerprint, b.job.fingerprint);
}

function describeInvalidJob(job: unknown): string | null {
  if (!job || typeof job !== 'object') return 'record is not an object';
  for (const field of ['id', 'title', 'description', 'source'] as const) {
    const value: unknown = Reflect.get(job, field);
    if (typeof value !== 'string') return `${field} is not a string`;
  }
  const skills: unknown = Reflect.get(job, 'raw_skills');
  if (!Array.isArray(skills)) return 'raw_skills is not an array';
  return null;
}

function jobIdOf(job: unknown, index: number): string {
  if (job && typeof job === 'object' && 'id' in job && typeof job.id === 'string') return job.id;
  return `#${index}`;
}

function assertResume(resume: ResumeProfile): void {
  if (!resume || typeof resume !== 'object') throw new InputError('Resume profile is missing');
  if (typeof resume.raw_text !== 'string' || !resume.raw_text.trim()) {
    throw new InputError('Resume text is empty');
  }
  if (!Array.isArray(resume.skills)) throw new InputError('Resume skills must be an array');
}

/**
 * Scores every unique job against the resume and returns the top `config.top_n`.
 * Per-job failures never abort the request: embedding failures score semantic
 * similarity as 0 (listed in `degraded`), malformed records are listed in `skipped`.
 */
export async function rankJobs(
  resume: ResumeProfile,
  jobs: readonly JobRecord[],
  config: RankConfig = DEFAULT_RANK_CONFIG,
  options: RankOptions = {}
): Promise<RankOutcome> {
  assertResume(resume);
  if (!Array.isArray(jobs)) throw new InputError('Job batch must be an array');
  const settings = validateRankConfig(config);
  options.signal?.throwIfAborted();

  const skipped: SkippedJob[] = [];
  const degraded: string[] = [];
  if (jobs.length === 0) return { resume, ranked: [], skipped, degraded, unique_count: 0 };

  const usable: JobRecord[] = [];
  jobs.forEach((job, index) => {
    const problem = describeInvalidJob(job);
    if (problem) skipped.push({ job_id: jobIdOf(job, index), reason: problem });
    else usable.push(job);
  });
  const unique = dedupe(usable);

  const provider = options.provider ?? getEmbeddingProvider();
  const embed = (text: string, label: string) =>
    withTimeout(
      (signal) => provider.embed(text, { signal }),
      settings.embedding_timeout_ms,
      label,
      options.signal
    );

  let profile = resume;
  if (!profile.embedding) {
    try {
      profile = withResumeEmbedding(resume, await embed(resume.raw_text, 'embed resume'));
    } catch (error) {
      options.signal?.throwIfAborted();
      console.warn('[ranking] resume embedding unavailable, semantic similarity scored as 0:', errorMessage(error));
    }
  }
  const resumeEmbedding = profile.embedding;

  const jobEmbeddings: Array<readonly number[] | null> = resumeEmbedding
    ? (
        await mapWithConcurrency(
          unique,
          settings.embedding_concurrency,
          (job) => embed(job.description, `embed job ${job.id}`),
          options.signal
        )
      ).map((result, i) => {
        if (result.status === 'fulfilled') return result.value;
        console.warn(`[ranking] embedding unavailable for job ${unique[i].id}:`, errorMessage(result.reason));
        return null;
      })
    : unique.map(() => null);

  const now = options.now ?? new Date();
  const resumeSkills = new Set(normalizeSkills(resume.skills));
  const scored: RankedJob[] = [];

  unique.forEach((job, i) => {
    const jobEmbedding = jobEmbeddings[i];
    try {
      const parts = computeSubScores({
        job,
        resumeEmbedding,
        jobEmbedding,
        resumeSkills,
        now,
        horizonDays: settings.recency_horizon_days,
        decay: options.decay ?? settings.recency_decay,
        popularity: options.popularity,
      });
      // A dimension mismatch scores 0 just like a missing vector.
      if (!resumeEmbedding || !jobEmbedding || jobEmbedding.length !== resumeEmbedding.length) {
        degraded.push(job.id);
      }
      scored.push({
        job,
        score: { job_id: job.id, ...parts, final_score: fuseScores(parts, settings.weights) },
      });
    } catch (error) {
      console.warn(`[ranking] skipped job ${job.id}:`, errorMessage(error));
      skipped.push({ job_id: job.id, reason: errorMessage(error) });
    }
  });

  scored.sort(compareRanked);
  return {
    resume: profile,
    ranked: scored.slice(0, settings.top_n),
    skipped,
    degraded,
    unique_count: unique.length,
  };
}

export async function rank(
  resume: ResumeProfile,
  jobs: readonly JobRecord[],
  config: RankConfig = DEFAULT_RANK_CONFIG,
  options: RankOptions = {}
): Promise<RankedJob[]> {
  return (await rankJobs(resume, jobs, config, options)).ranked;
}
