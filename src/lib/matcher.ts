import { DEFAULT_RANK_CONFIG } from '@/lib/config';
import { rankJobs, type RankOptions } from '@/lib/ranking';
import { analyzeGaps } from '@/lib/skill-gap';
import type { JobRecord, MatchReport, RankConfig, ResumeProfile } from '@/types';

/**
 * Full pipeline for one request: dedupe, rank, then gap analysis for each ranked job.
 */
export async function findMatches(
  resume: ResumeProfile,
  jobs: readonly JobRecord[],
  config: RankConfig = DEFAULT_RANK_CONFIG,
  options: RankOptions = {}
): Promise<MatchReport> {
  const outcome = await rankJobs(resume, jobs, config, options);
  const gaps = analyzeGaps(outcome.resume, outcome.ranked);

  if (outcome.skipped.length > 0) {
    console.warn(`[matcher] ${outcome.skipped.length} job(s) skipped during ranking`);
  }

  return {
    resume: outcome.resume,
    matches: outcome.ranked.map(({ job, score }, i) => ({ rank: i + 1, job, score, gap: gaps[i] })),
    skipped: outcome.skipped,
    degraded: outcome.degraded,
    pool_size: jobs.length,
    unique_count: outcome.unique_count,
  };
}
