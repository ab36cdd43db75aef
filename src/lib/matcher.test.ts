import { afterEach, describe, expect, it, vi } from 'vitest';
import { resolveRankConfig } from '@/lib/config';
import { findMatches } from '@/lib/matcher';
import { TableEmbeddingProvider, makeJob, makeResume } from '@/test/fixtures';

const NOW = new Date('2026-07-15T12:00:00Z');

afterEach(() => {
  vi.restoreAllMocks();
});

describe('findMatches', () => {
  const provider = () =>
    new TableEmbeddingProvider({
      resume: [1, 0],
      'etl work': [1, 0],
      'dashboards': [0, 1],
    });

  it('ranks the pool and reports gaps for each match', async () => {
    const jobs = [
      makeJob({ id: 'bi', title: 'BI Analyst', description: 'dashboards', raw_skills: ['Tableau', 'SQL'] }),
      makeJob({ id: 'de', title: 'Data Engineer', description: 'etl work', raw_skills: ['Python', 'Spark'] }),
      makeJob({ id: 'de-copy', title: 'Data Engineer', description: 'etl work', raw_skills: ['Python', 'Spark'] }),
    ];
    const report = await findMatches(makeResume({ skills: ['python', 'sql'] }), jobs, undefined, {
      provider: provider(),
      now: NOW,
    });

    expect(report.matches.map((m) => [m.rank, m.job.id])).toEqual([
      [1, 'de'],
      [2, 'bi'],
    ]);
    expect(report.matches[0].gap).toEqual({ job_id: 'de', matched_skills: ['python'], missing_skills: ['spark'] });
    expect(report.matches[1].gap).toEqual({ job_id: 'bi', matched_skills: ['sql'], missing_skills: ['tableau'] });
    expect(report.pool_size).toBe(3);
    expect(report.unique_count).toBe(2);
    expect(report.resume.embedding).toEqual([1, 0]);
  });

  it('only analyzes the shortlist', async () => {
    const jobs = [
      makeJob({ id: 'de', description: 'etl work', raw_skills: ['Python'] }),
      makeJob({ id: 'bi', description: 'dashboards', raw_skills: ['Tableau'] }),
    ];
    const report = await findMatches(makeResume(), jobs, resolveRankConfig({ top_n: 1 }), {
      provider: provider(),
      now: NOW,
    });
    expect(report.matches).toHaveLength(1);
    expect(report.matches[0].gap.job_id).toBe('de');
  });

  it('passes skipped records through with a warning', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const report = await findMatches(makeResume(), JSON.parse('[{"id":"broken"}]'), undefined, {
      provider: provider(),
      now: NOW,
    });
    expect(report.matches).toEqual([]);
    expect(report.skipped).toEqual([{ job_id: 'broken', reason: 'title is not a string' }]);
    expect(warn).toHaveBeenCalledWith('[matcher] 1 job(s) skipped during ranking');
  });
});
