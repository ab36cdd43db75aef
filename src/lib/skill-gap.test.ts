import { describe, expect, it } from 'vitest';
import { analyzeGap, analyzeGaps, missingSkillFrequency, skillGapMatrix } from '@/lib/skill-gap';
import { makeJob } from '@/test/fixtures';
import type { RankedJob, SkillGapReport } from '@/types';

function ranked(job: ReturnType<typeof makeJob>): RankedJob {
  return {
    job,
    score: {
      job_id: job.id,
      semantic_similarity: 0,
      keyword_overlap: 0,
      recency_weight: 0,
      popularity_score: 0,
      final_score: 0,
    },
  };
}

describe('analyzeGap', () => {
  it('splits job skills into matched and missing, in job order', () => {
    const report = analyzeGap({ skills: ['Python', 'SQL'] }, { id: 'j1', raw_skills: ['python', 'AWS', 'Docker', 'sql'] });
    expect(report).toEqual({ job_id: 'j1', matched_skills: ['python', 'sql'], missing_skills: ['aws', 'docker'] });
  });

  it('reports what the resume lacks', () => {
    const report = analyzeGap({ skills: ['python', 'java'] }, { id: 'j0', raw_skills: ['python', 'sql', 'aws'] });
    expect(report.matched_skills).toEqual(['python']);
    expect(report.missing_skills).toEqual(['sql', 'aws']);
  });

  it('reports nothing missing for a job without skills', () => {
    expect(analyzeGap({ skills: ['python'] }, { id: 'j2', raw_skills: [] })).toEqual({
      job_id: 'j2',
      matched_skills: [],
      missing_skills: [],
    });
  });

  it('reports every job skill missing for an empty resume', () => {
    expect(analyzeGap({ skills: [] }, { id: 'j3', raw_skills: ['Go', 'go', 'Rust'] }).missing_skills).toEqual([
      'go',
      'rust',
    ]);
  });

  it('does not merge aliases', () => {
    const report = analyzeGap({ skills: ['JS'] }, { id: 'j4', raw_skills: ['JavaScript'] });
    expect(report.missing_skills).toEqual(['javascript']);
  });

  it('keeps matched and missing disjoint and covering the job skills', () => {
    const job = { id: 'j5', raw_skills: ['A', 'b', 'C', 'd'] };
    const { matched_skills, missing_skills } = analyzeGap({ skills: ['a', 'd', 'z'] }, job);
    expect(matched_skills.filter((s) => missing_skills.includes(s))).toEqual([]);
    expect([...matched_skills, ...missing_skills].sort()).toEqual(['a', 'b', 'c', 'd']);
  });
});

describe('analyzeGaps', () => {
  it('produces one report per ranked job, in rank order', () => {
    const reports = analyzeGaps({ skills: ['sql'] }, [
      ranked(makeJob({ id: 'x', raw_skills: ['SQL', 'Tableau'] })),
      ranked(makeJob({ id: 'y', raw_skills: ['Excel'] })),
    ]);
    expect(reports.map((r) => r.job_id)).toEqual(['x', 'y']);
    expect(reports[0].missing_skills).toEqual(['tableau']);
  });
});

describe('missingSkillFrequency', () => {
  const reports: SkillGapReport[] = [
    { job_id: '1', matched_skills: [], missing_skills: ['aws', 'docker'] },
    { job_id: '2', matched_skills: [], missing_skills: ['docker', 'kafka'] },
    { job_id: '3', matched_skills: [], missing_skills: ['aws'] },
  ];

  it('counts missing skills, most common first, ties by name', () => {
    expect(missingSkillFrequency(reports)).toEqual([
      { skill: 'aws', count: 2 },
      { skill: 'docker', count: 2 },
      { skill: 'kafka', count: 1 },
    ]);
  });

  it('respects the limit', () => {
    expect(missingSkillFrequency(reports, 1)).toEqual([{ skill: 'aws', count: 2 }]);
  });
});

describe('skillGapMatrix', () => {
  it('lists roles with gaps against the sorted union of their missing skills', () => {
    const jobs = [
      ranked(makeJob({ id: '1', title: 'Data Engineer', description: '1' })),
      ranked(makeJob({ id: '2', title: 'Analyst', description: '2' })),
      ranked(makeJob({ id: '3', title: 'Data Engineer', description: '3' })),
    ];
    const reports: SkillGapReport[] = [
      { job_id: '1', matched_skills: [], missing_skills: ['spark'] },
      { job_id: '2', matched_skills: ['sql'], missing_skills: [] },
      { job_id: '3', matched_skills: [], missing_skills: ['airflow'] },
    ];

    expect(skillGapMatrix(jobs, reports)).toEqual({
      roles: ['Data Engineer'],
      skills: ['airflow', 'spark'],
      cells: [[1, 1]],
    });
  });

  it('marks only the skills each role is missing', () => {
    const jobs = [
      ranked(makeJob({ id: '1', title: 'Backend', description: '1' })),
      ranked(makeJob({ id: '2', title: 'Frontend', description: '2' })),
    ];
    const reports: SkillGapReport[] = [
      { job_id: '1', matched_skills: [], missing_skills: ['go'] },
      { job_id: '2', matched_skills: [], missing_skills: ['css', 'go'] },
    ];

    expect(skillGapMatrix(jobs, reports)).toEqual({
      roles: ['Backend', 'Frontend'],
      skills: ['css', 'go'],
      cells: [
        [0, 1],
        [1, 1],
      ],
    });
  });
});
