import { describe, expect, it } from 'vitest';
import { fingerprint } from '@/lib/dedupe';
import { InputError } from '@/lib/errors';
import {
  buildResumeProfile,
  fromAdzuna,
  fromJSearch,
  normalizeJobRecord,
  normalizeJobRecords,
  toIsoDate,
  withResumeEmbedding,
} from '@/lib/ingest';

describe('normalizeJobRecord', () => {
  it('cleans fields, fills defaults and extracts skills when none are given', () => {
    const job = normalizeJobRecord({
      title: '  Data   Engineer ',
      description: '<p>Build <b>pipelines</b> with Python &amp; SQL</p>',
      source: 'Adzuna',
      posted_date: '2026-07-01T00:00:00Z',
    });

    expect(job).toEqual({
      id: job.fingerprint.slice(0, 24),
      title: 'Data Engineer',
      description: 'Build pipelines with Python & SQL',
      raw_skills: ['python', 'sql'],
      category: 'general',
      posted_date: '2026-07-01T00:00:00.000Z',
      source: 'adzuna',
      company: '',
      location: 'Not specified',
      fingerprint: fingerprint({
        title: 'Data Engineer',
        company: '',
        description: 'Build pipelines with Python & SQL',
        source: 'adzuna',
      }),
    });
    expect(Object.isFrozen(job)).toBe(true);
  });

  it('keeps an explicitly empty skill list empty', () => {
    expect(normalizeJobRecord({ title: 'Python Developer', skills: [] }).raw_skills).toEqual([]);
  });

  it('deduplicates given skills, keeping the first spelling', () => {
    expect(normalizeJobRecord({ title: 'X', skills: [' Python', 'python', 'SQL', ''] }).raw_skills).toEqual([
      'Python',
      'SQL',
    ]);
  });

  it('stringifies numeric ids and defaults missing text', () => {
    const job = normalizeJobRecord({ id: 42 });
    expect(job.id).toBe('42');
    expect(job.title).toBe('Untitled role');
    expect(job.description).toBe('Untitled role position requiring relevant skills and experience.');
    expect(job.source).toBe('unknown');
    expect(job.posted_date).toBeNull();
  });

  it('rejects records of the wrong shape', () => {
    expect(() => normalizeJobRecord({ title: 5 })).toThrow(InputError);
    expect(() => normalizeJobRecord({ title: 5 })).toThrow(/^Malformed job record: title/);
  });
});

describe('normalizeJobRecords', () => {
  it('collects rejected records by index', () => {
    const { jobs, rejected } = normalizeJobRecords([{ title: 'A' }, 'oops', { skills: 'python' }]);
    expect(jobs.map((j) => j.title)).toEqual(['A']);
    expect(rejected.map((r) => r.index)).toEqual([1, 2]);
    expect(rejected[1].reason).toMatch(/^Malformed job record: skills/);
  });

  it('requires an array', () => {
    expect(() => normalizeJobRecords({ jobs: [] })).toThrow('Job batch must be an array');
  });
});

describe('toIsoDate', () => {
  it('accepts ISO strings, epoch millis and Date objects', () => {
    expect(toIsoDate('2026-01-02')).toBe(new Date(2026, 0, 2).toISOString());
    expect(toIsoDate(Date.UTC(2026, 0, 2))).toBe('2026-01-02T00:00:00.000Z');
    expect(toIsoDate(new Date('2026-01-02T03:04:05Z'))).toBe('2026-01-02T03:04:05.000Z');
  });

  it('returns null for blank or invalid input', () => {
    expect(toIsoDate('')).toBeNull();
    expect(toIsoDate('soon')).toBeNull();
    expect(toIsoDate(null)).toBeNull();
  });
});

describe('buildResumeProfile', () => {
  it('extracts skills when none are given', () => {
    expect(buildResumeProfile({ raw_text: ' I use Python and k8s daily ' })).toEqual({
      raw_text: 'I use Python and k8s daily',
      skills: ['kubernetes', 'python'],
      embedding: null,
    });
  });

  it('normalizes given skills', () => {
    expect(buildResumeProfile({ raw_text: 'resume', skills: ['Node.js', ' SQL', 'sql'] }).skills).toEqual([
      'nodejs',
      'sql',
    ]);
  });

  it('rejects empty or malformed resumes', () => {
    expect(() => buildResumeProfile({ raw_text: '  ' })).toThrow('Resume text is empty');
    expect(() => buildResumeProfile({ text: 'hi' })).toThrow(InputError);
  });
});

describe('withResumeEmbedding', () => {
  it('sets the embedding once', () => {
    const profile = buildResumeProfile({ raw_text: 'resume', skills: [] });
    const embedded = withResumeEmbedding(profile, [0.6, 0.8]);
    expect(embedded.embedding).toEqual([0.6, 0.8]);
    expect(profile.embedding).toBeNull();
    expect(withResumeEmbedding(embedded, [1, 0])).toBe(embedded);
  });
});

describe('provider mappers', () => {
  it('maps Adzuna results', () => {
    expect(
      fromAdzuna({
        id: 123,
        title: 'Data Analyst',
        company: { display_name: 'Acme' },
        location: { display_name: 'London' },
        description: 'Reports',
        created: '2026-07-01T00:00:00Z',
        category: { label: 'IT Jobs' },
      })
    ).toEqual({
      id: 'adzuna-123',
      title: 'Data Analyst',
      company: 'Acme',
      description: 'Reports',
      location: 'London',
      posted_date: '2026-07-01T00:00:00Z',
      category: 'IT Jobs',
      source: 'adzuna',
    });
  });

  it('maps JSearch results', () => {
    expect(
      fromJSearch({
        job_id: 'abc',
        job_title: 'Backend Engineer',
        employer_name: 'Beta',
        job_description: 'APIs',
        job_city: 'Austin',
        job_country: 'US',
        job_posted_at_datetime_utc: '2026-07-02T00:00:00Z',
        job_employment_type: 'FULLTIME',
      })
    ).toEqual({
      id: 'jsearch-abc',
      title: 'Backend Engineer',
      company: 'Beta',
      description: 'APIs',
      location: 'Austin, US',
      posted_date: '2026-07-02T00:00:00Z',
      category: 'FULLTIME',
      source: 'jsearch',
    });
  });

  it('produces records the normalizer accepts', () => {
    const job = normalizeJobRecord(fromJSearch({ job_title: 'Engineer', job_description: 'Go services' }));
    expect(job.source).toBe('jsearch');
    expect(job.location).toBe('Not specified');
    expect(job.raw_skills).toEqual(['go']);
  });
});
