import { fingerprint } from '@/lib/dedupe';
import type { EmbeddingProvider } from '@/lib/ai';
import { EmbeddingUnavailable } from '@/lib/errors';
import type { JobRecord, ResumeProfile } from '@/types';

export function makeJob(overrides: Partial<Omit<JobRecord, 'fingerprint'>> = {}): JobRecord {
  const base: Omit<JobRecord, 'fingerprint'> = {
    id: 'job-1',
    title: 'Software Engineer',
    description: 'Build services.',
    raw_skills: [],
    category: 'engineering',
    posted_date: null,
    source: 'test',
    company: '',
    location: 'Remote',
    ...overrides,
  };
  return { ...base, fingerprint: fingerprint(base) };
}

export function makeResume(overrides: Partial<ResumeProfile> = {}): ResumeProfile {
  return { raw_text: 'resume', skills: [], embedding: null, ...overrides };
}

// Looks vectors up by exact text; unknown text is treated as unembeddable.
export class TableEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'table';
  readonly dimensions = 2;
  readonly calls: string[] = [];

  constructor(private readonly table: Record<string, number[]>) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const vec = this.table[text];
    if (!vec) throw new EmbeddingUnavailable(`no vector for "${text}"`);
    return vec;
  }
}
