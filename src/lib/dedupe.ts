import { createHash } from 'crypto';
import { normalizeToken } from '@/lib/text';
import type { JobRecord } from '@/types';

export const FINGERPRINT_DESCRIPTION_CHARS = 200;

type FingerprintInput = Pick<JobRecord, 'title' | 'description' | 'source'> & { company?: string | null };

/**
 * Content hash identifying one posting across fetches and providers: normalized title,
 * employer (or source when the employer is unknown) and the first 200 normalized
 * characters of the description.
 */
export function fingerprint(job: FingerprintInput): string {
  const employer = job.company && job.company.trim() ? job.company : job.source;
  const key = [
    normalizeToken(job.title),
    normalizeToken(employer),
    normalizeToken(job.description).slice(0, FINGERPRINT_DESCRIPTION_CHARS),
  ].join('|');
  return createHash('sha256').update(key).digest('hex');
}

// Keeps the first record per fingerprint, in input order.
export function dedupe<T extends FingerprintInput>(jobs: readonly T[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const job of jobs) {
    const key = fingerprint(job);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(job);
  }
  return out;
}
