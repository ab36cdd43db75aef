import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import { fingerprint } from '@/lib/dedupe';
import { InputError } from '@/lib/errors';
import { extractSkillsFromText, normalizeSkill, normalizeSkills } from '@/lib/skills';
import { collapseWhitespace, stripHtml } from '@/lib/text';
import type { JobRecord, ResumeProfile } from '@/types';

const MAX_TITLE_CHARS = 200;
const MAX_COMPANY_CHARS = 100;
const MAX_LOCATION_CHARS = 150;
const MAX_DESCRIPTION_CHARS = 2000;
const DEFAULT_TITLE = 'Untitled role';
const DEFAULT_LOCATION = 'Not specified';
const DEFAULT_CATEGORY = 'general';
const DEFAULT_SOURCE = 'unknown';

const dateInput = z.union([z.string(), z.number(), z.date()]);

export const upstreamJobSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    skills: z.array(z.string()).nullish(),
    category: z.string().nullish(),
    posted_date: dateInput.nullish(),
    source: z.string().nullish(),
    company: z.string().nullish(),
    location: z.string().nullish(),
  })
  .passthrough();

export type UpstreamJob = z.infer<typeof upstreamJobSchema>;

export const resumeInputSchema = z.object({
  raw_text: z.string(),
  skills: z.array(z.string()).nullish(),
});

export type ResumeInput = z.infer<typeof resumeInputSchema>;

export interface RejectedRecord {
  index: number;
  reason: string;
}

function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function cleanField(value: string | null | undefined, maxChars: number): string {
  return collapseWhitespace(value ?? '').slice(0, maxChars).trim();
}

export function toIsoDate(value: z.infer<typeof dateInput> | null | undefined): string | null {
  if (value === null || value === undefined || value === '') return null;
  const date = typeof value === 'string' ? parseISO(value.trim()) : new Date(value);
  return isValid(date) ? date.toISOString() : null;
}

// Keeps the first surface form of each skill key.
function uniqueSkills(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of values) {
    const value = raw.trim();
    const key = normalizeSkill(value);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(value);
  }
  return out;
}

/**
 * Validates one upstream job payload and fills defaults, producing an immutable JobRecord.
 * Skills are extracted from the title and description only when the payload has no skill list.
 */
export function normalizeJobRecord(raw: unknown): JobRecord {
  const parsed = upstreamJobSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(`Malformed job record: ${describeZodError(parsed.error)}`);
  }
  const input = parsed.data;

  const title = cleanField(input.title, MAX_TITLE_CHARS) || DEFAULT_TITLE;
  const company = cleanField(input.company, MAX_COMPANY_CHARS);
  const description =
    cleanField(stripHtml(input.description ?? ''), MAX_DESCRIPTION_CHARS) ||
    `${title} position requiring relevant skills and experience.`;
  const source = cleanField(input.source, MAX_COMPANY_CHARS).toLowerCase() || DEFAULT_SOURCE;
  const raw_skills =
    input.skills === null || input.skills === undefined
      ? extractSkillsFromText(`${title} ${description}`)
      : uniqueSkills(input.skills);

  const fp = fingerprint({ title, company, description, source });
  const id = input.id === null || input.id === undefined || String(input.id).trim() === ''
    ? fp.slice(0, 24)
    : String(input.id).trim();

  return Object.freeze({
    id,
    title,
    description,
    raw_skills,
    category: cleanField(input.category, MAX_COMPANY_CHARS) || DEFAULT_CATEGORY,
    posted_date: toIsoDate(input.posted_date),
    source,
    company,
    location: cleanField(input.location, MAX_LOCATION_CHARS) || DEFAULT_LOCATION,
    fingerprint: fp,
  });
}

export function normalizeJobRecords(raws: unknown): { jobs: JobRecord[]; rejected: RejectedRecord[] } {
  if (!Array.isArray(raws)) throw new InputError('Job batch must be an array');

  const jobs: JobRecord[] = [];
  const rejected: RejectedRecord[] = [];
  raws.forEach((raw: unknown, index) => {
    try {
      jobs.push(normalizeJobRecord(raw));
    } catch (error) {
      rejected.push({ index, reason: error instanceof Error ? error.message : String(error) });
    }
  });
  return { jobs, rejected };
}

export function buildResumeProfile(raw: unknown): ResumeProfile {
  const parsed = resumeInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(`Malformed resume: ${describeZodError(parsed.error)}`);
  }
  const raw_text = parsed.data.raw_text.trim();
  if (!raw_text) throw new InputError('Resume text is empty');

  const skills = parsed.data.skills ?? extractSkillsFromText(raw_text);
  return Object.freeze({ raw_text, skills: normalizeSkills(skills), embedding: null });
}

// The embedding is set at most once; a profile that already has one is returned unchanged.
export function withResumeEmbedding(profile: ResumeProfile, embedding: readonly number[]): ResumeProfile {
  if (profile.embedding) return profile;
  return Object.freeze({ ...profile, embedding: Object.freeze([...embedding]) });
}

const named = z.union([z.string(), z.object({ display_name: z.string().nullish() }).passthrough()]).nullish();

const adzunaSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    title: z.string().nullish(),
    company: named,
    description: z.string().nullish(),
    location: named,
    created: z.string().nullish(),
    category: z.object({ label: z.string().nullish() }).passthrough().nullish(),
  })
  .passthrough();

const jsearchSchema = z
  .object({
    job_id: z.string().nullish(),
    job_title: z.string().nullish(),
    employer_name: z.string().nullish(),
    job_description: z.string().nullish(),
    job_city: z.string().nullish(),
    job_country: z.string().nullish(),
    job_posted_at_datetime_utc: z.string().nullish(),
    job_employment_type: z.string().nullish(),
  })
  .passthrough();

function displayName(value: z.infer<typeof named>): string | null {
  if (!value) return null;
  return typeof value === 'string' ? value : value.display_name ?? null;
}

export function fromAdzuna(payload: unknown): UpstreamJob {
  const parsed = adzunaSchema.safeParse(payload);
  if (!parsed.success) throw new InputError(`Malformed Adzuna job: ${describeZodError(parsed.error)}`);
  const job = parsed.data;
  return {
    id: job.id === null || job.id === undefined ? null : `adzuna-${job.id}`,
    title: job.title,
    company: displayName(job.company),
    description: job.description,
    location: displayName(job.location),
    posted_date: job.created,
    category: job.category?.label,
    source: 'adzuna',
  };
}

export function fromJSearch(payload: unknown): UpstreamJob {
  const parsed = jsearchSchema.safeParse(payload);
  if (!parsed.success) throw new InputError(`Malformed JSearch job: ${describeZodError(parsed.error)}`);
  const job = parsed.data;
  return {
    id: job.job_id ? `jsearch-${job.job_id}` : null,
    title: job.job_title,
    company: job.employer_name,
    description: job.job_description,
    location: [job.job_city, job.job_country].filter(Boolean).join(', ') || null,
    posted_date: job.job_posted_at_datetime_utc,
    category: job.job_employment_type,
    source: 'jsearch',
  };
}
