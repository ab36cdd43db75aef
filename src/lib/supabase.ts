import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { buildResumeProfile, normalizeJobRecords, type RejectedRecord } from '@/lib/ingest';
import type { JobRecord, ResumeProfile } from '@/types';

const JOBS_TABLE = 'jobs';
const RESUMES_TABLE = 'resumes';
const JOB_COLUMNS = 'id, title, description, skills, category, posted_date, source, company, location, fingerprint';

type Env = Record<string, string | undefined>;

export interface JobRow {
  id: string;
  title: string;
  description: string;
  skills: string[] | null;
  category: string | null;
  posted_date: string | null;
  source: string;
  company: string | null;
  location: string | null;
  fingerprint: string;
  active?: boolean;
}

export interface ResumeRow {
  user_id: string;
  raw_text: string;
  skills: string[] | null;
  uploaded_at: string;
}

function supabaseUrl(env: Env): string {
  return env.SUPABASE_URL ?? '';
}

function supabaseServiceKey(env: Env): string {
  return env.SUPABASE_SERVICE_ROLE_KEY ?? '';
}

export function isSupabaseConfigured(env: Env = process.env): boolean {
  return Boolean(supabaseUrl(env) && supabaseServiceKey(env));
}

let adminClient: SupabaseClient | null = null;

// Server-side client with the service role; created on first use.
export function getSupabaseAdmin(env: Env = process.env): SupabaseClient {
  if (adminClient) return adminClient;
  if (!isSupabaseConfigured(env)) {
    throw new Error('Missing Supabase environment variables: set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
  }
  adminClient = createClient(supabaseUrl(env), supabaseServiceKey(env), {
    auth: { persistSession: false },
  });
  return adminClient;
}

export function jobToRow(job: JobRecord): JobRow {
  return {
    id: job.id,
    title: job.title,
    description: job.description,
    skills: job.raw_skills,
    category: job.category,
    posted_date: job.posted_date,
    source: job.source,
    company: job.company || null,
    location: job.location,
    fingerprint: job.fingerprint,
    active: true,
  };
}

// Rows go through the ingestion boundary like any other upstream payload.
export function jobsFromRows(rows: readonly unknown[]): { jobs: JobRecord[]; rejected: RejectedRecord[] } {
  return normalizeJobRecords(rows);
}

export function resumeFromRow(row: ResumeRow): ResumeProfile {
  return buildResumeProfile({ raw_text: row.raw_text, skills: row.skills ?? [] });
}

export async function fetchActiveJobs(limit = 1500, client = getSupabaseAdmin()): Promise<JobRecord[]> {
  const { data, error } = await client
    .from(JOBS_TABLE)
    .select(JOB_COLUMNS)
    .eq('active', true)
    .order('posted_date', { ascending: false, nullsFirst: false })
    .limit(limit);
  if (error) throw error;

  const { jobs, rejected } = jobsFromRows(data ?? []);
  if (rejected.length > 0) {
    console.warn(`[supabase] ${rejected.length} job row(s) rejected:`, rejected.slice(0, 5));
  }
  return jobs;
}

export async function fetchJobById(id: string, client = getSupabaseAdmin()): Promise<JobRecord | null> {
  const { data, error } = await client.from(JOBS_TABLE).select(JOB_COLUMNS).eq('id', id).maybeSingle();
  if (error) throw error;
  if (!data) return null;
  return jobsFromRows([data]).jobs[0] ?? null;
}

export async function fetchLatestResume(userId: string, client = getSupabaseAdmin()): Promise<ResumeProfile | null> {
  const { data, error } = await client
    .from(RESUMES_TABLE)
    .select('user_id, raw_text, skills, uploaded_at')
    .eq('user_id', userId)
    .order('uploaded_at', { ascending: false })
    .limit(1)
    .maybeSingle();
  if (error) throw error;
  return data ? resumeFromRow(data as ResumeRow) : null;
}

export async function upsertJobs(jobs: readonly JobRecord[], client = getSupabaseAdmin()): Promise<number> {
  if (jobs.length === 0) return 0;
  const { error } = await client
    .from(JOBS_TABLE)
    .upsert(jobs.map(jobToRow), { onConflict: 'fingerprint' });
  if (error) throw error;
  return jobs.length;
}
