/**
 * Normalize job-search provider payloads (Adzuna or JSearch JSON dumps) and upsert them
 * into the jobs table, one row per fingerprint.
 *
 * Usage:
 *   npx tsx scripts/sync-jobs.ts --provider adzuna --file adzuna-results.json
 *
 * Reads SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY from `.env.local`.
 */

import * as dotenv from 'dotenv';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { dedupe } from '@/lib/dedupe';
import { fromAdzuna, fromJSearch, normalizeJobRecords, type UpstreamJob } from '@/lib/ingest';
import { upsertJobs } from '@/lib/supabase';

dotenv.config({ path: '.env.local' });

const MAPPERS: Record<string, (payload: unknown) => UpstreamJob> = {
  adzuna: fromAdzuna,
  jsearch: fromJSearch,
};

function readFlag(argv: string[], name: string): string | null {
  const idx = argv.indexOf(name);
  if (idx === -1) return null;
  const value = argv[idx + 1];
  return value && !value.startsWith('--') ? value : null;
}

// Provider dumps are either a bare array or wrapped in `results` (Adzuna) / `data` (JSearch).
function unwrapResults(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (payload && typeof payload === 'object') {
    for (const key of ['results', 'data']) {
      const value: unknown = Reflect.get(payload, key);
      if (Array.isArray(value)) return value;
    }
  }
  throw new Error('Expected an array of jobs, or an object with a "results" or "data" array');
}

async function main() {
  const argv = process.argv.slice(2);
  const provider = readFlag(argv, '--provider') ?? '';
  const file = readFlag(argv, '--file');
  const mapper = MAPPERS[provider];
  if (!mapper) throw new Error(`Unknown --provider "${provider}" (expected: ${Object.keys(MAPPERS).join(', ')})`);
  if (!file) throw new Error('Missing --file <payload.json>');

  const payload: unknown = JSON.parse(await readFile(resolve(file), 'utf-8'));
  const upstream: UpstreamJob[] = [];
  for (const [i, item] of unwrapResults(payload).entries()) {
    try {
      upstream.push(mapper(item));
    } catch (error) {
      console.warn(`Skipping ${provider} item #${i}:`, error instanceof Error ? error.message : error);
    }
  }

  const { jobs, rejected } = normalizeJobRecords(upstream);
  for (const r of rejected) console.warn(`Rejected job #${r.index}: ${r.reason}`);

  const unique = dedupe(jobs);
  console.log(`Normalized ${jobs.length} jobs, ${unique.length} unique. Upserting...`);
  const written = await upsertJobs(unique);
  console.log(`Done. Upserted ${written} jobs.`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
