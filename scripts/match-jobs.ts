/**
 * Rank a pool of job postings against a resume and print the shortlist with skill gaps.
 *
 * Usage:
 *   npx tsx scripts/match-jobs.ts --resume resume.txt --jobs jobs.json [--skills "python,sql"] [--top 10] [--explain]
 *   npx tsx scripts/match-jobs.ts --resume resume.txt --from-db [--top 10]
 *
 * Notes:
 * - Reads secrets from `.env.local` (not committed).
 * - Without an embeddings key the local hashing embedder is used.
 */

import * as dotenv from 'dotenv';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { loadRankConfig } from '@/lib/config';
import { generateMatchExplanation } from '@/lib/explain';
import { buildResumeProfile, normalizeJobRecords } from '@/lib/ingest';
import { findMatches } from '@/lib/matcher';
import { missingSkillFrequency } from '@/lib/skill-gap';
import { fetchActiveJobs } from '@/lib/supabase';
import type { JobRecord } from '@/types';

dotenv.config({ path: '.env.local' });

type Args = {
  resume: string;
  jobs: string | null;
  skills: string[] | null;
  top: number | null;
  explain: boolean;
  fromDb: boolean;
};

function parseArgs(argv: string[]): Args {
  const out: Args = { resume: '', jobs: null, skills: null, top: null, explain: false, fromDb: false };

  for (let i = 0; i < argv.length; i++) {
    const key = argv[i];
    if (key === '--explain') {
      out.explain = true;
      continue;
    }
    if (key === '--from-db') {
      out.fromDb = true;
      continue;
    }
    const next = argv[i + 1];
    if (!key.startsWith('--')) continue;
    if (!next || next.startsWith('--')) continue;
    if (key === '--resume') out.resume = next;
    if (key === '--jobs') out.jobs = next;
    if (key === '--top') out.top = Number(next);
    if (key === '--skills') {
      out.skills = next
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean);
    }
    i++;
  }

  return out;
}

async function loadJobs(args: Args): Promise<JobRecord[]> {
  if (args.fromDb) return fetchActiveJobs();
  if (!args.jobs) throw new Error('Pass --jobs <file.json> or --from-db');

  const raw: unknown = JSON.parse(await readFile(resolve(args.jobs), 'utf-8'));
  const { jobs, rejected } = normalizeJobRecords(raw);
  for (const r of rejected) {
    console.warn(`Rejected job #${r.index}: ${r.reason}`);
  }
  return jobs;
}

function pct(value: number): string {
  return `${Math.round(value * 100)}%`;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.resume) throw new Error('Missing --resume <file.txt>');

  const config = loadRankConfig(args.top ? { top_n: args.top } : {});
  const resume = buildResumeProfile({
    raw_text: await readFile(resolve(args.resume), 'utf-8'),
    skills: args.skills,
  });
  const jobs = await loadJobs(args);

  console.log(`Resume skills: ${resume.skills.join(', ') || '(none)'}`);
  console.log(`Ranking ${jobs.length} jobs (top ${config.top_n})...\n`);

  const report = await findMatches(resume, jobs, config);

  for (const match of report.matches) {
    const { job, score, gap } = match;
    console.log(`${match.rank}. ${job.title}${job.company ? ` at ${job.company}` : ''} [${job.source}]`);
    console.log(
      `   score ${score.final_score.toFixed(3)} | semantic ${pct(score.semantic_similarity)} | keyword ${pct(
        score.keyword_overlap
      )} | recency ${pct(score.recency_weight)}`
    );
    console.log(`   matched: ${gap.matched_skills.join(', ') || '-'}`);
    console.log(`   missing: ${gap.missing_skills.join(', ') || '-'}`);

    if (args.explain) {
      const explanation = await generateMatchExplanation({ resume: report.resume, job, gap, score });
      console.log(`   ${explanation.summary}`);
    }
  }

  const common = missingSkillFrequency(report.matches.map((m) => m.gap));
  if (common.length > 0) {
    console.log('\nMost common missing skills:');
    for (const { skill, count } of common) console.log(`  ${skill}: ${count}`);
  }

  console.log(
    `\n${report.pool_size} jobs in pool, ${report.unique_count} unique, ${report.skipped.length} skipped, ${report.degraded.length} without semantic score.`
  );
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
