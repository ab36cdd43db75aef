import { normalizeSkills } from '@/lib/skills';
import type { JobRecord, RankedJob, ResumeProfile, SkillGapReport } from '@/types';

/**
 * Matched and missing skills of one job relative to the resume, compared on normalized
 * skill keys. Lists follow the job's skill order. Distinct surface forms that stay
 * distinct after normalization ("JS" vs "JavaScript") are treated as different skills.
 */
export function analyzeGap(
  resume: Pick<ResumeProfile, 'skills'>,
  job: Pick<JobRecord, 'id' | 'raw_skills'>
): SkillGapReport {
  const have = new Set(normalizeSkills(resume.skills));
  const matched_skills: string[] = [];
  const missing_skills: string[] = [];

  for (const skill of normalizeSkills(job.raw_skills)) {
    if (have.has(skill)) matched_skills.push(skill);
    else missing_skills.push(skill);
  }

  return { job_id: job.id, missing_skills, matched_skills };
}

// Only the ranked shortlist is analyzed, never the whole pool.
export function analyzeGaps(resume: Pick<ResumeProfile, 'skills'>, ranked: readonly RankedJob[]): SkillGapReport[] {
  return ranked.map(({ job }) => analyzeGap(resume, job));
}

export interface SkillCount {
  skill: string;
  count: number;
}

/**
 * Most common missing skills across reports: count descending, then skill name.
 */
export function missingSkillFrequency(reports: readonly SkillGapReport[], limit = 10): SkillCount[] {
  const counts = new Map<string, number>();
  for (const report of reports) {
    for (const skill of report.missing_skills) {
      counts.set(skill, (counts.get(skill) ?? 0) + 1);
    }
  }

  return Array.from(counts, ([skill, count]) => ({ skill, count }))
    .sort((a, b) => b.count - a.count || (a.skill < b.skill ? -1 : a.skill > b.skill ? 1 : 0))
    .slice(0, Math.max(0, limit));
}

export interface SkillGapMatrix {
  roles: string[];
  skills: string[];
  // cells[r][s] is 1 when role r is missing skill s
  cells: number[][];
}

/**
 * Role-by-skill view of the gaps in a shortlist. Roles are the titles of jobs with at
 * least one missing skill, in rank order (at most `maxRoles`); skills are sorted.
 */
export function skillGapMatrix(
  ranked: readonly RankedJob[],
  reports: readonly SkillGapReport[],
  maxRoles = 10
): SkillGapMatrix {
  const missingById = new Map(reports.map((r) => [r.job_id, r.missing_skills]));
  const byRole = new Map<string, Set<string>>();

  for (const { job } of ranked) {
    const missing = missingById.get(job.id) ?? [];
    if (missing.length === 0) continue;
    const set = byRole.get(job.title) ?? new Set<string>();
    for (const skill of missing) set.add(skill);
    byRole.set(job.title, set);
  }

  const roles = Array.from(byRole.keys()).slice(0, Math.max(0, maxRoles));
  const skills = Array.from(new Set(roles.flatMap((role) => Array.from(byRole.get(role) ?? [])))).sort();
  const cells = roles.map((role) => {
    const missing = byRole.get(role) ?? new Set<string>();
    return skills.map((skill) => (missing.has(skill) ? 1 : 0));
  });

  return { roles, skills, cells };
}
