import taxonomy from '@/data/skill-taxonomy.json';
import { normalizeToken } from '@/lib/text';

// Skill comparison key. "Python", " python" and "PYTHON" share one key; so do
// "Node.js" and "nodejs". Aliases ("JS" vs "JavaScript") are NOT merged here.
export function normalizeSkill(value: string): string {
  return normalizeToken(value);
}

export function normalizeSkills(values: readonly string[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const raw of values) {
    if (typeof raw !== 'string') continue;
    const key = normalizeSkill(raw);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(key);
  }
  return out;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const SKILL_KEYS: string[] = normalizeSkills(taxonomy.skills);

const ALIAS_PATTERNS: Array<{ re: RegExp; canonical: string }> = Object.entries(taxonomy.aliases)
  .map(([alias, canonical]) => ({ alias: normalizeSkill(alias), canonical: normalizeSkill(canonical) }))
  .filter(({ alias, canonical }) => alias && canonical)
  .map(({ alias, canonical }) => ({
    re: new RegExp(`(?<= )${escapeRegExp(alias)}(?= )`, 'g'),
    canonical,
  }));

/**
 * Detects taxonomy skills mentioned in free text, after expanding known aliases.
 * Returns sorted skill keys. Used at the ingestion boundary to fill in skill lists.
 */
export function extractSkillsFromText(text: string): string[] {
  let haystack = ` ${normalizeToken(text)} `;
  if (!haystack.trim()) return [];

  for (const { re, canonical } of ALIAS_PATTERNS) {
    haystack = haystack.replace(re, canonical);
  }

  const found = new Set<string>();
  for (const key of SKILL_KEYS) {
    if (haystack.includes(` ${key} `)) found.add(key);
  }

  return Array.from(found).sort();
}
