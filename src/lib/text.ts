import stopwordList from '@/data/stopwords.json';
import { InputError } from '@/lib/errors';

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

function assertText(value: unknown): asserts value is string {
  if (typeof value !== 'string') {
    throw new InputError(`Expected text, received ${value === null ? 'null' : typeof value}`);
  }
}

// Canonical comparable form: "Node.js & C++" -> "nodejs and cplusplus". Letters of any script are kept.
export function normalizeToken(value: string): string {
  assertText(value);
  return value
    .trim()
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/c\+\+/g, 'cplusplus')
    .replace(/c#/g, 'csharp')
    .replace(/\.js\b/g, 'js')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function isStopword(token: string): boolean {
  return STOPWORDS.has(token);
}

/**
 * Ordered, duplicate-free tokens of `text` with stopwords removed.
 */
export function tokenize(text: string): string[] {
  const normalized = normalizeToken(text);
  if (!normalized) return [];

  const out: string[] = [];
  const seen = new Set<string>();
  for (const token of normalized.split(' ')) {
    if (!token || STOPWORDS.has(token) || seen.has(token)) continue;
    seen.add(token);
    out.push(token);
  }
  return out;
}

export function normalize(text: string): Set<string> {
  return new Set(tokenize(text));
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function stripHtml(value: string): string {
  return value
    .replace(/<\s*br\s*\/?>/gi, ' ')
    .replace(/<[^>]*>/g, ' ')
    .replaceAll('&nbsp;', ' ')
    .replaceAll('&amp;', '&')
    .replaceAll('&lt;', '<')
    .replaceAll('&gt;', '>')
    .replaceAll('&quot;', '"')
    .replaceAll('&#39;', "'");
}

export function clampText(value: string, maxChars: number): string {
  const v = value.trim();
  if (v.length <= maxChars) return v;
  return v.slice(0, maxChars) + '…';
}
