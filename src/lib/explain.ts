import { z } from 'zod';
import { generateText, hasAiCredentials } from '@/lib/ai';
import { withTimeout } from '@/lib/concurrency';
import { errorMessage } from '@/lib/errors';
import { clampText } from '@/lib/text';
import type { JobRecord, MatchExplanation, ResumeProfile, ScoreBreakdown, SkillGapReport } from '@/types';

const DESCRIPTION_EXCERPT_CHARS = 800;
const EXPLAIN_MODEL = process.env.AI_EXPLAIN_MODEL || 'gpt-4o-mini';
const DEFAULT_EXPLAIN_TIMEOUT_MS = 20000;

export function explainTimeoutMs(env: Record<string, string | undefined> = process.env): number {
  const value = Number(env.AI_EXPLAIN_TIMEOUT_MS);
  return Number.isFinite(value) && value > 0 ? value : DEFAULT_EXPLAIN_TIMEOUT_MS;
}

export interface ExplanationInput {
  resume: Pick<ResumeProfile, 'skills'>;
  job: Pick<JobRecord, 'title' | 'description' | 'raw_skills'>;
  gap: Pick<SkillGapReport, 'missing_skills'>;
  score?: Pick<ScoreBreakdown, 'final_score'>;
}

export interface ExplanationPrompt {
  system: string;
  user: string;
}

export const EXPLANATION_SYSTEM_PROMPT = `You are a career advisor explaining how well a candidate fits a job.

Rules:
- Use ONLY the skill lists provided. Do not invent or assume additional skills.
- Be concise and professional. English only.
- Return ONLY valid JSON. No Markdown, no commentary, no code fences.

Return JSON in the following schema:
{
  "summary": "2-3 sentences on overall match quality",
  "strengths": ["strength1", "strength2"],
  "gaps": ["gap and how to close it", "..."]
}`;

function listOrNone(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : 'None';
}

export function buildExplanationPrompt(input: ExplanationInput): ExplanationPrompt {
  const lines = [
    `Job Title:\n${input.job.title}`,
    `Job Description (summary):\n${clampText(input.job.description, DESCRIPTION_EXCERPT_CHARS)}`,
    `Candidate Skills:\n${listOrNone(input.resume.skills)}`,
    `Job Required Skills:\n${listOrNone(input.job.raw_skills)}`,
    `Missing Skills:\n${listOrNone(input.gap.missing_skills)}`,
  ];
  if (input.score) {
    lines.push(`Computed Match Score:\n${Math.round(input.score.final_score * 100)}%`);
  }
  return { system: EXPLANATION_SYSTEM_PROMPT, user: lines.join('\n\n') };
}

const explanationSchema = z.object({
  summary: z.string(),
  strengths: z.array(z.string()).default([]),
  gaps: z.array(z.string()).default([]),
});

function stripCodeFences(text: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(text.trim());
  return fenced ? fenced[1] : text.trim();
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Reads the model's JSON answer. Anything that is not the expected shape becomes a
 * summary-only explanation.
 */
export function parseExplanation(raw: string): MatchExplanation {
  const text = stripCodeFences(raw);
  const parsed = explanationSchema.safeParse(tryParseJson(text));
  if (parsed.success) {
    return {
      summary: parsed.data.summary.trim(),
      strengths: parsed.data.strengths.map((s) => s.trim()).filter(Boolean),
      gaps: parsed.data.gaps.map((s) => s.trim()).filter(Boolean),
    };
  }
  return { summary: text, strengths: [], gaps: [] };
}

export function unavailableExplanation(reason: string): MatchExplanation {
  return { summary: `AI explanation unavailable (${reason}).`, strengths: [], gaps: [] };
}

export type TextGenerator = (
  systemPrompt: string,
  userMessage: string,
  options: { model?: string; temperature?: number; maxTokens?: number; signal?: AbortSignal }
) => Promise<string>;

/**
 * Asks the chat model to explain one match. Never throws for upstream failures:
 * missing credentials, timeouts and errors all produce an "unavailable" explanation.
 */
export async function generateMatchExplanation(
  input: ExplanationInput,
  options: { generate?: TextGenerator; timeoutMs?: number; model?: string; signal?: AbortSignal } = {}
): Promise<MatchExplanation> {
  const generate = options.generate ?? generateText;
  if (!options.generate && !hasAiCredentials()) {
    return unavailableExplanation('API key missing');
  }

  const prompt = buildExplanationPrompt(input);
  try {
    const content = await withTimeout(
      (signal) =>
        generate(prompt.system, prompt.user, {
          model: options.model || EXPLAIN_MODEL,
          temperature: 0.3,
          maxTokens: 300,
          signal,
        }),
      options.timeoutMs ?? explainTimeoutMs(),
      'match explanation',
      options.signal
    );
    if (!content.trim()) return unavailableExplanation('empty response');
    return parseExplanation(content);
  } catch (error) {
    options.signal?.throwIfAborted();
    console.warn('[explain] explanation failed:', errorMessage(error));
    return unavailableExplanation('model error');
  }
}
