// Core data types for the matching engine

export interface ResumeProfile {
  raw_text: string;
  skills: string[]; // normalized skill keys, unique
  embedding: readonly number[] | null;
}

export interface JobRecord {
  id: string;
  title: string;
  description: string;
  raw_skills: string[];
  category: string;
  posted_date: string | null; // ISO-8601
  source: string;
  company: string;
  location: string;
  fingerprint: string;
}

export interface ScoreBreakdown {
  job_id: string;
  semantic_similarity: number;
  keyword_overlap: number;
  recency_weight: number;
  popularity_score: number;
  final_score: number;
}

export type SubScores = Omit<ScoreBreakdown, 'job_id' | 'final_score'>;

export interface SkillGapReport {
  job_id: string;
  missing_skills: string[];
  matched_skills: string[];
}

export interface RankedJob {
  job: JobRecord;
  score: ScoreBreakdown;
}

export interface SkippedJob {
  job_id: string;
  reason: string;
}

export interface RankOutcome {
  resume: ResumeProfile;
  ranked: RankedJob[];
  skipped: SkippedJob[];
  degraded: string[]; // job ids scored with a fallback semantic similarity
  unique_count: number;
}

export interface MatchResult {
  rank: number;
  job: JobRecord;
  score: ScoreBreakdown;
  gap: SkillGapReport;
}

export interface MatchReport {
  resume: ResumeProfile;
  matches: MatchResult[];
  skipped: SkippedJob[];
  degraded: string[];
  pool_size: number;
  unique_count: number;
}

export type RecencyDecayName = 'linear' | 'exponential' | 'step';

export interface ScoreWeights {
  semantic: number;
  keyword: number;
  recency: number;
  popularity: number;
}

export interface RankConfig {
  weights: ScoreWeights;
  top_n: number;
  recency_horizon_days: number;
  recency_decay: RecencyDecayName;
  embedding_timeout_ms: number;
  embedding_concurrency: number;
}

export interface MatchExplanation {
  summary: string;
  strengths: string[];
  gaps: string[];
}
