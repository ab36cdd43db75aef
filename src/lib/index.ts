export * from '@/lib/errors';
export * from '@/lib/concurrency';
export * from '@/lib/text';
export * from '@/lib/skills';
export * from '@/lib/ai';
export * from '@/lib/dedupe';
export * from '@/lib/scoring';
export * from '@/lib/config';
export * from '@/lib/ranking';
export * from '@/lib/skill-gap';
export * from '@/lib/ingest';
export * from '@/lib/matcher';
export * from '@/lib/explain';
export type * from '@/types';
