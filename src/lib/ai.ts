import OpenAI from 'openai';
import { createHash } from 'crypto';
import { tokenize } from '@/lib/text';
import { EmbeddingUnavailable, ProviderUnavailable, isRetryableUpstreamError } from '@/lib/errors';

const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_EMBEDDING_DIMENSIONS = 384;
const MAX_EMBEDDING_BATCH = 128;

export interface EmbedOptions {
  signal?: AbortSignal;
}

// Pure text -> vector capability. Identical input must produce an identical vector.
export interface EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
}

type Env = Record<string, string | undefined>;

// The slice of the OpenAI client the embedding provider calls.
export interface EmbeddingsApi {
  embeddings: {
    create(
      body: { model: string; input: string | string[]; dimensions?: number },
      options?: { signal?: AbortSignal }
    ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

function gatewayToken(env: Env): string {
  return env.AI_GATEWAY_TOKEN || '';
}

export function hasOpenAiKey(env: Env = process.env): boolean {
  return Boolean(env.OPENAI_API_KEY);
}

export function hasAiCredentials(env: Env = process.env): boolean {
  return hasOpenAiKey(env) || Boolean(gatewayToken(env) && env.AI_GATEWAY_BASE_URL);
}

// Clients are created on first use so that importing this module never needs credentials.
let openaiClient: OpenAI | null = null;
let gatewayClient: OpenAI | null = null;

function getDirectClient(env: Env): OpenAI | null {
  if (!hasOpenAiKey(env)) return null;
  openaiClient ??= new OpenAI({ apiKey: env.OPENAI_API_KEY });
  return openaiClient;
}

function getGatewayClient(env: Env): OpenAI | null {
  const token = gatewayToken(env);
  if (!token || !env.AI_GATEWAY_BASE_URL) return null;
  gatewayClient ??= new OpenAI({ apiKey: token, baseURL: env.AI_GATEWAY_BASE_URL });
  return gatewayClient;
}

function getEmbeddingsClient(env: Env): OpenAI {
  // Prefer direct OpenAI when available; otherwise the OpenAI-compatible gateway.
  const client = getDirectClient(env) ?? getGatewayClient(env);
  if (!client) {
    throw new ProviderUnavailable(
      'Missing embeddings API key: set OPENAI_API_KEY or AI_GATEWAY_TOKEN with AI_GATEWAY_BASE_URL.'
    );
  }
  return client;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  private readonly client: () => EmbeddingsApi;

  constructor(options: { client?: EmbeddingsApi; model?: string; dimensions?: number; env?: Env } = {}) {
    const env = options.env ?? process.env;
    this.model = options.model || env.AI_EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL;
    this.dimensions =
      options.dimensions ?? (Number(env.AI_EMBEDDING_DIMENSIONS) || DEFAULT_EMBEDDING_DIMENSIONS);
    const injected = options.client;
    this.client = injected ? () => injected : () => getEmbeddingsClient(env);
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    if (!text.trim()) throw new EmbeddingUnavailable('Cannot embed empty text');

    try {
      const response = await this.client().embeddings.create(
        { model: this.model, input: text, dimensions: this.dimensions },
        { signal: options.signal }
      );
      const embedding = response.data[0]?.embedding;
      if (!embedding) throw new Error('Embeddings response contained no vector');
      return embedding;
    } catch (error) {
      if (error instanceof ProviderUnavailable) throw error;
      throw new ProviderUnavailable(`Embedding request failed (${this.model})`, { cause: error });
    }
  }

  async embedMany(texts: string[], batchSize = 32, options: EmbedOptions = {}): Promise<number[][]> {
    if (!Array.isArray(texts) || texts.length === 0) return [];
    if (texts.some((t) => !t.trim())) throw new EmbeddingUnavailable('Cannot embed empty text');

    const safeBatch = Math.max(1, Math.min(batchSize, MAX_EMBEDDING_BATCH));
    const out: number[][] = [];

    for (let i = 0; i < texts.length; i += safeBatch) {
      const batch = texts.slice(i, i + safeBatch);
      try {
        const response = await this.client().embeddings.create(
          { model: this.model, input: batch, dimensions: this.dimensions },
          { signal: options.signal }
        );
        const sorted = [...response.data].sort((a, b) => a.index - b.index);
        out.push(...sorted.map((item) => item.embedding));
      } catch (error) {
        if (error instanceof ProviderUnavailable) throw error;
        throw new ProviderUnavailable(`Batch embedding request failed (${this.model})`, { cause: error });
      }
    }

    return out;
  }
}

/**
 * Local, deterministic embedding by feature hashing: every token and adjacent token pair is
 * hashed (SHA-256) into one of `dimensions` signed buckets, and the result is L2-normalized.
 * Texts that share vocabulary point in similar directions.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'feature-hashing-v1';
  readonly dimensions: number;

  constructor(dimensions = DEFAULT_EMBEDDING_DIMENSIONS) {
    this.dimensions = Math.max(1, Math.floor(dimensions));
  }

  async embed(text: string): Promise<number[]> {
    const tokens = tokenize(text);
    if (tokens.length === 0) throw new EmbeddingUnavailable('No embeddable content in text');

    const features = [...tokens];
    for (let i = 1; i < tokens.length; i++) features.push(`${tokens[i - 1]}_${tokens[i]}`);

    const vec = new Array<number>(this.dimensions).fill(0);
    for (const feature of features) {
      const digest = createHash('sha256').update(feature).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      vec[bucket] += (digest[4] & 1) === 1 ? 1 : -1;
    }

    const norm = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vec : vec.map((v) => v / norm);
  }
}

// Process-wide provider: created once on first use, then shared read-only.
let sharedProvider: EmbeddingProvider | null = null;

export function createEmbeddingProvider(env: Env = process.env): EmbeddingProvider {
  const choice = (env.EMBEDDING_PROVIDER || '').trim().toLowerCase();
  if (choice === 'hashing') return new HashingEmbeddingProvider();
  if (choice === 'openai' || hasAiCredentials(env)) return new OpenAIEmbeddingProvider({ env });
  return new HashingEmbeddingProvider();
}

export function getEmbeddingProvider(): EmbeddingProvider {
  if (!sharedProvider) {
    sharedProvider = createEmbeddingProvider();
    console.info(`[embeddings] using ${sharedProvider.model} (${sharedProvider.dimensions} dims)`);
  }
  return sharedProvider;
}

export function setEmbeddingProvider(provider: EmbeddingProvider): void {
  sharedProvider = provider;
}

export function resetEmbeddingProvider(): void {
  sharedProvider = null;
}

function getFallbackTextModel(env: Env, temperature?: number): string {
  if (env.AI_TEXT_MODEL_FALLBACK) return env.AI_TEXT_MODEL_FALLBACK;
  // For deterministic/structured outputs, prefer a model that supports temperature 0.
  if (temperature === 0) return 'gpt-4o-mini';
  return 'gpt-4o';
}

export async function generateText(
  systemPrompt: string,
  userMessage: string,
  options: { model?: string; temperature?: number; maxTokens?: number; signal?: AbortSignal; env?: Env } = {}
): Promise<string> {
  const env = options.env ?? process.env;
  const model = options.model || env.AI_TEXT_MODEL || 'gpt-4o-mini';
  const primary = getGatewayClient(env) ?? getDirectClient(env);
  if (!primary) throw new ProviderUnavailable('No chat model credentials configured');

  const messages: { role: 'system' | 'user'; content: string }[] = [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userMessage },
  ];
  const extra = {
    ...(typeof options.temperature === 'number' ? { temperature: options.temperature } : {}),
    ...(typeof options.maxTokens === 'number' ? { max_tokens: options.maxTokens } : {}),
  };

  try {
    const response = await primary.chat.completions.create(
      { model, messages, ...extra },
      { signal: options.signal }
    );
    return response.choices[0]?.message?.content || '';
  } catch (error) {
    // The gateway can be intermittently unavailable. Fall back to direct OpenAI if configured.
    const direct = getDirectClient(env);
    if (!isRetryableUpstreamError(error) || !direct || direct === primary) throw error;

    const response = await direct.chat.completions.create(
      { model: getFallbackTextModel(env, options.temperature), messages, ...extra },
      { signal: options.signal }
    );
    return response.choices[0]?.message?.content || '';
  }
}
