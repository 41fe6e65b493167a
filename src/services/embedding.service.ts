import OpenAI from 'openai';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { withTimeout } from '../utils/timeout';

/**
 * Maps text to a fixed-dimension vector. Every call on one instance must
 * return vectors of the same length.
 */
export interface Embedder {
  readonly name: string;
  embed(text: string): Promise<number[]>;
}

export class OpenAIEmbedder implements Embedder {
  readonly name: string;
  private client: OpenAI;

  constructor(
    apiKey: string = config.openai.apiKey,
    private model: string = config.openai.embeddingModel,
    private timeoutMs: number = config.execution.externalTimeout
  ) {
    this.client = new OpenAI({ apiKey });
    this.name = `openai:${model}`;
  }

  async embed(text: string): Promise<number[]> {
    const response = await withTimeout(
      this.client.embeddings.create({
        model: this.model,
        input: text.replace(/\n/g, ' '),
      }),
      this.timeoutMs,
      'Embedding request'
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new Error('Embedding response contained no vector');
    }
    return embedding;
  }
}

/**
 * Offline embedder: signed feature hashing of lower-cased word tokens,
 * L2-normalized. Same text always yields the same vector, so it keeps the
 * similarity cache usable without any embedding credentials.
 */
export class HashingEmbedder implements Embedder {
  readonly name: string;

  constructor(private dimension: number = config.cache.localDimension) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Invalid embedding dimension: ${dimension}`);
    }
    this.name = `hashing:${dimension}`;
  }

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

    for (const token of tokens) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimension;
      // high bit picks the sign so collisions partly cancel out
      vector[bucket] += hash & 0x80000000 ? -1 : 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map(value => value / norm);
  }
}

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function createEmbedder(): Embedder {
  if (config.openai.apiKey) {
    return new OpenAIEmbedder();
  }
  logger.warn('OPENAI_API_KEY not set - using local hashing embeddings for the similarity cache');
  return new HashingEmbedder();
}
