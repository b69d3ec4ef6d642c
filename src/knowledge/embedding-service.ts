/**
 * Text embeddings for hybrid knowledge search.
 *
 * Uses the OpenAI SDK against text-embedding-3-small by default.
 */

import OpenAI from 'openai';
import { env } from '../config/env';

export interface EmbeddingProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  readonly dimension: number;
}

const BATCH_SIZE = 100;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dimension = 1536;
  private readonly client: OpenAI;

  constructor(
    apiKey: string = env.openai.apiKey,
    private readonly model: string = env.rag.embeddingModel,
  ) {
    if (!apiKey) {
      throw new Error('OpenAI API key not configured for embeddings');
    }
    this.client = new OpenAI({ apiKey, timeout: env.openai.timeoutMs, maxRetries: 0 });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], signal);
    return embedding;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const all: number[][] = [];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      const response = await this.client.embeddings.create({ model: this.model, input: batch }, { signal });
      // Sort by index to maintain order
      const sorted = [...response.data].sort((a, b) => a.index - b.index);
      for (const item of sorted) {
        all.push(item.embedding);
      }
    }

    return all;
  }
}
