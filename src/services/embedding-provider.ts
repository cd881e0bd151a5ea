/**
 * Embedding providers
 */

import OpenAI from 'openai';
import type { EmbeddingProvider } from '../types/index.js';
import { EmbeddingUnavailableError, describeError } from '../errors.js';
import { TextProcessor } from '../utils/text-processing.js';

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  dimensions?: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIEmbeddingOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    let vector: number[] | undefined;
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.options.model,
          input: text,
          ...(this.options.dimensions ? { dimensions: this.options.dimensions } : {})
        },
        { signal }
      );
      vector = response.data[0]?.embedding;
    } catch (error) {
      throw new EmbeddingUnavailableError(describeError(error), error);
    }

    if (!vector || vector.length === 0) {
      throw new EmbeddingUnavailableError('empty embedding response');
    }
    return vector;
  }
}

/**
 * 32-bit FNV-1a
 */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Offline embedder: keyword term frequencies hashed into a fixed number of
 * buckets, L2-normalised. Deterministic, no network.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  constructor(readonly dimensions: number = 256) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new RangeError(`dimensions must be a positive integer, got ${dimensions}`);
    }
  }

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const [keyword, count] of TextProcessor.calculateTermFrequency(text)) {
      vector[fnv1a(keyword) % this.dimensions] += count;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map(v => v / norm);
  }
}
