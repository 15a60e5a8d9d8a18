/**
 * Embedding backends - Turn text chunks into vectors for similarity search.
 *
 * Callers only look at `available`; a NullEmbeddingBackend stands in when
 * nothing is configured.
 */

import { z } from 'zod';
import { EmbeddingConfig } from '../config';

export interface EmbeddingBackend {
  readonly name: string;
  /** Identifies the vector space; indexes built under another model are not comparable */
  readonly model: string;
  readonly available: boolean;
  embed(texts: string[]): Promise<number[][]>;
}

export class NullEmbeddingBackend implements EmbeddingBackend {
  readonly name = 'none';
  readonly model = 'none';
  readonly available = false;

  async embed(): Promise<number[][]> {
    throw new Error('No embedding backend configured');
  }
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int(),
      embedding: z.array(z.number()),
    })
  ),
});

/**
 * Any OpenAI-compatible `/embeddings` endpoint.
 */
export class OpenAIEmbeddingBackend implements EmbeddingBackend {
  readonly name = 'openai';
  readonly available = true;
  readonly model: string;

  constructor(private config: Pick<EmbeddingConfig, 'apiKey' | 'model' | 'baseUrl' | 'timeoutMs' | 'batchSize'>) {
    this.model = config.model;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      vectors.push(...(await this.embedBatch(texts.slice(i, i + this.config.batchSize))));
    }
    return vectors;
  }

  private async embedBatch(input: string[]): Promise<number[][]> {
    const response = await fetch(`${this.config.baseUrl.replace(/\/+$/, '')}/embeddings`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ model: this.config.model, input }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Embedding request failed with HTTP ${response.status}`);
    }

    const parsed = embeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected embedding response: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`);
    }
    if (parsed.data.data.length !== input.length) {
      throw new Error(`Expected ${input.length} embeddings, received ${parsed.data.data.length}`);
    }
    return [...parsed.data.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
  }
}

const TOKEN = /[A-Za-z_][A-Za-z0-9_]*|\d+|[^\sA-Za-z0-9_]/g;

/**
 * 32-bit FNV-1a hash.
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
 * Deterministic feature hashing of tokens and character trigrams.
 * Needs no network and gives reproducible vectors for tests and offline use.
 */
export class LocalHashEmbeddingBackend implements EmbeddingBackend {
  readonly name = 'local';
  readonly available = true;
  readonly model: string;

  constructor(private dimensions: number) {
    this.model = `local-hash-${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.vectorize(text));
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const add = (feature: string): void => {
      const hash = fnv1a(feature);
      const slot = hash % this.dimensions;
      vector[slot] = (vector[slot] ?? 0) + ((hash & 0x80000000) === 0 ? 1 : -1);
    };

    for (const token of text.toLowerCase().match(TOKEN) ?? []) {
      add(`t:${token}`);
      for (let i = 0; i + 3 <= token.length; i++) {
        add(`g:${token.slice(i, i + 3)}`);
      }
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map(v => v / norm);
  }
}
