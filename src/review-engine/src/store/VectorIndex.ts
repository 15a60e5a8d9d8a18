/**
 * VectorIndex - Brute-force cosine similarity over embedded code chunks.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { SimilarCodeResult } from '../types';
import { ChunkMetadata } from './TextChunker';

export const INDEX_FORMAT_VERSION = 1;

export interface VectorIndexEntry {
  content: string;
  metadata: ChunkMetadata;
  vector: number[];
}

export interface VectorIndexPayload {
  version: number;
  backend: string;
  model: string;
  dimensions: number;
  buildId: string;
  createdAt: string;
  entries: VectorIndexEntry[];
}

const payloadSchema = z.object({
  version: z.literal(INDEX_FORMAT_VERSION),
  backend: z.string(),
  model: z.string(),
  dimensions: z.number().int().min(0),
  buildId: z.string(),
  createdAt: z.string(),
  entries: z.array(
    z.object({
      content: z.string(),
      metadata: z.object({ sourceFile: z.string(), chunkIndex: z.number().int().min(0) }),
      vector: z.array(z.number()),
    })
  ),
});

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class VectorIndex {
  constructor(
    readonly backend: string,
    readonly model: string,
    readonly entries: readonly VectorIndexEntry[],
    readonly buildId: string = uuidv4(),
    readonly createdAt: string = new Date().toISOString()
  ) {}

  get dimensions(): number {
    return this.entries[0]?.vector.length ?? 0;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Up to k entries by descending similarity; ties keep insertion order.
   */
  search(query: readonly number[], k: number): SimilarCodeResult[] {
    return this.entries
      .map(entry => ({
        content: entry.content,
        file: entry.metadata.sourceFile,
        chunk: entry.metadata.chunkIndex,
        similarity: cosineSimilarity(query, entry.vector),
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, Math.max(0, k));
  }

  toPayload(): VectorIndexPayload {
    return {
      version: INDEX_FORMAT_VERSION,
      backend: this.backend,
      model: this.model,
      dimensions: this.dimensions,
      buildId: this.buildId,
      createdAt: this.createdAt,
      entries: [...this.entries],
    };
  }

  /**
   * Rebuild from a parsed index.json payload. Throws on anything malformed.
   */
  static fromPayload(raw: unknown): VectorIndex {
    const parsed = payloadSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Invalid index payload at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'unknown'}`);
    }
    const { backend, model, entries, buildId, createdAt, dimensions } = parsed.data;
    if (entries.some(entry => entry.vector.length !== dimensions)) {
      throw new Error(`Index entries do not all have ${dimensions} dimensions`);
    }
    return new VectorIndex(backend, model, entries, buildId, createdAt);
  }
}
