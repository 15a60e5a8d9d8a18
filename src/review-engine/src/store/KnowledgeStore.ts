/**
 * KnowledgeStore - Owns the persisted knowledge base for one storage path.
 *
 * Layout under the storage root:
 *   patterns.yaml  learned pattern families (extraction order, diffable)
 *   index.json     vector index over code chunks (only with an embedding backend)
 *
 * Patterns are required for review; the index only improves it. A load
 * without an index is a successful, degraded load.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { EmbeddingBackend } from '../ai';
import { errorMessage } from '../errors';
import { Logger } from '../logging';
import { FileRecord, RepositoryPatterns, SimilarCodeResult, StoredPatterns } from '../types';
import { parsePatternDocument, serializePatterns } from './PatternDocument';
import { TextChunker } from './TextChunker';
import { VectorIndex, VectorIndexEntry } from './VectorIndex';
import { writeFileAtomic } from './atomicWrite';

export const PATTERNS_FILE = 'patterns.yaml';
export const INDEX_FILE = 'index.json';

export interface KnowledgeStoreOptions {
  storagePath: string;
  chunkSize: number;
  chunkOverlap: number;
  logger: Logger;
}

export interface StoreLearnResult {
  patternsStored: boolean;
  indexStored: boolean;
  chunksIndexed: number;
  warnings: string[];
}

export interface StoreLoadResult {
  /** Equal to patternsLoaded: the index is optional */
  success: boolean;
  patternsLoaded: boolean;
  indexLoaded: boolean;
  warnings: string[];
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class KnowledgeStore {
  private patterns: StoredPatterns | null = null;
  private index: VectorIndex | null = null;
  private chunker: TextChunker;
  private logger: Logger;

  constructor(
    private options: KnowledgeStoreOptions,
    private embedding: EmbeddingBackend
  ) {
    this.chunker = new TextChunker(options);
    this.logger = options.logger.child('store');
  }

  get patternsPath(): string {
    return path.join(this.options.storagePath, PATTERNS_FILE);
  }

  get indexPath(): string {
    return path.join(this.options.storagePath, INDEX_FILE);
  }

  /** Patterns currently in memory (read-only view) */
  getPatterns(): Readonly<StoredPatterns> | null {
    return this.patterns;
  }

  hasIndex(): boolean {
    return this.index !== null;
  }

  /** Whether a knowledge base has been persisted at the storage path */
  async exists(): Promise<boolean> {
    try {
      await fs.access(this.patternsPath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Replace the knowledge base with freshly extracted patterns and, when an
   * embedding backend is available, a new index over the files.
   */
  async learn(files: readonly FileRecord[], patterns: RepositoryPatterns): Promise<StoreLearnResult> {
    const warnings: string[] = [];
    await fs.mkdir(this.options.storagePath, { recursive: true });

    let index: VectorIndex | null = null;
    if (this.embedding.available) {
      try {
        index = await this.buildIndex(files);
        await writeFileAtomic(this.indexPath, JSON.stringify(index.toPayload()));
        this.logger.info(`Stored ${index.size} chunks in ${this.indexPath}`);
      } catch (error) {
        index = null;
        this.warn(warnings, `Similarity index not built: ${errorMessage(error)}`);
      }
    } else {
      this.logger.info('No embedding backend available; storing patterns only');
    }

    if (index === null) {
      // A stale index would otherwise be paired with the new patterns on load
      await fs.rm(this.indexPath, { force: true });
    }

    let patternsStored = false;
    try {
      await writeFileAtomic(this.patternsPath, serializePatterns(patterns));
      patternsStored = true;
      this.logger.info(`Stored patterns in ${this.patternsPath}`);
    } catch (error) {
      this.warn(warnings, `Patterns not stored: ${errorMessage(error)}`);
    }

    this.patterns = patterns;
    this.index = index;
    return { patternsStored, indexStored: index !== null, chunksIndexed: index?.size ?? 0, warnings };
  }

  /**
   * Restore patterns and index from the storage path.
   */
  async load(): Promise<StoreLoadResult> {
    const warnings: string[] = [];
    this.patterns = await this.loadPatterns(warnings);
    this.index = await this.loadIndex(warnings);

    const patternsLoaded = this.patterns !== null;
    return { success: patternsLoaded, patternsLoaded, indexLoaded: this.index !== null, warnings };
  }

  /**
   * Up to k stored chunks most similar to the snippet. Empty when no index is
   * loaded or the embedding call fails.
   */
  async retrieveSimilar(snippet: string, k: number): Promise<SimilarCodeResult[]> {
    if (!this.index || !this.embedding.available || k <= 0) {
      return [];
    }
    try {
      const [query] = await this.embedding.embed([snippet]);
      return query ? this.index.search(query, k) : [];
    } catch (error) {
      this.logger.warn(`Similarity search failed: ${errorMessage(error)}`);
      return [];
    }
  }

  private async buildIndex(files: readonly FileRecord[]): Promise<VectorIndex> {
    const chunks = files.flatMap(file => this.chunker.chunkFile(file.relativePath, file.content));
    const vectors = await this.embedding.embed(chunks.map(chunk => chunk.content));
    if (vectors.length !== chunks.length) {
      throw new Error(`Embedding backend returned ${vectors.length} vectors for ${chunks.length} chunks`);
    }
    const entries: VectorIndexEntry[] = chunks.map((chunk, i) => ({
      content: chunk.content,
      metadata: chunk.metadata,
      vector: vectors[i] ?? [],
    }));
    return new VectorIndex(this.embedding.name, this.embedding.model, entries);
  }

  private async loadPatterns(warnings: string[]): Promise<StoredPatterns | null> {
    let text: string;
    try {
      text = await fs.readFile(this.patternsPath, 'utf-8');
    } catch (error) {
      this.warn(
        warnings,
        isMissingFile(error)
          ? `No pattern document at ${this.patternsPath}`
          : `Cannot read ${this.patternsPath}: ${errorMessage(error)}`
      );
      return null;
    }

    try {
      const document = parsePatternDocument(text);
      for (const warning of document.warnings) {
        this.warn(warnings, warning);
      }
      return document.patterns;
    } catch (error) {
      this.warn(warnings, `Cannot load ${this.patternsPath}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async loadIndex(warnings: string[]): Promise<VectorIndex | null> {
    let text: string;
    try {
      text = await fs.readFile(this.indexPath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.warn(warnings, `Cannot read ${this.indexPath}: ${errorMessage(error)}`);
      }
      return null;
    }

    if (!this.embedding.available) {
      this.warn(warnings, 'Similarity index present but no embedding backend is configured; retrieval disabled');
      return null;
    }

    try {
      const index = VectorIndex.fromPayload(JSON.parse(text));
      if (index.model !== this.embedding.model) {
        this.warn(
          warnings,
          `Similarity index was built with ${index.model}, current backend uses ${this.embedding.model}; retrieval disabled`
        );
        return null;
      }
      return index;
    } catch (error) {
      this.warn(warnings, `Cannot load ${this.indexPath}: ${errorMessage(error)}`);
      return null;
    }
  }

  private warn(warnings: string[], message: string): void {
    this.logger.warn(message);
    warnings.push(message);
  }
}
