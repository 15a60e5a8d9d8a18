/**
 * CodeReviewer - Facade over the learn and review pipelines.
 *
 * learn:  resolve -> index -> extract -> store
 * review: (lazy load) -> detect -> synthesize
 *
 * Everything a caller sees is structured data: failed learns come back with
 * success false and a diagnostic, reviews without knowledge come back as a
 * ReviewError instead of throwing.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createTwoFilesPatch } from 'diff';
import { glob } from 'glob';
import { Backends, createBackends } from '../ai';
import { ReviewEngineConfig } from '../config';
import { SourceAnalyzer } from '../core';
import { IssueDetector } from '../detector';
import { KnowledgeUnavailableError, SourceResolutionError, errorMessage } from '../errors';
import { PatternExtractor } from '../extractors';
import { FileIndexer } from '../indexer';
import { Logger } from '../logging';
import { RecommendationSynthesizer } from '../recommend';
import { SourceResolver, createSourceResolver } from '../resolver';
import { KnowledgeStore, StoreLoadResult } from '../store';
import { IndexWarning, RepositoryPatterns, ReviewError, ReviewResponse } from '../types';

/** Context lines around each hunk of a reviewed diff */
export const DIFF_CONTEXT_LINES = 3;

export interface LearnResult {
  success: boolean;
  filesIndexed: number;
  patterns?: RepositoryPatterns;
  patternsStored: boolean;
  indexStored: boolean;
  chunksIndexed: number;
  /** Why nothing was learned */
  diagnostic?: string;
  warnings: string[];
}

export interface ReviewDirectoryOptions {
  /** Defaults to the configured code extensions */
  extensions?: string[];
  recursive?: boolean;
}

/** Reviews keyed by the path they were requested with, in request order */
export type ReviewBatch = Record<string, ReviewResponse>;

export interface CodeReviewerDependencies {
  backends?: Partial<Backends>;
  resolver?: SourceResolver;
  analyzer?: SourceAnalyzer;
}

function describeWarning(warning: IndexWarning): string {
  return `${warning.path}: ${warning.message}`;
}

export class CodeReviewer {
  readonly store: KnowledgeStore;
  private indexer: FileIndexer;
  private extractor: PatternExtractor;
  private detector: IssueDetector;
  private synthesizer: RecommendationSynthesizer;
  private resolver: SourceResolver | undefined;
  private logger: Logger;

  constructor(
    private config: ReviewEngineConfig,
    dependencies: CodeReviewerDependencies = {}
  ) {
    this.logger = config.logger;
    const backends: Backends = { ...createBackends(config), ...dependencies.backends };
    const analyzer = dependencies.analyzer ?? new SourceAnalyzer();

    this.resolver = dependencies.resolver;
    this.store = new KnowledgeStore(config, backends.embedding);
    this.indexer = new FileIndexer(config);
    this.extractor = new PatternExtractor(config.logger, analyzer);
    this.detector = new IssueDetector(this.store, config, analyzer);
    this.synthesizer = new RecommendationSynthesizer(backends.generation, config.logger);
  }

  // ==========================================================================
  // LEARN
  // ==========================================================================

  /**
   * Learn the repository at the locator (default: the configured repoPath)
   * and replace the knowledge base with the result.
   */
  async learnRepository(locator: string = this.config.repoPath): Promise<LearnResult> {
    this.logger.info(`Learning repository: ${locator}`);

    let root: string;
    try {
      root = await this.resolverFor(locator).resolve(locator);
    } catch (error) {
      if (!(error instanceof SourceResolutionError)) throw error;
      this.logger.error(error.message);
      return this.failedLearn(error.message, []);
    }

    const indexed = await this.indexer.index(root);
    const warnings = indexed.warnings.map(describeWarning);
    if (indexed.files.length === 0) {
      return this.failedLearn(indexed.diagnostic ?? `No files indexed from ${root}`, warnings);
    }

    const extraction = this.extractor.extract(indexed.files);
    warnings.push(...extraction.warnings.map(describeWarning));

    const stored = await this.store.learn(indexed.files, extraction.patterns);
    warnings.push(...stored.warnings);

    if (stored.patternsStored) {
      this.logger.info(`Repository learned: ${indexed.files.length} files, ${stored.chunksIndexed} chunks indexed`);
    }
    return {
      success: stored.patternsStored,
      filesIndexed: indexed.files.length,
      patterns: extraction.patterns,
      patternsStored: stored.patternsStored,
      indexStored: stored.indexStored,
      chunksIndexed: stored.chunksIndexed,
      warnings,
    };
  }

  /**
   * Restore a previously learned knowledge base from the storage path.
   */
  async loadKnowledge(): Promise<StoreLoadResult> {
    this.logger.info(`Loading knowledge from ${this.config.storagePath}`);
    const result = await this.store.load();
    if (!result.success) {
      this.logger.warn('Failed to load knowledge');
    }
    return result;
  }

  // ==========================================================================
  // REVIEW
  // ==========================================================================

  async reviewCode(code: string, filePath: string): Promise<ReviewResponse> {
    this.logger.info(`Reviewing code: ${filePath}`);
    return this.review(code, filePath);
  }

  /**
   * Review the updated version of a file. The unified diff is handed to the
   * synthesizer, which enables the generative pass.
   */
  async reviewDiff(original: string, updated: string, filePath: string): Promise<ReviewResponse> {
    this.logger.info(`Reviewing diff: ${filePath}`);
    const diff = createTwoFilesPatch(`a/${filePath}`, `b/${filePath}`, original, updated, '', '', {
      context: DIFF_CONTEXT_LINES,
    });
    return this.review(updated, filePath, diff);
  }

  /**
   * Read and review each file. Unreadable files get a per-file error.
   */
  async reviewFiles(filePaths: readonly string[]): Promise<ReviewBatch> {
    const reviews: ReviewBatch = {};
    for (const filePath of filePaths) {
      let code: string;
      try {
        code = await fs.readFile(filePath, 'utf-8');
      } catch (error) {
        const message = `Failed to read file ${filePath}: ${errorMessage(error)}`;
        this.logger.error(message);
        reviews[filePath] = { file: filePath, error: message, code: 'FILE_UNREADABLE' };
        continue;
      }
      reviews[filePath] = await this.review(code, filePath);
    }
    return reviews;
  }

  /**
   * Review the files directly inside a directory (or below it, when
   * recursive) whose extension is in the list.
   */
  async reviewDirectory(dir: string, options: ReviewDirectoryOptions = {}): Promise<ReviewBatch> {
    const extensions = new Set((options.extensions ?? this.config.codeExtensions).map(ext => ext.toLowerCase()));
    const candidates = await glob(options.recursive ? '**/*' : '*', {
      cwd: dir,
      nodir: true,
      dot: true,
      posix: true,
      ignore: options.recursive ? this.config.ignoreDirs.map(ignored => `**/${ignored}/**`) : [],
    });

    const files = candidates
      .filter(candidate => extensions.has(path.extname(candidate).toLowerCase()))
      .sort()
      .map(candidate => path.join(dir, candidate));

    this.logger.info(`Found ${files.length} files to review in ${dir}`);
    return this.reviewFiles(files);
  }

  private async review(code: string, filePath: string, diff?: string): Promise<ReviewResponse> {
    if (this.store.getPatterns() === null) {
      await this.loadKnowledge();
    }
    try {
      const analysis = await this.detector.analyze(code, filePath, diff);
      return await this.synthesizer.synthesize(filePath, analysis);
    } catch (error) {
      if (!(error instanceof KnowledgeUnavailableError)) throw error;
      this.logger.error(`Failed to load knowledge for review of ${filePath}`);
      return this.knowledgeUnavailable(filePath, error);
    }
  }

  private knowledgeUnavailable(filePath: string, error: KnowledgeUnavailableError): ReviewError {
    return { file: filePath, error: error.message, code: 'KNOWLEDGE_UNAVAILABLE' };
  }

  private resolverFor(locator: string): SourceResolver {
    return (
      this.resolver ??
      createSourceResolver(locator, {
        cloneDir: this.config.cloneDir,
        cloneTimeoutMs: this.config.cloneTimeoutMs,
        logger: this.logger.child('resolver'),
      })
    );
  }

  private failedLearn(diagnostic: string, warnings: string[]): LearnResult {
    return {
      success: false,
      filesIndexed: 0,
      patternsStored: false,
      indexStored: false,
      chunksIndexed: 0,
      diagnostic,
      warnings,
    };
  }
}
