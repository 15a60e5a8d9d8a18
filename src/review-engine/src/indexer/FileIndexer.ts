/**
 * FileIndexer - Walks a resolved repository root and reads every source file.
 *
 * Files are filtered by extension (case-insensitive, final path segment) and
 * by ignored directory names, matched against whole path segments. Unreadable
 * files become warnings; an empty result carries a diagnostic instead of
 * throwing.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { ReviewEngineConfig } from '../config';
import { errorMessage } from '../errors';
import { Logger } from '../logging';
import { FileRecord, IndexResult, IndexWarning } from '../types';

export type FileIndexerOptions = Pick<ReviewEngineConfig, 'codeExtensions' | 'ignoreDirs' | 'maxFileSize'> & {
  logger: Logger;
};

// Files are read in batches to bound open file handles
const READ_BATCH_SIZE = 100;

export class FileIndexer {
  private extensions: Set<string>;
  private ignoreDirs: Set<string>;
  private logger: Logger;

  constructor(private options: FileIndexerOptions) {
    this.extensions = new Set(options.codeExtensions.map(ext => ext.toLowerCase()));
    this.ignoreDirs = new Set(options.ignoreDirs);
    this.logger = options.logger.child('indexer');
  }

  async index(root: string): Promise<IndexResult> {
    const warnings: IndexWarning[] = [];

    try {
      const stat = await fs.stat(root);
      if (!stat.isDirectory()) {
        return this.emptyResult(`Repository root ${root} is not a directory`, warnings);
      }
    } catch (error) {
      return this.emptyResult(`Repository root ${root} is not readable: ${errorMessage(error)}`, warnings);
    }

    const candidates = await glob('**/*', {
      cwd: root,
      nodir: true,
      dot: true,
      posix: true,
      ignore: [...this.ignoreDirs].map(dir => `**/${dir}/**`),
    });

    const accepted = candidates
      .map(candidate => candidate.split(path.sep).join('/'))
      .filter(relativePath => this.accepts(relativePath))
      .sort();

    const files: FileRecord[] = [];
    for (let i = 0; i < accepted.length; i += READ_BATCH_SIZE) {
      const batch = accepted.slice(i, i + READ_BATCH_SIZE);
      const records = await Promise.all(batch.map(relativePath => this.read(root, relativePath, warnings)));
      for (const record of records) {
        if (record) files.push(record);
      }
    }

    this.logger.info(`Indexed ${files.length} files from ${root}`);
    if (files.length === 0) {
      return this.emptyResult(
        `No files found in ${root} matching extensions [${[...this.extensions].join(', ')}] ` +
          `outside ignored directories [${[...this.ignoreDirs].join(', ')}]`,
        warnings
      );
    }
    return { files, warnings };
  }

  /**
   * Extension and ignore-list filter over a forward-slash relative path.
   */
  accepts(relativePath: string): boolean {
    const segments = relativePath.split('/');
    const fileName = segments[segments.length - 1] ?? '';
    if (!this.extensions.has(path.extname(fileName).toLowerCase())) {
      return false;
    }
    return !segments.slice(0, -1).some(segment => this.ignoreDirs.has(segment));
  }

  private async read(root: string, relativePath: string, warnings: IndexWarning[]): Promise<FileRecord | null> {
    const fullPath = path.join(root, relativePath);
    try {
      const stat = await fs.stat(fullPath);
      if (stat.size > this.options.maxFileSize) {
        this.warn(warnings, relativePath, `skipped, ${stat.size} bytes exceeds ${this.options.maxFileSize}`);
        return null;
      }
      const content = await fs.readFile(fullPath, 'utf-8');
      return {
        relativePath,
        content,
        extension: path.extname(relativePath).toLowerCase(),
      };
    } catch (error) {
      this.warn(warnings, relativePath, `unreadable: ${errorMessage(error)}`);
      return null;
    }
  }

  private warn(warnings: IndexWarning[], relativePath: string, message: string): void {
    this.logger.warn(`${relativePath}: ${message}`);
    warnings.push({ path: relativePath, message });
  }

  private emptyResult(diagnostic: string, warnings: IndexWarning[]): IndexResult {
    this.logger.warn(diagnostic);
    return { files: [], warnings, diagnostic };
  }
}
