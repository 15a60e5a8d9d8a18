/**
 * Source resolvers - Materialize a repository locator into a local directory.
 */

import { execFile } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';
import { promisify } from 'util';
import { SourceResolutionError, errorMessage } from '../errors';
import { Logger } from '../logging';

export interface SourceResolver {
  /** Resolve to an absolute local root, or throw SourceResolutionError */
  resolve(locator: string): Promise<string>;
}

/**
 * Runs a program with arguments. Rejects on a non-zero exit, and on timeout
 * with an error whose `killed` flag is set.
 */
export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<void>;

/** Default upper bound on a clone */
export const DEFAULT_CLONE_TIMEOUT_MS = 120000;

const REMOTE_LOCATOR = /^(?:https?:\/\/|ssh:\/\/|git@|file:\/\/)/;

export function isRemoteLocator(locator: string): boolean {
  return REMOTE_LOCATOR.test(locator);
}

const execFileAsync = promisify(execFile);

const runGit: CommandRunner = async (file, args, timeoutMs) => {
  await execFileAsync(file, args, { encoding: 'utf-8', timeout: timeoutMs });
};

function isTimeout(error: unknown): boolean {
  return error instanceof Error && 'killed' in error && error.killed === true;
}

export class LocalSourceResolver implements SourceResolver {
  async resolve(locator: string): Promise<string> {
    const root = path.resolve(locator);
    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(root)).isDirectory();
    } catch (error) {
      throw new SourceResolutionError(`Repository path not found: ${root} (${errorMessage(error)})`, locator);
    }
    if (!isDirectory) {
      throw new SourceResolutionError(`Repository path is not a directory: ${root}`, locator);
    }
    return root;
  }
}

/**
 * Shallow-clones a remote repository into a fixed destination, removing any
 * earlier clone there first.
 */
export class GitSourceResolver implements SourceResolver {
  constructor(
    private cloneDir: string,
    private logger: Logger,
    private run: CommandRunner = runGit,
    private timeoutMs: number = DEFAULT_CLONE_TIMEOUT_MS
  ) {}

  async resolve(locator: string): Promise<string> {
    const destination = path.resolve(this.cloneDir);

    try {
      await fs.rm(destination, { recursive: true, force: true });
    } catch (error) {
      throw new SourceResolutionError(
        `Cannot remove previous clone at ${destination}: ${errorMessage(error)}`,
        locator
      );
    }
    await fs.mkdir(path.dirname(destination), { recursive: true });

    this.logger.info(`Cloning ${locator} into ${destination}`);
    try {
      await this.run('git', ['clone', '--depth', '1', locator, destination], this.timeoutMs);
    } catch (error) {
      if (isTimeout(error)) {
        throw new SourceResolutionError(`git clone timed out after ${this.timeoutMs}ms for ${locator}`, locator);
      }
      throw new SourceResolutionError(`git clone failed for ${locator}: ${errorMessage(error)}`, locator);
    }
    return destination;
  }
}

export function createSourceResolver(
  locator: string,
  options: { cloneDir: string; logger: Logger; run?: CommandRunner; cloneTimeoutMs?: number }
): SourceResolver {
  if (isRemoteLocator(locator)) {
    return new GitSourceResolver(options.cloneDir, options.logger, options.run, options.cloneTimeoutMs);
  }
  return new LocalSourceResolver();
}
