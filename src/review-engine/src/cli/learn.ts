/**
 * The learn command, apart from argument parsing.
 */

import { CodeReviewer } from '../reviewer';
import { formatLearnResult } from './format';

export interface ConsoleSink {
  log(line: string): void;
  error(line: string): void;
}

export interface LearnCommandOptions {
  repo: string;
  storagePath: string;
  /** Replace an existing knowledge base */
  force: boolean;
}

/**
 * Learn a repository and report on `io`. Resolves to the process exit code.
 */
export async function runLearn(
  reviewer: CodeReviewer,
  options: LearnCommandOptions,
  io: ConsoleSink = console
): Promise<number> {
  if (!options.force && (await reviewer.store.exists())) {
    io.error(`Knowledge base already exists at ${options.storagePath}. Use --force to relearn.`);
    return 1;
  }

  io.error(`Learning repository: ${options.repo}...`);
  const result = await reviewer.learnRepository(options.repo);
  for (const warning of result.warnings) {
    io.error(`Warning: ${warning}`);
  }
  io.log(formatLearnResult(result, options.storagePath));
  return result.success ? 0 : 1;
}
