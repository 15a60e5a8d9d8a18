#!/usr/bin/env node
/**
 * review-engine CLI - Learn a repository's conventions and review code against them.
 *
 * Commands:
 *   learn <repo>                      Learn patterns and build the knowledge base
 *   review <files...>                 Review files
 *   review-diff <original> <updated>  Review the change between two versions of a file
 *   review-dir <dir>                  Review every matching file in a directory
 */

import { Command } from 'commander';
import * as fs from 'fs/promises';
import {
  ReviewEngineConfig,
  ReviewEngineConfigInput,
  loadConfigFile,
  resolveConfig,
} from '../config';
import { ConfigurationError, errorMessage } from '../errors';
import { LOG_LEVELS, isLogLevel } from '../logging';
import { CodeReviewer, ReviewBatch } from '../reviewer';
import { ReviewResponse, isReviewError } from '../types';
import { formatReviewBatch } from './format';
import { runLearn } from './learn';

type OutputFormat = 'console' | 'json';

interface CommonOptions {
  storage?: string;
  config?: string;
  logLevel?: string;
}

interface LearnOptions extends CommonOptions {
  force?: boolean;
}

interface OutputOptions extends CommonOptions {
  output: string;
  outputFile?: string;
}

interface ReviewDiffOptions extends OutputOptions {
  path?: string;
}

interface ReviewDirOptions extends OutputOptions {
  extensions?: string;
  recursive?: boolean;
}

// Lowest-precedence layer: file, env and --log-level override it
const CLI_DEFAULTS: ReviewEngineConfigInput = { logLevel: 'warn' };

async function buildConfig(options: CommonOptions, overrides: ReviewEngineConfigInput = {}): Promise<ReviewEngineConfig> {
  const file = options.config ? await loadConfigFile(options.config) : {};
  const cli: ReviewEngineConfigInput = { ...overrides };
  if (options.storage) {
    cli.storagePath = options.storage;
  }
  if (options.logLevel) {
    if (!isLogLevel(options.logLevel)) {
      throw new ConfigurationError(`--log-level must be one of ${LOG_LEVELS.join(', ')}, got "${options.logLevel}"`);
    }
    cli.logLevel = options.logLevel;
  }
  return resolveConfig({ file: { ...CLI_DEFAULTS, ...file }, env: process.env, overrides: cli });
}

function outputFormat(value: string): OutputFormat {
  if (value !== 'console' && value !== 'json') {
    throw new ConfigurationError(`--output must be console or json, got "${value}"`);
  }
  return value;
}

async function loadForReview(reviewer: CodeReviewer, config: ReviewEngineConfig): Promise<void> {
  const loaded = await reviewer.loadKnowledge();
  if (!loaded.success) {
    console.error(`Warning: no knowledge loaded from ${config.storagePath}. Run "learn" first.`);
  }
}

async function emit(reviews: ReviewBatch, options: OutputOptions): Promise<void> {
  if (outputFormat(options.output) === 'json') {
    const output = JSON.stringify(reviews, null, 2);
    if (options.outputFile) {
      await fs.writeFile(options.outputFile, output);
      console.error(`Reviews written to ${options.outputFile}`);
    } else {
      console.log(output);
    }
  } else {
    console.log(formatReviewBatch(reviews));
  }

  const failures = Object.values(reviews).filter((review: ReviewResponse) => isReviewError(review));
  if (failures.length > 0) {
    process.exitCode = 1;
  }
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-s, --storage <dir>', 'Knowledge base directory')
    .option('-c, --config <file>', 'YAML configuration file')
    .option('--log-level <level>', `Log level: ${LOG_LEVELS.join(', ')}`);
}

function withOutputOptions(command: Command): Command {
  return withCommonOptions(command)
    .option('-o, --output <format>', 'Output format: console, json', 'console')
    .option('--output-file <file>', 'Write JSON output to a file instead of stdout');
}

const program = new Command();

program
  .name('review-engine')
  .description('Learn repository conventions and review code against them')
  .version('0.1.0');

// Learn command
withCommonOptions(
  program
    .command('learn')
    .description('Learn patterns from a repository (local path or clone URL)')
    .argument('<repo>', 'Repository path or URL')
    .option('-f, --force', 'Replace an existing knowledge base')
).action(async (repo: string, options: LearnOptions) => {
  try {
    const config = await buildConfig(options, { repoPath: repo });
    const reviewer = new CodeReviewer(config);
    process.exitCode = await runLearn(reviewer, {
      repo,
      storagePath: config.storagePath,
      force: options.force ?? false,
    });
  } catch (error) {
    console.error(`Learning failed: ${errorMessage(error)}`);
    process.exit(1);
  }
});

// Review command
withOutputOptions(
  program
    .command('review')
    .description('Review one or more files')
    .argument('<files...>', 'Files to review')
).action(async (files: string[], options: OutputOptions) => {
  try {
    const config = await buildConfig(options);
    const reviewer = new CodeReviewer(config);
    await loadForReview(reviewer, config);
    await emit(await reviewer.reviewFiles(files), options);
  } catch (error) {
    console.error(`Review failed: ${errorMessage(error)}`);
    process.exit(1);
  }
});

// Review-diff command
withOutputOptions(
  program
    .command('review-diff')
    .description('Review the change from one version of a file to another')
    .argument('<original>', 'Original version of the file')
    .argument('<updated>', 'Updated version of the file')
    .option('-p, --path <path>', 'Path to report the file under (default: the updated file)')
).action(async (originalFile: string, updatedFile: string, options: ReviewDiffOptions) => {
  try {
    const config = await buildConfig(options);
    const reviewer = new CodeReviewer(config);
    await loadForReview(reviewer, config);

    const [original, updated] = await Promise.all([
      fs.readFile(originalFile, 'utf-8'),
      fs.readFile(updatedFile, 'utf-8'),
    ]);
    const filePath = options.path ?? updatedFile;
    const review = await reviewer.reviewDiff(original, updated, filePath);
    await emit({ [filePath]: review }, options);
  } catch (error) {
    console.error(`Diff review failed: ${errorMessage(error)}`);
    process.exit(1);
  }
});

// Review-dir command
withOutputOptions(
  program
    .command('review-dir')
    .description('Review all files in a directory')
    .argument('<dir>', 'Directory to review')
    .option('-e, --extensions <list>', 'Comma-separated extensions (default: configured code extensions)')
    .option('-r, --recursive', 'Include subdirectories')
).action(async (dir: string, options: ReviewDirOptions) => {
  try {
    const config = await buildConfig(options);
    const reviewer = new CodeReviewer(config);
    await loadForReview(reviewer, config);

    const extensions = options.extensions
      ?.split(',')
      .map(ext => ext.trim())
      .filter(ext => ext.length > 0);
    const reviews = await reviewer.reviewDirectory(dir, { extensions, recursive: options.recursive ?? false });
    console.error(`Reviewed ${Object.keys(reviews).length} files`);
    await emit(reviews, options);
  } catch (error) {
    console.error(`Directory review failed: ${errorMessage(error)}`);
    process.exit(1);
  }
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
