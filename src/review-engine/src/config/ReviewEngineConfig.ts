/**
 * ReviewEngineConfig - The single configuration value handed to every component.
 *
 * Built once: defaults <- config file <- environment <- explicit overrides.
 * Nothing below this module reads process.env.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';
import { Logger, LogLevel, LOG_LEVELS, createConsoleLogger, isLogLevel } from '../logging';
import { DEFAULT_CLONE_TIMEOUT_MS } from '../resolver';

export type EmbeddingProvider = 'auto' | 'openai' | 'local' | 'none';
export type GenerationProvider = 'auto' | 'groq' | 'none';

export interface EmbeddingConfig {
  provider: EmbeddingProvider;
  apiKey: string;
  model: string;
  /** Base URL of an OpenAI-compatible API */
  baseUrl: string;
  timeoutMs: number;
  /** Vector size of the local hashing backend */
  dimensions: number;
  /** Texts sent per embeddings request */
  batchSize: number;
}

export interface GenerationConfig {
  provider: GenerationProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
}

export interface ReviewEngineConfig {
  /** Repository locator: local path or clone URL */
  repoPath: string;
  storagePath: string;
  /** Destination of remote clones */
  cloneDir: string;
  /** Upper bound on a remote clone */
  cloneTimeoutMs: number;
  codeExtensions: string[];
  ignoreDirs: string[];
  /** Maximum file size to index (bytes) */
  maxFileSize: number;
  chunkSize: number;
  chunkOverlap: number;
  /** Similar chunks retrieved per review */
  similarResults: number;
  logLevel: LogLevel;
  embedding: EmbeddingConfig;
  generation: GenerationConfig;
  logger: Logger;
}

/** Partial configuration as read from a file, the environment or a caller */
export type ReviewEngineConfigInput = Partial<
  Omit<ReviewEngineConfig, 'embedding' | 'generation' | 'logger'>
> & {
  embedding?: Partial<EmbeddingConfig>;
  generation?: Partial<GenerationConfig>;
  logger?: Logger;
};

export const DEFAULT_CODE_EXTENSIONS: readonly string[] = [
  '.py', '.js', '.java', '.cpp', '.c', '.h', '.cs', '.php', '.rb', '.go', '.rs', '.ts',
  '.tsx', '.jsx', '.mjs', '.cjs',
];

export const DEFAULT_IGNORE_DIRS: readonly string[] = ['.git', 'node_modules', 'venv', '__pycache__', '.venv'];

const DEFAULT_EMBEDDING: EmbeddingConfig = {
  provider: 'auto',
  apiKey: '',
  model: 'text-embedding-3-small',
  baseUrl: 'https://api.openai.com/v1',
  timeoutMs: 30000,
  dimensions: 256,
  batchSize: 64,
};

const DEFAULT_GENERATION: GenerationConfig = {
  provider: 'auto',
  apiKey: '',
  model: 'llama-3.3-70b-versatile',
  temperature: 0.2,
  maxTokens: 2000,
  timeoutMs: 60000,
  maxRetries: 2,
};

const DEFAULTS: Pick<
  ReviewEngineConfig,
  'repoPath' | 'storagePath' | 'cloneTimeoutMs' | 'maxFileSize' | 'chunkSize' | 'chunkOverlap' | 'similarResults' | 'logLevel'
> = {
  repoPath: '.',
  storagePath: './knowledge',
  cloneTimeoutMs: DEFAULT_CLONE_TIMEOUT_MS,
  maxFileSize: 1024 * 1024, // 1MB
  chunkSize: 1000,
  chunkOverlap: 200,
  similarResults: 5,
  logLevel: 'info',
};

// ============================================================================
// FILE SCHEMA
// ============================================================================

const embeddingFileSchema = z
  .object({
    provider: z.enum(['auto', 'openai', 'local', 'none']),
    apiKey: z.string(),
    model: z.string().min(1),
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
    dimensions: z.number().int().positive(),
    batchSize: z.number().int().positive(),
  })
  .partial();

const generationFileSchema = z
  .object({
    provider: z.enum(['auto', 'groq', 'none']),
    apiKey: z.string(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0),
  })
  .partial();

const configFileSchema = z
  .object({
    repoPath: z.string().min(1),
    storagePath: z.string().min(1),
    cloneDir: z.string().min(1),
    cloneTimeoutMs: z.number().int().positive(),
    codeExtensions: z.array(z.string().min(1)),
    ignoreDirs: z.array(z.string().min(1)),
    maxFileSize: z.number().int().positive(),
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().min(0),
    similarResults: z.number().int().positive(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
    embedding: embeddingFileSchema,
    generation: generationFileSchema,
  })
  .partial();

/**
 * Read a YAML configuration file. Unknown keys are ignored with a warning,
 * anything else that does not validate raises ConfigurationError.
 */
export async function loadConfigFile(
  filePath: string,
  logger: Logger = createConsoleLogger('warn', 'config')
): Promise<ReviewEngineConfigInput> {
  let raw: unknown;
  try {
    raw = yaml.load(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${errorMessage(error)}`);
  }

  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a mapping`);
  }

  const known = new Set(Object.keys(configFileSchema.shape));
  for (const key of Object.keys(raw)) {
    if (!known.has(key)) {
      logger.warn(`Ignoring unknown config key "${key}" in ${filePath}`);
    }
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config file ${filePath}: ${details}`);
  }
  return parsed.data;
}

/**
 * Pick the recognised variables out of an environment map.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ReviewEngineConfigInput {
  const input: ReviewEngineConfigInput = {};

  const groqKey = env['GROQ_API_KEY'];
  if (groqKey) {
    input.generation = { apiKey: groqKey };
  }

  const embeddingKey = env['EMBEDDING_API_KEY'] || env['OPENAI_API_KEY'];
  if (embeddingKey) {
    input.embedding = { apiKey: embeddingKey };
  }

  const storage = env['REVIEW_ENGINE_STORAGE'];
  if (storage) {
    input.storagePath = storage;
  }

  const level = env['REVIEW_ENGINE_LOG_LEVEL'];
  if (level) {
    if (!isLogLevel(level)) {
      throw new ConfigurationError(
        `REVIEW_ENGINE_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${level}"`
      );
    }
    input.logLevel = level;
  }

  return input;
}

function mergeInputs(base: ReviewEngineConfigInput, next: ReviewEngineConfigInput): ReviewEngineConfigInput {
  return {
    ...base,
    ...next,
    embedding: { ...base.embedding, ...next.embedding },
    generation: { ...base.generation, ...next.generation },
  };
}

/**
 * Build a complete, validated configuration from a partial one.
 */
export function createConfig(input: ReviewEngineConfigInput = {}): ReviewEngineConfig {
  const storagePath = input.storagePath ?? DEFAULTS.storagePath;
  const logLevel = input.logLevel ?? DEFAULTS.logLevel;

  const config: ReviewEngineConfig = {
    repoPath: input.repoPath ?? DEFAULTS.repoPath,
    storagePath,
    cloneDir: input.cloneDir ?? path.join(path.dirname(path.resolve(storagePath)), 'repo_clone'),
    cloneTimeoutMs: input.cloneTimeoutMs ?? DEFAULTS.cloneTimeoutMs,
    codeExtensions: (input.codeExtensions ?? [...DEFAULT_CODE_EXTENSIONS]).map(ext => ext.toLowerCase()),
    ignoreDirs: input.ignoreDirs ?? [...DEFAULT_IGNORE_DIRS],
    maxFileSize: input.maxFileSize ?? DEFAULTS.maxFileSize,
    chunkSize: input.chunkSize ?? DEFAULTS.chunkSize,
    chunkOverlap: input.chunkOverlap ?? DEFAULTS.chunkOverlap,
    similarResults: input.similarResults ?? DEFAULTS.similarResults,
    logLevel,
    embedding: { ...DEFAULT_EMBEDDING, ...input.embedding },
    generation: { ...DEFAULT_GENERATION, ...input.generation },
    logger: input.logger ?? createConsoleLogger(logLevel),
  };

  validateConfig(config);
  return config;
}

function validateConfig(config: ReviewEngineConfig): void {
  const positive: Array<[string, number]> = [
    ['cloneTimeoutMs', config.cloneTimeoutMs],
    ['maxFileSize', config.maxFileSize],
    ['chunkSize', config.chunkSize],
    ['similarResults', config.similarResults],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
    }
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    throw new ConfigurationError(`chunkOverlap must be a non-negative integer, got ${config.chunkOverlap}`);
  }
  if (config.chunkOverlap >= config.chunkSize) {
    throw new ConfigurationError(
      `chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`
    );
  }
  if (config.codeExtensions.length === 0) {
    throw new ConfigurationError('codeExtensions must not be empty');
  }
}

export interface ResolveConfigOptions {
  file?: ReviewEngineConfigInput;
  env?: NodeJS.ProcessEnv;
  overrides?: ReviewEngineConfigInput;
}

/**
 * Merge defaults <- file <- env <- overrides into one configuration value.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): ReviewEngineConfig {
  let input: ReviewEngineConfigInput = {};
  if (options.file) input = mergeInputs(input, options.file);
  if (options.env) input = mergeInputs(input, configFromEnv(options.env));
  if (options.overrides) input = mergeInputs(input, options.overrides);
  return createConfig(input);
}
