/**
 * Configuration tests: defaults, validation, environment and file layers.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { configFromEnv, createConfig, loadConfigFile, resolveConfig } from '../config';
import { ConfigurationError } from '../errors';
import { Logger, silentLogger } from '../logging';

class RecordingLogger implements Logger {
  warnings: string[] = [];
  debug(): void {}
  info(): void {}
  warn(message: string): void {
    this.warnings.push(message);
  }
  error(): void {}
  child(): Logger {
    return this;
  }
}

describe('createConfig', () => {
  test('fills defaults', () => {
    const config = createConfig({ logger: silentLogger });
    expect(config.storagePath).toBe('./knowledge');
    expect(config.cloneDir).toBe(path.join(process.cwd(), 'repo_clone'));
    expect(config.chunkSize).toBe(1000);
    expect(config.chunkOverlap).toBe(200);
    expect(config.similarResults).toBe(5);
    expect(config.maxFileSize).toBe(1024 * 1024);
    expect(config.cloneTimeoutMs).toBe(120000);
    expect(config.logLevel).toBe('info');
    expect(config.ignoreDirs).toEqual(['.git', 'node_modules', 'venv', '__pycache__', '.venv']);
    expect(config.embedding.provider).toBe('auto');
    expect(config.generation.model).toBe('llama-3.3-70b-versatile');
  });

  test('places clones beside the storage directory', () => {
    const config = createConfig({ storagePath: '/data/kb', logger: silentLogger });
    expect(config.cloneDir).toBe(path.join('/data', 'repo_clone'));
  });

  test('lowercases extensions and merges nested sections', () => {
    const config = createConfig({
      codeExtensions: ['.PY', '.ts'],
      embedding: { provider: 'local' },
      logger: silentLogger,
    });
    expect(config.codeExtensions).toEqual(['.py', '.ts']);
    expect(config.embedding.provider).toBe('local');
    expect(config.embedding.dimensions).toBe(256);
  });

  test('rejects invalid sizes', () => {
    expect(() => createConfig({ chunkSize: 0 })).toThrow('chunkSize must be a positive integer, got 0');
    expect(() => createConfig({ cloneTimeoutMs: 0 })).toThrow('cloneTimeoutMs must be a positive integer, got 0');
    expect(() => createConfig({ chunkOverlap: 1000 })).toThrow(
      'chunkOverlap (1000) must be smaller than chunkSize (1000)'
    );
    expect(() => createConfig({ chunkOverlap: -1 })).toThrow(ConfigurationError);
    expect(() => createConfig({ codeExtensions: [] })).toThrow('codeExtensions must not be empty');
  });
});

describe('configFromEnv', () => {
  test('picks recognised variables', () => {
    expect(
      configFromEnv({
        GROQ_API_KEY: 'test-groq-key',
        OPENAI_API_KEY: 'test-openai-key',
        REVIEW_ENGINE_STORAGE: '/tmp/kb',
        REVIEW_ENGINE_LOG_LEVEL: 'debug',
        UNRELATED: 'x',
      })
    ).toEqual({
      generation: { apiKey: 'test-groq-key' },
      embedding: { apiKey: 'test-openai-key' },
      storagePath: '/tmp/kb',
      logLevel: 'debug',
    });
  });

  test('the dedicated embedding key wins over the OpenAI key', () => {
    expect(configFromEnv({ EMBEDDING_API_KEY: 'test-embed', OPENAI_API_KEY: 'test-openai' }).embedding).toEqual({
      apiKey: 'test-embed',
    });
  });

  test('rejects an unknown log level', () => {
    expect(() => configFromEnv({ REVIEW_ENGINE_LOG_LEVEL: 'loud' })).toThrow(
      'REVIEW_ENGINE_LOG_LEVEL must be one of debug, info, warn, error, silent, got "loud"'
    );
  });
});

describe('resolveConfig', () => {
  test('overrides beat the environment, which beats the file', () => {
    const file = { storagePath: 'from-file', chunkSize: 500, chunkOverlap: 50, embedding: { model: 'file-model' } };
    const env = { REVIEW_ENGINE_STORAGE: 'from-env', OPENAI_API_KEY: 'test-key' };

    const withOverrides = resolveConfig({ file, env, overrides: { storagePath: 'from-cli', logger: silentLogger } });
    expect(withOverrides.storagePath).toBe('from-cli');
    expect(withOverrides.chunkSize).toBe(500);
    expect(withOverrides.embedding.model).toBe('file-model');
    expect(withOverrides.embedding.apiKey).toBe('test-key');

    expect(resolveConfig({ file, env, overrides: { logger: silentLogger } }).storagePath).toBe('from-env');
    expect(resolveConfig({ file, overrides: { logger: silentLogger } }).storagePath).toBe('from-file');
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'review-engine-config-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(name: string, content: string): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, content);
    return filePath;
  }

  test('reads known keys and warns about unknown ones', async () => {
    const filePath = await writeConfig(
      'known.yaml',
      'storagePath: kb\nsimilarResults: 3\ncloneTimeoutMs: 30000\nembedding:\n  provider: local\ncolour: blue\n'
    );
    const logger = new RecordingLogger();
    expect(await loadConfigFile(filePath, logger)).toEqual({
      storagePath: 'kb',
      similarResults: 3,
      cloneTimeoutMs: 30000,
      embedding: { provider: 'local' },
    });
    expect(logger.warnings).toEqual([`Ignoring unknown config key "colour" in ${filePath}`]);
  });

  test('an empty file is an empty layer', async () => {
    expect(await loadConfigFile(await writeConfig('empty.yaml', ''), silentLogger)).toEqual({});
  });

  test('invalid values raise ConfigurationError', async () => {
    const filePath = await writeConfig('invalid.yaml', 'chunkSize: -1\n');
    await expect(loadConfigFile(filePath, silentLogger)).rejects.toThrow(
      `Invalid config file ${filePath}: chunkSize: Number must be greater than 0`
    );
  });

  test('a list is not a configuration', async () => {
    const filePath = await writeConfig('list.yaml', '- a\n- b\n');
    await expect(loadConfigFile(filePath, silentLogger)).rejects.toThrow(
      `Config file ${filePath} must contain a mapping`
    );
  });

  test('a missing file raises ConfigurationError', async () => {
    await expect(loadConfigFile(path.join(dir, 'missing.yaml'), silentLogger)).rejects.toThrow(ConfigurationError);
  });
});
