export {
  ReviewEngineConfig,
  ReviewEngineConfigInput,
  EmbeddingConfig,
  EmbeddingProvider,
  GenerationConfig,
  GenerationProvider,
  ResolveConfigOptions,
  DEFAULT_CODE_EXTENSIONS,
  DEFAULT_IGNORE_DIRS,
  createConfig,
  resolveConfig,
  loadConfigFile,
  configFromEnv,
} from './ReviewEngineConfig';
