/**
 * Capability selection. Runs once when the engine is built; everything
 * downstream only asks a backend whether it is `available`.
 */

import { ReviewEngineConfig } from '../config';
import {
  EmbeddingBackend,
  LocalHashEmbeddingBackend,
  NullEmbeddingBackend,
  OpenAIEmbeddingBackend,
} from './EmbeddingBackends';
import { GenerationBackend, GroqGenerationBackend, NullGenerationBackend } from './GenerationBackends';

export interface Backends {
  embedding: EmbeddingBackend;
  generation: GenerationBackend;
}

export function createEmbeddingBackend(config: ReviewEngineConfig): EmbeddingBackend {
  const { embedding, logger } = config;
  switch (embedding.provider) {
    case 'none':
      return new NullEmbeddingBackend();
    case 'local':
      return new LocalHashEmbeddingBackend(embedding.dimensions);
    case 'openai':
      if (!embedding.apiKey) {
        logger.warn('Embedding provider "openai" selected without an API key; similarity search disabled');
        return new NullEmbeddingBackend();
      }
      return new OpenAIEmbeddingBackend(embedding);
    case 'auto':
      return embedding.apiKey ? new OpenAIEmbeddingBackend(embedding) : new NullEmbeddingBackend();
  }
}

export function createGenerationBackend(config: ReviewEngineConfig): GenerationBackend {
  const { generation, logger } = config;
  if (generation.provider === 'none') {
    return new NullGenerationBackend();
  }
  if (!generation.apiKey) {
    if (generation.provider === 'groq') {
      logger.warn('Generation provider "groq" selected without an API key; generative review disabled');
    }
    return new NullGenerationBackend();
  }
  return new GroqGenerationBackend(generation, logger.child('groq'));
}

export function createBackends(config: ReviewEngineConfig): Backends {
  const backends = {
    embedding: createEmbeddingBackend(config),
    generation: createGenerationBackend(config),
  };
  config.logger.debug(
    `Backends: embedding=${backends.embedding.name} (${backends.embedding.model}), ` +
      `generation=${backends.generation.name} (${backends.generation.model})`
  );
  return backends;
}
