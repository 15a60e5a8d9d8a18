/**
 * Pluggable model backends: embeddings for retrieval, generation for the
 * optional generative review pass.
 */

export {
  AIClient,
  AIClientConfig,
  AIResponse,
  AIStats,
  ChatCompletion,
  ChatCompletionFn,
  ChatRequest,
  groqChatCompletion,
} from './AIClient';
export {
  EmbeddingBackend,
  NullEmbeddingBackend,
  OpenAIEmbeddingBackend,
  LocalHashEmbeddingBackend,
} from './EmbeddingBackends';
export { GenerationBackend, NullGenerationBackend, GroqGenerationBackend } from './GenerationBackends';
export { Backends, createBackends, createEmbeddingBackend, createGenerationBackend } from './createBackends';
