export {
  KnowledgeStore,
  KnowledgeStoreOptions,
  StoreLearnResult,
  StoreLoadResult,
  PATTERNS_FILE,
  INDEX_FILE,
} from './KnowledgeStore';
export { TextChunker, TextChunk, ChunkMetadata, ChunkerOptions } from './TextChunker';
export { VectorIndex, VectorIndexEntry, VectorIndexPayload, cosineSimilarity } from './VectorIndex';
export { serializePatterns, parsePatternDocument, ParsedPatternDocument } from './PatternDocument';
export { writeFileAtomic } from './atomicWrite';
