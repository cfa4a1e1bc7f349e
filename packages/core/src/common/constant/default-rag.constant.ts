import { RagConfig } from '../../types/rag/ragConfig.js';

export const DEFAULT_CHUNK_SIZE_TOKENS = 500;
export const DEFAULT_OVERLAP_TOKENS = 50;
export const DEFAULT_MAX_CHUNKS_FOR_CONTEXT = 5;

export const DEFAULT_RAG_CONFIG: RagConfig = {
  chunkSizeTokens: DEFAULT_CHUNK_SIZE_TOKENS,
  overlapTokens: DEFAULT_OVERLAP_TOKENS,
  maxChunksForContext: DEFAULT_MAX_CHUNKS_FOR_CONTEXT,
  maxContextTokens: 3000,
  snippetLength: 200,
  embeddingBatchSize: 64,
  similarityMetric: 'cosine',
  tokenizer: 'tiktoken',
  retry: {
    attempts: 2,
    baseDelayMs: 250,
  },
};
