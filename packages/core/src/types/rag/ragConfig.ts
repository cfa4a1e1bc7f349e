import { SimilarityMetric } from './vector.js';

export type TokenizerKind = 'tiktoken' | 'whitespace';

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

export interface RagConfig {
  chunkSizeTokens: number;
  overlapTokens: number;
  maxChunksForContext: number;
  maxContextTokens: number;
  snippetLength: number;
  embeddingBatchSize: number;
  minScore?: number;
  similarityMetric: SimilarityMetric;
  tokenizer: TokenizerKind;
  retry: RetryPolicy;
}
