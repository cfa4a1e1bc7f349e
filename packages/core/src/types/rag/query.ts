import { Chunk } from './chunk.js';
import { IndexStats } from './vector.js';

export interface RetrievedChunk {
  chunk: Chunk;
  score: number;
  documentTitle?: string;
}

export interface Citation {
  documentId: string;
  chunkId: string;
  chunkIndex: number;
  score: number;
  snippet: string;
  pageNumbers?: number[];
}

export type ConfidenceSource = 'model' | 'similarity' | 'none';

export interface QueryResult {
  answer: string;
  confidence: number;
  confidenceSource: ConfidenceSource;
  reasoning?: string;
  citations: Citation[];
}

export interface QueryOptions {
  documentId?: string;
  k?: number;
}

export interface RagStats {
  totalDocuments: number;
  totalChunks: number;
  totalTokens: number;
  index: IndexStats;
}

export const NO_RELEVANT_CONTENT_ANSWER =
  'No relevant content was found to answer this question.';
