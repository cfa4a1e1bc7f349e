import { Chunk } from './chunk.js';

export interface Document {
  id: string;
  title: string;
  chunkCount: number;
  tokenCount: number;
  pageCount: number;
  createdAt: string;
}

export interface DocumentWithChunks extends Document {
  chunks: Chunk[];
}

/**
 * Plain text handed over by an upstream extractor. When `pages` is present
 * it takes precedence over `text` and drives page numbering of chunks.
 */
export interface ExtractedText {
  text: string;
  pageCount?: number;
  pages?: string[];
}

export type IngestSource = string | ExtractedText;

export interface IngestOptions {
  title?: string;
  chunkSizeTokens?: number;
  overlapTokens?: number;
}
