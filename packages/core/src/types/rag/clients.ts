import { Chunk } from './chunk.js';
import { Document } from './document.js';

export interface EmbeddingClient {
  readonly dimensions?: number;
  embed(text: string): Promise<number[]>;
  /** Vectors come back in the order of `texts`. */
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface ContextChunk {
  chunkId: string;
  documentId: string;
  documentTitle?: string;
  text: string;
  pageNumbers?: number[];
}

export interface Generation {
  answer: string;
  confidence: number | null;
  reasoning?: string;
  /** Absent when the model did not report which context it relied on. */
  usedChunkIds?: string[];
}

export interface LanguageModelClient {
  generate(question: string, context: ContextChunk[]): Promise<Generation>;
}

export interface ChunkRepositoryStats {
  documents: number;
  chunks: number;
  tokens: number;
}

/**
 * Owner of documents and their chunks. The vector index only keeps weak
 * references (document id, chunk id) into this store.
 */
export interface ChunkRepository {
  save(document: Document, chunks: Chunk[]): Promise<void>;
  delete(documentId: string): Promise<boolean>;
  getDocument(documentId: string): Promise<Document | undefined>;
  getChunk(chunkId: string): Promise<Chunk | undefined>;
  getChunks(documentId: string): Promise<Chunk[]>;
  listDocuments(): Promise<Document[]>;
  stats(): Promise<ChunkRepositoryStats>;
}
