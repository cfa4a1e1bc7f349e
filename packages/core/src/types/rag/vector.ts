export interface VectorEntry {
  documentId: string;
  chunkId: string;
  chunkIndex: number;
  vector: number[];
}

export interface SearchHit {
  documentId: string;
  chunkId: string;
  chunkIndex: number;
  score: number;
}

export interface IndexStats {
  documents: number;
  entries: number;
  dimensions: number | null;
  approximateBytes: number;
}

export const SIMILARITY_METRICS = ['cosine'] as const;
export type SimilarityMetric = (typeof SIMILARITY_METRICS)[number];

/**
 * Embedding storage with k-nearest-neighbour search. Mutations of one
 * document id are serialized; searches may interleave with them.
 */
export interface VectorIndex {
  readonly metric: SimilarityMetric;
  insert(documentId: string, entries: VectorEntry[]): Promise<void>;
  remove(documentId: string): Promise<number>;
  search(
    queryVector: number[],
    k: number,
    documentId?: string
  ): Promise<SearchHit[]>;
  stats(): Promise<IndexStats>;
}
