import {
  ConfigurationError,
  DimensionMismatchError,
  DuplicateDocumentError,
  EmptyIndexError,
  IndexStats,
  SearchHit,
  VectorEntry,
  VectorIndex,
  logger,
} from '@docqa/core';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import {
  assertFiniteVector,
  assertValidK,
  compareHits,
  cosineSimilarity,
  vectorNorm,
} from './similarity.js';

interface StoredEntry {
  documentId: string;
  chunkId: string;
  chunkIndex: number;
  vector: Float64Array;
  norm: number;
}

export interface InMemoryVectorIndexOptions {
  /** Fix the dimensionality up front instead of taking it from the first insert. */
  dimensions?: number;
}

/**
 * Exact cosine search over vectors held in process memory. Entries are
 * grouped per document so that a mutation only touches its own document;
 * norms are computed once, at insert.
 */
export class InMemoryVectorIndex implements VectorIndex {
  readonly metric = 'cosine' as const;
  private readonly documents = new Map<string, StoredEntry[]>();
  private readonly mutex = new KeyedMutex();
  private dimensions: number | null;
  private entryCount = 0;

  constructor(options: InMemoryVectorIndexOptions = {}) {
    this.dimensions = options.dimensions ?? null;
  }

  async insert(documentId: string, entries: VectorEntry[]): Promise<void> {
    await this.mutex.runExclusive(documentId, async () => {
      if (entries.length === 0) {
        return;
      }
      if (this.documents.has(documentId)) {
        throw new DuplicateDocumentError(documentId);
      }

      const dimensions = this.dimensions ?? entries[0].vector.length;
      const seen = new Set<string>();
      for (const entry of entries) {
        if (entry.documentId !== documentId) {
          throw new ConfigurationError(
            `Entry ${entry.chunkId} belongs to ${entry.documentId}, not ${documentId}`
          );
        }
        if (seen.has(entry.chunkId)) {
          throw new ConfigurationError(`Duplicate chunk id ${entry.chunkId}`);
        }
        seen.add(entry.chunkId);
        if (entry.vector.length !== dimensions) {
          throw new DimensionMismatchError(dimensions, entry.vector.length, {
            documentId,
            chunkId: entry.chunkId,
          });
        }
        assertFiniteVector(entry.vector, `Vector of ${entry.chunkId}`);
      }

      const stored = entries.map((entry) => {
        const vector = Float64Array.from(entry.vector);
        return {
          documentId,
          chunkId: entry.chunkId,
          chunkIndex: entry.chunkIndex,
          vector,
          norm: vectorNorm(vector),
        };
      });

      this.documents.set(documentId, stored);
      this.dimensions = dimensions;
      this.entryCount += stored.length;
      logger.debug(
        `[InMemoryVectorIndex] Inserted ${stored.length} entries for ${documentId}`
      );
    });
  }

  async remove(documentId: string): Promise<number> {
    return this.mutex.runExclusive(documentId, async () => {
      const existing = this.documents.get(documentId);
      if (!existing) {
        return 0;
      }
      this.documents.delete(documentId);
      this.entryCount -= existing.length;
      logger.debug(
        `[InMemoryVectorIndex] Removed ${existing.length} entries for ${documentId}`
      );
      return existing.length;
    });
  }

  async search(
    queryVector: number[],
    k: number,
    documentId?: string
  ): Promise<SearchHit[]> {
    assertValidK(k);
    if (this.entryCount === 0 || this.dimensions === null) {
      throw new EmptyIndexError();
    }
    if (queryVector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, queryVector.length);
    }
    assertFiniteVector(queryVector, 'Query vector');

    const candidates =
      documentId === undefined
        ? this.documents.values()
        : [this.documents.get(documentId) ?? []];
    const queryNorm = vectorNorm(queryVector);
    const top: SearchHit[] = [];

    for (const group of candidates) {
      for (const entry of group) {
        const hit: SearchHit = {
          documentId: entry.documentId,
          chunkId: entry.chunkId,
          chunkIndex: entry.chunkIndex,
          score: cosineSimilarity(
            queryVector,
            queryNorm,
            entry.vector,
            entry.norm
          ),
        };
        insertBounded(top, hit, k);
      }
    }

    return top;
  }

  async stats(): Promise<IndexStats> {
    return {
      documents: this.documents.size,
      entries: this.entryCount,
      dimensions: this.dimensions,
      approximateBytes:
        this.entryCount * (this.dimensions ?? 0) * Float64Array.BYTES_PER_ELEMENT,
    };
  }
}

/**
 * Keep `top` sorted by `compareHits` and no longer than `k`.
 */
function insertBounded(top: SearchHit[], hit: SearchHit, k: number): void {
  if (top.length === k && compareHits(hit, top[k - 1]) >= 0) {
    return;
  }
  let lo = 0;
  let hi = top.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compareHits(top[mid], hit) <= 0) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  top.splice(lo, 0, hit);
  if (top.length > k) {
    top.pop();
  }
}
