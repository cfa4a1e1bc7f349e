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
import { vectors } from '@docqa/database';
import { metrics } from '@docqa/metrics';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { assertFiniteVector, assertValidK } from './similarity.js';

/**
 * Vector index backed by PostgreSQL + pgvector. The column type pins the
 * dimensionality, so it is fixed at construction.
 */
export class PgVectorIndex implements VectorIndex {
  readonly metric = 'cosine' as const;
  private readonly mutex = new KeyedMutex();

  constructor(private readonly dimensions: number) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ConfigurationError(
        `Embedding dimensions must be a positive integer, got ${dimensions}`
      );
    }
  }

  private async ready(): Promise<void> {
    await vectors.init(this.dimensions);
  }

  async insert(documentId: string, entries: VectorEntry[]): Promise<void> {
    await this.mutex.runExclusive(documentId, async () => {
      if (entries.length === 0) {
        return;
      }
      for (const entry of entries) {
        if (entry.documentId !== documentId) {
          throw new ConfigurationError(
            `Entry ${entry.chunkId} belongs to ${entry.documentId}, not ${documentId}`
          );
        }
        if (entry.vector.length !== this.dimensions) {
          throw new DimensionMismatchError(
            this.dimensions,
            entry.vector.length,
            { documentId, chunkId: entry.chunkId }
          );
        }
        assertFiniteVector(entry.vector, `Vector of ${entry.chunkId}`);
      }

      await this.ready();
      const existing = await vectors.countForDocument(documentId);
      if (existing > 0) {
        throw new DuplicateDocumentError(documentId);
      }

      await metrics.dbResponseTime('vectors.insert', () =>
        vectors.insert(
          entries.map((entry) => ({
            chunk_id: entry.chunkId,
            document_id: documentId,
            chunk_index: entry.chunkIndex,
            embedding: entry.vector,
          }))
        )
      );
      logger.debug(
        `[PgVectorIndex] Inserted ${entries.length} entries for ${documentId}`
      );
    });
  }

  async remove(documentId: string): Promise<number> {
    return this.mutex.runExclusive(documentId, async () => {
      await this.ready();
      const removed = await metrics.dbResponseTime('vectors.delete', () =>
        vectors.deleteDocument(documentId)
      );
      logger.debug(
        `[PgVectorIndex] Removed ${removed} entries for ${documentId}`
      );
      return removed;
    });
  }

  async search(
    queryVector: number[],
    k: number,
    documentId?: string
  ): Promise<SearchHit[]> {
    assertValidK(k);
    await this.ready();
    const { entries } = await vectors.totals();
    if (entries === 0) {
      throw new EmptyIndexError();
    }
    if (queryVector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, queryVector.length);
    }
    assertFiniteVector(queryVector, 'Query vector');

    const rows = await metrics.dbResponseTime('vectors.search', () =>
      vectors.search(queryVector, k, documentId)
    );
    return rows.map((row) => ({
      documentId: row.document_id,
      chunkId: row.chunk_id,
      chunkIndex: row.chunk_index,
      score: Number(row.score),
    }));
  }

  async stats(): Promise<IndexStats> {
    await this.ready();
    const { entries, documents } = await vectors.totals();
    return {
      documents,
      entries,
      dimensions: this.dimensions,
      approximateBytes: entries * this.dimensions * 4,
    };
  }
}
