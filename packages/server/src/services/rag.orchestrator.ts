import { Inject, Injectable } from '@nestjs/common';
import {
  Chunk,
  ChunkDraft,
  ChunkOptions,
  ChunkRepository,
  Document,
  DocumentNotFoundError,
  DocumentWithChunks,
  DuplicateDocumentError,
  EmbeddingClient,
  EmbeddingUnavailableError,
  ExtractedText,
  IngestOptions,
  IngestSource,
  QueryOptions,
  QueryResult,
  RagConfig,
  RagStats,
  RollbackError,
  VectorEntry,
  VectorIndex,
  chunkIdFor,
  logger,
  toError,
  withErrorContext,
} from '@docqa/core';
import { metrics } from '@docqa/metrics';
import { ChunkingService } from '../chunking/chunking.service.js';
import { RetrieverService } from '../retrieval/retriever.service.js';
import { AnswerSynthesizerService } from '../synthesis/answer-synthesizer.service.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { withRetry } from '../utils/retry.js';
import {
  CHUNK_REPOSITORY,
  EMBEDDING_CLIENT,
  RAG_CONFIG,
  VECTOR_INDEX,
} from '../tokens.js';

function toExtractedText(source: IngestSource): ExtractedText {
  return typeof source === 'string' ? { text: source } : source;
}

/**
 * Entry point of the RAG pipeline. Ingests are all-or-nothing: a failure
 * after chunking removes whatever reached the index and the repository
 * before the original error is rethrown.
 */
@Injectable()
export class RagOrchestrator {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly chunking: ChunkingService,
    private readonly retriever: RetrieverService,
    private readonly synthesizer: AnswerSynthesizerService,
    @Inject(EMBEDDING_CLIENT) private readonly embeddings: EmbeddingClient,
    @Inject(VECTOR_INDEX) private readonly index: VectorIndex,
    @Inject(CHUNK_REPOSITORY) private readonly repository: ChunkRepository,
    @Inject(RAG_CONFIG) private readonly config: RagConfig
  ) {}

  async ingest(
    documentId: string,
    source: IngestSource,
    options: IngestOptions = {},
    signal?: AbortSignal
  ): Promise<Document> {
    return this.locks.runExclusive(documentId, () =>
      this.ingestExclusive(documentId, toExtractedText(source), options, signal)
    );
  }

  async query(
    question: string,
    { documentId, k = this.config.maxChunksForContext }: QueryOptions = {},
    signal?: AbortSignal
  ): Promise<QueryResult> {
    const scope = documentId ? 'document' : 'all';
    return metrics.queryResponseTimeMeasure(scope, async () => {
      try {
        const ranked = await this.retry(
          () => this.retriever.retrieve(question, k, documentId),
          signal
        );
        signal?.throwIfAborted();
        return await this.retry(
          () => this.synthesizer.synthesize(question, ranked),
          signal
        );
      } catch (err) {
        logger.error(`Query failed: ${toError(err).message}`);
        throw withErrorContext(
          err,
          documentId ? { question, documentId } : { question }
        );
      }
    });
  }

  async delete(documentId: string): Promise<{ deleted: boolean }> {
    return this.locks.runExclusive(documentId, async () => {
      const removed = await this.index.remove(documentId);
      const existed = await this.repository.delete(documentId);
      const deleted = removed > 0 || existed;
      if (deleted) {
        metrics.documentDeleted();
        logger.info(`Deleted document ${documentId} (${removed} vectors)`);
      }
      return { deleted };
    });
  }

  async stats(): Promise<RagStats> {
    const [totals, index] = await Promise.all([
      this.repository.stats(),
      this.index.stats(),
    ]);
    return {
      totalDocuments: totals.documents,
      totalChunks: totals.chunks,
      totalTokens: totals.tokens,
      index,
    };
  }

  async listDocuments(): Promise<Document[]> {
    return this.repository.listDocuments();
  }

  async getDocument(documentId: string): Promise<DocumentWithChunks> {
    const document = await this.repository.getDocument(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }
    return { ...document, chunks: await this.repository.getChunks(documentId) };
  }

  private async ingestExclusive(
    documentId: string,
    source: ExtractedText,
    options: IngestOptions,
    signal?: AbortSignal
  ): Promise<Document> {
    if (await this.repository.getDocument(documentId)) {
      throw new DuplicateDocumentError(documentId);
    }

    const chunkOptions: ChunkOptions = {
      chunkSize: options.chunkSizeTokens ?? this.config.chunkSizeTokens,
      overlap: options.overlapTokens ?? this.config.overlapTokens,
    };
    const drafts = source.pages?.length
      ? this.chunking.chunkPages(source.pages, chunkOptions)
      : this.chunking.chunkText(source.text, chunkOptions);
    const chunks = drafts.map((draft) => this.toChunk(documentId, draft));

    const document: Document = {
      id: documentId,
      title: options.title ?? documentId,
      chunkCount: chunks.length,
      tokenCount: chunks.length ? chunks[chunks.length - 1].endToken : 0,
      pageCount: source.pageCount ?? source.pages?.length ?? 1,
      createdAt: new Date().toISOString(),
    };
    logger.debug(`Chunked ${documentId} into ${chunks.length} chunks`);

    try {
      signal?.throwIfAborted();
      if (chunks.length > 0) {
        const vectors = await this.embedChunks(chunks, signal);
        signal?.throwIfAborted();
        const entries: VectorEntry[] = chunks.map((chunk, idx) => ({
          documentId,
          chunkId: chunk.id,
          chunkIndex: chunk.chunkIndex,
          vector: vectors[idx],
        }));
        await this.index.insert(documentId, entries);
        signal?.throwIfAborted();
      }
      await this.repository.save(document, chunks);
    } catch (err) {
      if (err instanceof DuplicateDocumentError) {
        // entries belong to an earlier ingest
        metrics.documentIngested('failure');
        throw err;
      }
      await this.rollback(documentId, err);
      metrics.documentIngested('failure');
      logger.error(`Ingest of ${documentId} failed: ${toError(err).message}`);
      throw withErrorContext(err, { documentId });
    }

    metrics.documentIngested('success', chunks.length);
    logger.info(
      `Ingested document ${documentId}: ${chunks.length} chunks, ${document.tokenCount} tokens`
    );
    return document;
  }

  private async embedChunks(
    chunks: Chunk[],
    signal?: AbortSignal
  ): Promise<number[][]> {
    const { embeddingBatchSize } = this.config;
    const vectors: number[][] = [];

    for (let start = 0; start < chunks.length; start += embeddingBatchSize) {
      signal?.throwIfAborted();
      const batch = chunks
        .slice(start, start + embeddingBatchSize)
        .map((chunk) => chunk.text);
      const batchVectors = await this.retry(
        () => this.embeddings.embedBatch(batch),
        signal
      );
      if (batchVectors.length !== batch.length) {
        throw new EmbeddingUnavailableError(
          `Embedding service returned ${batchVectors.length} vectors for ${batch.length} texts`
        );
      }
      for (const vector of batchVectors) {
        vectors.push(vector);
      }
    }
    return vectors;
  }

  private async rollback(documentId: string, cause: unknown): Promise<void> {
    try {
      await this.index.remove(documentId);
      await this.repository.delete(documentId);
    } catch (rollbackFailure) {
      metrics.documentIngested('rollback_failed');
      logger.error(
        `Rollback of ${documentId} failed: ${toError(rollbackFailure).message}`
      );
      throw new RollbackError(documentId, cause, rollbackFailure);
    }
    logger.warn(`Rolled back partial ingest of ${documentId}`);
  }

  private retry<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(task, this.config.retry, {
      signal,
      onRetry: (error, attempt, delayMs) =>
        logger.warn(
          `Retrying after ${toError(error).message} (attempt ${attempt}, in ${delayMs}ms)`
        ),
    });
  }

  private toChunk(documentId: string, draft: ChunkDraft): Chunk {
    return { ...draft, id: chunkIdFor(documentId, draft.chunkIndex), documentId };
  }
}
