import { Inject, Injectable } from '@nestjs/common';
import {
  BaseError,
  ChunkRepository,
  EmbeddingClient,
  EmbeddingUnavailableError,
  EmptyIndexError,
  RagConfig,
  RetrievedChunk,
  SearchHit,
  VectorIndex,
  logger,
} from '@docqa/core';
import {
  CHUNK_REPOSITORY,
  EMBEDDING_CLIENT,
  RAG_CONFIG,
  VECTOR_INDEX,
} from '../tokens.js';

@Injectable()
export class RetrieverService {
  constructor(
    @Inject(EMBEDDING_CLIENT) private readonly embeddings: EmbeddingClient,
    @Inject(VECTOR_INDEX) private readonly index: VectorIndex,
    @Inject(CHUNK_REPOSITORY) private readonly repository: ChunkRepository,
    @Inject(RAG_CONFIG) private readonly config: RagConfig
  ) {}

  /**
   * Rank the chunks closest to `question`, optionally within one document.
   * Best match first; an empty index yields no chunks.
   */
  async retrieve(
    question: string,
    k: number,
    documentId?: string
  ): Promise<RetrievedChunk[]> {
    const queryVector = await this.embedQuestion(question);

    let hits: SearchHit[];
    try {
      hits = await this.index.search(queryVector, k, documentId);
    } catch (err) {
      if (err instanceof EmptyIndexError) {
        logger.debug('Retrieval on an empty index');
        return [];
      }
      throw err;
    }

    const { minScore } = this.config;
    const seen = new Set<string>();
    const retrieved: RetrievedChunk[] = [];
    const titles = new Map<string, string | undefined>();

    for (const hit of hits) {
      if (seen.has(hit.chunkId)) {
        continue;
      }
      seen.add(hit.chunkId);
      if (minScore !== undefined && hit.score < minScore) {
        continue;
      }
      const chunk = await this.repository.getChunk(hit.chunkId);
      if (!chunk) {
        logger.warn(`Skipping stale index entry ${hit.chunkId}`);
        continue;
      }
      if (!titles.has(chunk.documentId)) {
        const document = await this.repository.getDocument(chunk.documentId);
        titles.set(chunk.documentId, document?.title);
      }
      retrieved.push({
        chunk,
        score: hit.score,
        documentTitle: titles.get(chunk.documentId),
      });
    }

    logger.debug(
      `Retrieved ${retrieved.length}/${hits.length} chunks` +
        (documentId ? ` in ${documentId}` : '')
    );
    return retrieved;
  }

  private async embedQuestion(question: string): Promise<number[]> {
    try {
      return await this.embeddings.embed(question);
    } catch (err) {
      if (err instanceof BaseError) {
        throw err;
      }
      throw new EmbeddingUnavailableError('Query embedding failed', err);
    }
  }
}
