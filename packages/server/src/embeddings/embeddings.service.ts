import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import {
  ConfigurationError,
  EmbeddingClient,
  EmbeddingUnavailableError,
  logger,
  toError,
} from '@docqa/core';
import { metrics } from '@docqa/metrics';

/**
 * EmbeddingClient backed by a LangChain embeddings model
 * (`OpenAIEmbeddings` in production).
 */
export class EmbeddingsService implements EmbeddingClient {
  constructor(
    private readonly embeddings: EmbeddingsInterface,
    public readonly dimensions?: number
  ) {}

  async embed(text: string): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new ConfigurationError('Cannot embed empty text');
    }
    try {
      return await this.embeddings.embedQuery(text);
    } catch (err) {
      throw this.unavailable('Query embedding failed', err);
    }
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    // Chunks of pure whitespace are legitimate and are embedded as-is.
    if (texts.some((t) => t.length === 0)) {
      throw new ConfigurationError('All input texts must be non-empty');
    }

    let vectors: number[][];
    try {
      vectors = await this.embeddings.embedDocuments(texts);
    } catch (err) {
      throw this.unavailable('Embedding generation failed', err, {
        batchSize: texts.length,
      });
    }

    if (vectors.length !== texts.length) {
      throw this.unavailable(
        `Embedding service returned ${vectors.length} vectors for ${texts.length} texts`,
        undefined,
        { batchSize: texts.length, received: vectors.length }
      );
    }
    return vectors;
  }

  private unavailable(
    message: string,
    cause: unknown,
    metadata?: Record<string, unknown>
  ): EmbeddingUnavailableError {
    metrics.externalCallFailed('embedding');
    if (cause !== undefined) {
      logger.error(`${message}: ${toError(cause).message}`);
    } else {
      logger.error(message);
    }
    return new EmbeddingUnavailableError(message, cause, metadata);
  }
}
