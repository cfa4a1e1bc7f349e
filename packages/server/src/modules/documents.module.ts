import { Module, OnApplicationShutdown } from '@nestjs/common';
import { OpenAIEmbeddings, ChatOpenAI } from '@langchain/openai';
import { ChunkRepository, RagConfig, VectorIndex, logger } from '@docqa/core';
import { Postgres } from '@docqa/database';
import { ConfigModule } from '../../config/config.module.js';
import { ConfigurationService } from '../../config/configuration.js';
import { ChunkingService } from '../chunking/chunking.service.js';
import { Tokenizer, createTokenizer } from '../chunking/tokenizer.js';
import { DocumentsController } from '../controllers/documents.controller.js';
import { MetricsController } from '../controllers/metrics.controller.js';
import { EmbeddingsService } from '../embeddings/embeddings.service.js';
import {
  AnswerModelService,
  bindAnswerSchema,
} from '../llm/answer-model.service.js';
import { InMemoryChunkRepository } from '../repositories/in-memory-chunk.repository.js';
import { PgChunkRepository } from '../repositories/pg-chunk.repository.js';
import { RetrieverService } from '../retrieval/retriever.service.js';
import { RagOrchestrator } from '../services/rag.orchestrator.js';
import { AnswerSynthesizerService } from '../synthesis/answer-synthesizer.service.js';
import { InMemoryVectorIndex } from '../vector-store/in-memory-vector-index.js';
import { PgVectorIndex } from '../vector-store/pg-vector-index.js';
import {
  CHUNK_REPOSITORY,
  DATABASE,
  EMBEDDING_CLIENT,
  LANGUAGE_MODEL,
  RAG_CONFIG,
  TOKENIZER,
  VECTOR_INDEX,
} from '../tokens.js';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: RAG_CONFIG,
      inject: [ConfigurationService],
      useFactory: (config: ConfigurationService): RagConfig => config.rag,
    },
    {
      provide: TOKENIZER,
      inject: [ConfigurationService],
      useFactory: (config: ConfigurationService): Tokenizer =>
        createTokenizer(config.tokenizer),
    },
    {
      provide: EMBEDDING_CLIENT,
      inject: [ConfigurationService],
      useFactory: (config: ConfigurationService) => {
        const { apiKey, model, dimensions } = config.embedding;
        return new EmbeddingsService(
          new OpenAIEmbeddings({ apiKey, model, dimensions }),
          dimensions
        );
      },
    },
    {
      provide: LANGUAGE_MODEL,
      inject: [ConfigurationService],
      useFactory: (config: ConfigurationService) => {
        const { apiKey, model, temperature, maxTokens } = config.answerModel;
        return new AnswerModelService(
          bindAnswerSchema(
            new ChatOpenAI({ apiKey, model, temperature, maxTokens })
          )
        );
      },
    },
    {
      provide: DATABASE,
      inject: [ConfigurationService],
      useFactory: async (config: ConfigurationService): Promise<boolean> => {
        if (config.vectorStore !== 'postgres') {
          return false;
        }
        await Postgres.connect(config.database);
        logger.info('Connected to the database');
        return true;
      },
    },
    {
      provide: VECTOR_INDEX,
      inject: [ConfigurationService, DATABASE],
      useFactory: (
        config: ConfigurationService,
        connected: boolean
      ): VectorIndex => {
        const { dimensions } = config.embedding;
        return connected
          ? new PgVectorIndex(dimensions)
          : new InMemoryVectorIndex({ dimensions });
      },
    },
    {
      provide: CHUNK_REPOSITORY,
      inject: [DATABASE],
      useFactory: (connected: boolean): ChunkRepository =>
        connected ? new PgChunkRepository() : new InMemoryChunkRepository(),
    },
    ChunkingService,
    RetrieverService,
    AnswerSynthesizerService,
    RagOrchestrator,
  ],
  controllers: [DocumentsController, MetricsController],
  exports: [RagOrchestrator],
})
export class DocumentsModule implements OnApplicationShutdown {
  async onApplicationShutdown(): Promise<void> {
    await Postgres.shutdown();
  }
}
