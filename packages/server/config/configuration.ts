import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RagConfig, TokenizerKind, parseRagConfig } from '@docqa/core';
import type { DatabaseCredentials } from '@docqa/database';
import { envSchema, type EnvConfig } from './env.validation.js';

@Injectable()
export class ConfigurationService {
  private readonly logger = new Logger(ConfigurationService.name);
  private readonly config: EnvConfig;
  private readonly ragConfig: RagConfig;

  constructor(private configService: ConfigService) {
    const envVariables = Object.fromEntries(
      Object.keys(envSchema.innerType().shape).map((key) => [
        key,
        this.configService.get<string>(key),
      ])
    );

    const result = envSchema.safeParse(envVariables);

    if (!result.success) {
      const errorMessages = result.error.issues.map(
        (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
      );
      this.logger.error(
        `\n\nMissing or invalid environment variables:\n${errorMessages.join('\n')}\n\nPlease check your .env file and ensure all required variables are set.\n`
      );
      throw new Error(
        'Invalid environment variables. Check logs above for details.'
      );
    }

    this.config = result.data;
    this.ragConfig = parseRagConfig({
      chunkSizeTokens: this.config.CHUNK_SIZE_TOKENS,
      overlapTokens: this.config.OVERLAP_TOKENS,
      maxChunksForContext: this.config.MAX_CHUNKS_FOR_CONTEXT,
      maxContextTokens: this.config.MAX_CONTEXT_TOKENS,
      snippetLength: this.config.SNIPPET_LENGTH,
      embeddingBatchSize: this.config.EMBEDDING_BATCH_SIZE,
      minScore: this.config.MIN_SIMILARITY,
      similarityMetric: this.config.SIMILARITY_METRIC,
      tokenizer: this.config.TOKENIZER,
      retry: {
        attempts: this.config.RETRY_ATTEMPTS,
        baseDelayMs: this.config.RETRY_BASE_DELAY_MS,
      },
    });
  }

  get port(): number {
    return this.config.SERVER_PORT;
  }

  get nodeEnv(): string {
    return this.config.NODE_ENV;
  }

  get rag(): RagConfig {
    return this.ragConfig;
  }

  get tokenizer(): TokenizerKind {
    return this.ragConfig.tokenizer;
  }

  get vectorStore(): EnvConfig['VECTOR_STORE'] {
    return this.config.VECTOR_STORE;
  }

  get isDevelopment(): boolean {
    return this.config.NODE_ENV === 'development';
  }

  get isProduction(): boolean {
    return this.config.NODE_ENV === 'production';
  }

  get embedding() {
    return {
      apiKey: this.config.OPENAI_API_KEY,
      model: this.config.EMBEDDING_MODEL,
      dimensions: this.config.EMBEDDING_DIMENSIONS,
    };
  }

  get answerModel() {
    return {
      apiKey: this.config.OPENAI_API_KEY,
      model: this.config.ANSWER_MODEL,
      temperature: this.config.ANSWER_TEMPERATURE,
      maxTokens: this.config.ANSWER_MAX_TOKENS,
    };
  }

  get database(): DatabaseCredentials {
    return {
      host: this.config.POSTGRES_HOST,
      port: this.config.POSTGRES_PORT,
      user: this.config.POSTGRES_USER ?? '',
      password: this.config.POSTGRES_PASSWORD ?? '',
      database: this.config.POSTGRES_DB ?? '',
    };
  }
}
