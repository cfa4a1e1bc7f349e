import { z } from 'zod';
import { DEFAULT_RAG_CONFIG, SIMILARITY_METRICS } from '@docqa/core';

const optionalNumber = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.coerce.number().min(-1).max(1).optional()
);

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    SERVER_PORT: z.coerce.number().int().positive().default(3002),
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),

    CHUNK_SIZE_TOKENS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_RAG_CONFIG.chunkSizeTokens),
    OVERLAP_TOKENS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_RAG_CONFIG.overlapTokens),
    MAX_CHUNKS_FOR_CONTEXT: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_RAG_CONFIG.maxChunksForContext),
    MAX_CONTEXT_TOKENS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_RAG_CONFIG.maxContextTokens),
    SNIPPET_LENGTH: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_RAG_CONFIG.snippetLength),
    EMBEDDING_BATCH_SIZE: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_RAG_CONFIG.embeddingBatchSize),
    RETRY_ATTEMPTS: z.coerce
      .number()
      .int()
      .min(0)
      .default(DEFAULT_RAG_CONFIG.retry.attempts),
    RETRY_BASE_DELAY_MS: z.coerce
      .number()
      .int()
      .min(0)
      .default(DEFAULT_RAG_CONFIG.retry.baseDelayMs),
    MIN_SIMILARITY: optionalNumber,
    TOKENIZER: z
      .enum(['tiktoken', 'whitespace'])
      .default(DEFAULT_RAG_CONFIG.tokenizer),
    SIMILARITY_METRIC: z
      .enum(SIMILARITY_METRICS)
      .default(DEFAULT_RAG_CONFIG.similarityMetric),
    VECTOR_STORE: z.enum(['memory', 'postgres']).default('memory'),

    OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
    EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
    ANSWER_MODEL: z.string().default('gpt-4o'),
    ANSWER_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    ANSWER_MAX_TOKENS: z.coerce.number().int().positive().default(1000),

    POSTGRES_HOST: z.string().default('localhost'),
    POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
    POSTGRES_USER: z.string().optional(),
    POSTGRES_PASSWORD: z.string().optional(),
    POSTGRES_DB: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.VECTOR_STORE !== 'postgres') {
      return;
    }
    for (const key of [
      'POSTGRES_USER',
      'POSTGRES_PASSWORD',
      'POSTGRES_DB',
    ] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when VECTOR_STORE=postgres`,
        });
      }
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;
