import { z } from 'zod';
import { ConfigurationError } from '../../common/errors/rag.errors.js';
import { DEFAULT_RAG_CONFIG } from '../../common/constant/default-rag.constant.js';
import { RagConfig } from '../../types/rag/ragConfig.js';
import { SIMILARITY_METRICS } from '../../types/rag/vector.js';

const positiveInteger = z.number().int().positive();
const nonNegativeInteger = z.number().int().min(0);

export const ChunkOptionsSchema = z
  .object({
    chunkSize: positiveInteger,
    overlap: positiveInteger,
  })
  .refine((options) => options.overlap < options.chunkSize, {
    message: 'overlap must be smaller than chunkSize',
    path: ['overlap'],
  });

export const RagConfigSchema = z
  .object({
    chunkSizeTokens: positiveInteger,
    overlapTokens: positiveInteger,
    maxChunksForContext: positiveInteger,
    maxContextTokens: positiveInteger,
    snippetLength: positiveInteger,
    embeddingBatchSize: positiveInteger,
    minScore: z.number().min(-1).max(1).optional(),
    similarityMetric: z.enum(SIMILARITY_METRICS),
    tokenizer: z.enum(['tiktoken', 'whitespace']),
    retry: z.object({
      attempts: nonNegativeInteger,
      baseDelayMs: nonNegativeInteger,
    }),
  })
  .refine((config) => config.overlapTokens < config.chunkSizeTokens, {
    message: 'overlapTokens must be smaller than chunkSizeTokens',
    path: ['overlapTokens'],
  });

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Merge `overrides` onto the defaults and validate the result.
 * @throws ConfigurationError when a constraint is violated
 */
export function parseRagConfig(overrides: Partial<RagConfig> = {}): RagConfig {
  const result = RagConfigSchema.safeParse({
    ...DEFAULT_RAG_CONFIG,
    ...overrides,
    retry: { ...DEFAULT_RAG_CONFIG.retry, ...overrides.retry },
  });
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid RAG configuration: ${formatIssues(result.error)}`
    );
  }
  return result.data;
}
