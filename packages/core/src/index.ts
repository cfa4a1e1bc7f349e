import 'reflect-metadata';

export { default as logger } from './logger/logger.js';

export * from './common/errors/index.js';
export * from './common/constant/default-rag.constant.js';
export * from './common/server/dto/index.js';

export * from './types/rag/chunk.js';
export * from './types/rag/document.js';
export * from './types/rag/vector.js';
export * from './types/rag/query.js';
export * from './types/rag/clients.js';
export type * from './types/rag/ragConfig.js';

export {
  ChunkOptionsSchema,
  RagConfigSchema,
  parseRagConfig,
  formatIssues,
} from './config/rag/ragConfigSchema.js';
