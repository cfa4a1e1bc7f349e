export * from './documents.dto.js';
