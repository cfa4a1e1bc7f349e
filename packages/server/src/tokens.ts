export const TOKENIZER = Symbol('TOKENIZER');
export const EMBEDDING_CLIENT = Symbol('EMBEDDING_CLIENT');
export const LANGUAGE_MODEL = Symbol('LANGUAGE_MODEL');
export const VECTOR_INDEX = Symbol('VECTOR_INDEX');
export const CHUNK_REPOSITORY = Symbol('CHUNK_REPOSITORY');
export const RAG_CONFIG = Symbol('RAG_CONFIG');
export const DATABASE = Symbol('DATABASE');
