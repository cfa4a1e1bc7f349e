export enum ErrorType {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  DIMENSION_MISMATCH_ERROR = 'DIMENSION_MISMATCH_ERROR',
  DUPLICATE_DOCUMENT_ERROR = 'DUPLICATE_DOCUMENT_ERROR',
  EMPTY_INDEX_ERROR = 'EMPTY_INDEX_ERROR',
  DOCUMENT_NOT_FOUND_ERROR = 'DOCUMENT_NOT_FOUND_ERROR',
  EMBEDDING_UNAVAILABLE_ERROR = 'EMBEDDING_UNAVAILABLE_ERROR',
  SYNTHESIS_ERROR = 'SYNTHESIS_ERROR',
  ROLLBACK_ERROR = 'ROLLBACK_ERROR',
}

export type ErrorMetadata = Record<string, unknown>;
