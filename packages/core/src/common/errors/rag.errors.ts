import { BaseError } from './base.error.js';
import { ErrorMetadata, ErrorType } from './error.type.js';

export class ConfigurationError extends BaseError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(ErrorType.CONFIGURATION_ERROR, message, metadata);
  }
}

export class DimensionMismatchError extends BaseError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    metadata?: ErrorMetadata
  ) {
    super(
      ErrorType.DIMENSION_MISMATCH_ERROR,
      `Vector dimension mismatch: expected ${expected}, got ${actual}`,
      metadata
    );
  }
}

export class DuplicateDocumentError extends BaseError {
  constructor(
    public readonly documentId: string,
    metadata?: ErrorMetadata
  ) {
    super(
      ErrorType.DUPLICATE_DOCUMENT_ERROR,
      `Document ${documentId} is already indexed`,
      { documentId, ...metadata }
    );
  }
}

export class EmptyIndexError extends BaseError {
  constructor(metadata?: ErrorMetadata) {
    super(ErrorType.EMPTY_INDEX_ERROR, 'Vector index has no entries', metadata);
  }
}

export class DocumentNotFoundError extends BaseError {
  constructor(
    public readonly documentId: string,
    metadata?: ErrorMetadata
  ) {
    super(
      ErrorType.DOCUMENT_NOT_FOUND_ERROR,
      `Document ${documentId} not found`,
      { documentId, ...metadata }
    );
  }
}

export class EmbeddingUnavailableError extends BaseError {
  constructor(message: string, cause?: unknown, metadata?: ErrorMetadata) {
    super(ErrorType.EMBEDDING_UNAVAILABLE_ERROR, message, metadata, {
      cause,
      retryable: true,
    });
  }
}

export class SynthesisError extends BaseError {
  constructor(message: string, cause?: unknown, metadata?: ErrorMetadata) {
    super(ErrorType.SYNTHESIS_ERROR, message, metadata, {
      cause,
      retryable: true,
    });
  }
}

/**
 * Cleanup after a failed ingest did not complete; the index may still hold
 * part of the document.
 */
export class RollbackError extends BaseError {
  constructor(
    public readonly documentId: string,
    public readonly originalError: unknown,
    public readonly rollbackFailure: unknown
  ) {
    super(
      ErrorType.ROLLBACK_ERROR,
      `Rollback of document ${documentId} failed`,
      { documentId },
      { cause: rollbackFailure }
    );
  }
}
