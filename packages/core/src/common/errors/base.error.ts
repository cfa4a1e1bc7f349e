import { ErrorMetadata, ErrorType } from './error.type.js';

export interface BaseErrorOptions {
  cause?: unknown;
  retryable?: boolean;
}

/**
 * Root of the error taxonomy. `retryable` marks failures of external
 * services that may succeed on a later attempt.
 */
export abstract class BaseError extends Error {
  public readonly type: ErrorType;
  public readonly retryable: boolean;
  public metadata: ErrorMetadata;

  constructor(
    type: ErrorType,
    message: string,
    metadata: ErrorMetadata = {},
    options: BaseErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.type = type;
    this.metadata = { ...metadata };
    this.retryable = options.retryable ?? false;
  }

  toJSON() {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      metadata: this.metadata,
    };
  }
}

/**
 * Merge contextual identifiers into a taxonomy error and hand it back
 * unchanged otherwise. Foreign errors are returned as-is.
 */
export function withErrorContext<E>(error: E, context: ErrorMetadata): E {
  if (error instanceof BaseError) {
    error.metadata = { ...context, ...error.metadata };
  }
  return error;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
