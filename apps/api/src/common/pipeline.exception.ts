/**
 * Machine-readable failure codes persisted on Document.errorCode.
 */
export type PipelineErrorCode =
  | 'STORAGE_NOT_FOUND'
  | 'STORAGE_UNAVAILABLE'
  | 'UNSUPPORTED_FORMAT'
  | 'CORRUPT_INPUT'
  | 'EMPTY_RESULT'
  | 'REMOTE_UNAVAILABLE'
  | 'RATE_LIMITED'
  | 'INVALID_RESPONSE'
  | 'AUTH_ERROR'
  | 'PROCESSING_CANCELLED'
  | 'PROCESSING_INTERRUPTED'
  | 'UNEXPECTED_ERROR'
  | 'REPOSITORY_UNAVAILABLE';

/**
 * Base class for every failure raised inside the processing pipeline.
 *
 * `retryable` tells an operator whether re-running the same input can
 * succeed once the environment recovers (network, quota) or whether the
 * input or configuration has to change first.
 */
export abstract class PipelineException extends Error {
  abstract readonly code: PipelineErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Renders any thrown value as a one-line message. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
