import { PipelineException } from '../common/pipeline.exception';

export abstract class StorageException extends PipelineException {}

/** The locator does not name stored bytes (or escapes the storage root). */
export class StorageNotFoundException extends StorageException {
  readonly code = 'STORAGE_NOT_FOUND' as const;
  readonly retryable = false;

  constructor(readonly locator: string) {
    super(`Stored file not found: "${locator}"`);
  }
}

/**
 * The storage medium could not be reached or refused the operation
 * (network, permissions, full disk, missing bucket).
 */
export class StorageUnavailableException extends StorageException {
  readonly code = 'STORAGE_UNAVAILABLE' as const;
  readonly retryable = true;

  constructor(operation: string, target: string, cause: Error) {
    super(
      `Storage backend unavailable during ${operation} of "${target}": ${cause.message}`,
      cause,
    );
  }
}
