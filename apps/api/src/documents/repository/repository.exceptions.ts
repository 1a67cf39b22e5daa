import { PipelineException } from '../../common/pipeline.exception';

/**
 * The document store could not be reached. Aborts the current attempt
 * without recording a failure, since that write cannot be trusted either.
 */
export class RepositoryUnavailableException extends PipelineException {
  readonly code = 'REPOSITORY_UNAVAILABLE' as const;
  readonly retryable = true;

  constructor(operation: string, cause: Error) {
    super(`Document repository unavailable during ${operation}: ${cause.message}`, cause);
  }
}
