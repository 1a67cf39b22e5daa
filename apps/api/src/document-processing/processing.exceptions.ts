import {
  PipelineException,
  describeError,
} from '../common/pipeline.exception';

/** Anything thrown mid-attempt that is not a known pipeline failure. */
export class UnexpectedProcessingException extends PipelineException {
  readonly code = 'UNEXPECTED_ERROR' as const;
  readonly retryable = true;

  constructor(cause: unknown) {
    super(`Unexpected processing error: ${describeError(cause)}`, cause);
  }
}

/** Recorded at startup for documents a previous process left in processing. */
export class ProcessingInterruptedException extends PipelineException {
  readonly code = 'PROCESSING_INTERRUPTED' as const;
  readonly retryable = true;

  constructor() {
    super(
      'Processing interrupted: the service stopped before the attempt finished',
    );
  }
}
