import { PipelineException } from './pipeline.exception';

/**
 * The caller (client disconnect, application shutdown) abandoned the
 * attempt before it finished.
 */
export class ProcessingCancelledException extends PipelineException {
  readonly code = 'PROCESSING_CANCELLED' as const;
  readonly retryable = true;

  constructor(reason: string) {
    super(`Processing cancelled: ${reason}`);
  }
}

/**
 * Throws the signal's reason when it is a ProcessingCancelledException,
 * otherwise a generic cancellation.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  throw reason instanceof ProcessingCancelledException
    ? reason
    : new ProcessingCancelledException('request aborted');
}
