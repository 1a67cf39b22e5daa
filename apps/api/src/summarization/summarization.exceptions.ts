import { PipelineException } from '../common/pipeline.exception';

export abstract class SummarizationException extends PipelineException {}

/** Network failure, timeout or 5xx from the model endpoint. */
export class RemoteUnavailableException extends SummarizationException {
  readonly code = 'REMOTE_UNAVAILABLE' as const;
  readonly retryable = true;

  constructor(detail: string, cause?: unknown) {
    super(`Remote model unavailable: ${detail}`, cause);
  }
}

/** The endpoint asked the caller to back off (HTTP 429 / quota). */
export class RateLimitedException extends SummarizationException {
  readonly code = 'RATE_LIMITED' as const;
  readonly retryable = true;

  constructor(detail: string, cause?: unknown) {
    super(`Rate limited by remote model: ${detail}`, cause);
  }
}

/** Empty or malformed model output, or a request the endpoint rejected. */
export class InvalidModelResponseException extends SummarizationException {
  readonly code = 'INVALID_RESPONSE' as const;
  readonly retryable = false;

  constructor(detail: string, cause?: unknown) {
    super(`Invalid model response: ${detail}`, cause);
  }
}

/** Missing or rejected credentials; needs operator action. */
export class ModelAuthException extends SummarizationException {
  readonly code = 'AUTH_ERROR' as const;
  readonly retryable = false;

  constructor(detail: string, cause?: unknown) {
    super(`Authentication failed for remote model: ${detail}`, cause);
  }
}
