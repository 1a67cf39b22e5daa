import { PipelineException } from '../common/pipeline.exception';

export abstract class ExtractionException extends PipelineException {}

export class UnsupportedFormatException extends ExtractionException {
  readonly code = 'UNSUPPORTED_FORMAT' as const;
  readonly retryable = false;

  constructor(contentType: string, supported: readonly string[]) {
    super(
      `Unsupported format: content type "${contentType}" cannot be extracted (supported: ${supported.join(', ')})`,
    );
  }
}

export class CorruptInputException extends ExtractionException {
  readonly code = 'CORRUPT_INPUT' as const;
  readonly retryable = false;

  constructor(contentType: string, cause: Error) {
    super(
      `Corrupt input: could not parse ${contentType} content (${cause.message})`,
      cause,
    );
  }
}

export class EmptyResultException extends ExtractionException {
  readonly code = 'EMPTY_RESULT' as const;
  readonly retryable = false;

  constructor(contentType: string) {
    super(`Empty result: no extractable text found in ${contentType} content`);
  }
}
