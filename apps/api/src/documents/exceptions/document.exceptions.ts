import { HttpException, HttpStatus } from '@nestjs/common';
import { DocumentStatus } from '@papertrail/database';

/**
 * Thrown when no file is attached to the upload request.
 * Maps to HTTP 400 Bad Request.
 */
export class MissingFileException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: 'A non-empty file must be attached to the "file" multipart field',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the uploaded file exceeds the configured size limit.
 * Maps to HTTP 413 Content Too Large.
 */
export class FileTooLargeException extends HttpException {
  constructor(maxSizeMb: number) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        message: `File exceeds the maximum allowed size of ${maxSizeMb} MB`,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}

/**
 * Thrown when the id names no active (non-deleted) document.
 * Maps to HTTP 404 Not Found.
 */
export class DocumentNotFoundException extends HttpException {
  constructor(documentId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Document ${documentId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when a retry is requested for a document that is neither
 * failed nor processed. Maps to HTTP 409 Conflict.
 */
export class DocumentNotRetryableException extends HttpException {
  constructor(documentId: string, status: DocumentStatus) {
    super(
      {
        statusCode: HttpStatus.CONFLICT,
        error: 'Conflict',
        message: `Document ${documentId} is ${status}; only failed or processed documents can be retried`,
      },
      HttpStatus.CONFLICT,
    );
  }
}
