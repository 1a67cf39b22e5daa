import { DocumentStatus } from '@papertrail/database';

/**
 * A document as listed by GET /documents and returned by the upload.
 * Processing results are fetched separately through the status route.
 */
export class DocumentResponseDto {
  documentId!: string;

  fileName!: string;

  /** Content type as received at upload */
  contentType!: string;

  sizeBytes!: number;

  /**
   * Where the bytes live in the configured storage backend.
   * Pattern: documents/{documentId}/{sanitized-filename}
   */
  storageLocator!: string;

  status!: DocumentStatus;

  /** Failure code of the last attempt, null unless status is failed */
  errorCode!: string | null;

  attemptCount!: number;

  /** ISO 8601 */
  createdAt!: string;

  /** ISO 8601 */
  updatedAt!: string;
}
