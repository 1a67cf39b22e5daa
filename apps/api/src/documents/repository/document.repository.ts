import { Document, DocumentStatus } from '@papertrail/database';

export interface NewDocument {
  id: string;
  fileName: string;
  contentType: string;
  sizeBytes: number;
  storageLocator: string;
}

/**
 * Persistence boundary for Document records.
 *
 * Soft-deleted documents are invisible to every read here. Any failure of
 * the underlying store surfaces as RepositoryUnavailableException.
 */
export abstract class DocumentRepository {
  /** Inserts a PENDING document. */
  abstract create(fields: NewDocument): Promise<Document>;

  abstract load(id: string): Promise<Document | null>;

  /**
   * Writes the lifecycle fields of `document` (status, attempt results,
   * error, attempt count) if the stored row is still `expected` and not
   * soft-deleted. Upload fields and the deleted flag are never written.
   * Returns null when that condition no longer holds.
   */
  abstract saveTransition(
    document: Document,
    expected: DocumentStatus,
  ): Promise<Document | null>;

  /** All documents that are not soft-deleted, newest first. */
  abstract listActive(): Promise<Document[]>;

  abstract findByStatus(status: DocumentStatus): Promise<Document[]>;

  /**
   * Atomically moves the document to PROCESSING if its current status is
   * one of `from`, clearing the previous attempt's results. Returns the
   * claimed document, or null when another caller got there first or the
   * status does not allow it.
   */
  abstract claim(
    id: string,
    from: readonly DocumentStatus[],
  ): Promise<Document | null>;

  /** Returns false when no active document has this id. */
  abstract softDelete(id: string): Promise<boolean>;
}
