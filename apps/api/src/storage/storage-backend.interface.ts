/** Injection token for the StorageBackend selected at startup */
export const STORAGE_BACKEND = 'STORAGE_BACKEND';

export interface StoredFileMetadata {
  /** The owning document; the locator is derived from it */
  documentId: string;
  fileName: string;
  contentType: string;
}

/**
 * Byte-blob store shared by the upload path and the orchestrator.
 *
 * `put` for the same documentId always yields the same locator, so a
 * retried upload rewrites that document's bytes and nothing else.
 * `get` throws StorageNotFoundException for unknown locators and
 * StorageUnavailableException when the medium is unreachable.
 */
export interface StorageBackend {
  readonly kind: 'local' | 'object';
  put(bytes: Buffer, metadata: StoredFileMetadata): Promise<string>;
  get(locator: string): Promise<Buffer>;
  exists(locator: string): Promise<boolean>;
}
