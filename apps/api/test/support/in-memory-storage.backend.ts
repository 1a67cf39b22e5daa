import { buildStorageKey } from '../../src/storage/storage-key';
import {
  StorageBackend,
  StoredFileMetadata,
} from '../../src/storage/storage-backend.interface';
import {
  StorageNotFoundException,
  StorageUnavailableException,
} from '../../src/storage/storage.exceptions';

/** StorageBackend over a Map. `offline` fails every call as unreachable. */
export class InMemoryStorageBackend implements StorageBackend {
  readonly kind = 'local' as const;
  readonly blobs = new Map<string, Buffer>();
  offline = false;

  async put(bytes: Buffer, metadata: StoredFileMetadata): Promise<string> {
    const locator = buildStorageKey(metadata.documentId, metadata.fileName);
    this.assertOnline('put', locator);
    this.blobs.set(locator, Buffer.from(bytes));
    return locator;
  }

  async get(locator: string): Promise<Buffer> {
    this.assertOnline('get', locator);
    const bytes = this.blobs.get(locator);
    if (!bytes) {
      throw new StorageNotFoundException(locator);
    }
    return Buffer.from(bytes);
  }

  async exists(locator: string): Promise<boolean> {
    this.assertOnline('exists', locator);
    return this.blobs.has(locator);
  }

  private assertOnline(operation: string, target: string): void {
    if (this.offline) {
      throw new StorageUnavailableException(
        operation,
        target,
        new Error('connect ECONNREFUSED 127.0.0.1:9000'),
      );
    }
  }
}
