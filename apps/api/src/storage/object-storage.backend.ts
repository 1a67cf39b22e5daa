import { Logger } from '@nestjs/common';
import { Readable } from 'stream';
import {
  StorageBackend,
  StoredFileMetadata,
} from './storage-backend.interface';
import { buildStorageKey } from './storage-key';
import {
  StorageNotFoundException,
  StorageUnavailableException,
} from './storage.exceptions';

/**
 * The subset of the MinIO client this backend calls. `Minio.Client`
 * satisfies it; tests pass an in-memory fake.
 */
export interface ObjectStoreClient {
  putObject(
    bucketName: string,
    objectName: string,
    stream: Buffer,
    size: number,
    metaData: Record<string, string>,
  ): Promise<unknown>;
  getObject(bucketName: string, objectName: string): Promise<Readable>;
  statObject(bucketName: string, objectName: string): Promise<unknown>;
  bucketExists(bucketName: string): Promise<boolean>;
  makeBucket(bucketName: string, region: string): Promise<void>;
}

/** S3 error codes meaning "no such object" */
const NOT_FOUND_CODES = new Set(['NoSuchKey', 'NotFound']);

// Checked by shape: errors raised in another realm fail instanceof Error
function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/**
 * ObjectStorageBackend — stores blobs in an S3-compatible bucket (MinIO).
 *
 * The locator is the object key. A missing bucket is reported as
 * "unavailable" rather than "not found": it is a configuration problem,
 * not a property of one document.
 */
export class ObjectStorageBackend implements StorageBackend {
  readonly kind = 'object' as const;

  private readonly logger = new Logger(ObjectStorageBackend.name);

  constructor(
    private readonly client: ObjectStoreClient,
    private readonly bucket: string,
    private readonly region: string,
  ) {}

  /**
   * Creates the bucket if it does not exist yet. Failures are logged;
   * later calls then fail with StorageUnavailableException.
   */
  async ensureBucket(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, this.region);
        this.logger.log(`Created bucket "${this.bucket}"`);
      }
    } catch (error) {
      this.logger.error(
        `Failed to ensure bucket "${this.bucket}" exists: ${toError(error).message}`,
      );
    }
  }

  async put(bytes: Buffer, metadata: StoredFileMetadata): Promise<string> {
    const objectKey = buildStorageKey(metadata.documentId, metadata.fileName);

    this.logger.debug(`Uploading ${objectKey} (${bytes.length} bytes)`);

    try {
      await this.client.putObject(this.bucket, objectKey, bytes, bytes.length, {
        'Content-Type': metadata.contentType,
      });
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Failed to upload "${objectKey}": ${cause.message}`);
      throw new StorageUnavailableException('put', objectKey, cause);
    }

    this.logger.log(`Uploaded "${objectKey}" (${bytes.length} bytes)`);
    return objectKey;
  }

  async get(locator: string): Promise<Buffer> {
    try {
      const stream = await this.client.getObject(this.bucket, locator);
      return await readAll(stream);
    } catch (error) {
      const code = errorCode(error);
      if (code && NOT_FOUND_CODES.has(code)) {
        throw new StorageNotFoundException(locator);
      }
      throw new StorageUnavailableException('get', locator, toError(error));
    }
  }

  async exists(locator: string): Promise<boolean> {
    try {
      await this.client.statObject(this.bucket, locator);
      return true;
    } catch (error) {
      const code = errorCode(error);
      if (code && NOT_FOUND_CODES.has(code)) {
        return false;
      }
      throw new StorageUnavailableException('exists', locator, toError(error));
    }
  }
}
