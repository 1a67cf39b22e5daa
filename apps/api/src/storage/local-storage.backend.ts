import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, stat, unlink, writeFile } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve } from 'path';
import { describeError } from '../common/pipeline.exception';
import {
  StorageBackend,
  StoredFileMetadata,
} from './storage-backend.interface';
import { buildStorageKey } from './storage-key';
import {
  StorageNotFoundException,
  StorageUnavailableException,
} from './storage.exceptions';

/** errno codes meaning "nothing stored here" */
const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR']);

// Checked by shape: errors raised in another realm fail instanceof Error
function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * LocalStorageBackend — stores blobs as files below a root directory.
 *
 * The locator is the storage key relative to the root. Writes land in a
 * temp file first and are renamed into place, so a reader never sees a
 * half-written file.
 */
export class LocalStorageBackend implements StorageBackend {
  readonly kind = 'local' as const;

  private readonly logger = new Logger(LocalStorageBackend.name);
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = resolve(rootDir);
  }

  async put(bytes: Buffer, metadata: StoredFileMetadata): Promise<string> {
    const locator = buildStorageKey(metadata.documentId, metadata.fileName);
    const target = this.resolveLocator(locator);
    const tempPath = `${target}.${randomUUID()}.tmp`;

    this.logger.debug(`Writing ${locator} (${bytes.length} bytes)`);

    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(tempPath, bytes);
      await rename(tempPath, target);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        this.logger.debug(
          `No temp file to remove for ${locator}: ${describeError(cleanupError)}`,
        );
      });
      throw new StorageUnavailableException('put', locator, toError(error));
    }

    this.logger.log(`Stored "${locator}" (${bytes.length} bytes)`);
    return locator;
  }

  async get(locator: string): Promise<Buffer> {
    const path = this.resolveLocator(locator);

    try {
      return await readFile(path);
    } catch (error) {
      const code = errnoCode(error);
      if (code && NOT_FOUND_CODES.has(code)) {
        throw new StorageNotFoundException(locator);
      }
      throw new StorageUnavailableException('get', locator, toError(error));
    }
  }

  async exists(locator: string): Promise<boolean> {
    let path: string;
    try {
      path = this.resolveLocator(locator);
    } catch {
      return false;
    }

    try {
      const stats = await stat(path);
      return stats.isFile();
    } catch (error) {
      const code = errnoCode(error);
      if (code && NOT_FOUND_CODES.has(code)) {
        return false;
      }
      throw new StorageUnavailableException('exists', locator, toError(error));
    }
  }

  /**
   * Maps a locator to an absolute path inside the root. Locators that
   * would resolve outside it are treated as unknown.
   */
  private resolveLocator(locator: string): string {
    const path = resolve(this.root, locator);
    const rel = relative(this.root, path);

    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new StorageNotFoundException(locator);
    }
    return path;
  }
}
