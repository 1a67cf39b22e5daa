import { Logger, Module } from '@nestjs/common';
import * as Minio from 'minio';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { STORAGE_BACKEND, StorageBackend } from './storage-backend.interface';
import { LocalStorageBackend } from './local-storage.backend';
import { ObjectStorageBackend } from './object-storage.backend';

/**
 * Picks the storage variant once, at startup, from the resolved
 * configuration. Callers only ever see the StorageBackend interface.
 */
export async function createStorageBackend(
  config: PipelineConfig,
): Promise<StorageBackend> {
  const logger = new Logger('StorageModule');
  const storage = config.storage;

  if (storage.driver === 'local') {
    logger.log(`Using local storage at "${storage.rootDir}"`);
    return new LocalStorageBackend(storage.rootDir);
  }

  const client = new Minio.Client({
    endPoint: storage.endPoint,
    port: storage.port,
    useSSL: storage.useSSL,
    accessKey: storage.accessKey,
    secretKey: storage.secretKey,
    region: storage.region,
  });
  const backend = new ObjectStorageBackend(
    client,
    storage.bucket,
    storage.region,
  );
  await backend.ensureBucket();

  logger.log(
    `Using object storage, bucket "${storage.bucket}" @ ${storage.endPoint}:${storage.port}`,
  );
  return backend;
}

/**
 * StorageModule — provides the StorageBackend under STORAGE_BACKEND.
 */
@Module({
  providers: [
    {
      provide: STORAGE_BACKEND,
      inject: [pipelineConfig.KEY],
      useFactory: createStorageBackend,
    },
  ],
  exports: [STORAGE_BACKEND],
})
export class StorageModule {}
