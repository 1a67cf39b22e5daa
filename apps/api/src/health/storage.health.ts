import { Inject, Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { describeError } from '../common/pipeline.exception';
import { STORAGE_BACKEND, StorageBackend } from '../storage/storage-backend.interface';

/** A locator nothing is ever stored under; only reachability matters. */
const PROBE_LOCATOR = 'documents/health/ping';

/**
 * Reports whether the selected storage backend answers at all. A missing
 * object is healthy; an unreachable medium is not.
 */
@Injectable()
export class StorageHealthIndicator extends HealthIndicator {
  constructor(
    @Inject(STORAGE_BACKEND)
    private readonly storage: StorageBackend,
  ) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const kind = this.storage.kind;
    try {
      await this.storage.exists(PROBE_LOCATOR);
      return this.getStatus(key, true, { kind });
    } catch (error) {
      throw new HealthCheckError(
        'Storage check failed',
        this.getStatus(key, false, { kind, message: describeError(error) }),
      );
    }
  }
}
