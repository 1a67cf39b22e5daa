import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { StorageHealthIndicator } from './storage.health';

/**
 * GET /health — the document store and the blob storage backend.
 * 503 when either is unreachable.
 */
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly documentsStore: TypeOrmHealthIndicator,
    private readonly storage: StorageHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.documentsStore.pingCheck('documents_store', { timeout: 3000 }),
      () => this.storage.isHealthy('storage'),
    ]);
  }
}
