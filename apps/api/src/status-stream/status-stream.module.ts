import { Module } from '@nestjs/common';
import { RedisModule } from '@papertrail/redis';
import { DocumentRepositoryModule } from '../documents/repository/document-repository.module';
import { StatusStreamController } from './status-stream.controller';
import { StatusStreamService } from './status-stream.service';

/**
 * StatusStreamModule — SSE status streaming.
 *
 * RedisModule.forRoot() resolves to the same module instance that
 * DocumentProcessingModule imports, so both share one publisher and one
 * subscriber connection.
 */
@Module({
  imports: [RedisModule.forRoot(), DocumentRepositoryModule],
  controllers: [StatusStreamController],
  providers: [StatusStreamService],
})
export class StatusStreamModule {}
