import { Module } from '@nestjs/common';
import { RedisModule } from '@papertrail/redis';
import { DocumentRepositoryModule } from '../documents/repository/document-repository.module';
import { ExtractionModule } from '../extraction/extraction.module';
import { StorageModule } from '../storage/storage.module';
import { SummarizationModule } from '../summarization/summarization.module';
import { DocumentProcessingService } from './document-processing.service';

/**
 * DocumentProcessingModule — the orchestrator and everything it drives.
 *
 * Status events go out on the publisher connection of RedisModule, which
 * is shared with StatusStreamModule.
 */
@Module({
  imports: [
    DocumentRepositoryModule,
    StorageModule,
    ExtractionModule,
    SummarizationModule,
    RedisModule.forRoot(),
  ],
  providers: [DocumentProcessingService],
  exports: [DocumentProcessingService],
})
export class DocumentProcessingModule {}
