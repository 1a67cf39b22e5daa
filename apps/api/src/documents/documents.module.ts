import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { DocumentProcessingModule } from '../document-processing/document-processing.module';
import { DocumentRepositoryModule } from './repository/document-repository.module';
import { DocumentsService } from './documents.service';
import { DocumentsController } from './documents.controller';

/**
 * DocumentsModule — upload path and the REST surface over documents.
 *
 * Imports:
 *   - DocumentRepositoryModule: PostgreSQL-backed DocumentRepository
 *   - StorageModule:            the StorageBackend chosen at startup
 *   - DocumentProcessingModule: the orchestrator behind process/retry/status
 */
@Module({
  imports: [DocumentRepositoryModule, StorageModule, DocumentProcessingModule],
  controllers: [DocumentsController],
  providers: [DocumentsService],
})
export class DocumentsModule {}
