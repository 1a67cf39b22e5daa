import { Module } from '@nestjs/common';
import { DatabaseModule } from '@papertrail/database';
import { DocumentRepository } from './document.repository';
import { TypeOrmDocumentRepository } from './typeorm-document.repository';

/**
 * Binds the DocumentRepository boundary to its PostgreSQL implementation.
 * Shared by the upload path and the orchestrator.
 */
@Module({
  imports: [DatabaseModule.forFeature()],
  providers: [
    { provide: DocumentRepository, useClass: TypeOrmDocumentRepository },
  ],
  exports: [DocumentRepository],
})
export class DocumentRepositoryModule {}
