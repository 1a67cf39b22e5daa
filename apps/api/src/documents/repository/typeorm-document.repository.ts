import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  Document,
  DocumentStatus,
  assertTransition,
} from '@papertrail/database';
import { DocumentRepository, NewDocument } from './document.repository';
import { RepositoryUnavailableException } from './repository.exceptions';

/**
 * PostgreSQL-backed DocumentRepository.
 *
 * `claim` is a single conditional UPDATE, so two processes racing for the
 * same document cannot both win.
 */
@Injectable()
export class TypeOrmDocumentRepository extends DocumentRepository {
  private readonly logger = new Logger(TypeOrmDocumentRepository.name);

  constructor(
    @InjectRepository(Document)
    private readonly repository: Repository<Document>,
  ) {
    super();
  }

  create(fields: NewDocument): Promise<Document> {
    return this.guard('create', () => {
      const document = this.repository.create({
        id: fields.id,
        fileName: fields.fileName,
        contentType: fields.contentType,
        sizeBytes: fields.sizeBytes.toString(), // bigint stored as string by pg driver
        storageLocator: fields.storageLocator,
        status: DocumentStatus.PENDING,
        extractedText: null,
        summary: null,
        summaryMetadata: null,
        errorCode: null,
        errorMessage: null,
        attemptCount: 0,
        isDeleted: false,
      });
      return this.repository.save(document);
    });
  }

  load(id: string): Promise<Document | null> {
    return this.guard('load', () =>
      this.repository.findOne({ where: { id, isDeleted: false } }),
    );
  }

  async saveTransition(
    document: Document,
    expected: DocumentStatus,
  ): Promise<Document | null> {
    const result = await this.guard('saveTransition', () =>
      this.repository
        .createQueryBuilder()
        .update(Document)
        .set({
          status: document.status,
          extractedText: document.extractedText,
          summary: document.summary,
          summaryMetadata: document.summaryMetadata,
          errorCode: document.errorCode,
          errorMessage: document.errorMessage,
          attemptCount: document.attemptCount,
          updatedAt: document.updatedAt,
        })
        .where('id = :id', { id: document.id })
        .andWhere('status = :expected', { expected })
        .andWhere('is_deleted = false')
        .execute(),
    );

    if (!result.affected) {
      this.logger.debug(
        `Write of ${document.status} for document ${document.id} skipped: no longer ${expected} or deleted`,
      );
      return null;
    }
    return document;
  }

  listActive(): Promise<Document[]> {
    return this.guard('listActive', () =>
      this.repository.find({
        where: { isDeleted: false },
        order: { createdAt: 'DESC' },
      }),
    );
  }

  findByStatus(status: DocumentStatus): Promise<Document[]> {
    return this.guard('findByStatus', () =>
      this.repository.find({ where: { status, isDeleted: false } }),
    );
  }

  async claim(
    id: string,
    from: readonly DocumentStatus[],
  ): Promise<Document | null> {
    for (const status of from) {
      assertTransition(status, DocumentStatus.PROCESSING);
    }

    const result = await this.guard('claim', () =>
      this.repository
        .createQueryBuilder()
        .update(Document)
        .set({
          status: DocumentStatus.PROCESSING,
          extractedText: null,
          summary: null,
          summaryMetadata: null,
          errorCode: null,
          errorMessage: null,
          attemptCount: () => 'attempt_count + 1',
        })
        .where('id = :id', { id })
        .andWhere('status IN (:...from)', { from })
        .andWhere('is_deleted = false')
        .execute(),
    );

    if (!result.affected) {
      this.logger.debug(`Claim of document ${id} from [${from.join(', ')}] lost`);
      return null;
    }
    // Not filtered on is_deleted: a delete racing the claim still hands the
    // row to the caller, whose first conditional write then stops the attempt
    return this.guard('claim', () => this.repository.findOneBy({ id }));
  }

  async softDelete(id: string): Promise<boolean> {
    const result = await this.guard('softDelete', () =>
      this.repository.update({ id, isDeleted: false }, { isDeleted: true }),
    );
    return !!result.affected;
  }

  // ── Private helpers ──────────────────────────────────────

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Repository ${operation} failed: ${cause.message}`);
      throw new RepositoryUnavailableException(operation, cause);
    }
  }
}
