import { randomUUID } from 'crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { Document } from '@papertrail/database';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { STORAGE_BACKEND, StorageBackend } from '../storage/storage-backend.interface';
import { DocumentProcessingService } from '../document-processing/document-processing.service';
import { DocumentRepository } from './repository/document.repository';
import { UploadDocumentDto } from './dto/upload-document.dto';
import { DocumentResponseDto } from './dto/document-response.dto';
import {
  DocumentNotFoundException,
  FileTooLargeException,
  MissingFileException,
} from './exceptions/document.exceptions';

const BYTES_PER_MB = 1024 * 1024;
const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

/** The parts of a Multer file the upload path reads. */
export interface UploadedDocumentFile {
  buffer: Buffer;
  originalname: string;
  mimetype: string;
  size: number;
}

export function toDocumentResponse(document: Document): DocumentResponseDto {
  return {
    documentId: document.id,
    fileName: document.fileName,
    contentType: document.contentType,
    sizeBytes: parseInt(document.sizeBytes, 10),
    storageLocator: document.storageLocator,
    status: document.status,
    errorCode: document.errorCode,
    attemptCount: document.attemptCount,
    createdAt: document.createdAt.toISOString(),
    updatedAt: document.updatedAt.toISOString(),
  };
}

/**
 * DocumentsService — the upload path and document bookkeeping.
 *
 * Upload:
 *   1. Validate the file (presence, size)
 *   2. Generate the document id and store the bytes under it
 *   3. Create the PENDING record, locator already set
 *   4. Hand the id to the orchestrator in the background (AUTO_PROCESS_ON_UPLOAD)
 *
 * If the record cannot be created after the bytes were stored, the stored
 * object is left behind; a repeated upload never reuses its locator.
 * The content type is not checked here: an unsupported type becomes a
 * failed document with an unsupported-format reason.
 */
@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);

  constructor(
    private readonly documents: DocumentRepository,

    @Inject(STORAGE_BACKEND)
    private readonly storage: StorageBackend,

    private readonly processing: DocumentProcessingService,

    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  async submit(
    file: UploadedDocumentFile | undefined,
    dto: UploadDocumentDto,
  ): Promise<DocumentResponseDto> {
    // ── Step 1: Validate file ──────────────────────────────
    const validated = this.validateFile(file);

    // ── Step 2: Store bytes ────────────────────────────────
    const id = randomUUID();
    const fileName = dto.fileName?.trim() || validated.originalname;
    const contentType = validated.mimetype || FALLBACK_CONTENT_TYPE;

    const storageLocator = await this.storage.put(validated.buffer, {
      documentId: id,
      fileName,
      contentType,
    });
    this.logger.log(
      `Stored ${validated.size} bytes for document ${id} at ${storageLocator}`,
    );

    // ── Step 3: Persist record ─────────────────────────────
    const document = await this.documents.create({
      id,
      fileName,
      contentType,
      sizeBytes: validated.size,
      storageLocator,
    });

    // ── Step 4: Trigger processing ─────────────────────────
    if (this.config.autoProcessOnUpload) {
      this.processing.processInBackground(document.id);
    }

    return toDocumentResponse(document);
  }

  async listActive(): Promise<DocumentResponseDto[]> {
    const documents = await this.documents.listActive();
    return documents.map(toDocumentResponse);
  }

  /**
   * Marks the document deleted. Stored bytes are kept; the document just
   * disappears from every query and is never processed again.
   */
  async softDelete(documentId: string): Promise<void> {
    const deleted = await this.documents.softDelete(documentId);
    if (!deleted) {
      throw new DocumentNotFoundException(documentId);
    }
    this.logger.log(`Document ${documentId} soft-deleted`);
  }

  // ── Private methods ──────────────────────────────────────

  private validateFile(
    file: UploadedDocumentFile | undefined,
  ): UploadedDocumentFile {
    if (!file || !file.buffer || file.size === 0) {
      throw new MissingFileException();
    }

    if (file.size > this.config.maxUploadBytes) {
      throw new FileTooLargeException(this.config.maxUploadBytes / BYTES_PER_MB);
    }

    return file;
  }
}
