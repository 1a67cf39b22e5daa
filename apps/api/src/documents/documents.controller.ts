import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Res,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import { memoryStorage } from 'multer';
import { ProcessingCancelledException } from '../common/processing-cancelled.exception';
import { DocumentProcessingService } from '../document-processing/document-processing.service';
import { DocumentStatusView } from '../document-processing/interfaces/document-status-view.interface';
import { DocumentsService } from './documents.service';
import { UploadDocumentDto } from './dto/upload-document.dto';
import { ProcessDocumentDto } from './dto/process-document.dto';
import { DocumentResponseDto } from './dto/document-response.dto';

/**
 * Multer configuration: memory storage so the buffer goes straight to the
 * storage backend without a temp file.
 *
 * The limit here is a hard cap only; UPLOAD_MAX_FILE_SIZE_MB is enforced
 * in DocumentsService with a descriptive error.
 */
const MULTER_OPTIONS = {
  storage: memoryStorage(),
  limits: {
    fileSize: 1024 * 1024 * 1024, // 1 GB
  },
};

/**
 * Aborts when the client goes away before the response is written.
 * Used to cancel synchronous processing requests.
 */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort(new ProcessingCancelledException('client disconnected'));
    }
  });
  return controller.signal;
}

/**
 * REST controller for documents.
 *
 * Routes:
 *   POST   /documents/upload       — store a file and create a pending document
 *   POST   /documents/:id/process  — run one attempt for a pending document
 *   POST   /documents/:id/retry    — re-run a failed or processed document
 *   GET    /documents/:id/status   — current status, summary or failure
 *   GET    /documents              — all active documents, newest first
 *   DELETE /documents/:id          — soft delete
 */
@Controller('documents')
export class DocumentsController {
  private readonly logger = new Logger(DocumentsController.name);

  constructor(
    private readonly documentsService: DocumentsService,
    private readonly processingService: DocumentProcessingService,
  ) {}

  /**
   * POST /documents/upload
   *
   * multipart/form-data with:
   *   - file:     the document (required), field name must be "file"
   *   - fileName: optional override of the stored name
   *
   * Error responses:
   *   400 — No file attached
   *   413 — File exceeds UPLOAD_MAX_FILE_SIZE_MB
   *   503 — Storage or database unreachable
   */
  @Post('upload')
  @UseInterceptors(FileInterceptor('file', MULTER_OPTIONS))
  @HttpCode(HttpStatus.CREATED)
  uploadDocument(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: UploadDocumentDto,
  ): Promise<DocumentResponseDto> {
    this.logger.log(
      `Upload request: file="${file?.originalname ?? 'none'}", size=${file?.size ?? 0}`,
    );
    return this.documentsService.submit(file, dto);
  }

  /**
   * POST /documents/:id/process
   *
   * Waits for the attempt to finish. A failed attempt is still 200; the
   * outcome is in the returned status. Closing the connection cancels it.
   */
  @Post(':id/process')
  @HttpCode(HttpStatus.OK)
  processDocument(
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body() dto: ProcessDocumentDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<DocumentStatusView> {
    return this.processingService.processDocument(id, {
      maxTokens: dto.maxTokens,
      modelId: dto.modelId,
      signal: abortOnDisconnect(res),
    });
  }

  /**
   * POST /documents/:id/retry
   *
   * 409 when the document is still pending.
   */
  @Post(':id/retry')
  @HttpCode(HttpStatus.OK)
  retryDocument(
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body() dto: ProcessDocumentDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<DocumentStatusView> {
    return this.processingService.retry(id, {
      maxTokens: dto.maxTokens,
      modelId: dto.modelId,
      signal: abortOnDisconnect(res),
    });
  }

  @Get(':id/status')
  getStatus(
    @Param('id', new ParseUUIDPipe()) id: string,
  ): Promise<DocumentStatusView> {
    return this.processingService.getStatus(id);
  }

  @Get()
  listDocuments(): Promise<DocumentResponseDto[]> {
    return this.documentsService.listActive();
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  deleteDocument(
    @Param('id', new ParseUUIDPipe()) id: string,
  ): Promise<void> {
    return this.documentsService.softDelete(id);
  }
}
