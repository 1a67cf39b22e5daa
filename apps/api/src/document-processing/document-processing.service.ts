import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import {
  CLAIMABLE_FOR_PROCESSING,
  CLAIMABLE_FOR_RETRY,
  Document,
  DocumentStatus,
  DocumentTransition,
  applyTransition,
} from '@papertrail/database';
import {
  RedisPublisherService,
  documentStatusChannel,
} from '@papertrail/redis';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import {
  PipelineException,
  describeError,
} from '../common/pipeline.exception';
import {
  ProcessingCancelledException,
  throwIfCancelled,
} from '../common/processing-cancelled.exception';
import { STORAGE_BACKEND, StorageBackend } from '../storage/storage-backend.interface';
import { TextExtractorService } from '../extraction/text-extractor.service';
import {
  SummarizationService,
  SummaryResult,
} from '../summarization/summarization.service';
import { DocumentRepository } from '../documents/repository/document.repository';
import {
  DocumentNotFoundException,
  DocumentNotRetryableException,
} from '../documents/exceptions/document.exceptions';
import { DocumentStatusView } from './interfaces/document-status-view.interface';
import { StatusEvent } from './interfaces/status-event.interface';
import {
  ProcessingInterruptedException,
  UnexpectedProcessingException,
} from './processing.exceptions';

export interface ProcessingOptions {
  /** Overrides SUMMARIZER_MAX_TOKENS for this attempt */
  maxTokens?: number;
  /** Overrides SUMMARIZER_MODEL_ID for this attempt */
  modelId?: string;
  /** Cancels the attempt; the document is left pending or failed */
  signal?: AbortSignal;
}

type AttemptMode = 'process' | 'retry';

interface InFlightAttempt {
  mode: AttemptMode;
  promise: Promise<DocumentStatusView>;
  controller: AbortController;
}

export function toStatusView(document: Document): DocumentStatusView {
  return {
    documentId: document.id,
    status: document.status,
    summary: document.summary,
    summaryMetadata: document.summaryMetadata,
    errorCode: document.errorCode,
    errorMessage: document.errorMessage,
    attemptCount: document.attemptCount,
    updatedAt: document.updatedAt.toISOString(),
  };
}

/**
 * DocumentProcessingService — drives a document through
 * PENDING → PROCESSING → PROCESSED | FAILED.
 *
 * One attempt per call: storage read, extraction, summarization, terminal
 * write, in that order. Storage, extraction and summarization failures
 * become a FAILED status and are not rethrown; a repository failure aborts
 * the attempt and propagates, since the FAILED write could not be trusted.
 *
 * At most one attempt per document is in flight: a concurrent
 * processDocument() in this process joins the running attempt, a concurrent
 * retry() is refused, and the repository's conditional claim keeps other
 * processes out. Every status write is conditional too, so a document
 * deleted mid-attempt stays deleted and the attempt stops at its next write.
 */
@Injectable()
export class DocumentProcessingService
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(DocumentProcessingService.name);
  private readonly inFlight = new Map<string, InFlightAttempt>();

  constructor(
    private readonly documents: DocumentRepository,

    @Inject(STORAGE_BACKEND)
    private readonly storage: StorageBackend,

    private readonly extractor: TextExtractorService,
    private readonly summarizer: SummarizationService,
    private readonly publisher: RedisPublisherService,

    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  // ── Public API ──────────────────────────────────────────

  /**
   * Runs one attempt for a PENDING document. For any other status this is
   * a no-op that returns the current state.
   */
  processDocument(
    documentId: string,
    options: ProcessingOptions = {},
  ): Promise<DocumentStatusView> {
    return this.runExclusive(documentId, 'process', options);
  }

  /**
   * Re-runs a FAILED or PROCESSED document from scratch.
   * @throws DocumentNotRetryableException for a PENDING document or one
   * with an attempt already in flight
   */
  retry(
    documentId: string,
    options: ProcessingOptions = {},
  ): Promise<DocumentStatusView> {
    return this.runExclusive(documentId, 'retry', options);
  }

  /**
   * Fire-and-forget variant of processDocument() used after upload.
   * The outcome is persisted; only aborts of the attempt itself are logged.
   */
  processInBackground(documentId: string): void {
    this.processDocument(documentId).catch((err: unknown) => {
      this.logger.error(
        `Background processing of document ${documentId} aborted: ${describeError(err)}`,
      );
    });
  }

  async getStatus(documentId: string): Promise<DocumentStatusView> {
    const document = await this.documents.load(documentId);
    if (!document) {
      throw new DocumentNotFoundException(documentId);
    }
    return toStatusView(document);
  }

  isInFlight(documentId: string): boolean {
    return this.inFlight.has(documentId);
  }

  // ── Lifecycle hooks ─────────────────────────────────────

  /**
   * Documents still PROCESSING at startup belong to a process that died
   * mid-attempt; mark them FAILED so they can be retried.
   */
  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.recoverInterruptedOnStart) return;

    try {
      const recovered = await this.recoverInterrupted();
      if (recovered > 0) {
        this.logger.warn(`Marked ${recovered} interrupted document(s) as failed`);
      }
    } catch (error) {
      this.logger.error(
        `Recovery of interrupted documents failed: ${describeError(error)}`,
      );
    }
  }

  /**
   * Cancels every in-flight attempt and waits for each to write its
   * final status before the database connection closes.
   */
  async beforeApplicationShutdown(): Promise<void> {
    if (this.inFlight.size === 0) return;

    this.logger.warn(`Cancelling ${this.inFlight.size} in-flight attempt(s)`);
    const pending = [...this.inFlight.values()];
    for (const { controller } of pending) {
      controller.abort(
        new ProcessingCancelledException('application shutting down'),
      );
    }
    await Promise.allSettled(pending.map(({ promise }) => promise));
  }

  async recoverInterrupted(): Promise<number> {
    const stuck = await this.documents.findByStatus(DocumentStatus.PROCESSING);
    let recovered = 0;

    for (const document of stuck) {
      if (this.inFlight.has(document.id)) continue;
      try {
        await this.fail(document, new ProcessingInterruptedException());
        recovered += 1;
      } catch (error) {
        if (!(error instanceof DocumentNotFoundException)) throw error;
      }
    }
    return recovered;
  }

  // ── Attempt pipeline ────────────────────────────────────

  private runExclusive(
    documentId: string,
    mode: AttemptMode,
    options: ProcessingOptions,
  ): Promise<DocumentStatusView> {
    const existing = this.inFlight.get(documentId);
    if (existing && mode === 'retry') {
      this.logger.warn(
        `Document ${documentId} already has a ${existing.mode} attempt in flight; retry refused`,
      );
      return Promise.reject(
        new DocumentNotRetryableException(documentId, DocumentStatus.PROCESSING),
      );
    }
    if (existing) {
      this.logger.warn(
        `Document ${documentId} already has a ${existing.mode} attempt in flight; joining it`,
      );
      return existing.promise;
    }

    const controller = new AbortController();
    const signal = options.signal
      ? AbortSignal.any([options.signal, controller.signal])
      : controller.signal;

    const promise = this.attempt(documentId, mode, { ...options, signal }).finally(
      () => this.inFlight.delete(documentId),
    );
    this.inFlight.set(documentId, { mode, promise, controller });
    return promise;
  }

  private async attempt(
    documentId: string,
    mode: AttemptMode,
    options: ProcessingOptions,
  ): Promise<DocumentStatusView> {
    const current = await this.documents.load(documentId);
    if (!current) {
      throw new DocumentNotFoundException(documentId);
    }

    const from =
      mode === 'process' ? CLAIMABLE_FOR_PROCESSING : CLAIMABLE_FOR_RETRY;
    const claimed = await this.documents.claim(documentId, from);

    if (!claimed) {
      const latest = (await this.documents.load(documentId)) ?? current;
      if (mode === 'retry' && latest.status === DocumentStatus.PENDING) {
        throw new DocumentNotRetryableException(documentId, latest.status);
      }
      this.logger.warn(
        `Document ${documentId} is ${latest.status}; ${mode} request ignored`,
      );
      return toStatusView(latest);
    }

    this.logger.log(
      `Attempt ${claimed.attemptCount} for document ${documentId} started (${mode} from ${current.status})`,
    );
    await this.publishStatus(claimed);

    return this.run(claimed, current.status, options);
  }

  private async run(
    document: Document,
    origin: DocumentStatus,
    options: ProcessingOptions,
  ): Promise<DocumentStatusView> {
    const { signal } = options;

    // ── 1. Read + extract ────────────────────────────────
    let text: string;
    try {
      const bytes = await this.storage.get(document.storageLocator);
      throwIfCancelled(signal);
      text = await this.extractor.extract(bytes, document.contentType);
      throwIfCancelled(signal);
    } catch (error) {
      if (
        error instanceof ProcessingCancelledException &&
        origin === DocumentStatus.PENDING
      ) {
        return this.rollback(document, error);
      }
      return this.fail(document, error);
    }

    let current = await this.persist(document, {
      to: DocumentStatus.PROCESSING,
      extractedText: text,
    });
    this.logger.debug(
      `Document ${document.id}: extracted ${text.length} characters`,
    );

    // ── 2. Summarize ─────────────────────────────────────
    let result: SummaryResult;
    try {
      result = await this.summarizer.summarize(text, {
        maxTokens: options.maxTokens,
        modelId: options.modelId,
        signal,
      });
    } catch (error) {
      return this.fail(current, error);
    }

    // ── 3. Complete ──────────────────────────────────────
    current = await this.persist(current, {
      to: DocumentStatus.PROCESSED,
      summary: result.summary,
      summaryMetadata: result.metadata,
    });

    this.logger.log(
      `Document ${document.id} processed with ${result.metadata.modelId}` +
        (result.metadata.truncated ? ' (input truncated)' : ''),
    );
    return toStatusView(current);
  }

  private async rollback(
    document: Document,
    cancellation: ProcessingCancelledException,
  ): Promise<DocumentStatusView> {
    this.logger.warn(
      `Document ${document.id}: ${cancellation.message}; nothing stored yet, back to pending`,
    );
    const saved = await this.persist(document, { to: DocumentStatus.PENDING });
    return toStatusView(saved);
  }

  private async fail(
    document: Document,
    error: unknown,
  ): Promise<DocumentStatusView> {
    const failure =
      error instanceof PipelineException
        ? error
        : new UnexpectedProcessingException(error);

    if (failure instanceof UnexpectedProcessingException) {
      this.logger.error(
        `Document ${document.id} failed unexpectedly: ${failure.message}`,
        error instanceof Error ? error.stack : undefined,
      );
    } else {
      this.logger.warn(
        `Document ${document.id} failed [${failure.code}${failure.retryable ? ', retryable' : ''}]: ${failure.message}`,
      );
    }

    const saved = await this.persist(document, {
      to: DocumentStatus.FAILED,
      errorCode: failure.code,
      errorMessage: failure.message,
    });
    return toStatusView(saved);
  }

  // ── Utility methods ──────────────────────────────────────

  /**
   * Applies the transition, saves it if the document is still where this
   * attempt left it, then announces it.
   * @throws DocumentNotFoundException when the document was deleted or
   * moved on in the meantime
   */
  private async persist(
    document: Document,
    transition: DocumentTransition,
  ): Promise<Document> {
    const expected = document.status;
    const saved = await this.documents.saveTransition(
      applyTransition(document, transition),
      expected,
    );
    if (!saved) {
      this.logger.warn(
        `Document ${document.id} is no longer ${expected} or was deleted; ${transition.to} not written`,
      );
      throw new DocumentNotFoundException(document.id);
    }
    await this.publishStatus(saved);
    return saved;
  }

  private async publishStatus(document: Document): Promise<void> {
    const event: StatusEvent = {
      documentId: document.id,
      status: document.status,
      errorCode: document.errorCode ?? undefined,
      errorMessage: document.errorMessage ?? undefined,
      publishedAt: new Date().toISOString(),
    };

    try {
      await this.publisher.publish(documentStatusChannel(document.id), event);
    } catch (error) {
      // The database is the source of truth; the event is best-effort
      this.logger.warn(
        `Failed to publish status event for document ${document.id}: ${describeError(error)}`,
      );
    }
  }
}
