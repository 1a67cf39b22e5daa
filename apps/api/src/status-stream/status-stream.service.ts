import { Injectable, Logger } from '@nestjs/common';
import { Subscription } from 'rxjs';
import { Document, isTerminalStatus } from '@papertrail/database';
import {
  RedisSubscriberService,
  documentStatusChannel,
} from '@papertrail/redis';
import { DocumentRepository } from '../documents/repository/document.repository';
import {
  StatusEvent,
  isStatusEvent,
} from '../document-processing/interfaces/status-event.interface';

// ── Timing constants ────────────────────────────────────────

/**
 * SSE keepalive interval (ms).
 * Proxies and load balancers drop idle connections after 60 s.
 */
export const HEARTBEAT_INTERVAL_MS = 25_000;

/**
 * Maximum SSE stream lifetime (ms). A stream whose document never reaches
 * a terminal status is closed after this long.
 */
export const MAX_STREAM_LIFETIME_MS = 5 * 60 * 1000;

/** Reconnect delay sent to EventSource in the first frame (ms). */
const SSE_RETRY_MS = 3_000;

/** The slice of an express Response the stream writes to. */
export interface SseResponse {
  readonly writableEnded: boolean;
  status(code: number): { json(body: object): unknown };
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: 'close', listener: () => void): unknown;
}

/**
 * All mutable state for a single SSE connection, so cleanup() can release
 * everything exactly once.
 */
interface StreamContext {
  readonly documentId: string;
  readonly res: SseResponse;
  eventCounter: number;
  heartbeatTimer: ReturnType<typeof setInterval> | null;
  timeoutTimer: ReturnType<typeof setTimeout> | null;
  redisSubscription: Subscription | null;
  closed: boolean;
}

/**
 * StatusStreamService — bridges Redis status events to Server-Sent Events.
 *
 * Lifecycle of a single stream:
 *
 * 1. **Validate**: 404 JSON response if the document is unknown or deleted.
 * 2. **Subscribe**: `doc:{documentId}:status` on Redis.
 * 3. **Snapshot**: the current DB state as the first `status` frame,
 *    read after subscribing so no transition falls between the two.
 *    A document already processed or failed closes the stream here.
 * 4. **Relay**: each StatusEvent becomes a `status` frame; a terminal
 *    status closes the stream.
 * 5. **Heartbeat / timeout**: `: heartbeat` comment every 25 s, forced
 *    close after 5 minutes.
 * 6. **Cleanup**: on terminal event, client disconnect, Redis error or
 *    timeout.
 */
@Injectable()
export class StatusStreamService {
  private readonly logger = new Logger(StatusStreamService.name);

  constructor(
    private readonly documents: DocumentRepository,
    private readonly subscriber: RedisSubscriberService,
  ) {}

  // ── Public API ──────────────────────────────────────────

  /**
   * Opens an SSE stream for the given document.
   *
   * @returns `true` if the stream was opened, `false` if a 404 was sent.
   *          The caller should not touch `res` after this method returns.
   */
  async streamStatus(documentId: string, res: SseResponse): Promise<boolean> {
    // ── 1. Validate document ──────────────────────────────
    const existing = await this.documents.load(documentId);

    if (!existing) {
      this.logger.warn(`SSE rejected: document ${documentId} not found`);
      res.status(404).json({
        statusCode: 404,
        message: `Document ${documentId} not found`,
        error: 'Not Found',
      });
      return false;
    }

    this.writeHeaders(res);

    const ctx: StreamContext = {
      documentId,
      res,
      eventCounter: 0,
      heartbeatTimer: null,
      timeoutTimer: null,
      redisSubscription: null,
      closed: false,
    };

    res.on('close', () => {
      this.logger.log(`Client disconnected from status stream of ${documentId}`);
      this.cleanup(ctx);
    });

    res.write(`retry: ${SSE_RETRY_MS}\n\n`);

    // ── 2. Subscribe ──────────────────────────────────────
    ctx.redisSubscription = this.subscriber
      .subscribeJson(documentStatusChannel(documentId), isStatusEvent)
      .subscribe({
        next: (event: StatusEvent) => {
          this.writeSseFrame(ctx, 'status', event);

          if (isTerminalStatus(event.status)) {
            this.logger.log(
              `Document ${documentId} reached ${event.status}. Closing SSE.`,
            );
            this.cleanup(ctx);
          }
        },
        error: (err: Error) => {
          this.logger.error(
            `Redis subscription error for document ${documentId}: ${err.message}`,
          );
          this.writeSseFrame(ctx, 'error', {
            documentId,
            message: 'Stream error, please reconnect',
          });
          this.cleanup(ctx);
        },
        complete: () => this.cleanup(ctx),
      });

    // ── 3. Snapshot ───────────────────────────────────────
    const snapshot = (await this.documents.load(documentId)) ?? existing;
    if (ctx.closed) return true;
    this.writeSseFrame(ctx, 'status', this.toEvent(snapshot));

    if (isTerminalStatus(snapshot.status)) {
      this.logger.log(
        `Document ${documentId} already ${snapshot.status}. Closing SSE after snapshot.`,
      );
      this.cleanup(ctx);
      return true;
    }

    // ── 4. Heartbeat + timeout ────────────────────────────
    ctx.heartbeatTimer = setInterval(() => {
      this.writeHeartbeat(ctx);
    }, HEARTBEAT_INTERVAL_MS);

    ctx.timeoutTimer = setTimeout(() => {
      this.logger.warn(
        `Status stream for document ${documentId} reached max lifetime. Force-closing.`,
      );
      this.writeSseFrame(ctx, 'timeout', {
        documentId,
        message: 'Stream timed out, reconnect or poll GET /documents/:id/status',
      });
      this.cleanup(ctx);
    }, MAX_STREAM_LIFETIME_MS);

    this.logger.log(`SSE stream opened for document ${documentId} (${snapshot.status})`);
    return true;
  }

  // ── Private helpers ──────────────────────────────────────

  private writeHeaders(res: SseResponse): void {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    // Stops nginx from buffering the stream
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();
  }

  /**
   * Wire format:
   *   id: <counter>\n
   *   event: <eventName>\n
   *   data: <json>\n
   *   \n
   */
  private writeSseFrame(ctx: StreamContext, eventName: string, payload: object): void {
    if (ctx.closed) return;

    try {
      const id = ++ctx.eventCounter;
      ctx.res.write(`id: ${id}\nevent: ${eventName}\ndata: ${JSON.stringify(payload)}\n\n`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to write SSE frame for document ${ctx.documentId}: ${message}`);
    }
  }

  private writeHeartbeat(ctx: StreamContext): void {
    if (ctx.closed) return;

    try {
      ctx.res.write(': heartbeat\n\n');
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to write heartbeat for document ${ctx.documentId}: ${message}`);
    }
  }

  /** Idempotent: clears timers, unsubscribes Redis, ends the response. */
  private cleanup(ctx: StreamContext): void {
    if (ctx.closed) return;
    ctx.closed = true;

    if (ctx.heartbeatTimer) {
      clearInterval(ctx.heartbeatTimer);
      ctx.heartbeatTimer = null;
    }
    if (ctx.timeoutTimer) {
      clearTimeout(ctx.timeoutTimer);
      ctx.timeoutTimer = null;
    }
    if (ctx.redisSubscription) {
      ctx.redisSubscription.unsubscribe();
      ctx.redisSubscription = null;
    }

    if (!ctx.res.writableEnded) {
      ctx.res.end();
    }
  }

  private toEvent(document: Document): StatusEvent {
    return {
      documentId: document.id,
      status: document.status,
      errorCode: document.errorCode ?? undefined,
      errorMessage: document.errorMessage ?? undefined,
      publishedAt: document.updatedAt.toISOString(),
    };
  }
}
