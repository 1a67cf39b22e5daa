/**
 * Lifecycle status of a document in the processing pipeline.
 *
 * Transitions:
 *   PENDING → PROCESSING → PROCESSED
 *                        → FAILED
 *   FAILED | PROCESSED → PROCESSING   (explicit retry only)
 *   PROCESSING → PENDING              (cancelled before any side effect)
 */
export enum DocumentStatus {
  /** Document stored and recorded, not yet picked up */
  PENDING = 'pending',

  /** An orchestrator attempt currently owns the document */
  PROCESSING = 'processing',

  /** Summary persisted */
  PROCESSED = 'processed',

  /** Attempt failed (see Document.errorCode / errorMessage) */
  FAILED = 'failed',
}

/** Statuses from which no automatic transition happens. */
export const TERMINAL_STATUSES: readonly DocumentStatus[] = [
  DocumentStatus.PROCESSED,
  DocumentStatus.FAILED,
];

export function isTerminalStatus(status: DocumentStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
