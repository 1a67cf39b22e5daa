import { Document } from '../entities/document.entity';
import { DocumentStatus } from '../enums/document-status.enum';
import { SummaryMetadata } from '../interfaces/summary-metadata.interface';

/**
 * Allowed status transitions. PROCESSING → PROCESSING records extracted
 * text mid-attempt; PROCESSING → PENDING is the cancellation rollback.
 */
const ALLOWED_TRANSITIONS: Readonly<
  Record<DocumentStatus, readonly DocumentStatus[]>
> = {
  [DocumentStatus.PENDING]: [DocumentStatus.PROCESSING],
  [DocumentStatus.PROCESSING]: [
    DocumentStatus.PROCESSING,
    DocumentStatus.PROCESSED,
    DocumentStatus.FAILED,
    DocumentStatus.PENDING,
  ],
  [DocumentStatus.PROCESSED]: [DocumentStatus.PROCESSING],
  [DocumentStatus.FAILED]: [DocumentStatus.PROCESSING],
};

export class InvalidStatusTransitionError extends Error {
  constructor(
    readonly from: DocumentStatus,
    readonly to: DocumentStatus,
  ) {
    super(`Status transition ${from} → ${to} is not allowed`);
    this.name = 'InvalidStatusTransitionError';
  }
}

export function canTransition(
  from: DocumentStatus,
  to: DocumentStatus,
): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(
  from: DocumentStatus,
  to: DocumentStatus,
): void {
  if (!canTransition(from, to)) {
    throw new InvalidStatusTransitionError(from, to);
  }
}

/** Statuses an attempt may be claimed from, per entry point. */
export const CLAIMABLE_FOR_PROCESSING: readonly DocumentStatus[] = [
  DocumentStatus.PENDING,
];
export const CLAIMABLE_FOR_RETRY: readonly DocumentStatus[] = [
  DocumentStatus.FAILED,
  DocumentStatus.PROCESSED,
];

export type DocumentTransition =
  | { to: DocumentStatus.PENDING }
  | { to: DocumentStatus.PROCESSING; extractedText?: string }
  | {
      to: DocumentStatus.PROCESSED;
      summary: string;
      summaryMetadata: SummaryMetadata;
    }
  | { to: DocumentStatus.FAILED; errorCode: string; errorMessage: string };

/**
 * The only place document status changes. Validates the move against
 * ALLOWED_TRANSITIONS and rewrites the dependent fields so that
 * summary ⇔ PROCESSED and errorMessage ⇔ FAILED hold afterwards.
 *
 * Entering PROCESSING from another status starts a fresh attempt: results
 * of any earlier attempt are cleared.
 */
export function applyTransition(
  document: Document,
  transition: DocumentTransition,
  now: Date = new Date(),
): Document {
  const from = document.status;
  assertTransition(from, transition.to);

  switch (transition.to) {
    case DocumentStatus.PENDING:
      document.extractedText = null;
      break;

    case DocumentStatus.PROCESSING:
      if (from !== DocumentStatus.PROCESSING) {
        document.extractedText = null;
        document.attemptCount += 1;
      }
      if (transition.extractedText !== undefined) {
        document.extractedText = transition.extractedText;
      }
      break;

    case DocumentStatus.PROCESSED:
      document.summary = transition.summary;
      document.summaryMetadata = transition.summaryMetadata;
      break;

    case DocumentStatus.FAILED:
      document.errorCode = transition.errorCode;
      document.errorMessage = transition.errorMessage;
      break;
  }

  if (transition.to !== DocumentStatus.PROCESSED) {
    document.summary = null;
    document.summaryMetadata = null;
  }
  if (transition.to !== DocumentStatus.FAILED) {
    document.errorCode = null;
    document.errorMessage = null;
  }

  document.status = transition.to;
  document.updatedAt = now;
  return document;
}
