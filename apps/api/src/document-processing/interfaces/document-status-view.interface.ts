import { DocumentStatus, SummaryMetadata } from '@papertrail/database';

/**
 * What callers see of a document's processing state.
 * summary is non-null iff status is processed; errorMessage iff failed.
 */
export interface DocumentStatusView {
  documentId: string;
  status: DocumentStatus;
  summary: string | null;
  summaryMetadata: SummaryMetadata | null;
  errorCode: string | null;
  errorMessage: string | null;
  attemptCount: number;
  updatedAt: string;
}
