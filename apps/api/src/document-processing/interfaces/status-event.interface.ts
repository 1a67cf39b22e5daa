import { DocumentStatus } from '@papertrail/database';

/**
 * StatusEvent — published to Redis on `doc:{documentId}:status` after each
 * persisted status transition.
 *
 * Invariants:
 *   - errorCode / errorMessage are only set when status === 'failed'
 *   - publishedAt is an ISO 8601 UTC string
 */
export interface StatusEvent {
  documentId: string;
  status: DocumentStatus;
  errorCode?: string;
  errorMessage?: string;
  publishedAt: string;
}

const STATUSES: readonly string[] = Object.values(DocumentStatus);

export function isStatusEvent(value: unknown): value is StatusEvent {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate['documentId'] === 'string' &&
    typeof candidate['status'] === 'string' &&
    STATUSES.includes(candidate['status']) &&
    typeof candidate['publishedAt'] === 'string'
  );
}
