// ── Entities ────────────────────────────────────────────────
export { Document } from './entities/document.entity';

// ── Enums ───────────────────────────────────────────────────
export {
  DocumentStatus,
  TERMINAL_STATUSES,
  isTerminalStatus,
} from './enums/document-status.enum';

// ── Interfaces ──────────────────────────────────────────────
export { SummaryMetadata } from './interfaces/summary-metadata.interface';

// ── Lifecycle ───────────────────────────────────────────────
export {
  DocumentTransition,
  InvalidStatusTransitionError,
  CLAIMABLE_FOR_PROCESSING,
  CLAIMABLE_FOR_RETRY,
  applyTransition,
  assertTransition,
  canTransition,
} from './lifecycle/document-lifecycle';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
