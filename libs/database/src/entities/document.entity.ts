import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { DocumentStatus } from '../enums/document-status.enum';
import { SummaryMetadata } from '../interfaces/summary-metadata.interface';

/**
 * Document entity — one uploaded file and its processing outcome.
 *
 * Invariants:
 * - id is generated by the upload path before the bytes are stored, so the
 *   storage locator can be keyed by it
 * - file_name, content_type, size_bytes and storage_locator never change
 * - summary and summary_metadata are set iff status = processed
 * - error_code and error_message are set iff status = failed
 * - is_deleted hides the row from active queries; rows are never purged
 */
@Entity('documents')
@Index('IDX_documents_status_active', ['status', 'isDeleted'])
export class Document {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255, name: 'file_name' })
  fileName!: string;

  @Column({ type: 'varchar', length: 128, name: 'content_type' })
  contentType!: string;

  @Column({ type: 'bigint', name: 'size_bytes' })
  sizeBytes!: string; // bigint stored as string by pg driver

  @Column({ type: 'varchar', length: 1024, name: 'storage_locator' })
  storageLocator!: string;

  @Column({
    type: 'enum',
    enum: DocumentStatus,
    default: DocumentStatus.PENDING,
  })
  status!: DocumentStatus;

  @Column({ type: 'text', name: 'extracted_text', nullable: true })
  extractedText!: string | null;

  @Column({ type: 'text', nullable: true })
  summary!: string | null;

  @Column({ type: 'jsonb', name: 'summary_metadata', nullable: true })
  summaryMetadata!: SummaryMetadata | null;

  @Column({ type: 'varchar', length: 64, name: 'error_code', nullable: true })
  errorCode!: string | null;

  @Column({ type: 'text', name: 'error_message', nullable: true })
  errorMessage!: string | null;

  @Column({ type: 'int', name: 'attempt_count', default: 0 })
  attemptCount!: number;

  @Column({ type: 'boolean', name: 'is_deleted', default: false })
  isDeleted!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
