import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration — creates the documents table.
 *
 * Hand-written to match the Document entity, since migration:generate
 * needs a running database. PostgreSQL-specific (enum type, jsonb,
 * timestamptz).
 */
export class InitialSchema1760745600000 implements MigrationInterface {
  name = 'InitialSchema1760745600000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TYPE "documents_status_enum" AS ENUM ('pending', 'processing', 'processed', 'failed')`,
    );

    await queryRunner.query(`
      CREATE TABLE "documents" (
        "id"               uuid NOT NULL,
        "file_name"        varchar(255) NOT NULL,
        "content_type"     varchar(128) NOT NULL,
        "size_bytes"       bigint NOT NULL,
        "storage_locator"  varchar(1024) NOT NULL,
        "status"           "documents_status_enum" NOT NULL DEFAULT 'pending',
        "extracted_text"   text,
        "summary"          text,
        "summary_metadata" jsonb,
        "error_code"       varchar(64),
        "error_message"    text,
        "attempt_count"    integer NOT NULL DEFAULT 0,
        "is_deleted"       boolean NOT NULL DEFAULT false,
        "created_at"       TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"       TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_documents" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_documents_summary_processed"
          CHECK (("summary" IS NOT NULL) = ("status" = 'processed')),
        CONSTRAINT "CHK_documents_error_failed"
          CHECK (("error_message" IS NOT NULL) = ("status" = 'failed'))
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_documents_status_active" ON "documents" ("status", "is_deleted")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "documents"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "documents_status_enum"`);
  }
}
