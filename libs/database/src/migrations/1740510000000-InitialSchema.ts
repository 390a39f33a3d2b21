import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration — documents, jobs, extractions.
 *
 * Hand-written to match the entity definitions. Two constraints carry the
 * engine's concurrency guarantees and have no decorator equivalent:
 *
 * - UQ_jobs_document_active: partial unique index allowing one PENDING or
 *   PROCESSING job per document. Concurrent job creation loses on 23505.
 * - UQ_extractions_job_id: at most one extraction per job.
 */
export class InitialSchema1740510000000 implements MigrationInterface {
  name = 'InitialSchema1740510000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // ── Enum types ─────────────────────────────────────────
    await queryRunner.query(
      `CREATE TYPE "documents_status_enum" AS ENUM ('uploaded', 'processing', 'processed', 'error')`,
    );
    await queryRunner.query(
      `CREATE TYPE "jobs_status_enum" AS ENUM ('pending', 'processing', 'completed', 'failed', 'canceled')`,
    );

    // ── Documents ──────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "documents" (
        "id"            uuid NOT NULL DEFAULT uuid_generate_v4(),
        "filename"      varchar(255) NOT NULL,
        "file_type"     varchar(20) NOT NULL,
        "subtype"       varchar(50) NOT NULL,
        "file_size"     bigint NOT NULL,
        "storage_ref"   varchar(1024) NOT NULL,
        "status"        "documents_status_enum" NOT NULL DEFAULT 'uploaded',
        "error_message" text,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_documents" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_documents_status" ON "documents" ("status")`,
    );

    // ── Jobs ───────────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "jobs" (
        "id"               uuid NOT NULL DEFAULT uuid_generate_v4(),
        "document_id"      uuid NOT NULL,
        "status"           "jobs_status_enum" NOT NULL DEFAULT 'pending',
        "progress"         double precision NOT NULL DEFAULT 0,
        "claim_token"      uuid,
        "attempts"         integer NOT NULL DEFAULT 0,
        "cancel_requested" boolean NOT NULL DEFAULT false,
        "error_message"    text,
        "heartbeat_at"     TIMESTAMPTZ,
        "started_at"       TIMESTAMPTZ,
        "completed_at"     TIMESTAMPTZ,
        "created_at"       TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"       TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_jobs" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_jobs_progress" CHECK ("progress" >= 0 AND "progress" <= 100),
        CONSTRAINT "FK_jobs_document" FOREIGN KEY ("document_id")
          REFERENCES "documents"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_jobs_document_id" ON "jobs" ("document_id")`,
    );
    await queryRunner.query(`CREATE INDEX "IDX_jobs_status" ON "jobs" ("status")`);
    await queryRunner.query(
      `CREATE INDEX "IDX_jobs_status_heartbeat" ON "jobs" ("status", "heartbeat_at")`,
    );
    await queryRunner.query(`
      CREATE UNIQUE INDEX "UQ_jobs_document_active" ON "jobs" ("document_id")
        WHERE "status" IN ('pending', 'processing')
    `);

    // ── Extractions ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "extractions" (
        "id"                 uuid NOT NULL DEFAULT uuid_generate_v4(),
        "job_id"             uuid NOT NULL,
        "document_id"        uuid NOT NULL,
        "extracted_data"     jsonb NOT NULL,
        "confidence_score"   double precision NOT NULL,
        "format_type"        varchar(50) NOT NULL,
        "validation_results" jsonb NOT NULL,
        "extracted_at"       TIMESTAMPTZ NOT NULL,
        "notes"              text,
        "created_at"         TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"         TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_extractions" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_extractions_confidence" CHECK ("confidence_score" >= 0 AND "confidence_score" <= 1),
        CONSTRAINT "FK_extractions_job" FOREIGN KEY ("job_id")
          REFERENCES "jobs"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_extractions_document" FOREIGN KEY ("document_id")
          REFERENCES "documents"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_extractions_job_id" ON "extractions" ("job_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_extractions_document_id" ON "extractions" ("document_id")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "extractions"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "jobs"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "documents"`);

    await queryRunner.query(`DROP TYPE IF EXISTS "jobs_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "documents_status_enum"`);

    await queryRunner.query(`DROP EXTENSION IF EXISTS "uuid-ossp"`);
  }
}
