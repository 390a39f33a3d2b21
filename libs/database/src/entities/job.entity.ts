import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Document } from './document.entity';
import { JobStatus } from '../enums/job-status.enum';

/**
 * Job entity — one extraction request for a document.
 *
 * Invariants:
 * - At most one job per document is PENDING or PROCESSING
 *   (partial unique index UQ_jobs_document_active, created by the migration)
 * - claim_token identifies the worker attempt that currently owns the job;
 *   every worker write is a compare-and-set against it
 * - claim_token is NULL while PENDING, and while PROCESSING after the
 *   watchdog released a stale lease
 * - progress is 0–100 and never decreases while PROCESSING
 * - Terminal states: COMPLETED, FAILED, CANCELED; a terminal row is never
 *   written again
 * - error_message is set only on FAILED
 */
@Entity('jobs')
@Index('IDX_jobs_status_heartbeat', ['status', 'heartbeatAt'])
export class Job {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_jobs_document_id')
  @Column({ type: 'uuid', name: 'document_id' })
  documentId!: string;

  @Index('IDX_jobs_status')
  @Column({
    type: 'enum',
    enum: JobStatus,
    default: JobStatus.PENDING,
  })
  status!: JobStatus;

  @Column({ type: 'double precision', default: 0 })
  progress!: number;

  @Column({ type: 'uuid', name: 'claim_token', nullable: true })
  claimToken!: string | null;

  @Column({ type: 'int', default: 0 })
  attempts!: number;

  @Column({ type: 'boolean', name: 'cancel_requested', default: false })
  cancelRequested!: boolean;

  @Column({ type: 'text', name: 'error_message', nullable: true })
  errorMessage!: string | null;

  @Column({ type: 'timestamptz', name: 'heartbeat_at', nullable: true })
  heartbeatAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'started_at', nullable: true })
  startedAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'completed_at', nullable: true })
  completedAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => Document, (document) => document.jobs, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'document_id' })
  document!: Document;
}
