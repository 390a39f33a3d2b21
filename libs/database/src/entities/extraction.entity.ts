import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToOne,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Job } from './job.entity';
import { Document } from './document.entity';

/** Outcome of the validate stage, stored verbatim on the extraction. */
export interface ValidationReport {
  valid: boolean;
  schemaType: string;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Extraction entity — the structured result of a completed job.
 *
 * Invariants:
 * - Exists iff its job is COMPLETED; written in the same transaction that
 *   moves the job to COMPLETED
 * - job_id is unique: never more than one extraction per job
 * - Immutable after creation except for notes
 * - confidence_score is in [0, 1]
 */
@Entity('extractions')
export class Extraction {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('UQ_extractions_job_id', { unique: true })
  @Column({ type: 'uuid', name: 'job_id' })
  jobId!: string;

  @Index('IDX_extractions_document_id')
  @Column({ type: 'uuid', name: 'document_id' })
  documentId!: string;

  @Column({ type: 'jsonb', name: 'extracted_data' })
  extractedData!: Record<string, unknown>;

  @Column({ type: 'double precision', name: 'confidence_score' })
  confidenceScore!: number;

  @Column({ type: 'varchar', length: 50, name: 'format_type' })
  formatType!: string;

  @Column({ type: 'jsonb', name: 'validation_results' })
  validationResults!: ValidationReport;

  @Column({ type: 'timestamptz', name: 'extracted_at' })
  extractedAt!: Date;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @OneToOne(() => Job, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'job_id' })
  job!: Job;

  @ManyToOne(() => Document, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'document_id' })
  document!: Document;
}
