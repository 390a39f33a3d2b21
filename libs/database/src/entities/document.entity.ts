import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { Job } from './job.entity';
import { DocumentStatus } from '../enums/document-status.enum';

/**
 * Document entity — an uploaded spreadsheet, before or after extraction.
 *
 * Invariants:
 * - Content is owned by the upload flow; jobs read it but never change it
 * - status mirrors the outcome of the most recent job
 * - storage_ref is the object-store key of the raw bytes
 * - subtype selects the parser/extractor/validator triple in the registry
 * - Deleting a document cascades to its jobs and extractions
 */
@Entity('documents')
export class Document {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  filename!: string;

  @Column({ type: 'varchar', length: 20, name: 'file_type' })
  fileType!: string;

  @Column({ type: 'varchar', length: 50 })
  subtype!: string;

  @Column({ type: 'bigint', name: 'file_size' })
  fileSize!: string; // bigint stored as string by pg driver

  @Column({ type: 'varchar', length: 1024, name: 'storage_ref' })
  storageRef!: string;

  @Index('IDX_documents_status')
  @Column({
    type: 'enum',
    enum: DocumentStatus,
    default: DocumentStatus.UPLOADED,
  })
  status!: DocumentStatus;

  @Column({ type: 'text', name: 'error_message', nullable: true })
  errorMessage!: string | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => Job, (job) => job.document, { cascade: false })
  jobs!: Job[];
}
