// ── Entities ────────────────────────────────────────────────
export { Document } from './entities/document.entity';
export { Job } from './entities/job.entity';
export { Extraction } from './entities/extraction.entity';
export type {
  ValidationReport,
  ValidationIssue,
} from './entities/extraction.entity';

// ── Enums ───────────────────────────────────────────────────
export { DocumentStatus } from './enums/document-status.enum';
export {
  JobStatus,
  ACTIVE_JOB_STATUSES,
  TERMINAL_JOB_STATUSES,
  isTerminalJobStatus,
} from './enums/job-status.enum';

// ── Job store ───────────────────────────────────────────────
export { JOB_STORE } from './job-store/job-store.interface';
export type {
  JobStore,
  JobListFilter,
  PageRequest,
  JobPage,
  ExtractionListFilter,
  ExtractionPage,
  CreateJobResult,
  JobClaim,
  ClaimResult,
  CancelJobResult,
  LeaseState,
  NewExtraction,
  ReclaimRequest,
  ReclaimResult,
} from './job-store/job-store.interface';
export { StorageError } from './job-store/job-store.errors';
export { TypeOrmJobStore } from './job-store/typeorm-job-store';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
