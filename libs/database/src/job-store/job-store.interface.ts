import { Document } from '../entities/document.entity';
import { Job } from '../entities/job.entity';
import { Extraction, ValidationReport } from '../entities/extraction.entity';
import { JobStatus } from '../enums/job-status.enum';

/** Injection token for the JobStore implementation */
export const JOB_STORE = 'JOB_STORE';

export interface JobListFilter {
  status?: JobStatus;
  documentId?: string;
}

export interface PageRequest {
  /** 1-based page number */
  page: number;
  pageSize: number;
}

export interface JobPage {
  items: Job[];
  total: number;
  page: number;
  pageSize: number;
}

export interface ExtractionListFilter {
  documentId?: string;
}

export interface ExtractionPage {
  items: Extraction[];
  total: number;
  page: number;
  pageSize: number;
}

export type CreateJobResult =
  | { outcome: 'created'; job: Job }
  | { outcome: 'document_not_found' }
  | { outcome: 'active_job_exists'; activeJobId: string | null };

export interface JobClaim {
  job: Job;
  document: Document;
  claimToken: string;
}

export type ClaimResult =
  | { outcome: 'claimed'; claim: JobClaim }
  | { outcome: 'not_found' }
  | { outcome: 'terminal'; status: JobStatus }
  | { outcome: 'held' };

export type CancelJobResult =
  | { outcome: 'not_found' }
  | { outcome: 'already_terminal'; job: Job }
  | { outcome: 'canceled'; job: Job }
  | { outcome: 'cancel_requested'; job: Job };

/**
 * State of a worker's claim as seen by the store.
 * - held: the caller still owns the job
 * - cancel_requested: the caller owns it and must stop at the next checkpoint
 * - lost: another attempt owns the job, or it is no longer PROCESSING
 */
export type LeaseState = 'held' | 'cancel_requested' | 'lost';

export interface NewExtraction {
  extractedData: Record<string, unknown>;
  confidenceScore: number;
  formatType: string;
  validationResults: ValidationReport;
  extractedAt: Date;
  notes: string | null;
}

export interface ReclaimRequest {
  /** Token observed when the job was found stale; null for a released lease */
  expectedClaimToken: string | null;
  staleBefore: Date;
  maxAttempts: number;
  errorMessage: string;
}

export type ReclaimResult = 'released' | 'failed' | 'canceled' | 'skipped';

/**
 * JobStore — persistence contract for documents, jobs and extractions.
 *
 * Every write a worker performs is a compare-and-set on
 * (status, claim_token), so a worker whose claim was superseded can never
 * modify the job again.
 * Finalizing operations write the job, its extraction and the document status
 * in one transaction.
 */
export interface JobStore {
  findDocument(documentId: string): Promise<Document | null>;

  /** Inserts a PENDING job; the store enforces one active job per document. */
  createJob(documentId: string): Promise<CreateJobResult>;

  findJob(jobId: string): Promise<Job | null>;

  listJobs(filter: JobListFilter, page: PageRequest): Promise<JobPage>;

  findExtractionByJobId(jobId: string): Promise<Extraction | null>;

  /** Newest extraction first. */
  listExtractions(
    filter: ExtractionListFilter,
    page: PageRequest,
  ): Promise<ExtractionPage>;

  /** Updates the only mutable extraction field. Returns null when absent. */
  annotateExtraction(
    jobId: string,
    notes: string | null,
  ): Promise<Extraction | null>;

  /**
   * PENDING → PROCESSING (or re-claim of a released PROCESSING lease) with a
   * fresh claim token. Exactly one concurrent caller can succeed.
   */
  claim(jobId: string): Promise<ClaimResult>;

  /** No-op (false) unless the token matches and percent ≥ current progress. */
  updateProgress(
    jobId: string,
    claimToken: string,
    percent: number,
  ): Promise<boolean>;

  heartbeat(jobId: string, claimToken: string): Promise<boolean>;

  checkLease(jobId: string, claimToken: string): Promise<LeaseState>;

  cancel(jobId: string): Promise<CancelJobResult>;

  /** Returns the new extraction, or null if the claim no longer holds. */
  completeJob(
    jobId: string,
    claimToken: string,
    extraction: NewExtraction,
  ): Promise<Extraction | null>;

  failJob(
    jobId: string,
    claimToken: string,
    errorMessage: string,
  ): Promise<boolean>;

  cancelClaimedJob(jobId: string, claimToken: string): Promise<boolean>;

  /**
   * Gives up a claim without an outcome: the job stays PROCESSING with no
   * owner, so the next delivery can claim it again. False when the token
   * no longer holds.
   */
  releaseClaim(jobId: string, claimToken: string): Promise<boolean>;

  /** PROCESSING jobs whose last heartbeat (or update) predates staleBefore. */
  findStaleProcessingJobs(staleBefore: Date, limit: number): Promise<Job[]>;

  /** PENDING jobs not touched since staleBefore (lost enqueue, lost message). */
  findStalePendingJobs(staleBefore: Date, limit: number): Promise<Job[]>;

  /** Bumps updated_at of a PENDING job after it has been re-enqueued. */
  touchPendingJob(jobId: string): Promise<void>;

  reclaimStaleJob(
    jobId: string,
    request: ReclaimRequest,
  ): Promise<ReclaimResult>;
}
