import { Extraction, Job, JobStatus } from '@sheetwise/database';
import {
  ExtractionReply,
  GrpcTimestamp,
  JobReply,
  ProgressUpdate,
} from '@sheetwise/proto';
import { JobProgressEvent, JobProgressStatus } from '@sheetwise/redis';

const PROGRESS_STATUS: Readonly<Record<JobStatus, JobProgressStatus>> = {
  [JobStatus.PENDING]: 'pending',
  [JobStatus.PROCESSING]: 'processing',
  [JobStatus.COMPLETED]: 'completed',
  [JobStatus.FAILED]: 'failed',
  [JobStatus.CANCELED]: 'canceled',
};

export function toProgressStatus(status: JobStatus): JobProgressStatus {
  return PROGRESS_STATUS[status];
}

export function toGrpcTimestamp(date: Date): GrpcTimestamp {
  const ms = date.getTime();
  return {
    seconds: Math.floor(ms / 1000),
    nanos: (ms % 1000) * 1_000_000,
  };
}

export function toJobReply(job: Job): JobReply {
  return {
    id: job.id,
    documentId: job.documentId,
    status: job.status,
    progress: job.progress,
    errorMessage: job.errorMessage ?? '',
    attempts: job.attempts,
    cancelRequested: job.cancelRequested,
    createdAt: toGrpcTimestamp(job.createdAt),
    updatedAt: toGrpcTimestamp(job.updatedAt),
    completedAt: job.completedAt ? toGrpcTimestamp(job.completedAt) : null,
  };
}

export function toExtractionReply(extraction: Extraction): ExtractionReply {
  const report = extraction.validationResults;
  return {
    id: extraction.id,
    jobId: extraction.jobId,
    documentId: extraction.documentId,
    extractedData: JSON.stringify(extraction.extractedData),
    confidenceScore: extraction.confidenceScore,
    formatType: extraction.formatType,
    valid: report.valid,
    errors: report.errors,
    warnings: report.warnings,
    notes: extraction.notes ?? '',
    extractedAt: toGrpcTimestamp(extraction.extractedAt),
  };
}

export function toProgressUpdate(event: JobProgressEvent): ProgressUpdate {
  return {
    jobId: event.jobId,
    status: event.status,
    progress: event.progress,
    stage: event.stage ?? '',
    message: event.message,
    errorMessage: event.errorMessage ?? '',
    updatedAt: toGrpcTimestamp(new Date(event.publishedAt)),
  };
}

/** Event describing a job as currently stored, for watchers that join late. */
export function snapshotEvent(job: Job, message: string): JobProgressEvent {
  const status = toProgressStatus(job.status);
  return {
    jobId: job.id,
    documentId: job.documentId,
    status,
    progress: job.progress,
    stage: null,
    message,
    ...(status === 'failed' && job.errorMessage
      ? { errorMessage: job.errorMessage }
      : {}),
    publishedAt: (job.completedAt ?? job.updatedAt).toISOString(),
  };
}
