import { Inject, Injectable, Logger } from '@nestjs/common';
import { isUUID } from 'class-validator';
import {
  Observable,
  concat,
  defer,
  from,
  of,
  switchMap,
  takeWhile,
} from 'rxjs';
import {
  Extraction,
  ExtractionPage,
  JOB_STORE,
  Job,
  JobPage,
  JobStore,
  isTerminalJobStatus,
} from '@sheetwise/database';
import {
  JOB_EVENT_SINK,
  JobEventSink,
  JobProgressEvent,
  RedisSubscriberService,
  WORK_QUEUE,
  WorkQueue,
  isJobProgressEvent,
  isTerminalProgressStatus,
  progressChannel,
} from '@sheetwise/redis';
import {
  ActiveJobConflictException,
  DocumentNotFoundException,
  ExtractionNotFoundException,
  InvalidJobQueryException,
  JobAlreadyTerminalException,
  JobNotFoundException,
} from './exceptions/job.exceptions';
import { ListJobsInput, toListJobsQuery } from './dto/list-jobs-query.dto';
import {
  ListExtractionsInput,
  toListExtractionsQuery,
} from './dto/list-extractions-query.dto';
import { snapshotEvent } from './jobs.mapper';

const MAX_NOTES_LENGTH = 10_000;

/**
 * JobsService — the orchestrator. Owns the job lifecycle as seen by
 * callers: creation and dispatch, cancellation, status reads, listing,
 * extraction lookup and the progress feed.
 *
 * Every state change goes through the JobStore's compare-and-set
 * operations; this service never writes a job row directly.
 */
@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);

  constructor(
    @Inject(JOB_STORE)
    private readonly store: JobStore,

    @Inject(WORK_QUEUE)
    private readonly queue: WorkQueue,

    @Inject(JOB_EVENT_SINK)
    private readonly events: JobEventSink,

    private readonly subscriber: RedisSubscriberService,
  ) {}

  /**
   * Creates a PENDING job for the document and enqueues it.
   *
   * A failed enqueue is not reported to the caller: the job is committed,
   * and the watchdog's pending sweep enqueues it again.
   */
  async createJob(documentId: string): Promise<Job> {
    if (!isUUID(documentId)) {
      throw new DocumentNotFoundException(documentId);
    }

    const result = await this.store.createJob(documentId);
    if (result.outcome === 'document_not_found') {
      throw new DocumentNotFoundException(documentId);
    }
    if (result.outcome === 'active_job_exists') {
      throw new ActiveJobConflictException(documentId, result.activeJobId);
    }

    const job = result.job;
    this.logger.log(`Created job ${job.id} for document ${documentId}`);

    try {
      await this.queue.enqueue(job.id);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Job ${job.id} saved but not enqueued; the watchdog will retry: ${message}`,
      );
    }

    await this.events.publish(snapshotEvent(job, 'Job queued'));
    return job;
  }

  /**
   * Cancels a job. PENDING jobs (and jobs whose lease was released) are
   * canceled at once; a job held by a worker is flagged and stops at its
   * next checkpoint, so the returned job may still be PROCESSING.
   */
  async cancelJob(jobId: string): Promise<Job> {
    const result = await this.store.cancel(this.requireJobId(jobId));

    switch (result.outcome) {
      case 'not_found':
        throw new JobNotFoundException(jobId);
      case 'already_terminal':
        throw new JobAlreadyTerminalException(jobId, result.job.status);
      case 'canceled':
        this.logger.log(`Job ${jobId} canceled`);
        await this.events.publish(snapshotEvent(result.job, 'Job canceled'));
        return result.job;
      case 'cancel_requested':
        this.logger.log(`Cancellation requested for running job ${jobId}`);
        return result.job;
    }
  }

  async getJob(jobId: string): Promise<Job> {
    const job = await this.store.findJob(this.requireJobId(jobId));
    if (!job) {
      throw new JobNotFoundException(jobId);
    }
    return job;
  }

  /**
   * Newest first; see ListJobsQueryDto for paging limits. A documentId
   * filter gives the job history of one document.
   */
  async listJobs(input: ListJobsInput): Promise<JobPage> {
    const query = toListJobsQuery(input);
    return this.store.listJobs(
      { status: query.status, documentId: query.documentId },
      { page: query.page, pageSize: query.pageSize },
    );
  }

  async getExtractionForJob(jobId: string): Promise<Extraction> {
    const job = await this.getJob(jobId);
    const extraction = await this.store.findExtractionByJobId(job.id);
    if (!extraction) {
      throw new ExtractionNotFoundException(jobId, job.status);
    }
    return extraction;
  }

  /** Extractions newest first, optionally those of a single document. */
  async listExtractions(input: ListExtractionsInput): Promise<ExtractionPage> {
    const query = toListExtractionsQuery(input);
    return this.store.listExtractions(
      { documentId: query.documentId },
      { page: query.page, pageSize: query.pageSize },
    );
  }

  /** Sets the reviewer notes of an extraction; blank notes clear them. */
  async annotateExtraction(jobId: string, notes: string): Promise<Extraction> {
    if (notes.length > MAX_NOTES_LENGTH) {
      throw new InvalidJobQueryException(
        `notes must be at most ${MAX_NOTES_LENGTH} characters`,
      );
    }

    const job = await this.getJob(jobId);
    const trimmed = notes.trim();
    const extraction = await this.store.annotateExtraction(
      job.id,
      trimmed === '' ? null : trimmed,
    );
    if (!extraction) {
      throw new ExtractionNotFoundException(jobId, job.status);
    }
    return extraction;
  }

  /**
   * Records progress for the claim identified by `claimToken`.
   *
   * Returns false, without throwing, when the update does not apply: the
   * token is stale, the job is no longer PROCESSING, or the value would
   * move progress backwards. Storage failures are logged and also yield
   * false; progress is advisory.
   */
  async updateProgress(
    jobId: string,
    percent: number,
    claimToken: string,
  ): Promise<boolean> {
    if (Number.isNaN(percent)) return false;
    const clamped = Math.min(100, Math.max(0, percent));

    try {
      return await this.store.updateProgress(jobId, claimToken, clamped);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Could not record progress ${clamped}% for job ${jobId}: ${message}`,
      );
      return false;
    }
  }

  /**
   * Current state of the job followed by live events until a terminal one.
   * A job that is already terminal yields a single snapshot.
   */
  watchProgress(jobId: string): Observable<JobProgressEvent> {
    return defer(() => from(this.getJob(jobId))).pipe(
      switchMap((job) => {
        const snapshot = of(snapshotEvent(job, `Job is ${job.status}`));
        if (isTerminalJobStatus(job.status)) {
          return snapshot;
        }

        const live = this.subscriber
          .subscribeJson(progressChannel(job.id), isJobProgressEvent)
          .pipe(
            takeWhile((event) => !isTerminalProgressStatus(event.status), true),
          );

        this.logger.debug(`Opened progress stream for job ${job.id}`);
        return concat(snapshot, live);
      }),
    );
  }

  private requireJobId(jobId: string): string {
    if (!isUUID(jobId)) {
      throw new JobNotFoundException(jobId);
    }
    return jobId;
  }
}
