import { randomUUID } from 'crypto';
import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import {
  DataSource,
  EntityManager,
  FindOptionsWhere,
  QueryFailedError,
} from 'typeorm';
import { Document } from '../entities/document.entity';
import { Job } from '../entities/job.entity';
import { Extraction } from '../entities/extraction.entity';
import { DocumentStatus } from '../enums/document-status.enum';
import {
  ACTIVE_JOB_STATUSES,
  JobStatus,
  isTerminalJobStatus,
} from '../enums/job-status.enum';
import {
  CancelJobResult,
  ClaimResult,
  CreateJobResult,
  ExtractionListFilter,
  ExtractionPage,
  JobListFilter,
  JobPage,
  JobStore,
  LeaseState,
  NewExtraction,
  PageRequest,
  ReclaimRequest,
  ReclaimResult,
} from './job-store.interface';
import { StorageError } from './job-store.errors';

/** PostgreSQL unique_violation */
const UNIQUE_VIOLATION = '23505';

const ACTIVE_JOB_CONSTRAINT = 'UQ_jobs_document_active';

/**
 * TypeOrmJobStore — JobStore backed by PostgreSQL.
 *
 * Claim and finalize operations lock the job row (SELECT … FOR UPDATE)
 * inside a transaction and compare (status, claim_token) before writing, so
 * two workers racing on a redelivered job serialize on the row lock and
 * only the holder of the current token can move it forward.
 */
@Injectable()
export class TypeOrmJobStore implements JobStore {
  private readonly logger = new Logger(TypeOrmJobStore.name);

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  // ── Reads ────────────────────────────────────────────────

  findDocument(documentId: string): Promise<Document | null> {
    return this.run('findDocument', () =>
      this.dataSource.manager.findOne(Document, { where: { id: documentId } }),
    );
  }

  findJob(jobId: string): Promise<Job | null> {
    return this.run('findJob', () =>
      this.dataSource.manager.findOne(Job, { where: { id: jobId } }),
    );
  }

  async listJobs(filter: JobListFilter, page: PageRequest): Promise<JobPage> {
    const where: FindOptionsWhere<Job> = {};
    if (filter.status) where.status = filter.status;
    if (filter.documentId) where.documentId = filter.documentId;

    const [items, total] = await this.run('listJobs', () =>
      this.dataSource.manager.findAndCount(Job, {
        where,
        order: { createdAt: 'DESC' },
        skip: (page.page - 1) * page.pageSize,
        take: page.pageSize,
      }),
    );

    return { items, total, page: page.page, pageSize: page.pageSize };
  }

  findExtractionByJobId(jobId: string): Promise<Extraction | null> {
    return this.run('findExtractionByJobId', () =>
      this.dataSource.manager.findOne(Extraction, { where: { jobId } }),
    );
  }

  async listExtractions(
    filter: ExtractionListFilter,
    page: PageRequest,
  ): Promise<ExtractionPage> {
    const where: FindOptionsWhere<Extraction> = {};
    if (filter.documentId) where.documentId = filter.documentId;

    const [items, total] = await this.run('listExtractions', () =>
      this.dataSource.manager.findAndCount(Extraction, {
        where,
        order: { extractedAt: 'DESC' },
        skip: (page.page - 1) * page.pageSize,
        take: page.pageSize,
      }),
    );

    return { items, total, page: page.page, pageSize: page.pageSize };
  }

  checkLease(jobId: string, claimToken: string): Promise<LeaseState> {
    return this.run('checkLease', async () => {
      const job = await this.dataSource.manager.findOne(Job, {
        where: { id: jobId },
        select: {
          id: true,
          status: true,
          claimToken: true,
          cancelRequested: true,
        },
      });

      if (!job || !holds(job, claimToken)) return 'lost';
      return job.cancelRequested ? 'cancel_requested' : 'held';
    });
  }

  findStaleProcessingJobs(staleBefore: Date, limit: number): Promise<Job[]> {
    return this.run('findStaleProcessingJobs', () =>
      this.dataSource.manager
        .createQueryBuilder(Job, 'job')
        .where('job.status = :status', { status: JobStatus.PROCESSING })
        .andWhere('COALESCE(job.heartbeat_at, job.updated_at) < :staleBefore', {
          staleBefore,
        })
        .orderBy('job.updated_at', 'ASC')
        .take(limit)
        .getMany(),
    );
  }

  findStalePendingJobs(staleBefore: Date, limit: number): Promise<Job[]> {
    return this.run('findStalePendingJobs', () =>
      this.dataSource.manager
        .createQueryBuilder(Job, 'job')
        .where('job.status = :status', { status: JobStatus.PENDING })
        .andWhere('job.updated_at < :staleBefore', { staleBefore })
        .orderBy('job.updated_at', 'ASC')
        .take(limit)
        .getMany(),
    );
  }

  // ── Orchestrator writes ──────────────────────────────────

  async createJob(documentId: string): Promise<CreateJobResult> {
    try {
      return await this.dataSource.transaction(
        async (manager): Promise<CreateJobResult> => {
          const document = await manager.findOne(Document, {
            where: { id: documentId },
          });
          if (!document) {
            return { outcome: 'document_not_found' };
          }

          const job = manager.create(Job, {
            documentId,
            status: JobStatus.PENDING,
            progress: 0,
            claimToken: null,
            attempts: 0,
            cancelRequested: false,
            errorMessage: null,
            heartbeatAt: null,
            startedAt: null,
            completedAt: null,
          });
          const savedJob = await manager.save(Job, job);

          this.logger.log(
            `Transaction committed: job ${savedJob.id} for document ${documentId}`,
          );
          return { outcome: 'created', job: savedJob };
        },
      );
    } catch (error) {
      if (isUniqueViolation(error, ACTIVE_JOB_CONSTRAINT)) {
        const active = await this.findActiveJob(documentId);
        return {
          outcome: 'active_job_exists',
          activeJobId: active?.id ?? null,
        };
      }
      throw new StorageError('createJob', error);
    }
  }

  cancel(jobId: string): Promise<CancelJobResult> {
    return this.transaction(
      'cancel',
      async (manager): Promise<CancelJobResult> => {
        const job = await this.lockJob(manager, jobId);
        if (!job) return { outcome: 'not_found' };

        if (isTerminalJobStatus(job.status)) {
          return { outcome: 'already_terminal', job };
        }

        // Not owned by any worker: cancel immediately. A worker that has
        // already dequeued the id will fail its claim against CANCELED.
        if (job.status === JobStatus.PENDING || job.claimToken === null) {
          const wasProcessing = job.status === JobStatus.PROCESSING;
          await manager.update(
            Job,
            { id: jobId },
            {
              status: JobStatus.CANCELED,
              cancelRequested: true,
              completedAt: new Date(),
            },
          );
          if (wasProcessing) {
            await manager.update(
              Document,
              { id: job.documentId },
              { status: DocumentStatus.UPLOADED },
            );
          }
          return {
            outcome: 'canceled',
            job: await this.reloadJob(manager, jobId),
          };
        }

        await manager.update(Job, { id: jobId }, { cancelRequested: true });
        return {
          outcome: 'cancel_requested',
          job: await this.reloadJob(manager, jobId),
        };
      },
    );
  }

  annotateExtraction(
    jobId: string,
    notes: string | null,
  ): Promise<Extraction | null> {
    return this.transaction('annotateExtraction', async (manager) => {
      const result = await manager.update(Extraction, { jobId }, { notes });
      if (!result.affected) return null;
      return manager.findOne(Extraction, { where: { jobId } });
    });
  }

  touchPendingJob(jobId: string): Promise<void> {
    return this.run('touchPendingJob', async () => {
      await this.dataSource.manager
        .createQueryBuilder()
        .update(Job)
        .set({ updatedAt: () => 'now()' })
        .where('id = :jobId', { jobId })
        .andWhere('status = :status', { status: JobStatus.PENDING })
        .execute();
    });
  }

  // ── Worker writes (compare-and-set on claim token) ───────

  claim(jobId: string): Promise<ClaimResult> {
    return this.transaction('claim', async (manager): Promise<ClaimResult> => {
      const job = await this.lockJob(manager, jobId);
      if (!job) return { outcome: 'not_found' };

      if (isTerminalJobStatus(job.status)) {
        return { outcome: 'terminal', status: job.status };
      }
      if (job.status === JobStatus.PROCESSING && job.claimToken !== null) {
        return { outcome: 'held' };
      }

      const claimToken = randomUUID();
      const now = new Date();

      await manager.update(
        Job,
        { id: jobId },
        {
          status: JobStatus.PROCESSING,
          claimToken,
          attempts: job.attempts + 1,
          heartbeatAt: now,
          startedAt: job.startedAt ?? now,
        },
      );
      await manager.update(
        Document,
        { id: job.documentId },
        { status: DocumentStatus.PROCESSING, errorMessage: null },
      );

      const document = await manager.findOneOrFail(Document, {
        where: { id: job.documentId },
      });
      const claimed = await this.reloadJob(manager, jobId);

      return {
        outcome: 'claimed',
        claim: { job: claimed, document, claimToken },
      };
    });
  }

  updateProgress(
    jobId: string,
    claimToken: string,
    percent: number,
  ): Promise<boolean> {
    return this.run('updateProgress', async () => {
      const result = await this.dataSource.manager
        .createQueryBuilder()
        .update(Job)
        .set({ progress: percent, heartbeatAt: new Date() })
        .where('id = :jobId', { jobId })
        .andWhere('claim_token = :claimToken', { claimToken })
        .andWhere('status = :status', { status: JobStatus.PROCESSING })
        .andWhere('progress <= :percent', { percent })
        .execute();
      return (result.affected ?? 0) > 0;
    });
  }

  heartbeat(jobId: string, claimToken: string): Promise<boolean> {
    return this.run('heartbeat', () =>
      this.updateHeld(jobId, claimToken, { heartbeatAt: new Date() }),
    );
  }

  completeJob(
    jobId: string,
    claimToken: string,
    input: NewExtraction,
  ): Promise<Extraction | null> {
    return this.transaction('completeJob', async (manager) => {
      const job = await this.lockHeldJob(manager, jobId, claimToken);
      if (!job) return null;

      const now = new Date();
      await manager.update(
        Job,
        { id: jobId },
        {
          status: JobStatus.COMPLETED,
          progress: 100,
          errorMessage: null,
          heartbeatAt: now,
          completedAt: now,
        },
      );

      const extraction = manager.create(Extraction, {
        jobId,
        documentId: job.documentId,
        extractedData: input.extractedData,
        confidenceScore: input.confidenceScore,
        formatType: input.formatType,
        validationResults: input.validationResults,
        extractedAt: input.extractedAt,
        notes: input.notes,
      });
      const saved = await manager.save(Extraction, extraction);

      await manager.update(
        Document,
        { id: job.documentId },
        { status: DocumentStatus.PROCESSED, errorMessage: null },
      );

      return saved;
    });
  }

  failJob(
    jobId: string,
    claimToken: string,
    errorMessage: string,
  ): Promise<boolean> {
    return this.transaction('failJob', async (manager) => {
      const job = await this.lockHeldJob(manager, jobId, claimToken);
      if (!job) return false;

      await this.markFailed(manager, job, errorMessage);
      return true;
    });
  }

  cancelClaimedJob(jobId: string, claimToken: string): Promise<boolean> {
    return this.transaction('cancelClaimedJob', async (manager) => {
      const job = await this.lockHeldJob(manager, jobId, claimToken);
      if (!job) return false;

      await this.markCanceled(manager, job);
      return true;
    });
  }

  releaseClaim(jobId: string, claimToken: string): Promise<boolean> {
    return this.run('releaseClaim', () =>
      this.updateHeld(jobId, claimToken, {
        claimToken: null,
        heartbeatAt: new Date(),
      }),
    );
  }

  reclaimStaleJob(
    jobId: string,
    request: ReclaimRequest,
  ): Promise<ReclaimResult> {
    return this.transaction(
      'reclaimStaleJob',
      async (manager): Promise<ReclaimResult> => {
        const job = await this.lockJob(manager, jobId);
        if (!job || job.status !== JobStatus.PROCESSING) return 'skipped';
        if (job.claimToken !== request.expectedClaimToken) return 'skipped';

        // Re-check under the lock: a heartbeat may have landed since the scan
        const lastSeen = job.heartbeatAt ?? job.updatedAt;
        if (lastSeen.getTime() >= request.staleBefore.getTime()) {
          return 'skipped';
        }

        if (job.cancelRequested) {
          await this.markCanceled(manager, job);
          return 'canceled';
        }

        if (job.attempts >= request.maxAttempts) {
          await this.markFailed(manager, job, request.errorMessage);
          return 'failed';
        }

        await manager.update(
          Job,
          { id: jobId },
          { claimToken: null, heartbeatAt: new Date() },
        );
        return 'released';
      },
    );
  }

  // ── Helpers ──────────────────────────────────────────────

  private async updateHeld(
    jobId: string,
    claimToken: string,
    changes: Partial<Pick<Job, 'claimToken' | 'heartbeatAt'>>,
  ): Promise<boolean> {
    const result = await this.dataSource.manager.update(
      Job,
      { id: jobId, claimToken, status: JobStatus.PROCESSING },
      changes,
    );
    return (result.affected ?? 0) > 0;
  }

  private async markFailed(
    manager: EntityManager,
    job: Job,
    errorMessage: string,
  ): Promise<void> {
    await manager.update(
      Job,
      { id: job.id },
      { status: JobStatus.FAILED, errorMessage, completedAt: new Date() },
    );
    await manager.update(
      Document,
      { id: job.documentId },
      { status: DocumentStatus.ERROR, errorMessage },
    );
  }

  private async markCanceled(manager: EntityManager, job: Job): Promise<void> {
    await manager.update(
      Job,
      { id: job.id },
      {
        status: JobStatus.CANCELED,
        errorMessage: null,
        completedAt: new Date(),
      },
    );
    await manager.update(
      Document,
      { id: job.documentId },
      { status: DocumentStatus.UPLOADED },
    );
  }

  private lockJob(manager: EntityManager, jobId: string): Promise<Job | null> {
    return manager.findOne(Job, {
      where: { id: jobId },
      lock: { mode: 'pessimistic_write' },
    });
  }

  private async lockHeldJob(
    manager: EntityManager,
    jobId: string,
    claimToken: string,
  ): Promise<Job | null> {
    const job = await this.lockJob(manager, jobId);
    if (!job || !holds(job, claimToken)) {
      this.logger.warn(`Stale claim on job ${jobId}: finalize skipped`);
      return null;
    }
    return job;
  }

  private reloadJob(manager: EntityManager, jobId: string): Promise<Job> {
    return manager.findOneOrFail(Job, { where: { id: jobId } });
  }

  private async findActiveJob(documentId: string): Promise<Job | null> {
    const jobs = await this.dataSource.manager.find(Job, {
      where: ACTIVE_JOB_STATUSES.map((status) => ({ documentId, status })),
      take: 1,
    });
    return jobs[0] ?? null;
  }

  private transaction<T>(
    operation: string,
    work: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    return this.run(operation, () => this.dataSource.transaction(work));
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Job store operation "${operation}" failed: ${message}`,
      );
      throw new StorageError(operation, error);
    }
  }
}

function holds(job: Job, claimToken: string): boolean {
  return job.status === JobStatus.PROCESSING && job.claimToken === claimToken;
}

function isUniqueViolation(error: unknown, constraint: string): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) return false;
  return (
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION &&
    'constraint' in driverError &&
    driverError.constraint === constraint
  );
}
