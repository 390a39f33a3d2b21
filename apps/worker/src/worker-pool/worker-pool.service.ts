import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { hostname } from 'os';
import {
  Subscription,
  catchError,
  exhaustMap,
  firstValueFrom,
  from,
  interval,
  map,
  of,
  timeout,
  timer,
} from 'rxjs';
import {
  JOB_STORE,
  Job,
  JobClaim,
  JobStore,
  LeaseState,
} from '@sheetwise/database';
import {
  JobCanceledSignal,
  LeaseLostSignal,
  PipelineStage,
  withRetry,
} from '@sheetwise/pipeline';
import {
  JOB_EVENT_SINK,
  JobEventSink,
  JobProgressStatus,
  QueueConsumer,
  WORK_QUEUE,
  WorkQueue,
} from '@sheetwise/redis';
import { WORKER_SETTINGS, WorkerSettings } from '../config/worker-settings';
import { JobsService } from '../jobs/jobs.service';
import {
  ExecutionHooks,
  ExecutionOutcome,
} from '../pipeline-executor/execution.interfaces';
import {
  PipelineExecutorService,
} from '../pipeline-executor/pipeline-executor.service';

/** Pause after an unexpected loop error */
const LOOP_ERROR_BACKOFF_MS = 1_000;

/** Progress recorded during one claim; never decreases */
interface AttemptState {
  progress: number;
}

/**
 * What one turn of a consumer loop did:
 * - idle: nothing arrived within the block timeout
 * - skipped: the delivery was stale (job terminal, held elsewhere or
 *   gone) and was acked
 * - abandoned: the outcome could not be written; the claim is released
 *   and the delivery is left unacked
 */
export type ProcessResult =
  | 'idle'
  | 'skipped'
  | 'abandoned'
  | ExecutionOutcome['kind'];

/**
 * WorkerPoolService — N consumer loops that take job ids off the queue,
 * claim them and run them through the pipeline executor.
 *
 * A delivery is acked only after the job's outcome has been written (or
 * the job turned out not to need work), so a crash at any point leaves
 * the message for redelivery. Each loop handles one job at a time; the
 * pool's concurrency is the number of loops.
 */
@Injectable()
export class WorkerPoolService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(WorkerPoolService.name);

  private running = false;
  private loops: Promise<void>[] = [];
  private consumers: QueueConsumer[] = [];

  constructor(
    @Inject(JOB_STORE)
    private readonly store: JobStore,

    @Inject(WORK_QUEUE)
    private readonly queue: WorkQueue,

    private readonly executor: PipelineExecutorService,
    private readonly jobs: JobsService,

    @Inject(JOB_EVENT_SINK)
    private readonly events: JobEventSink,

    @Inject(WORKER_SETTINGS)
    private readonly settings: WorkerSettings,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  async start(): Promise<void> {
    if (this.running) return;

    const { concurrency } = this.settings;
    if (concurrency <= 0) {
      this.logger.log(
        'Worker concurrency is 0; this instance will not process jobs',
      );
      return;
    }

    this.running = true;
    for (let index = 0; index < concurrency; index += 1) {
      const consumer = await this.queue.createConsumer(
        `${hostname()}-${process.pid}-${index}`,
      );
      this.consumers.push(consumer);
      this.loops.push(this.runLoop(consumer));
    }
    this.logger.log(`Worker pool started with ${concurrency} consumer(s)`);
  }

  /**
   * Stops taking new deliveries and waits up to the shutdown grace period
   * for in-flight jobs. Jobs still running after that keep their claim and
   * are reclaimed by the watchdog once their heartbeat goes stale.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    const graceMs = this.settings.shutdownGraceMs;
    const drained = await firstValueFrom(
      from(Promise.all(this.loops)).pipe(
        map(() => true),
        timeout({ first: graceMs, with: () => of(false) }),
      ),
    );
    if (!drained) {
      this.logger.warn(
        `Shutdown grace of ${graceMs}ms elapsed with jobs in flight; ` +
          'they will be reclaimed once stale',
      );
    }

    const consumers = this.consumers;
    this.consumers = [];
    this.loops = [];
    await Promise.all(
      consumers.map((consumer) =>
        consumer.close().catch((error: unknown) => {
          const message =
            error instanceof Error ? error.message : String(error);
          this.logger.warn(
            `Could not close consumer ${consumer.name}: ${message}`,
          );
        }),
      ),
    );
    this.logger.log('Worker pool stopped');
  }

  /** Takes at most one delivery from `consumer` and carries it to an outcome. */
  async processNext(consumer: QueueConsumer): Promise<ProcessResult> {
    const delivery = await consumer.dequeue(this.settings.queueBlockMs);
    if (!delivery) return 'idle';

    if (delivery.redelivered) {
      this.logger.log(`Job ${delivery.jobId} redelivered to ${consumer.name}`);
    }

    const claimed = await this.store.claim(delivery.jobId);
    if (claimed.outcome !== 'claimed') {
      this.logger.debug(
        `Skipping delivery of job ${delivery.jobId}: ${claimed.outcome}`,
      );
      await this.queue.ack(delivery.ackHandle);
      return 'skipped';
    }

    const result = await this.runClaimed(claimed.claim);
    if (result !== 'abandoned') {
      await this.queue.ack(delivery.ackHandle);
    }
    return result;
  }

  // ── Job lifecycle ────────────────────────────────────────

  private async runLoop(consumer: QueueConsumer): Promise<void> {
    while (this.running) {
      try {
        await this.processNext(consumer);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Consumer ${consumer.name} failed: ${message}`);
        await firstValueFrom(timer(LOOP_ERROR_BACKOFF_MS));
      }
    }
  }

  private async runClaimed(claim: JobClaim): Promise<ProcessResult> {
    const { job } = claim;
    this.logger.log(`Claimed job ${job.id} (attempt ${job.attempts})`);
    await this.publish(
      job,
      'processing',
      job.progress,
      null,
      `Processing started (attempt ${job.attempts})`,
    );

    const attempt: AttemptState = { progress: job.progress };
    const heartbeat = this.startHeartbeat(claim);
    let outcome: ExecutionOutcome;
    try {
      outcome = await this.executor.execute(
        claim,
        this.hooksFor(claim, attempt),
      );
    } finally {
      heartbeat.unsubscribe();
    }

    return this.finalize(claim, attempt, outcome);
  }

  /**
   * Writes the outcome under the claim token. Storage failures are
   * retried with backoff; once the retries are spent the claim is
   * released so that the unacked delivery can be claimed again.
   */
  private async finalize(
    claim: JobClaim,
    attempt: AttemptState,
    outcome: ExecutionOutcome,
  ): Promise<ProcessResult> {
    const { job, claimToken } = claim;

    try {
      switch (outcome.kind) {
        case 'completed': {
          const extraction = await this.writeOutcome(job, () =>
            this.store.completeJob(job.id, claimToken, outcome.extraction),
          );
          if (!extraction) return this.superseded(job);
          this.logger.log(`Job ${job.id} completed`);
          await this.publish(
            job,
            'completed',
            100,
            'validate',
            'Extraction completed',
          );
          return 'completed';
        }
        case 'failed': {
          const { message, stage } = outcome.failure;
          const written = await this.writeOutcome(job, () =>
            this.store.failJob(job.id, claimToken, message),
          );
          if (!written) return this.superseded(job);
          await this.publish(
            job,
            'failed',
            attempt.progress,
            stage,
            'Extraction failed',
            message,
          );
          return 'failed';
        }
        case 'canceled': {
          const written = await this.writeOutcome(job, () =>
            this.store.cancelClaimedJob(job.id, claimToken),
          );
          if (!written) return this.superseded(job);
          await this.publish(
            job,
            'canceled',
            attempt.progress,
            null,
            'Job canceled',
          );
          return 'canceled';
        }
        case 'lost':
          return 'lost';
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Could not record the outcome of job ${job.id}: ${message}`,
      );
      await this.releaseClaim(claim);
      return 'abandoned';
    }
  }

  private writeOutcome<T>(job: Job, write: () => Promise<T>): Promise<T> {
    return withRetry(write, {
      maxAttempts: this.settings.storageMaxAttempts,
      baseDelayMs: this.settings.storageRetryBaseDelayMs,
      shouldRetry: () => true,
      onRetry: (error, retryNumber) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Job ${job.id}: outcome write failed (retry ${retryNumber}): ${message}`,
        );
      },
    });
  }

  /** Clears the claim token so the next delivery can claim the job at once. */
  private async releaseClaim(claim: JobClaim): Promise<void> {
    const { job, claimToken } = claim;
    try {
      if (await this.store.releaseClaim(job.id, claimToken)) {
        this.logger.warn(`Job ${job.id}: claim released for redelivery`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Job ${job.id}: could not release the claim, ` +
          `the watchdog will reclaim it once stale: ${message}`,
      );
    }
  }

  private superseded(job: Job): ProcessResult {
    this.logger.warn(
      `Job ${job.id}: claim superseded before the outcome was written`,
    );
    return 'lost';
  }

  private hooksFor(claim: JobClaim, attempt: AttemptState): ExecutionHooks {
    const { job, claimToken } = claim;

    return {
      checkpoint: async () => {
        let state: LeaseState;
        try {
          state = await this.store.checkLease(job.id, claimToken);
        } catch (error) {
          // Keep going; a finalize with a stale token is rejected anyway
          const message =
            error instanceof Error ? error.message : String(error);
          this.logger.warn(`Job ${job.id}: lease check failed: ${message}`);
          return;
        }

        if (state === 'cancel_requested') throw new JobCanceledSignal(job.id);
        if (state === 'lost') throw new LeaseLostSignal(job.id);
      },

      reportProgress: async (
        stage: PipelineStage,
        percent: number,
        message: string,
      ) => {
        const rounded = Math.floor(percent);
        if (rounded <= attempt.progress) return;

        if (await this.jobs.updateProgress(job.id, rounded, claimToken)) {
          attempt.progress = rounded;
          await this.publish(job, 'processing', rounded, stage, message);
        }
      },
    };
  }

  private startHeartbeat(claim: JobClaim): Subscription {
    const { job, claimToken } = claim;

    return interval(this.settings.heartbeatIntervalMs)
      .pipe(
        exhaustMap(() =>
          from(this.store.heartbeat(job.id, claimToken)).pipe(
            catchError((error: unknown) => {
              const message =
                error instanceof Error ? error.message : String(error);
              this.logger.warn(`Job ${job.id}: heartbeat failed: ${message}`);
              return of(true);
            }),
          ),
        ),
      )
      .subscribe((accepted) => {
        if (!accepted) {
          this.logger.debug(
            `Job ${job.id}: heartbeat rejected, claim no longer held`,
          );
        }
      });
  }

  private async publish(
    job: Job,
    status: JobProgressStatus,
    progress: number,
    stage: PipelineStage | null,
    message: string,
    errorMessage?: string,
  ): Promise<void> {
    await this.events.publish({
      jobId: job.id,
      documentId: job.documentId,
      status,
      progress,
      stage,
      message,
      ...(errorMessage ? { errorMessage } : {}),
      publishedAt: new Date().toISOString(),
    });
  }
}
