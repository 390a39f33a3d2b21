import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import {
  EMPTY,
  Subscription,
  catchError,
  exhaustMap,
  from,
  timer,
} from 'rxjs';
import { JOB_STORE, Job, JobStore } from '@sheetwise/database';
import {
  JOB_EVENT_SINK,
  JobEventSink,
  JobProgressStatus,
  WORK_QUEUE,
  WorkQueue,
} from '@sheetwise/redis';
import { WORKER_SETTINGS, WorkerSettings } from '../config/worker-settings';

/** Jobs examined per sweep and kind; the rest wait for the next tick */
const SWEEP_BATCH_SIZE = 100;

export interface SweepReport {
  released: string[];
  failed: string[];
  canceled: string[];
  requeued: string[];
}

/**
 * WatchdogService — recovers jobs a worker or the queue lost track of.
 *
 * Processing jobs whose heartbeat went silent are released and put back
 * on the queue, or failed with `worker_lost` once their attempts are used
 * up. Pending jobs that sat untouched for the longer pending threshold
 * (a failed enqueue, a dropped message) are enqueued again; a duplicate
 * delivery is harmless because only one claim can succeed.
 */
@Injectable()
export class WatchdogService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(WatchdogService.name);
  private subscription: Subscription | null = null;

  constructor(
    @Inject(JOB_STORE)
    private readonly store: JobStore,

    @Inject(WORK_QUEUE)
    private readonly queue: WorkQueue,

    @Inject(JOB_EVENT_SINK)
    private readonly events: JobEventSink,

    @Inject(WORKER_SETTINGS)
    private readonly settings: WorkerSettings,
  ) {}

  onApplicationBootstrap(): void {
    this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  start(): void {
    const intervalMs = this.settings.watchdogIntervalMs;
    if (this.subscription || intervalMs <= 0) return;

    // exhaustMap: a slow sweep is never overlapped by the next tick
    this.subscription = timer(0, intervalMs)
      .pipe(
        exhaustMap(() =>
          from(this.sweep()).pipe(
            catchError((error: unknown) => {
              const message =
                error instanceof Error ? error.message : String(error);
              this.logger.error(`Watchdog sweep failed: ${message}`);
              return EMPTY;
            }),
          ),
        ),
      )
      .subscribe((report) => {
        const { released, failed, canceled, requeued } = report;
        const touched =
          released.length + failed.length + canceled.length + requeued.length;
        if (touched > 0) {
          this.logger.log(
            `Sweep: released ${released.length}, failed ${failed.length}, ` +
              `canceled ${canceled.length}, ` +
              `re-enqueued ${requeued.length} pending`,
          );
        }
      });
    this.logger.log(`Watchdog running every ${intervalMs}ms`);
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  async sweep(now: Date = new Date()): Promise<SweepReport> {
    const report: SweepReport = {
      released: [],
      failed: [],
      canceled: [],
      requeued: [],
    };
    const staleBefore = ago(now, this.settings.staleAfterMs);
    const pendingBefore = ago(now, this.settings.pendingStaleAfterMs);

    const processing = await this.store.findStaleProcessingJobs(
      staleBefore,
      SWEEP_BATCH_SIZE,
    );
    for (const job of processing) {
      await this.reclaim(job, staleBefore, report);
    }

    const pending = await this.store.findStalePendingJobs(
      pendingBefore,
      SWEEP_BATCH_SIZE,
    );
    for (const job of pending) {
      await this.requeue(job, report);
    }

    return report;
  }

  private async reclaim(
    job: Job,
    staleBefore: Date,
    report: SweepReport,
  ): Promise<void> {
    const lastSeen = job.heartbeatAt ?? job.updatedAt;
    const errorMessage =
      `worker_lost: no heartbeat since ${lastSeen.toISOString()} ` +
      `(attempt ${job.attempts} of ${this.settings.maxAttempts})`;

    const result = await this.store.reclaimStaleJob(job.id, {
      expectedClaimToken: job.claimToken,
      staleBefore,
      maxAttempts: this.settings.maxAttempts,
      errorMessage,
    });

    switch (result) {
      case 'released':
        this.logger.warn(
          `Job ${job.id}: worker went silent, lease released for another attempt`,
        );
        report.released.push(job.id);
        await this.enqueue(job.id);
        break;
      case 'failed':
        this.logger.warn(`Job ${job.id}: ${errorMessage}`);
        report.failed.push(job.id);
        await this.publish(job, 'failed', 'Worker lost', errorMessage);
        break;
      case 'canceled':
        report.canceled.push(job.id);
        await this.publish(job, 'canceled', 'Job canceled');
        break;
      case 'skipped':
        break;
    }
  }

  private async requeue(job: Job, report: SweepReport): Promise<void> {
    if (await this.enqueue(job.id)) {
      await this.store.touchPendingJob(job.id);
      report.requeued.push(job.id);
    }
  }

  /** Left for the next sweep when the queue is unreachable. */
  private async enqueue(jobId: string): Promise<boolean> {
    try {
      await this.queue.enqueue(jobId);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not re-enqueue job ${jobId}: ${message}`);
      return false;
    }
  }

  private async publish(
    job: Job,
    status: JobProgressStatus,
    message: string,
    errorMessage?: string,
  ): Promise<void> {
    await this.events.publish({
      jobId: job.id,
      documentId: job.documentId,
      status,
      progress: job.progress,
      stage: null,
      message,
      ...(errorMessage ? { errorMessage } : {}),
      publishedAt: new Date().toISOString(),
    });
  }
}

function ago(now: Date, ms: number): Date {
  return new Date(now.getTime() - ms);
}
