import { Test } from '@nestjs/testing';
import { DocumentStatus, JOB_STORE, JobStatus } from '@sheetwise/database';
import {
  InferenceCapability,
  OBJECT_STORE,
  PIPELINE_REGISTRY,
  createDefaultRegistry,
} from '@sheetwise/pipeline';
import {
  JOB_EVENT_SINK,
  QueueConsumer,
  RedisSubscriberService,
  WORK_QUEUE,
} from '@sheetwise/redis';
import {
  InMemoryJobStore,
  InMemoryObjectStore,
  InMemoryWorkQueue,
  NewDocument,
  RecordingEventSink,
  ScriptedInference,
  buildInvoiceWorkbook,
  buildXlsx,
} from '@sheetwise/testing';
import {
  WORKER_SETTINGS,
  WorkerSettings,
  defaultWorkerSettings,
} from '../config/worker-settings';
import { INFERENCE_CAPABILITY } from '../inference/inference.constants';
import { JobsService } from '../jobs/jobs.service';
import {
  PipelineExecutorService,
} from '../pipeline-executor/pipeline-executor.service';
import { WorkerPoolService } from './worker-pool.service';

function poolSettings(overrides: Partial<WorkerSettings> = {}): WorkerSettings {
  const defaults = defaultWorkerSettings();
  return {
    ...defaults,
    queueBlockMs: 5,
    shutdownGraceMs: 1_000,
    storageRetryBaseDelayMs: 1,
    extraction: {
      ...defaults.extraction,
      concurrency: 1,
      baseDelayMs: 1,
      callTimeoutMs: 20,
    },
    ...overrides,
  };
}

const invoiceAnswers = (): ScriptedInference =>
  ScriptedInference.bySheet({
    Summary: {
      payload: {
        invoice_number: 'INV-2026-0042',
        date: '2026-03-15',
        total_amount: 1250,
      },
      confidence: 0.9,
    },
    'Line Items': {
      payload: {
        line_items: [
          { description: 'Office chairs', amount: 750 },
          { description: 'Standing desk', amount: 500 },
        ],
      },
      confidence: 0.8,
    },
  });

async function waitFor(
  condition: () => Promise<boolean>,
  timeoutMs = 2_000,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await condition())) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe('WorkerPoolService', () => {
  let store: InMemoryJobStore;
  let queue: InMemoryWorkQueue;
  let objects: InMemoryObjectStore;
  let events: RecordingEventSink;
  let jobs: JobsService;
  let pool: WorkerPoolService;

  async function createPool(
    ai: InferenceCapability,
    settings = poolSettings(),
  ): Promise<void> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        WorkerPoolService,
        PipelineExecutorService,
        JobsService,
        { provide: JOB_STORE, useValue: store },
        { provide: WORK_QUEUE, useValue: queue },
        { provide: JOB_EVENT_SINK, useValue: events },
        {
          provide: RedisSubscriberService,
          useValue: { subscribeJson: jest.fn() },
        },
        {
          provide: PIPELINE_REGISTRY,
          useValue: createDefaultRegistry(settings.extraction),
        },
        { provide: OBJECT_STORE, useValue: objects },
        { provide: INFERENCE_CAPABILITY, useValue: ai },
        { provide: WORKER_SETTINGS, useValue: settings },
      ],
    }).compile();

    jobs = moduleRef.get(JobsService);
    pool = moduleRef.get(WorkerPoolService);
  }

  async function submit(document: NewDocument, bytes: Buffer): Promise<string> {
    const created = store.addDocument(document);
    objects.put(created.storageRef, bytes);
    const job = await jobs.createJob(created.id);
    return job.id;
  }

  async function findJob(jobId: string) {
    const job = await store.findJob(jobId);
    if (!job) throw new Error(`job ${jobId} missing`);
    return job;
  }

  let consumer: QueueConsumer;

  beforeEach(async () => {
    store = new InMemoryJobStore();
    queue = new InMemoryWorkQueue();
    objects = new InMemoryObjectStore();
    events = new RecordingEventSink();
    consumer = await queue.createConsumer('test-consumer');
  });

  afterEach(async () => {
    await pool.stop();
  });

  describe('processNext', () => {
    it('should report idle when nothing is queued', async () => {
      await createPool(invoiceAnswers());

      await expect(pool.processNext(consumer)).resolves.toBe('idle');
    });

    it('should take an invoice from queue to completed extraction', async () => {
      await createPool(invoiceAnswers());
      const workbook = buildInvoiceWorkbook();
      const jobId = await submit({ subtype: 'invoice' }, workbook);

      await expect(pool.processNext(consumer)).resolves.toBe('completed');

      const job = await findJob(jobId);
      expect(job).toMatchObject({
        status: JobStatus.COMPLETED,
        progress: 100,
        attempts: 1,
        errorMessage: null,
      });
      expect(store.statusHistory(jobId)).toEqual([
        JobStatus.PENDING,
        JobStatus.PROCESSING,
        JobStatus.COMPLETED,
      ]);
      expect(await store.findExtractionByJobId(jobId)).toMatchObject({
        jobId,
        // (0.9 × 3 fields + 0.8 × 4 fields) / 7
        confidenceScore: 0.8429,
        formatType: 'invoice',
        validationResults: { valid: true, errors: [], warnings: [] },
      });
      expect(store.documentSnapshot(job.documentId)?.status).toBe(
        DocumentStatus.PROCESSED,
      );
      expect(queue.acked).toHaveLength(1);
      expect(queue.size()).toBe(0);
    });

    it('should publish non-decreasing progress ending in a terminal event', async () => {
      await createPool(invoiceAnswers());
      const jobId = await submit({}, buildInvoiceWorkbook());

      await pool.processNext(consumer);

      expect(
        events
          .eventsFor(jobId)
          .map((event) => [event.status, event.progress, event.stage]),
      ).toEqual([
        ['pending', 0, null],
        ['processing', 0, null],
        ['processing', 30, 'parse'],
        ['processing', 55, 'extract'],
        ['processing', 80, 'extract'],
        ['completed', 100, 'validate'],
      ]);
    });

    it('should let exactly one of two concurrent deliveries run the job', async () => {
      await createPool(invoiceAnswers());
      const jobId = await submit({}, buildInvoiceWorkbook());
      await queue.enqueue(jobId);
      const second = await queue.createConsumer('second-consumer');

      const results = await Promise.all([
        pool.processNext(consumer),
        pool.processNext(second),
      ]);

      expect([...results].sort()).toEqual(['completed', 'skipped']);
      expect(store.extractionCount(jobId)).toBe(1);
      expect((await findJob(jobId)).attempts).toBe(1);
      expect(queue.acked).toHaveLength(2);
    });

    it('should skip a job canceled before it was dequeued', async () => {
      const ai = invoiceAnswers();
      await createPool(ai);
      const jobId = await submit({}, buildInvoiceWorkbook());
      await jobs.cancelJob(jobId);

      await expect(pool.processNext(consumer)).resolves.toBe('skipped');

      expect(store.statusHistory(jobId)).toEqual([
        JobStatus.PENDING,
        JobStatus.CANCELED,
      ]);
      expect(store.extractionCount(jobId)).toBe(0);
      expect(ai.calls).toHaveLength(0);
      expect(queue.size()).toBe(0);
    });

    it('should stop a running job at the next checkpoint once cancellation is requested', async () => {
      let jobId = '';
      const answers = invoiceAnswers();
      const ai = new ScriptedInference(async (context, call) => {
        if (call === 1) await jobs.cancelJob(jobId);
        return answers.infer(context);
      });
      await createPool(ai);
      jobId = await submit({}, buildInvoiceWorkbook());

      await expect(pool.processNext(consumer)).resolves.toBe('canceled');

      expect(ai.calls).toHaveLength(1);
      expect(store.statusHistory(jobId)).toEqual([
        JobStatus.PENDING,
        JobStatus.PROCESSING,
        JobStatus.CANCELED,
      ]);
      expect(store.extractionCount(jobId)).toBe(0);
      const job = await findJob(jobId);
      expect(store.documentSnapshot(job.documentId)?.status).toBe(
        DocumentStatus.UPLOADED,
      );
      expect(events.eventsFor(jobId).at(-1)).toMatchObject({
        status: 'canceled',
        progress: 55,
      });
    });

    it('should fail an unsupported file type on the first attempt', async () => {
      const ai = invoiceAnswers();
      await createPool(ai);
      const jobId = await submit({ fileType: 'pdf' }, Buffer.from('%PDF-1.7'));

      await expect(pool.processNext(consumer)).resolves.toBe('failed');

      const errorMessage =
        'parse stage failed: PermanentProcessingError(unsupported_format): ' +
        'Unsupported file type: pdf';
      const job = await findJob(jobId);
      expect(job).toMatchObject({
        status: JobStatus.FAILED,
        attempts: 1,
        errorMessage,
      });
      expect(store.documentSnapshot(job.documentId)).toMatchObject({
        status: DocumentStatus.ERROR,
        errorMessage,
      });
      expect(ai.calls).toHaveLength(0);
      expect(events.eventsFor(jobId).at(-1)).toMatchObject({
        status: 'failed',
        progress: 0,
        stage: 'parse',
        errorMessage,
      });
      expect(queue.size()).toBe(0);
    });

    it('should fail the job after every AI attempt times out', async () => {
      const ai = ScriptedInference.hanging();
      await createPool(ai);
      const jobId = await submit(
        {},
        buildXlsx({ Summary: [['Invoice', 'INV-1']] }),
      );

      await expect(pool.processNext(consumer)).resolves.toBe('failed');

      expect(ai.calls).toHaveLength(3);
      expect(await findJob(jobId)).toMatchObject({
        status: JobStatus.FAILED,
        progress: 30,
        errorMessage:
          'extract stage failed: TransientProcessingError(timeout): ' +
          'AI call for sheet "Summary" timed out after 20ms ' +
          '(gave up after 3 attempts)',
      });
      expect(store.extractionCount(jobId)).toBe(0);
    });

    it('should write nothing once another worker has taken over the job', async () => {
      let jobId = '';
      const answers = invoiceAnswers();
      const ai = new ScriptedInference(async (context) => {
        const current = await findJob(jobId);
        store.backdateHeartbeat(jobId, new Date(Date.now() - 120_000));
        await store.reclaimStaleJob(jobId, {
          expectedClaimToken: current.claimToken,
          staleBefore: new Date(),
          maxAttempts: 3,
          errorMessage: 'worker_lost: test',
        });
        await store.claim(jobId);
        return answers.infer(context);
      });
      await createPool(ai);
      jobId = await submit(
        {},
        buildXlsx({ Summary: [['Invoice', 'INV-2026-0042']] }),
      );

      await expect(pool.processNext(consumer)).resolves.toBe('lost');

      expect(await findJob(jobId)).toMatchObject({
        status: JobStatus.PROCESSING,
        attempts: 2,
      });
      expect(store.extractionCount(jobId)).toBe(0);
      expect(
        events.eventsFor(jobId).map((event) => event.status),
      ).not.toContain('completed');
    });
  });

  describe('writing the outcome', () => {
    it('should retry a failed write and complete the job', async () => {
      await createPool(invoiceAnswers());
      const jobId = await submit({}, buildInvoiceWorkbook());
      const completeJob = jest
        .spyOn(store, 'completeJob')
        .mockRejectedValueOnce(new Error('connection refused'));

      await expect(pool.processNext(consumer)).resolves.toBe('completed');

      expect(completeJob).toHaveBeenCalledTimes(2);
      expect((await findJob(jobId)).status).toBe(JobStatus.COMPLETED);
      expect(store.extractionCount(jobId)).toBe(1);
      expect(queue.acked).toHaveLength(1);
    });

    it('should release the claim and leave the delivery unacked once retries are spent', async () => {
      await createPool(invoiceAnswers());
      const jobId = await submit({}, buildInvoiceWorkbook());
      const completeJob = jest
        .spyOn(store, 'completeJob')
        .mockRejectedValue(new Error('connection refused'));

      await expect(pool.processNext(consumer)).resolves.toBe('abandoned');

      expect(completeJob).toHaveBeenCalledTimes(3);
      expect(queue.acked).toEqual([]);
      expect(queue.size()).toBe(1);
      expect(await findJob(jobId)).toMatchObject({
        status: JobStatus.PROCESSING,
        claimToken: null,
        attempts: 1,
      });
    });

    it('should let the redelivered job be claimed again right away', async () => {
      queue = new InMemoryWorkQueue(0);
      const redelivering = await queue.createConsumer('redelivering');
      await createPool(invoiceAnswers());
      const jobId = await submit({}, buildInvoiceWorkbook());
      const completeJob = jest
        .spyOn(store, 'completeJob')
        .mockRejectedValue(new Error('connection refused'));
      await pool.processNext(redelivering);

      completeJob.mockRestore();

      await expect(pool.processNext(redelivering)).resolves.toBe('completed');
      expect(await findJob(jobId)).toMatchObject({
        status: JobStatus.COMPLETED,
        attempts: 2,
      });
      expect(store.extractionCount(jobId)).toBe(1);
      expect(queue.size()).toBe(0);
    });

    it('should leave the claim to the watchdog when it cannot be released', async () => {
      await createPool(invoiceAnswers());
      const jobId = await submit({ fileType: 'pdf' }, Buffer.from('%PDF-1.7'));
      const failJob = jest
        .spyOn(store, 'failJob')
        .mockRejectedValue(new Error('connection refused'));
      jest
        .spyOn(store, 'releaseClaim')
        .mockRejectedValue(new Error('connection refused'));

      await expect(pool.processNext(consumer)).resolves.toBe('abandoned');

      expect(failJob).toHaveBeenCalledTimes(3);
      expect(queue.acked).toEqual([]);
      const job = await findJob(jobId);
      expect(job.status).toBe(JobStatus.PROCESSING);
      expect(job.claimToken).not.toBeNull();
    });
  });

  describe('start / stop', () => {
    it('should process queued jobs with its own consumer loops', async () => {
      await createPool(invoiceAnswers(), poolSettings({ concurrency: 2 }));
      const jobId = await submit({}, buildInvoiceWorkbook());

      await pool.start();
      await waitFor(
        async () => (await findJob(jobId)).status === JobStatus.COMPLETED,
      );
      await pool.stop();

      expect(store.extractionCount(jobId)).toBe(1);
      expect(queue.size()).toBe(0);
    });

    it('should not consume anything with a concurrency of 0', async () => {
      await createPool(invoiceAnswers(), poolSettings({ concurrency: 0 }));
      const createConsumer = jest.spyOn(queue, 'createConsumer');

      await pool.start();

      expect(createConsumer).not.toHaveBeenCalled();
    });
  });
});
