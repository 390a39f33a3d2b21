import { JobClaim } from '@sheetwise/database';
import {
  InferenceCapability,
  JobCanceledSignal,
  LeaseLostSignal,
  createDefaultRegistry,
} from '@sheetwise/pipeline';
import {
  InMemoryJobStore,
  InMemoryObjectStore,
  NewDocument,
  ScriptedInference,
  buildInvoiceWorkbook,
  buildXlsx,
} from '@sheetwise/testing';
import {
  WorkerSettings,
  defaultWorkerSettings,
} from '../config/worker-settings';
import { ExecutionHooks } from './execution.interfaces';
import { PipelineExecutorService } from './pipeline-executor.service';

function testSettings(
  overrides: Partial<WorkerSettings> = {},
): WorkerSettings {
  const defaults = defaultWorkerSettings();
  return {
    ...defaults,
    storageRetryBaseDelayMs: 1,
    extraction: {
      ...defaults.extraction,
      baseDelayMs: 1,
      callTimeoutMs: 20,
    },
    ...overrides,
  };
}

function lineItems() {
  return [
    {
      description: 'Office chairs',
      quantity: 5,
      unit_price: 150,
      amount: 750,
    },
    {
      description: 'Standing desk',
      quantity: 1,
      unit_price: 500,
      amount: 500,
    },
  ];
}

const invoiceAnswers = ScriptedInference.bySheet({
  Summary: {
    payload: {
      invoice_number: 'INV-2026-0042',
      date: '2026-03-15',
      vendor: { name: 'Northwind Traders' },
      total_amount: '$1,250.00',
      currency: 'USD',
    },
    confidence: 0.9,
  },
  'Line Items': {
    payload: {
      line_items: lineItems(),
    },
    confidence: 0.8,
  },
});

describe('PipelineExecutorService', () => {
  let store: InMemoryJobStore;
  let objects: InMemoryObjectStore;
  let progress: Array<[string, number]>;
  let hooks: ExecutionHooks;

  beforeEach(() => {
    store = new InMemoryJobStore();
    objects = new InMemoryObjectStore();
    progress = [];
    hooks = {
      checkpoint: jest.fn().mockResolvedValue(undefined),
      reportProgress: jest.fn(async (stage: string, percent: number) => {
        progress.push([stage, percent]);
      }),
    };
  });

  function executor(
    ai: InferenceCapability,
    settings = testSettings(),
  ): PipelineExecutorService {
    return new PipelineExecutorService(
      createDefaultRegistry(settings.extraction),
      objects,
      ai,
      settings,
    );
  }

  async function claimFor(
    document: NewDocument,
    bytes: Buffer | null,
  ): Promise<JobClaim> {
    const created = store.addDocument(document);
    if (bytes) objects.put(created.storageRef, bytes);
    const job = await store.createJob(created.id);
    if (job.outcome !== 'created') throw new Error('job not created');
    const claim = await store.claim(job.job.id);
    if (claim.outcome !== 'claimed') throw new Error('job not claimed');
    return claim.claim;
  }

  it('should extract an invoice workbook end to end', async () => {
    const claim = await claimFor(
      { subtype: 'invoice' },
      buildInvoiceWorkbook(),
    );

    const outcome = await executor(invoiceAnswers).execute(claim, hooks);

    expect(outcome).toEqual({
      kind: 'completed',
      extraction: {
        extractedData: {
          invoice_number: 'INV-2026-0042',
          date: '2026-03-15',
          vendor: { name: 'Northwind Traders' },
          total_amount: 1250,
          currency: 'USD',
          line_items: lineItems(),
        },
        // (0.9 × 5 fields + 0.8 × 8 fields) / 13
        confidenceScore: 0.8385,
        formatType: 'invoice',
        validationResults: {
          valid: true,
          schemaType: 'invoice',
          errors: [],
          warnings: [],
        },
        extractedAt: expect.any(Date),
        notes: null,
      },
    });
    expect(progress).toEqual([
      ['parse', 30],
      ['extract', 55],
      ['extract', 80],
    ]);
  });

  it('should fail an unsupported file type at parse without calling the AI', async () => {
    const ai = ScriptedInference.failing('rate_limited');
    const claim = await claimFor(
      { fileType: 'pdf' },
      Buffer.from('%PDF-1.7'),
    );

    const outcome = await executor(ai).execute(claim, hooks);

    expect(outcome).toMatchObject({
      kind: 'failed',
      failure: {
        stage: 'parse',
        message:
          'parse stage failed: PermanentProcessingError(unsupported_format): ' +
          'Unsupported file type: pdf',
      },
    });
    expect(ai.calls).toHaveLength(0);
  });

  it('should fail a subtype without a registered pipeline at parse', async () => {
    const claim = await claimFor(
      { subtype: 'purchase_order' },
      buildInvoiceWorkbook(),
    );

    const outcome = await executor(invoiceAnswers).execute(claim, hooks);

    expect(outcome).toMatchObject({
      kind: 'failed',
      failure: {
        message:
          'parse stage failed: PermanentProcessingError(unsupported_format): ' +
          'No pipeline registered for subtype "purchase_order" ' +
          '(known: form, invoice, report)',
      },
    });
  });

  it('should fail permanently when the object is missing', async () => {
    const claim = await claimFor({ storageRef: 'uploads/gone.xlsx' }, null);

    const outcome = await executor(invoiceAnswers).execute(claim, hooks);

    expect(outcome).toMatchObject({
      kind: 'failed',
      failure: {
        message:
          'parse stage failed: PermanentProcessingError(missing_object): ' +
          'Object "uploads/gone.xlsx" not found',
      },
    });
    expect(objects.reads).toEqual(['uploads/gone.xlsx']);
  });

  it('should retry a transient read failure', async () => {
    const claim = await claimFor(
      { subtype: 'invoice' },
      buildInvoiceWorkbook(),
    );
    objects.failNextRead('connection reset');

    const outcome = await executor(invoiceAnswers).execute(claim, hooks);

    expect(outcome.kind).toBe('completed');
    expect(objects.reads).toHaveLength(2);
  });

  it('should fail after the AI times out on every attempt', async () => {
    const ai = ScriptedInference.hanging();
    const claim = await claimFor(
      {},
      buildXlsx({ Summary: [['Invoice', 'INV-1']] }),
    );

    const outcome = await executor(ai).execute(claim, hooks);

    expect(outcome).toMatchObject({
      kind: 'failed',
      failure: {
        stage: 'extract',
        message:
          'extract stage failed: TransientProcessingError(timeout): ' +
          'AI call for sheet "Summary" timed out after 20ms ' +
          '(gave up after 3 attempts)',
      },
    });
    expect(ai.calls).toHaveLength(3);
  });

  it('should stop at the checkpoint after cancellation', async () => {
    const claim = await claimFor({}, buildInvoiceWorkbook());
    hooks.checkpoint = jest
      .fn<Promise<void>, []>()
      .mockResolvedValueOnce(undefined)
      .mockRejectedValue(new JobCanceledSignal(claim.job.id));
    const ai = ScriptedInference.hanging();

    const outcome = await executor(ai).execute(claim, hooks);

    expect(outcome).toEqual({ kind: 'canceled' });
    expect(ai.calls).toHaveLength(0);
  });

  it('should abandon the attempt when the claim is lost', async () => {
    const claim = await claimFor({}, buildInvoiceWorkbook());
    hooks.checkpoint = jest
      .fn()
      .mockRejectedValue(new LeaseLostSignal(claim.job.id));

    await expect(
      executor(invoiceAnswers).execute(claim, hooks),
    ).resolves.toEqual({ kind: 'lost' });
  });

  describe('validation failures', () => {
    const partial = ScriptedInference.bySheet({
      Summary: { payload: { invoice_number: 'INV-1' }, confidence: 0.4 },
    });
    const workbook = buildXlsx({ Summary: [['Invoice', 'INV-1']] });

    it('should complete with the errors recorded under the annotate policy', async () => {
      const claim = await claimFor({}, workbook);

      const outcome = await executor(partial).execute(claim, hooks);

      expect(outcome).toMatchObject({
        kind: 'completed',
        extraction: {
          confidenceScore: 0.4,
          validationResults: {
            valid: false,
            errors: [
              { path: 'date', message: 'Required' },
              { path: 'total_amount', message: 'Required' },
            ],
          },
        },
      });
    });

    it('should fail with schema_mismatch under the fail policy', async () => {
      const claim = await claimFor({}, workbook);

      const failing = executor(
        partial,
        testSettings({ validationFailurePolicy: 'fail' }),
      );

      const outcome = await failing.execute(claim, hooks);

      expect(outcome).toMatchObject({
        kind: 'failed',
        failure: {
          stage: 'validate',
          message:
            'validate stage failed: PermanentProcessingError(schema_mismatch): ' +
            'Extracted data does not match the invoice schema ' +
            '(date: Required; total_amount: Required)',
        },
      });
    });
  });
});
