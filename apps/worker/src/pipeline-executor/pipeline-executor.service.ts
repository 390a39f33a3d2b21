import { Inject, Injectable, Logger } from '@nestjs/common';
import { JobClaim } from '@sheetwise/database';
import {
  DocumentDescriptor,
  ExtractionResult,
  InferenceCapability,
  JobCanceledSignal,
  LeaseLostSignal,
  OBJECT_STORE,
  ObjectStore,
  ObjectStoreError,
  PIPELINE_REGISTRY,
  ParsedWorkbook,
  PermanentProcessingError,
  PipelineEntry,
  PipelineRegistry,
  PipelineStage,
  StageFailure,
  StorageObjectNotFoundError,
  TransientProcessingError,
  ValidationOutcome,
  withRetry,
  withTimeout,
} from '@sheetwise/pipeline';
import { WORKER_SETTINGS, WorkerSettings } from '../config/worker-settings';
import { INFERENCE_CAPABILITY } from '../inference/inference.constants';
import {
  ExecutionHooks,
  ExecutionOutcome,
  STAGE_PROGRESS,
} from './execution.interfaces';

/**
 * PipelineExecutorService — runs parse → extract → validate for one
 * claimed job and reports what should happen to it.
 *
 * The executor never finalizes a job: the outcome is handed back to the
 * worker pool, which writes it with the claim token. Cancellation is
 * checked before every stage and, through the extraction context, before
 * every AI call.
 */
@Injectable()
export class PipelineExecutorService {
  private readonly logger = new Logger(PipelineExecutorService.name);

  constructor(
    @Inject(PIPELINE_REGISTRY)
    private readonly registry: PipelineRegistry,

    @Inject(OBJECT_STORE)
    private readonly objects: ObjectStore,

    @Inject(INFERENCE_CAPABILITY)
    private readonly inference: InferenceCapability,

    @Inject(WORKER_SETTINGS)
    private readonly settings: WorkerSettings,
  ) {}

  async execute(
    claim: JobClaim,
    hooks: ExecutionHooks,
  ): Promise<ExecutionOutcome> {
    const { job, document } = claim;
    const descriptor: DocumentDescriptor = {
      documentId: document.id,
      filename: document.filename,
      fileType: document.fileType,
      subtype: document.subtype,
    };

    let stage: PipelineStage = 'parse';
    try {
      await hooks.checkpoint();
      const entry = this.resolveEntry(descriptor);

      const parsed = await this.runStage('parse', () =>
        this.parse(entry, descriptor, document.storageRef),
      );
      const sheetsWithData = parsed.sheets.filter(
        (sheet) => !sheet.empty,
      ).length;
      await hooks.reportProgress(
        'parse',
        STAGE_PROGRESS.parse.end,
        `Parsed ${parsed.sheets.length} sheet(s), ${sheetsWithData} with data`,
      );

      stage = 'extract';
      await hooks.checkpoint();
      const extracted = await this.runStage('extract', () =>
        this.extract(entry, parsed, job.id, descriptor, hooks),
      );

      stage = 'validate';
      await hooks.checkpoint();
      const validation = await this.runStage('validate', () =>
        this.validate(entry, extracted),
      );

      const policy = this.settings.validationFailurePolicy;
      if (!validation.valid && policy === 'fail') {
        const summary = validation.results.errors
          .map((issue) => `${issue.path}: ${issue.message}`)
          .join('; ');
        throw new StageFailure(
          'validate',
          new PermanentProcessingError(
            'schema_mismatch',
            `Extracted data does not match the ` +
              `${validation.results.schemaType} schema (${summary})`,
          ),
        );
      }

      const issues = validation.valid
        ? ''
        : ` (${validation.results.errors.length} validation error(s))`;
      this.logger.log(
        `Job ${job.id}: extracted ${descriptor.subtype} ` +
          `with confidence ${extracted.confidence}${issues}`,
      );

      return {
        kind: 'completed',
        extraction: {
          extractedData: validation.normalizedData,
          confidenceScore: extracted.confidence,
          formatType: descriptor.subtype.trim().toLowerCase(),
          validationResults: validation.results,
          extractedAt: new Date(),
          notes: null,
        },
      };
    } catch (error) {
      return this.toOutcome(job.id, stage, error);
    }
  }

  // ── Stages ───────────────────────────────────────────────

  private resolveEntry(descriptor: DocumentDescriptor): PipelineEntry {
    const entry = this.registry.resolve(descriptor.subtype);
    if (!entry) {
      throw new StageFailure(
        'parse',
        new PermanentProcessingError(
          'unsupported_format',
          `No pipeline registered for subtype "${descriptor.subtype}" ` +
            `(known: ${this.registry.subtypes().join(', ')})`,
        ),
      );
    }
    return entry;
  }

  private async parse(
    entry: PipelineEntry,
    descriptor: DocumentDescriptor,
    storageRef: string,
  ): Promise<ParsedWorkbook> {
    const bytes = await this.readObject(storageRef);
    const timeoutMs = this.settings.parseTimeoutMs;

    return withTimeout(
      () => entry.parser.parse(bytes, descriptor),
      timeoutMs,
      () =>
        new PermanentProcessingError(
          'timeout',
          `Parsing "${descriptor.filename}" took longer than ${timeoutMs}ms`,
        ),
    );
  }

  private extract(
    entry: PipelineEntry,
    parsed: ParsedWorkbook,
    jobId: string,
    descriptor: DocumentDescriptor,
    hooks: ExecutionHooks,
  ): Promise<ExtractionResult> {
    const { start, end } = STAGE_PROGRESS.extract;

    return entry.extractor.extract(parsed, this.inference, {
      jobId,
      subtype: descriptor.subtype,
      checkpoint: () => hooks.checkpoint(),
      reportUnitDone: (done, total) =>
        hooks.reportProgress(
          'extract',
          start + ((end - start) * done) / total,
          `Extracted ${done} of ${total} sheet(s)`,
        ),
    });
  }

  private validate(
    entry: PipelineEntry,
    extracted: ExtractionResult,
  ): Promise<ValidationOutcome> {
    const timeoutMs = this.settings.validateTimeoutMs;

    return withTimeout(
      () => entry.validator.validate(extracted.data),
      timeoutMs,
      () =>
        new PermanentProcessingError(
          'timeout',
          `Validation took longer than ${timeoutMs}ms`,
        ),
    );
  }

  /** IO failures are retried; a missing object is permanent. */
  private readObject(storageRef: string): Promise<Buffer> {
    return withRetry(
      async () => {
        try {
          return await this.objects.get(storageRef);
        } catch (error) {
          if (error instanceof StorageObjectNotFoundError) {
            throw new PermanentProcessingError(
              'missing_object',
              error.message,
              { cause: error },
            );
          }
          if (error instanceof ObjectStoreError) {
            throw new TransientProcessingError('io_error', error.message, {
              cause: error,
            });
          }
          throw error;
        }
      },
      {
        maxAttempts: this.settings.storageMaxAttempts,
        baseDelayMs: this.settings.storageRetryBaseDelayMs,
        onRetry: (error, retryNumber) => {
          const message =
            error instanceof Error ? error.message : String(error);
          this.logger.warn(
            `Retrying read of "${storageRef}" (retry ${retryNumber}): ${message}`,
          );
        },
      },
    );
  }

  // ── Helpers ──────────────────────────────────────────────

  /** Wraps stage-local errors; control signals pass through untouched. */
  private async runStage<T>(
    stage: PipelineStage,
    run: () => Promise<T>,
  ): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (
        error instanceof JobCanceledSignal ||
        error instanceof LeaseLostSignal ||
        error instanceof StageFailure
      ) {
        throw error;
      }
      throw new StageFailure(stage, error);
    }
  }

  private toOutcome(
    jobId: string,
    stage: PipelineStage,
    error: unknown,
  ): ExecutionOutcome {
    if (error instanceof JobCanceledSignal) {
      this.logger.log(
        `Job ${jobId}: stopped at a checkpoint after cancellation`,
      );
      return { kind: 'canceled' };
    }
    if (error instanceof LeaseLostSignal) {
      this.logger.warn(
        `Job ${jobId}: claim superseded, abandoning this attempt`,
      );
      return { kind: 'lost' };
    }

    const failure =
      error instanceof StageFailure ? error : new StageFailure(stage, error);
    this.logger.error(`Job ${jobId}: ${failure.message}`);
    return { kind: 'failed', failure };
  }
}
