import { Logger } from '@nestjs/common';
import {
  TransientProcessingError,
  PermanentProcessingError,
} from '../errors/processing.errors';
import { InferenceError } from '../stages/inference.errors';
import {
  ExtractionContext,
  ExtractionResult,
  Extractor,
  InferenceCapability,
  InferenceContext,
  InferenceResult,
  ParsedSheet,
  ParsedWorkbook,
  UnitResult,
} from '../stages/stage.interfaces';
import { RetryPolicy, withRetry, withTimeout } from '../resilience/retry';
import { mapWithConcurrency } from '../resilience/fan-out';
import {
  aggregateConfidence,
  countFields,
  mergeUnitPayloads,
} from '../confidence/confidence';

export interface SheetExtractorOptions {
  /** AI calls in flight per job */
  concurrency: number;
  /** Attempts per AI call, first one included */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Per-call limit; exceeding it counts as a transient timeout */
  callTimeoutMs: number;
  /** Rows of a sheet sent to the model; the rest is dropped */
  maxRowsPerUnit?: number;
}

const DEFAULT_MAX_ROWS_PER_UNIT = 500;

/**
 * SheetExtractor — one inference call per non-empty sheet.
 *
 * Calls fan out with bounded concurrency; each one is retried with
 * exponential backoff on transient failures. Cancellation is checked
 * before every unit starts.
 */
export class SheetExtractor implements Extractor {
  private readonly logger = new Logger(SheetExtractor.name);

  constructor(private readonly options: SheetExtractorOptions) {}

  async extract(
    parsed: ParsedWorkbook,
    ai: InferenceCapability,
    context: ExtractionContext,
  ): Promise<ExtractionResult> {
    const units = parsed.sheets.filter((sheet) => !sheet.empty);
    if (units.length === 0) {
      throw new PermanentProcessingError(
        'empty_document',
        `"${parsed.filename}" has no sheet with data`,
      );
    }

    let done = 0;
    const extractSheet = async (
      sheet: ParsedSheet,
      index: number,
    ): Promise<UnitResult> => {
      await context.checkpoint();

      const input: InferenceContext = {
        subtype: context.subtype,
        filename: parsed.filename,
        unitName: sheet.name,
        unitIndex: index,
        unitCount: units.length,
        rows: this.limitRows(sheet),
      };
      const inference = await this.inferWithRetry(ai, input, context.jobId);

      done += 1;
      await context.reportUnitDone(done, units.length);

      return {
        unitName: sheet.name,
        payload: inference.payload,
        confidence: inference.confidence,
        fieldCount: countFields(inference.payload),
      };
    };

    const results = await mapWithConcurrency(
      units,
      this.options.concurrency,
      extractSheet,
    );

    return {
      data: mergeUnitPayloads(results.map((unit) => unit.payload)),
      confidence: aggregateConfidence(results),
      units: results,
    };
  }

  private async inferWithRetry(
    ai: InferenceCapability,
    input: InferenceContext,
    jobId: string,
  ): Promise<InferenceResult> {
    const policy: RetryPolicy = {
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.baseDelayMs,
      maxDelayMs: this.options.maxDelayMs,
      onRetry: (error, retryNumber) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Job ${jobId}: retrying AI call for sheet "${input.unitName}" ` +
            `(retry ${retryNumber}/${this.options.maxAttempts - 1}): ${message}`,
        );
      },
    };

    try {
      return await withRetry(() => this.inferOnce(ai, input), policy);
    } catch (error) {
      if (error instanceof TransientProcessingError) {
        throw new TransientProcessingError(
          error.code,
          `${error.message} (gave up after ${this.options.maxAttempts} attempts)`,
          { cause: error },
        );
      }
      throw error;
    }
  }

  private async inferOnce(
    ai: InferenceCapability,
    input: InferenceContext,
  ): Promise<InferenceResult> {
    const timeoutMs = this.options.callTimeoutMs;
    try {
      const result = await withTimeout(
        () => ai.infer(input),
        timeoutMs,
        () =>
          new TransientProcessingError(
            'timeout',
            `AI call for sheet "${input.unitName}" timed out after ${timeoutMs}ms`,
          ),
      );
      return {
        payload: result.payload,
        confidence: normalizeConfidence(result.confidence),
      };
    } catch (error) {
      if (error instanceof InferenceError) {
        throw new TransientProcessingError(
          error.kind,
          `AI call for sheet "${input.unitName}" failed: ${error.message}`,
          { cause: error },
        );
      }
      throw error;
    }
  }

  private limitRows(sheet: ParsedSheet): ParsedSheet['rows'] {
    const limit = this.options.maxRowsPerUnit ?? DEFAULT_MAX_ROWS_PER_UNIT;
    return sheet.rows.length > limit ? sheet.rows.slice(0, limit) : sheet.rows;
  }
}

function normalizeConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
