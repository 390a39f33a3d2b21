/**
 * @sheetwise/pipeline
 *
 * Stage contracts, the subtype registry, processing errors and the
 * spreadsheet implementations of parse / extract / validate.
 */

// ── Contracts ───────────────────────────────────────────────
export type {
  PipelineStage,
  DocumentDescriptor,
  CellValue,
  ParsedSheet,
  ParsedWorkbook,
  Parser,
  InferenceContext,
  InferenceResult,
  InferenceCapability,
  ExtractionContext,
  UnitResult,
  ExtractionResult,
  Extractor,
  ValidationIssue,
  ValidationResults,
  ValidationOutcome,
  Validator,
} from './stages/stage.interfaces';
export { InferenceError } from './stages/inference.errors';
export {
  OBJECT_STORE,
  StorageObjectNotFoundError,
  ObjectStoreError,
} from './stages/object-store.interface';
export type { ObjectStore } from './stages/object-store.interface';
export type { InferenceErrorKind } from './stages/inference.errors';

// ── Errors ──────────────────────────────────────────────────
export {
  ProcessingError,
  TransientProcessingError,
  PermanentProcessingError,
  StageFailure,
  JobCanceledSignal,
  LeaseLostSignal,
  isTransientError,
  describeStageFailure,
} from './errors/processing.errors';
export type { ProcessingErrorCode } from './errors/processing.errors';

// ── Registry ────────────────────────────────────────────────
export {
  PIPELINE_REGISTRY,
  PipelineRegistry,
  PipelineRegistryBuilder,
} from './registry/pipeline-registry';
export type { PipelineEntry } from './registry/pipeline-registry';
export { createDefaultRegistry } from './registry/default-registry';

// ── Resilience ──────────────────────────────────────────────
export { withRetry, withTimeout, backoffDelay } from './resilience/retry';
export type { RetryPolicy } from './resilience/retry';
export { mapWithConcurrency } from './resilience/fan-out';

// ── Confidence ──────────────────────────────────────────────
export {
  aggregateConfidence,
  countFields,
  mergeUnitPayloads,
  isPlainObject,
} from './confidence/confidence';
export type { WeightedConfidence } from './confidence/confidence';

// ── Implementations ─────────────────────────────────────────
export {
  SpreadsheetParser,
  SUPPORTED_SPREADSHEET_TYPES,
  CSV_SHEET_NAME,
  isSpreadsheetType,
} from './parser/spreadsheet-parser';
export { SheetExtractor } from './extractor/sheet-extractor';
export type { SheetExtractorOptions } from './extractor/sheet-extractor';
export { ZodSchemaValidator } from './validator/zod-schema-validator';
export {
  createInvoiceValidator,
  createReportValidator,
  createFormValidator,
  invoiceSchema,
  reportSchema,
  formSchema,
} from './validator/subtype-schemas';
