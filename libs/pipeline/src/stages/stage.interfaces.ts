/**
 * Capability contracts for the three pipeline stages.
 *
 * A document subtype selects one Parser, one Extractor and one Validator
 * from the PipelineRegistry; the executor only ever talks to these
 * interfaces.
 */

export type PipelineStage = 'parse' | 'extract' | 'validate';

/** What the pipeline knows about a document besides its bytes. */
export interface DocumentDescriptor {
  documentId: string;
  filename: string;
  /** Declared file type, e.g. `xlsx` */
  fileType: string;
  subtype: string;
}

// ── Parse ──────────────────────────────────────────────────

export type CellValue = string | number | boolean | null;

export interface ParsedSheet {
  name: string;
  rows: CellValue[][];
  /** True when no cell holds a value */
  empty: boolean;
}

export interface ParsedWorkbook {
  filename: string;
  fileType: string;
  sheets: ParsedSheet[];
}

export interface Parser {
  parse(bytes: Buffer, descriptor: DocumentDescriptor): Promise<ParsedWorkbook>;
}

// ── Extract ────────────────────────────────────────────────

/** Input of one AI call: a single logical unit (sheet) of the workbook. */
export interface InferenceContext {
  subtype: string;
  filename: string;
  unitName: string;
  unitIndex: number;
  unitCount: number;
  rows: CellValue[][];
}

export interface InferenceResult {
  payload: Record<string, unknown>;
  confidence: number;
}

/** Externally supplied AI inference capability. */
export interface InferenceCapability {
  infer(context: InferenceContext): Promise<InferenceResult>;
}

/** Hooks the executor hands to an extractor for the duration of one job. */
export interface ExtractionContext {
  jobId: string;
  subtype: string;
  /** Throws JobCanceledSignal / LeaseLostSignal when the job must stop. */
  checkpoint(): Promise<void>;
  /** Called after each unit finishes, in completion order. */
  reportUnitDone(done: number, total: number): Promise<void>;
}

export interface UnitResult {
  unitName: string;
  payload: Record<string, unknown>;
  confidence: number;
  fieldCount: number;
}

export interface ExtractionResult {
  data: Record<string, unknown>;
  confidence: number;
  units: UnitResult[];
}

export interface Extractor {
  extract(
    parsed: ParsedWorkbook,
    ai: InferenceCapability,
    context: ExtractionContext,
  ): Promise<ExtractionResult>;
}

// ── Validate ───────────────────────────────────────────────

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ValidationResults {
  valid: boolean;
  schemaType: string;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export interface ValidationOutcome {
  valid: boolean;
  results: ValidationResults;
  /** Extracted data after subtype normalization (amounts, dates) */
  normalizedData: Record<string, unknown>;
}

/** Deterministic and free of I/O. */
export interface Validator {
  validate(data: Record<string, unknown>): Promise<ValidationOutcome>;
}
