/**
 * TypeScript interfaces mirroring extraction.proto.
 *
 * Hand-written to match the proto contract without a code-generation step;
 * @grpc/proto-loader parses the proto at runtime (keepCase: false, so
 * fields arrive camelCased).
 */
// ── Requests ────────────────────────────────────────────

export interface CreateJobRequest {
  documentId: string;
}

export interface GetJobRequest {
  jobId: string;
}

export interface CancelJobRequest {
  jobId: string;
}

/** Empty strings and zeros mean "not set" (proto3 defaults) */
export interface ListJobsRequest {
  status: string;
  documentId: string;
  page: number;
  pageSize: number;
}

export interface GetExtractionRequest {
  jobId: string;
}

/** Empty strings and zeros mean "not set" (proto3 defaults) */
export interface ListExtractionsRequest {
  documentId: string;
  page: number;
  pageSize: number;
}

export interface AnnotateExtractionRequest {
  jobId: string;
  notes: string;
}

export interface WatchProgressRequest {
  jobId: string;
}

// ── Replies ─────────────────────────────────────────────

export interface JobReply {
  id: string;
  documentId: string;
  status: string;
  progress: number;
  errorMessage: string;
  attempts: number;
  cancelRequested: boolean;
  createdAt: GrpcTimestamp;
  updatedAt: GrpcTimestamp;
  completedAt: GrpcTimestamp | null;
}

export interface ListJobsReply {
  items: JobReply[];
  total: number;
  page: number;
  pageSize: number;
}

export interface ValidationIssueMessage {
  path: string;
  message: string;
}

export interface ExtractionReply {
  id: string;
  jobId: string;
  documentId: string;
  /** JSON-encoded */
  extractedData: string;
  confidenceScore: number;
  formatType: string;
  valid: boolean;
  errors: ValidationIssueMessage[];
  warnings: ValidationIssueMessage[];
  notes: string;
  extractedAt: GrpcTimestamp;
}

export interface ListExtractionsReply {
  items: ExtractionReply[];
  total: number;
  page: number;
  pageSize: number;
}

export interface ProgressUpdate {
  jobId: string;
  status: string;
  progress: number;
  stage: string;
  message: string;
  errorMessage: string;
  updatedAt: GrpcTimestamp;
}

// ── gRPC Timestamp ──────────────────────────────────────
// google.protobuf.Timestamp is serialized as { seconds, nanos } over the wire

export interface GrpcTimestamp {
  seconds: number;
  nanos: number;
}
