/**
 * @sheetwise/proto
 *
 * Protobuf definition and TypeScript interfaces for the worker's gRPC API.
 *
 * - The proto file is consumed at runtime by @grpc/proto-loader
 * - TypeScript interfaces provide compile-time type safety
 * - gRPC exceptions provide a shared error contract
 */
import { existsSync } from 'fs';
import { join } from 'path';

// ── Proto File Paths ────────────────────────────────────

const PROTO_FILE = 'extraction.proto';

/**
 * Absolute path to the extraction job proto file. tsc does not copy the
 * proto into dist/, so compiled code falls back to the source tree.
 */
export const EXTRACTION_PROTO_PATH: string = [
  join(__dirname, PROTO_FILE),
  join(__dirname, '../../../../libs/proto/src', PROTO_FILE),
].find((candidate) => existsSync(candidate)) ?? join(__dirname, PROTO_FILE);

// ── Package & Service Constants ─────────────────────────

/** gRPC package name matching the proto `package` directive */
export const SHEETWISE_PACKAGE_NAME = 'sheetwise';

/** Service name for the extraction job gRPC service */
export const EXTRACTION_JOB_SERVICE_NAME = 'ExtractionJobService';

// ── TypeScript Interfaces ───────────────────────────────

export type {
  CreateJobRequest,
  GetJobRequest,
  CancelJobRequest,
  ListJobsRequest,
  GetExtractionRequest,
  ListExtractionsRequest,
  AnnotateExtractionRequest,
  WatchProgressRequest,
  JobReply,
  ListJobsReply,
  ValidationIssueMessage,
  ExtractionReply,
  ListExtractionsReply,
  ProgressUpdate,
  GrpcTimestamp,
} from './interfaces';

// ── gRPC Exceptions ─────────────────────────────────────

export {
  GrpcNotFoundException,
  GrpcInvalidArgumentException,
  GrpcInternalException,
  GrpcAlreadyExistsException,
  GrpcFailedPreconditionException,
  GrpcUnavailableException,
  toRpcException,
} from './grpc-exceptions';
