import {
  BadRequestException,
  ConflictException,
  HttpStatus,
  NotFoundException,
} from '@nestjs/common';
import { JobStatus } from '@sheetwise/database';

/**
 * Orchestrator errors. They extend Nest's HTTP exceptions so that the
 * status carries the meaning; the gRPC controller maps them with
 * toRpcException (404 → NOT_FOUND, 409 duplicate → ALREADY_EXISTS,
 * other 409 → FAILED_PRECONDITION, 400 → INVALID_ARGUMENT).
 */

export class DocumentNotFoundException extends NotFoundException {
  constructor(documentId: string) {
    super(`Document ${documentId} not found`);
  }
}

export class JobNotFoundException extends NotFoundException {
  constructor(jobId: string) {
    super(`Job ${jobId} not found`);
  }
}

export class ExtractionNotFoundException extends NotFoundException {
  constructor(jobId: string, status: JobStatus) {
    super(`Job ${jobId} has no extraction (status: ${status})`);
  }
}

/** A document may have at most one PENDING or PROCESSING job. */
export class ActiveJobConflictException extends ConflictException {
  constructor(documentId: string, activeJobId: string | null) {
    super({
      statusCode: HttpStatus.CONFLICT,
      error: 'Conflict',
      reason: 'duplicate',
      message: activeJobId
        ? `Document ${documentId} already has an active job: ${activeJobId}`
        : `Document ${documentId} already has an active job`,
    });
  }
}

export class JobAlreadyTerminalException extends ConflictException {
  constructor(jobId: string, status: JobStatus) {
    super({
      statusCode: HttpStatus.CONFLICT,
      error: 'Conflict',
      reason: 'terminal',
      message: `Job ${jobId} is already ${status}`,
    });
  }
}

export class InvalidJobQueryException extends BadRequestException {
  constructor(details: string) {
    super(`Invalid job query: ${details}`);
  }
}
