import { Controller, HttpException, Logger } from '@nestjs/common';
import { GrpcMethod, RpcException } from '@nestjs/microservices';
import { Observable, catchError, map, throwError } from 'rxjs';
import {
  AnnotateExtractionRequest,
  CancelJobRequest,
  CreateJobRequest,
  EXTRACTION_JOB_SERVICE_NAME,
  ExtractionReply,
  GetExtractionRequest,
  GetJobRequest,
  GrpcInvalidArgumentException,
  JobReply,
  ListExtractionsReply,
  ListExtractionsRequest,
  ListJobsReply,
  ListJobsRequest,
  ProgressUpdate,
  WatchProgressRequest,
  toRpcException,
} from '@sheetwise/proto';
import { JobsService } from './jobs.service';
import {
  toExtractionReply,
  toJobReply,
  toProgressUpdate,
} from './jobs.mapper';

/**
 * gRPC controller for ExtractionJobService.
 *
 * Proto3 has no "unset" for scalars, so empty strings and zeros in
 * requests are read as absent. Service exceptions are mapped onto gRPC
 * status codes with toRpcException.
 */
@Controller()
export class JobsController {
  private readonly logger = new Logger(JobsController.name);

  constructor(private readonly jobsService: JobsService) {}

  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'CreateJob')
  async createJob(request: CreateJobRequest): Promise<JobReply> {
    const documentId = required(request.documentId, 'document_id');
    return this.handle('CreateJob', async () =>
      toJobReply(await this.jobsService.createJob(documentId)),
    );
  }

  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'GetJob')
  async getJob(request: GetJobRequest): Promise<JobReply> {
    const jobId = required(request.jobId, 'job_id');
    return this.handle('GetJob', async () =>
      toJobReply(await this.jobsService.getJob(jobId)),
    );
  }

  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'ListJobs')
  async listJobs(request: ListJobsRequest): Promise<ListJobsReply> {
    return this.handle('ListJobs', async () => {
      const page = await this.jobsService.listJobs({
        status: request.status || undefined,
        documentId: request.documentId || undefined,
        page: request.page || undefined,
        pageSize: request.pageSize || undefined,
      });
      return {
        items: page.items.map(toJobReply),
        total: page.total,
        page: page.page,
        pageSize: page.pageSize,
      };
    });
  }

  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'CancelJob')
  async cancelJob(request: CancelJobRequest): Promise<JobReply> {
    const jobId = required(request.jobId, 'job_id');
    return this.handle('CancelJob', async () =>
      toJobReply(await this.jobsService.cancelJob(jobId)),
    );
  }

  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'GetExtraction')
  async getExtraction(request: GetExtractionRequest): Promise<ExtractionReply> {
    const jobId = required(request.jobId, 'job_id');
    return this.handle('GetExtraction', async () =>
      toExtractionReply(await this.jobsService.getExtractionForJob(jobId)),
    );
  }

  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'ListExtractions')
  async listExtractions(
    request: ListExtractionsRequest,
  ): Promise<ListExtractionsReply> {
    return this.handle('ListExtractions', async () => {
      const page = await this.jobsService.listExtractions({
        documentId: request.documentId || undefined,
        page: request.page || undefined,
        pageSize: request.pageSize || undefined,
      });
      return {
        items: page.items.map(toExtractionReply),
        total: page.total,
        page: page.page,
        pageSize: page.pageSize,
      };
    });
  }

  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'AnnotateExtraction')
  async annotateExtraction(
    request: AnnotateExtractionRequest,
  ): Promise<ExtractionReply> {
    const jobId = required(request.jobId, 'job_id');
    const notes = request.notes ?? '';
    return this.handle('AnnotateExtraction', async () =>
      toExtractionReply(
        await this.jobsService.annotateExtraction(jobId, notes),
      ),
    );
  }

  /** Server-streaming: completes after the job's terminal event. */
  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'WatchProgress')
  watchProgress(request: WatchProgressRequest): Observable<ProgressUpdate> {
    if (!request.jobId) {
      return throwError(
        () => new GrpcInvalidArgumentException('job_id is required'),
      );
    }
    return this.jobsService.watchProgress(request.jobId).pipe(
      map(toProgressUpdate),
      catchError((error: unknown) =>
        throwError(() => this.toRpc('WatchProgress', error)),
      ),
    );
  }

  private async handle<T>(method: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw this.toRpc(method, error);
    }
  }

  private toRpc(method: string, error: unknown): RpcException {
    const expected =
      error instanceof HttpException || error instanceof RpcException;
    if (!expected) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`${method} failed: ${message}`);
    }
    return toRpcException(error);
  }
}

function required(value: string | undefined, field: string): string {
  if (!value) {
    throw new GrpcInvalidArgumentException(`${field} is required`);
  }
  return value;
}
