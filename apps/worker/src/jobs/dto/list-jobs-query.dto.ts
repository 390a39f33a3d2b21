import { IsEnum, IsOptional, IsUUID } from 'class-validator';
import { JobStatus } from '@sheetwise/database';
import { PageInput, PageQueryDto, toQuery } from './page-query.dto';

/** Loose input as it arrives from a transport; absent keys take defaults. */
export interface ListJobsInput extends PageInput {
  status?: string;
  documentId?: string;
}

export class ListJobsQueryDto extends PageQueryDto {
  @IsOptional()
  @IsEnum(JobStatus, {
    message: `status must be one of: ${Object.values(JobStatus).join(', ')}`,
  })
  status?: JobStatus;

  @IsOptional()
  @IsUUID()
  documentId?: string;
}

/** Validates a job listing request, throwing InvalidJobQueryException. */
export function toListJobsQuery(input: ListJobsInput): ListJobsQueryDto {
  return toQuery(ListJobsQueryDto, input);
}
