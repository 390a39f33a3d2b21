import { IsOptional, IsUUID } from 'class-validator';
import { PageInput, PageQueryDto, toQuery } from './page-query.dto';

export interface ListExtractionsInput extends PageInput {
  documentId?: string;
}

export class ListExtractionsQueryDto extends PageQueryDto {
  @IsOptional()
  @IsUUID()
  documentId?: string;
}

export function toListExtractionsQuery(
  input: ListExtractionsInput,
): ListExtractionsQueryDto {
  return toQuery(ListExtractionsQueryDto, input);
}
