import { ClassConstructor, plainToInstance } from 'class-transformer';
import { IsInt, Max, Min, validateSync } from 'class-validator';
import { InvalidJobQueryException } from '../exceptions/job.exceptions';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface PageInput {
  page?: number;
  pageSize?: number;
}

/** 1-based paging shared by every listing; pageSize is capped. */
export class PageQueryDto {
  @IsInt()
  @Min(1)
  page: number = 1;

  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_SIZE)
  pageSize: number = DEFAULT_PAGE_SIZE;
}

/**
 * Builds and validates a listing query. Absent keys keep the DTO's
 * defaults; violations become one InvalidJobQueryException.
 */
export function toQuery<T extends PageQueryDto>(
  dto: ClassConstructor<T>,
  input: object,
): T {
  const present = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined),
  );
  const query = plainToInstance(dto, present);

  const errors = validateSync(query);
  if (errors.length > 0) {
    throw new InvalidJobQueryException(
      errors
        .flatMap((error) => Object.values(error.constraints ?? {}))
        .join('; '),
    );
  }
  return query;
}
