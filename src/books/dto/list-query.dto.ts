import { Transform } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { MAX_PAGE_SIZE } from '../../config/env.validation';
import { ORDER_BY_VALUES } from '../book-sort';

const toOptionalNumber = ({ value }: { value: unknown }) =>
  value === undefined || value === null || value === '' ? undefined : Number(value);

/** Largest page whose offset stays an exact integer at any allowed page size. */
export const MAX_PAGE = Math.floor(Number.MAX_SAFE_INTEGER / MAX_PAGE_SIZE);

export class ListQueryDto {
  @IsOptional()
  @Transform(toOptionalNumber)
  @IsInt()
  @Min(0)
  @Max(MAX_PAGE)
  page?: number;

  @IsOptional()
  @Transform(toOptionalNumber)
  @IsInt()
  @IsIn(ORDER_BY_VALUES)
  orderBy?: number;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  filter?: string;
}
