import { plainToInstance, Transform } from 'class-transformer';
import { IsInt, IsOptional, IsString, IsNotEmpty, Max, Min, validateSync } from 'class-validator';

export const DEFAULT_PORT = 3001;
export const DEFAULT_DATABASE_PATH = 'books.sqlite';
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;
export const DEFAULT_OPERATION_TIMEOUT_MS = 10_000;
export const DEFAULT_SYNC_CACHE_TTL_MS = 5_000;
export const DEFAULT_CACHE_MAX_ENTRIES = 1_000;
export const DEFAULT_CORS_ORIGINS = 'http://localhost:3000,http://localhost:5173';

const toNumber = ({ value }: { value: unknown }) =>
  value === undefined || value === null || value === '' ? undefined : Number(value);

export class EnvironmentVariables {
  @Transform(toNumber)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = DEFAULT_PORT;

  @IsString()
  @IsNotEmpty()
  DATABASE_PATH: string = DEFAULT_DATABASE_PATH;

  @Transform(toNumber)
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_SIZE)
  BOOKS_PAGE_SIZE: number = DEFAULT_PAGE_SIZE;

  @Transform(toNumber)
  @IsInt()
  @Min(1)
  BOOKS_OPERATION_TIMEOUT_MS: number = DEFAULT_OPERATION_TIMEOUT_MS;

  /** Unset means cached entries never expire. */
  @IsOptional()
  @Transform(toNumber)
  @IsInt()
  @Min(1)
  BOOKS_CACHE_ASYNC_TTL_MS?: number;

  @Transform(toNumber)
  @IsInt()
  @Min(1)
  BOOKS_CACHE_SYNC_TTL_MS: number = DEFAULT_SYNC_CACHE_TTL_MS;

  /** Per list variant; the oldest entry is evicted once full. */
  @Transform(toNumber)
  @IsInt()
  @Min(1)
  BOOKS_CACHE_MAX_ENTRIES: number = DEFAULT_CACHE_MAX_ENTRIES;

  @IsString()
  CORS_ORIGINS: string = DEFAULT_CORS_ORIGINS;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
