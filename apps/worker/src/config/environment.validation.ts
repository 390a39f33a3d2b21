import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const VALIDATION_FAILURE_POLICIES = ['annotate', 'fail'] as const;
export type ValidationFailurePolicy =
  (typeof VALIDATION_FAILURE_POLICIES)[number];

/**
 * Environment contract of the worker. Every key is optional; defaults live
 * in worker-settings.ts and in the services that read their own keys.
 *
 * String values from the process environment are converted by
 * class-transformer's implicit conversion before validation.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'test', 'production'])
  NODE_ENV?: string;

  // ── Infrastructure ───────────────────────────────────────

  @IsOptional()
  @IsString()
  POSTGRES_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  POSTGRES_PORT?: number;

  @IsOptional()
  @IsString()
  REDIS_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  REDIS_PORT?: number;

  @IsOptional()
  @IsString()
  MINIO_ENDPOINT?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  MINIO_PORT?: number;

  /** Kept as a string: implicit conversion would turn "false" into true */
  @IsOptional()
  @IsIn(['true', 'false'])
  MINIO_USE_SSL?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  MINIO_BUCKET?: string;

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  OPENAI_MODEL?: string;

  // ── Queue & worker pool ──────────────────────────────────

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(64)
  WORKER_CONCURRENCY?: number;

  @IsOptional()
  @IsInt()
  @Min(100)
  QUEUE_BLOCK_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1000)
  QUEUE_VISIBILITY_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(100)
  HEARTBEAT_INTERVAL_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1000)
  JOB_STALE_AFTER_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1000)
  JOB_PENDING_STALE_AFTER_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  JOB_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsInt()
  @Min(1000)
  WATCHDOG_INTERVAL_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  WORKER_SHUTDOWN_GRACE_MS?: number;

  // ── Pipeline ─────────────────────────────────────────────

  @IsOptional()
  @IsInt()
  @Min(1)
  AI_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  AI_RETRY_BASE_DELAY_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  AI_RETRY_MAX_DELAY_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  AI_CALL_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  AI_MAX_ROWS_PER_SHEET?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(32)
  EXTRACTION_CONCURRENCY?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  PARSE_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  VALIDATE_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  STORAGE_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsIn(VALIDATION_FAILURE_POLICIES)
  VALIDATION_FAILURE_POLICY?: ValidationFailurePolicy;

  // ── Transport ────────────────────────────────────────────

  @IsOptional()
  @IsString()
  WORKER_GRPC_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  WORKER_GRPC_PORT?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  WORKER_HTTP_PORT?: number;
}

/**
 * `validate` hook for ConfigModule.forRoot(). Throws with every violated
 * constraint so a misconfigured worker refuses to start.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map(
        (error) =>
          `${error.property}: ` +
          Object.values(error.constraints ?? {}).join(', '),
      )
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
