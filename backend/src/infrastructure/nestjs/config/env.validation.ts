import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Min, validateSync } from 'class-validator';
import { SUMMARIZER_TYPES } from './pipeline.config';

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number;

  @IsOptional()
  @IsString()
  DATABASE_PATH?: string;

  @IsOptional()
  @IsString()
  OWNER_HEADER?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  HISTORY_LIMIT?: number;

  @IsOptional()
  @IsString()
  PIPELINE_STAGES?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  WORKER_POLL_INTERVAL_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  WORKER_CONCURRENCY?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  VISIBILITY_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_DELIVERY_ATTEMPTS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  FETCH_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_REPOSITORY_SIZE_KB?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_SOURCE_FILES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_EXTRACTED_CHARS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  ANALYSIS_TIMEOUT_MS?: number;

  @IsOptional()
  @IsIn(SUMMARIZER_TYPES)
  SUMMARIZER?: string;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: string;
}

/**
 * Rejects malformed variables at boot; the values themselves are read by
 * loadPipelineConfig
 */
export function validateEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return config;
}
