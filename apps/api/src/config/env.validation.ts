import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

function toBoolean(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

/**
 * Environment variables read by the pipeline. Defaults are dev defaults.
 *
 * Database and Redis connection settings are read directly through
 * ConfigService where the connections are built and are not listed here.
 */
export class EnvironmentVariables {
  // ── Storage ───────────────────────────────────────────
  @IsOptional()
  @IsIn(['local', 'object'])
  STORAGE_DRIVER?: 'local' | 'object';

  @IsString()
  STORAGE_LOCAL_ROOT: string = './storage';

  @IsOptional()
  @IsString()
  MINIO_ENDPOINT?: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  MINIO_PORT: number = 9000;

  @Transform(({ obj }: { obj: Record<string, unknown> }) =>
    toBoolean(obj['MINIO_USE_SSL']),
  )
  @IsBoolean()
  MINIO_USE_SSL: boolean = false;

  @IsOptional()
  @IsString()
  MINIO_ACCESS_KEY?: string;

  @IsOptional()
  @IsString()
  MINIO_SECRET_KEY?: string;

  @IsString()
  MINIO_BUCKET: string = 'papertrail-documents';

  @IsString()
  MINIO_REGION: string = 'us-east-1';

  // ── Summarizer ────────────────────────────────────────
  @IsString()
  SUMMARIZER_MODEL_ID: string = 'gemini-2.0-flash';

  @IsInt()
  @Min(1)
  SUMMARIZER_MAX_TOKENS: number = 512;

  @IsInt()
  @Min(1)
  SUMMARIZER_MAX_INPUT_CHARS: number = 100_000;

  @IsInt()
  @Min(1)
  SUMMARIZER_TIMEOUT_MS: number = 30_000;

  @IsOptional()
  @IsString()
  SUMMARIZER_API_KEY?: string;

  /** Vertex AI project; when set, SUMMARIZER_REGION selects the location */
  @IsOptional()
  @IsString()
  SUMMARIZER_PROJECT?: string;

  @IsString()
  SUMMARIZER_REGION: string = 'us-central1';

  @IsOptional()
  @IsString()
  SUMMARIZER_ENDPOINT?: string;

  // ── Processing ────────────────────────────────────────
  @IsInt()
  @Min(1)
  UPLOAD_MAX_FILE_SIZE_MB: number = 50;

  @Transform(({ obj }: { obj: Record<string, unknown> }) =>
    toBoolean(obj['AUTO_PROCESS_ON_UPLOAD']),
  )
  @IsBoolean()
  AUTO_PROCESS_ON_UPLOAD: boolean = true;

  @Transform(({ obj }: { obj: Record<string, unknown> }) =>
    toBoolean(obj['RECOVER_INTERRUPTED_ON_START']),
  )
  @IsBoolean()
  RECOVER_INTERRUPTED_ON_START: boolean = true;
}

/**
 * Coerces and validates raw environment values.
 * Throws with every violation listed when anything is invalid.
 */
export function validateEnvironment(
  raw: Record<string, unknown>,
): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, raw, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(env, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return env;
}
