import { registerAs } from '@nestjs/config';
import { EnvironmentVariables, validateEnvironment } from './env.validation';

const BYTES_PER_MB = 1024 * 1024;

export interface LocalStorageConfig {
  readonly driver: 'local';
  readonly rootDir: string;
}

export interface ObjectStorageConfig {
  readonly driver: 'object';
  readonly endPoint: string;
  readonly port: number;
  readonly useSSL: boolean;
  readonly accessKey: string;
  readonly secretKey: string;
  readonly bucket: string;
  readonly region: string;
}

export type StorageConfig = LocalStorageConfig | ObjectStorageConfig;

/**
 * Either a Gemini API key or a Vertex AI project + region.
 * `none` lets the service start; every summarization then fails with an
 * auth error until credentials are configured.
 */
export type SummarizerCredentials =
  | { readonly kind: 'api-key'; readonly apiKey: string }
  | { readonly kind: 'vertex'; readonly project: string; readonly region: string }
  | { readonly kind: 'none' };

export interface SummarizerConfig {
  readonly modelId: string;
  readonly maxTokens: number;
  readonly maxInputChars: number;
  readonly timeoutMs: number;
  readonly endpoint: string | null;
  readonly credentials: SummarizerCredentials;
}

/**
 * Process-wide settings, resolved once at startup and frozen.
 * Injected with `@Inject(pipelineConfig.KEY)`.
 */
export interface PipelineConfig {
  readonly storage: StorageConfig;
  readonly summarizer: SummarizerConfig;
  readonly maxUploadBytes: number;
  readonly autoProcessOnUpload: boolean;
  readonly recoverInterruptedOnStart: boolean;
}

function resolveStorage(env: EnvironmentVariables): StorageConfig {
  const { MINIO_ENDPOINT, MINIO_ACCESS_KEY, MINIO_SECRET_KEY } = env;
  const hasObjectStore =
    !!MINIO_ENDPOINT && !!MINIO_ACCESS_KEY && !!MINIO_SECRET_KEY;
  const driver = env.STORAGE_DRIVER ?? (hasObjectStore ? 'object' : 'local');

  if (driver === 'local') {
    return Object.freeze({ driver, rootDir: env.STORAGE_LOCAL_ROOT });
  }

  if (!MINIO_ENDPOINT || !MINIO_ACCESS_KEY || !MINIO_SECRET_KEY) {
    throw new Error(
      'STORAGE_DRIVER=object requires MINIO_ENDPOINT, MINIO_ACCESS_KEY and MINIO_SECRET_KEY',
    );
  }

  return Object.freeze({
    driver,
    endPoint: MINIO_ENDPOINT,
    port: env.MINIO_PORT,
    useSSL: env.MINIO_USE_SSL,
    accessKey: MINIO_ACCESS_KEY,
    secretKey: MINIO_SECRET_KEY,
    bucket: env.MINIO_BUCKET,
    region: env.MINIO_REGION,
  });
}

function resolveCredentials(env: EnvironmentVariables): SummarizerCredentials {
  if (env.SUMMARIZER_PROJECT) {
    return Object.freeze({
      kind: 'vertex',
      project: env.SUMMARIZER_PROJECT,
      region: env.SUMMARIZER_REGION,
    });
  }
  if (env.SUMMARIZER_API_KEY) {
    return Object.freeze({ kind: 'api-key', apiKey: env.SUMMARIZER_API_KEY });
  }
  return Object.freeze({ kind: 'none' });
}

export function buildPipelineConfig(env: EnvironmentVariables): PipelineConfig {
  return Object.freeze({
    storage: resolveStorage(env),
    summarizer: Object.freeze({
      modelId: env.SUMMARIZER_MODEL_ID,
      maxTokens: env.SUMMARIZER_MAX_TOKENS,
      maxInputChars: env.SUMMARIZER_MAX_INPUT_CHARS,
      timeoutMs: env.SUMMARIZER_TIMEOUT_MS,
      endpoint: env.SUMMARIZER_ENDPOINT || null,
      credentials: resolveCredentials(env),
    }),
    maxUploadBytes: env.UPLOAD_MAX_FILE_SIZE_MB * BYTES_PER_MB,
    autoProcessOnUpload: env.AUTO_PROCESS_ON_UPLOAD,
    recoverInterruptedOnStart: env.RECOVER_INTERRUPTED_ON_START,
  });
}

/**
 * Registered with ConfigModule.forRoot({ load }); runs after .env files
 * have been merged into process.env.
 */
export const pipelineConfig = registerAs(
  'pipeline',
  (): PipelineConfig => buildPipelineConfig(validateEnvironment(process.env)),
);
