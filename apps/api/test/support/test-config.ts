import { buildPipelineConfig, PipelineConfig } from '../../src/config/pipeline.config';
import { validateEnvironment } from '../../src/config/env.validation';

/**
 * Pipeline configuration for specs: local storage, fake API key and the
 * production defaults for everything else.
 */
export function testPipelineConfig(
  env: Record<string, string> = {},
): PipelineConfig {
  return buildPipelineConfig(
    validateEnvironment({
      STORAGE_DRIVER: 'local',
      STORAGE_LOCAL_ROOT: './storage-test',
      SUMMARIZER_API_KEY: 'test-key',
      ...env,
    }),
  );
}
