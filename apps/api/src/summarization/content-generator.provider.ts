import { FactoryProvider, Logger } from '@nestjs/common';
import { GoogleGenAI, GoogleGenAIOptions } from '@google/genai';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { CONTENT_GENERATOR, ContentGenerator } from './summarization.service';
import { ModelAuthException } from './summarization.exceptions';

/**
 * Stands in for the model client when no credentials are configured, so
 * the service still boots and each attempt fails with a clear auth error.
 */
class UnconfiguredContentGenerator implements ContentGenerator {
  async generateContent(): Promise<never> {
    throw new ModelAuthException(
      'no credentials configured (set SUMMARIZER_API_KEY or SUMMARIZER_PROJECT)',
    );
  }
}

export function createContentGenerator(config: PipelineConfig): ContentGenerator {
  const logger = new Logger('SummarizationModule');
  const { credentials, endpoint } = config.summarizer;
  const httpOptions = endpoint ? { baseUrl: endpoint } : undefined;

  let options: GoogleGenAIOptions;
  switch (credentials.kind) {
    case 'none':
      logger.warn('Summarizer has no credentials; summaries will fail');
      return new UnconfiguredContentGenerator();
    case 'api-key':
      options = { apiKey: credentials.apiKey, httpOptions };
      break;
    case 'vertex':
      options = {
        vertexai: true,
        project: credentials.project,
        location: credentials.region,
        httpOptions,
      };
      break;
  }

  logger.log(
    `Summarizer using ${credentials.kind === 'vertex' ? `Vertex AI (${credentials.region})` : 'Gemini API'}, ` +
      `default model ${config.summarizer.modelId}`,
  );
  return new GoogleGenAI(options).models;
}

export const contentGeneratorProvider: FactoryProvider<ContentGenerator> = {
  provide: CONTENT_GENERATOR,
  inject: [pipelineConfig.KEY],
  useFactory: createContentGenerator,
};
