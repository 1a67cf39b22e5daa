import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  GenerateContentParameters,
  GenerateContentResponse,
} from '@google/genai';
import { SummaryMetadata } from '@papertrail/database';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import {
  PipelineException,
  describeError,
} from '../common/pipeline.exception';
import {
  ProcessingCancelledException,
  throwIfCancelled,
} from '../common/processing-cancelled.exception';
import {
  InvalidModelResponseException,
  ModelAuthException,
  RateLimitedException,
  RemoteUnavailableException,
} from './summarization.exceptions';
import { truncateToFit } from './truncate-text';

/** Injection token for the model client (`GoogleGenAI#models` in production) */
export const CONTENT_GENERATOR = 'CONTENT_GENERATOR';

/** The one call the summarizer makes against @google/genai. */
export interface ContentGenerator {
  generateContent(
    params: GenerateContentParameters,
  ): Promise<Pick<GenerateContentResponse, 'text'>>;
}

export interface SummarizeOptions {
  /** Caps the response length; defaults to SUMMARIZER_MAX_TOKENS */
  maxTokens?: number;
  /** Remote model variant; defaults to SUMMARIZER_MODEL_ID */
  modelId?: string;
  /** Aborts the call; surfaces as ProcessingCancelledException */
  signal?: AbortSignal;
}

export interface SummaryResult {
  summary: string;
  metadata: SummaryMetadata;
}

const SYSTEM_INSTRUCTION =
  'You summarize documents. Reply with a concise plain-prose summary of the ' +
  'document the user sends, a few sentences long, without preamble.';

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * SummarizationService — one summarization call per invocation.
 *
 * Input longer than SUMMARIZER_MAX_INPUT_CHARS is cut to its longest
 * fitting prefix; the returned metadata says so. The call is bounded by
 * SUMMARIZER_TIMEOUT_MS. There is no retry or back-off here; every failure
 * is mapped to a SummarizationException and left to the caller.
 */
@Injectable()
export class SummarizationService {
  private readonly logger = new Logger(SummarizationService.name);

  constructor(
    @Inject(CONTENT_GENERATOR)
    private readonly generator: ContentGenerator,

    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  async summarize(
    text: string,
    options: SummarizeOptions = {},
  ): Promise<SummaryResult> {
    const { summarizer } = this.config;
    const modelId = options.modelId ?? summarizer.modelId;
    const maxTokens = options.maxTokens ?? summarizer.maxTokens;
    const input = truncateToFit(text, summarizer.maxInputChars);

    if (input.truncated) {
      this.logger.warn(
        `Input truncated from ${text.length} to ${input.text.length} characters for ${modelId}`,
      );
    }

    throwIfCancelled(options.signal);
    const startedAt = Date.now();

    let response: Pick<GenerateContentResponse, 'text'>;
    try {
      response = await this.generateWithTimeout(
        {
          model: modelId,
          contents: input.text,
          config: {
            systemInstruction: SYSTEM_INSTRUCTION,
            maxOutputTokens: maxTokens,
          },
        },
        options.signal,
      );
    } catch (error) {
      const failure = this.classify(error);
      this.logger.warn(
        `Summarization with ${modelId} failed after ${Date.now() - startedAt} ms: ${failure.message}`,
      );
      throw failure;
    }

    const summary = response.text?.trim() ?? '';
    if (summary.length === 0) {
      throw new InvalidModelResponseException('model returned no text');
    }

    this.logger.log(
      `Summarized ${input.text.length} characters with ${modelId} in ${Date.now() - startedAt} ms`,
    );

    return {
      summary,
      metadata: {
        modelId,
        maxTokens,
        truncated: input.truncated,
        originalChars: text.length,
        inputChars: input.text.length,
        generatedAt: new Date().toISOString(),
      },
    };
  }

  // ── Private helpers ──────────────────────────────────────

  /**
   * Races the model call against the timeout and the caller's signal.
   * Whichever aborts first decides the rejection reason; the same signal
   * is handed to the SDK so the HTTP request is torn down too.
   */
  private async generateWithTimeout(
    params: GenerateContentParameters,
    callerSignal: AbortSignal | undefined,
  ): Promise<Pick<GenerateContentResponse, 'text'>> {
    const timeoutMs = this.config.summarizer.timeoutMs;
    const controller = new AbortController();

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(controller.signal.reason),
        { once: true },
      );
    });

    const onCallerAbort = (): void => {
      const reason: unknown = callerSignal?.reason;
      controller.abort(
        reason instanceof ProcessingCancelledException
          ? reason
          : new ProcessingCancelledException('request aborted'),
      );
    };
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    const timer = setTimeout(() => {
      controller.abort(
        new RemoteUnavailableException(`request timed out after ${timeoutMs} ms`),
      );
    }, timeoutMs);

    try {
      return await Promise.race([
        this.generator.generateContent({
          ...params,
          config: { ...params.config, abortSignal: controller.signal },
        }),
        aborted,
      ]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private classify(error: unknown): PipelineException {
    if (error instanceof PipelineException) {
      return error;
    }

    const status = httpStatusOf(error);
    const detail = describeError(error);

    if (status === 401 || status === 403) {
      return new ModelAuthException(detail, error);
    }
    // Gemini answers a bad API key with 400 INVALID_ARGUMENT
    if (status === 400 && /api key/i.test(detail)) {
      return new ModelAuthException(detail, error);
    }
    if (status === 429) {
      return new RateLimitedException(detail, error);
    }
    if (status !== undefined && status >= 500) {
      return new RemoteUnavailableException(detail, error);
    }
    if (status !== undefined) {
      return new InvalidModelResponseException(detail, error);
    }
    return new RemoteUnavailableException(detail, error);
  }
}
