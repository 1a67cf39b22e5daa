import { Test } from '@nestjs/testing';
import { pipelineConfig } from '../config/pipeline.config';
import { ProcessingCancelledException } from '../common/processing-cancelled.exception';
import {
  FakeContentGenerator,
  httpError,
} from '../../test/support/fake-content-generator';
import { testPipelineConfig } from '../../test/support/test-config';
import {
  CONTENT_GENERATOR,
  SummarizationService,
} from './summarization.service';
import {
  InvalidModelResponseException,
  ModelAuthException,
  RateLimitedException,
  RemoteUnavailableException,
} from './summarization.exceptions';

describe('SummarizationService', () => {
  let generator: FakeContentGenerator;
  let service: SummarizationService;

  async function createService(env: Record<string, string> = {}): Promise<void> {
    generator = new FakeContentGenerator();
    const moduleRef = await Test.createTestingModule({
      providers: [
        SummarizationService,
        { provide: CONTENT_GENERATOR, useValue: generator },
        { provide: pipelineConfig.KEY, useValue: testPipelineConfig(env) },
      ],
    }).compile();
    service = moduleRef.get(SummarizationService);
  }

  beforeEach(async () => {
    await createService({ SUMMARIZER_MAX_INPUT_CHARS: '20' });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('sends the text with the configured model and token cap', async () => {
    generator.replyWith('  A short summary.  ');

    const result = await service.summarize('Hello there.');

    expect(result.summary).toBe('A short summary.');
    expect(result.metadata).toMatchObject({
      modelId: 'gemini-2.0-flash',
      maxTokens: 512,
      truncated: false,
      originalChars: 12,
      inputChars: 12,
    });
    expect(generator.calls[0]).toMatchObject({
      model: 'gemini-2.0-flash',
      contents: 'Hello there.',
      config: { maxOutputTokens: 512 },
    });
  });

  it('honours per-call model and token overrides', async () => {
    await service.summarize('Hello there.', {
      modelId: 'gemini-2.5-pro',
      maxTokens: 64,
    });

    expect(generator.calls[0]).toMatchObject({
      model: 'gemini-2.5-pro',
      config: { maxOutputTokens: 64 },
    });
  });

  it('truncates input beyond the window and records it', async () => {
    const text = 'abcdefghijklmnopqrstuvwxyz';

    const result = await service.summarize(text);

    expect(generator.calls[0].contents).toBe('abcdefghijklmnopqrst');
    expect(result.metadata.truncated).toBe(true);
    expect(result.metadata.originalChars).toBe(26);
    expect(result.metadata.inputChars).toBe(20);
  });

  it.each([
    [httpError(401, 'unauthenticated'), ModelAuthException, 'AUTH_ERROR'],
    [httpError(403, 'permission denied'), ModelAuthException, 'AUTH_ERROR'],
    [httpError(400, 'API key not valid. Please pass a valid API key.'), ModelAuthException, 'AUTH_ERROR'],
    [httpError(429, 'quota exceeded'), RateLimitedException, 'RATE_LIMITED'],
    [httpError(503, 'overloaded'), RemoteUnavailableException, 'REMOTE_UNAVAILABLE'],
    [httpError(400, 'request too large'), InvalidModelResponseException, 'INVALID_RESPONSE'],
    [new TypeError('fetch failed'), RemoteUnavailableException, 'REMOTE_UNAVAILABLE'],
  ])('maps %p to %p', async (error, expectedClass, code) => {
    generator.failWith(error);

    const attempt = service.summarize('Hello there.');

    await expect(attempt).rejects.toBeInstanceOf(expectedClass);
    await expect(attempt).rejects.toHaveProperty('code', code);
  });

  it('rejects empty model output', async () => {
    generator.replyWith('   ');

    await expect(service.summarize('Hello there.')).rejects.toThrow(
      new InvalidModelResponseException('model returned no text'),
    );
  });

  it('rejects a missing text part', async () => {
    generator.replyWith(undefined);

    await expect(service.summarize('Hello there.')).rejects.toBeInstanceOf(
      InvalidModelResponseException,
    );
  });

  it('gives up after the configured 30 s timeout', async () => {
    await createService();
    jest.useFakeTimers();
    generator.hang();

    const attempt = service.summarize('Hello there.');
    const assertion = expect(attempt).rejects.toThrow(
      'Remote model unavailable: request timed out after 30000 ms',
    );

    await jest.advanceTimersByTimeAsync(30_000);
    await assertion;
    expect(generator.calls[0].config?.abortSignal?.aborted).toBe(true);
  });

  it('stops when the caller aborts', async () => {
    generator.hang();
    const controller = new AbortController();

    const attempt = service.summarize('Hello there.', {
      signal: controller.signal,
    });
    controller.abort();

    await expect(attempt).rejects.toBeInstanceOf(ProcessingCancelledException);
  });

  it('does not call the model when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      service.summarize('Hello there.', { signal: controller.signal }),
    ).rejects.toBeInstanceOf(ProcessingCancelledException);
    expect(generator.calls).toHaveLength(0);
  });
});
