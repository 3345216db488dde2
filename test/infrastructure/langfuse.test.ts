import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  LangfuseService,
  compilePrompt,
  createLangfuseServiceFromEnv,
  type LangfuseClient,
} from '../../src/infrastructure/langfuse.js';

function createMockClient(overrides?: Partial<LangfuseClient>): LangfuseClient {
  return {
    getPrompt: vi.fn(),
    trace: vi.fn().mockReturnValue({ generation: vi.fn() }),
    ...overrides,
  };
}

afterEach(() => {
  vi.useRealTimers();
});

const fakePromptResponse = {
  name: 'passport-visual-zone-extraction',
  prompt: 'Read the printed zone. Fields to extract: {{fields}}',
  version: 3,
  config: { temperature: 0.1 },
};

describe('compilePrompt', () => {
  it('replaces known placeholders', () => {
    expect(compilePrompt('Fields: {{fields}}', { fields: 'surname, sex' })).toBe('Fields: surname, sex');
  });

  it('tolerates whitespace inside braces', () => {
    expect(compilePrompt('{{ fields }}', { fields: 'sex' })).toBe('sex');
  });

  it('leaves unknown placeholders in place', () => {
    expect(compilePrompt('{{fields}} {{other}}', { fields: 'sex' })).toBe('sex {{other}}');
    expect(compilePrompt('{{constructor}}', {})).toBe('{{constructor}}');
  });
});

const ref = { name: 'passport-visual-zone-extraction', label: 'production' };

describe('LangfuseService.getPrompt', () => {
  it('fetches the prompt once and then serves it from cache', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockResolvedValue(fakePromptResponse);
    const service = new LangfuseService(client);

    const first = await service.getPrompt(ref);
    expect(first).toEqual({
      ok: true,
      value: {
        name: 'passport-visual-zone-extraction',
        version: 3,
        template: 'Read the printed zone. Fields to extract: {{fields}}',
        config: { temperature: 0.1 },
        origin: 'fetched',
      },
    });

    const again = await service.getPrompt(ref);
    expect(again.ok && again.value.origin).toBe('cached');
    expect(client.getPrompt).toHaveBeenCalledTimes(1);
    expect(client.getPrompt).toHaveBeenCalledWith('passport-visual-zone-extraction', undefined, {
      label: 'production',
      type: 'text',
    });
  });

  it('caches per label', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockResolvedValue(fakePromptResponse);
    const service = new LangfuseService(client);

    await service.getPrompt(ref);
    await service.getPrompt({ name: ref.name, label: 'staging' });
    await service.getPrompt({ name: ref.name });

    expect(client.getPrompt).toHaveBeenCalledTimes(3);
  });

  it('replaces a non-object config with an empty one', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockResolvedValue({ ...fakePromptResponse, config: 'oops' });
    const service = new LangfuseService(client);

    const result = await service.getPrompt(ref);
    expect(result.ok && result.value.config).toEqual({});
  });

  it('refetches after five minutes', async () => {
    vi.useFakeTimers();
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockResolvedValue(fakePromptResponse);
    const service = new LangfuseService(client);

    await service.getPrompt(ref);
    vi.advanceTimersByTime(5 * 60 * 1000);
    const result = await service.getPrompt(ref);

    expect(result.ok && result.value.origin).toBe('fetched');
    expect(client.getPrompt).toHaveBeenCalledTimes(2);
  });

  it('serves an expired prompt marked stale when Langfuse is unavailable', async () => {
    vi.useFakeTimers();
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockResolvedValueOnce(fakePromptResponse);
    const service = new LangfuseService(client);

    await service.getPrompt(ref);

    vi.advanceTimersByTime(6 * 60 * 1000);
    vi.mocked(client.getPrompt).mockRejectedValueOnce(new Error('Langfuse 503'));

    const result = await service.getPrompt(ref);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.version).toBe(3);
      expect(result.value.origin).toBe('stale');
    }
    expect(client.getPrompt).toHaveBeenCalledTimes(2);
  });

  it('returns LANGFUSE_UNAVAILABLE when nothing is cached and Langfuse is down', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockRejectedValueOnce(new Error('Connection refused'));
    const service = new LangfuseService(client);

    const result = await service.getPrompt(ref);
    expect(result.ok).toBe(false);

    if (!result.ok) {
      expect(result.error.code).toBe('LANGFUSE_UNAVAILABLE');
      expect(result.error.message).toBe(
        "Cannot fetch prompt 'passport-visual-zone-extraction' from Langfuse and none is cached",
      );
      expect(result.error.retryable).toBe(true);
      expect(result.error.details).toBe('Connection refused');
    }
  });
});

describe('LangfuseService.traceExtraction', () => {
  const trace = {
    runId: 'run-1',
    model: 'vision-test-model',
    systemPrompt: 'prompt',
    output: '{}',
    prompt: { name: 'passport-visual-zone-extraction', version: 3 },
    attempts: 2,
    fieldCount: 4,
    document: { mimeType: 'image/png', filename: 'scan.png' },
    startTime: new Date(0),
    endTime: new Date(1000),
  };

  it('records a generation on a trace keyed by run id', () => {
    const generation = vi.fn();
    const client = createMockClient({ trace: vi.fn().mockReturnValue({ generation }) });
    const service = new LangfuseService(client);

    service.traceExtraction(trace);

    expect(client.trace).toHaveBeenCalledWith({
      id: 'run-1',
      name: 'vision-field-extraction',
      metadata: { mimeType: 'image/png', filename: 'scan.png' },
    });
    expect(generation).toHaveBeenCalledWith({
      name: 'vision-field-extraction',
      model: 'vision-test-model',
      input: 'prompt',
      output: '{}',
      startTime: new Date(0),
      endTime: new Date(1000),
      metadata: {
        promptName: 'passport-visual-zone-extraction',
        promptVersion: 3,
        attempts: 2,
        fieldCount: 4,
      },
    });
  });

  it('does not throw when tracing fails', () => {
    const client = createMockClient({
      trace: vi.fn().mockImplementation(() => {
        throw new Error('network down');
      }),
    });
    const service = new LangfuseService(client);

    expect(() => service.traceExtraction(trace)).not.toThrow();
  });
});

describe('LangfuseService.warm', () => {
  it('resolves true once the prompt is cached', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockResolvedValue(fakePromptResponse);
    const service = new LangfuseService(client);

    await expect(service.warm(ref)).resolves.toBe(true);
    await service.getPrompt(ref);
    expect(client.getPrompt).toHaveBeenCalledTimes(1);
  });

  it('resolves false instead of failing when Langfuse is down', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockRejectedValue(new Error('missing'));
    const service = new LangfuseService(client);

    await expect(service.warm(ref)).resolves.toBe(false);
  });
});

describe('createLangfuseServiceFromEnv', () => {
  it('returns undefined without keys', () => {
    expect(createLangfuseServiceFromEnv({})).toBeUndefined();
    expect(createLangfuseServiceFromEnv({ LANGFUSE_PUBLIC_KEY: 'pk-test' })).toBeUndefined();
  });
});
