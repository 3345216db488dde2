import { describe, it, expect, vi } from 'vitest';
import { GroqProvider, DEFAULT_VISION_MODEL, type GroqClient } from '../../src/infrastructure/llm/index.js';

function createMockClient(): GroqClient {
  return {
    chat: {
      completions: {
        create: vi.fn(),
      },
    },
  };
}

const successResponse = {
  choices: [{ message: { content: '{"surname":"ERIKSSON","given_names":"ANNA MARIA"}' } }],
  model: 'vision-test-model',
  usage: { prompt_tokens: 900, completion_tokens: 40, total_tokens: 940 },
};

const IMAGE_URL = 'data:image/png;base64,dGVzdA==';

describe('GroqProvider.chat', () => {
  it('returns parsed LLM response on success', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockResolvedValue(successResponse);
    const provider = new GroqProvider(client, 'vision-test-model');

    const result = await provider.chat('system prompt', 'user message');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.content).toContain('ERIKSSON');
      expect(result.value.model).toBe('vision-test-model');
      expect(result.value.usage.totalTokens).toBe(940);
      expect(result.value.latencyMs).toBeGreaterThanOrEqual(0);
    }
  });

  it('defaults to the vision model', () => {
    expect(new GroqProvider(createMockClient()).model).toBe(DEFAULT_VISION_MODEL);
  });

  it('sends images as image_url content parts after the text', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockResolvedValue(successResponse);
    const provider = new GroqProvider(client);

    await provider.chat('system', 'read this', { images: [IMAGE_URL] });

    expect(client.chat.completions.create).toHaveBeenCalledWith(
      expect.objectContaining({
        messages: [
          { role: 'system', content: 'system' },
          {
            role: 'user',
            content: [
              { type: 'text', text: 'read this' },
              { type: 'image_url', image_url: { url: IMAGE_URL } },
            ],
          },
        ],
      }),
      undefined,
    );
  });

  it('forwards the abort signal to the client', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockResolvedValue(successResponse);
    const provider = new GroqProvider(client);
    const controller = new AbortController();

    await provider.chat('system', 'user', { signal: controller.signal });

    expect(client.chat.completions.create).toHaveBeenCalledWith(
      expect.objectContaining({ model: DEFAULT_VISION_MODEL }),
      { signal: controller.signal },
    );
  });

  it('returns LLM_MALFORMED_RESPONSE on empty content', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockResolvedValue({
      choices: [{ message: { content: null } }],
      model: 'vision-test-model',
      usage: undefined,
    });
    const provider = new GroqProvider(client);

    const result = await provider.chat('system', 'user');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_MALFORMED_RESPONSE');
    }
  });

  it('maps 429 to LLM_RATE_LIMITED (retryable)', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockRejectedValue(
      Object.assign(new Error('Rate limited'), { status: 429 }),
    );
    const provider = new GroqProvider(client);

    const result = await provider.chat('system', 'user');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_RATE_LIMITED');
      expect(result.error.retryable).toBe(true);
    }
  });

  it('maps 500 to LLM_API_ERROR (retryable)', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockRejectedValue(
      Object.assign(new Error('Server error'), { status: 500 }),
    );
    const provider = new GroqProvider(client);

    const result = await provider.chat('system', 'user');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_API_ERROR');
      expect(result.error.message).toBe('Groq API returned 500');
      expect(result.error.retryable).toBe(true);
    }
  });

  it('maps 401 to LLM_AUTH_ERROR (not retryable)', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockRejectedValue(
      Object.assign(new Error('Unauthorized'), { status: 401 }),
    );
    const provider = new GroqProvider(client);

    const result = await provider.chat('system', 'user');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_AUTH_ERROR');
      expect(result.error.retryable).toBe(false);
    }
  });

  it('maps a rejection after abort to LLM_ABORTED', async () => {
    const client = createMockClient();
    const controller = new AbortController();
    vi.mocked(client.chat.completions.create).mockImplementation(async () => {
      controller.abort();
      throw new Error('Request was aborted.');
    });
    const provider = new GroqProvider(client);

    const result = await provider.chat('system', 'user', { signal: controller.signal });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_ABORTED');
    }
  });

  it('passes json response_format when requested', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockResolvedValue(successResponse);
    const provider = new GroqProvider(client);

    await provider.chat('system', 'user', { responseFormat: 'json' });

    expect(client.chat.completions.create).toHaveBeenCalledWith(
      expect.objectContaining({
        response_format: { type: 'json_object' },
      }),
      undefined,
    );
  });
});
