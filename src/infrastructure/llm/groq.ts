import { ok, err } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { LLMProvider, LLMResponse, LLMRequestOptions } from './types.js';

export const DEFAULT_VISION_MODEL = 'meta-llama/llama-4-scout-17b-16e-instruct';
const DEFAULT_MAX_TOKENS = 1024;

const log = logger.child({ module: 'llm-groq' });

type GroqContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

type GroqMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | GroqContentPart[] };

export interface GroqClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: GroqMessage[];
          temperature?: number;
          max_tokens?: number;
          response_format?: { type: 'json_object' | 'text' };
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{ message?: { content?: string | null } }>;
        model: string;
        usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
      }>;
    };
  };
}

export class GroqProvider implements LLMProvider {
  private readonly client: GroqClient;
  readonly model: string;

  constructor(client: GroqClient, model?: string) {
    this.client = client;
    this.model = model ?? DEFAULT_VISION_MODEL;
  }

  async chat(
    systemPrompt: string,
    userMessage: string,
    options?: LLMRequestOptions,
  ): Promise<Result<LLMResponse, AppError>> {
    const startTime = Date.now();
    const images = options?.images ?? [];
    const ctx = { model: this.model, imageCount: images.length };

    log.debug(ctx, 'Calling Groq chat completion');

    const userContent: string | GroqContentPart[] = images.length === 0
      ? userMessage
      : [
        { type: 'text', text: userMessage },
        ...images.map((url): GroqContentPart => ({ type: 'image_url', image_url: { url } })),
      ];

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userContent },
          ],
          temperature: options?.temperature ?? 0.1,
          max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
          ...(options?.responseFormat === 'json' && {
            response_format: { type: 'json_object' },
          }),
        },
        options?.signal ? { signal: options.signal } : undefined,
      );

      const latencyMs = Date.now() - startTime;
      const content = response.choices[0]?.message?.content;

      if (!content) {
        log.error({ ...ctx, latencyMs, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false }, 'Groq returned empty response');
        return err(
          createAppError(
            ErrorCode.LLM_MALFORMED_RESPONSE,
            'Groq returned empty response content',
            false,
          ),
        );
      }

      const usage = response.usage;
      const result: LLMResponse = {
        content,
        model: response.model,
        usage: {
          promptTokens: usage?.prompt_tokens ?? 0,
          completionTokens: usage?.completion_tokens ?? 0,
          totalTokens: usage?.total_tokens ?? 0,
        },
        latencyMs,
      };

      log.info(
        {
          ...ctx,
          latencyMs,
          promptTokens: result.usage.promptTokens,
          completionTokens: result.usage.completionTokens,
        },
        'Groq chat completion succeeded',
      );

      return ok(result);
    } catch (cause) {
      const latencyMs = Date.now() - startTime;
      return this.mapError(cause, latencyMs, options?.signal);
    }
  }

  private mapError(cause: unknown, latencyMs: number, signal?: AbortSignal): Result<never, AppError> {
    const details = cause instanceof Error ? cause.message : String(cause);
    const status = this.extractStatus(cause);
    const ctx = { model: this.model, latencyMs, status, details };

    if (signal?.aborted || (cause instanceof Error && /abort/i.test(cause.name))) {
      log.warn({ ...ctx, errorCode: ErrorCode.LLM_ABORTED, retryable: true }, 'Groq request aborted');
      return err(createAppError(ErrorCode.LLM_ABORTED, 'Groq request was aborted', true, details));
    }

    if (status === 401) {
      log.error({ ...ctx, errorCode: ErrorCode.LLM_AUTH_ERROR, retryable: false }, 'Groq authentication failed');
      return err(createAppError(ErrorCode.LLM_AUTH_ERROR, 'Groq API authentication failed', false, details));
    }

    if (status === 429) {
      log.warn({ ...ctx, errorCode: ErrorCode.LLM_RATE_LIMITED, retryable: true }, 'Groq rate limited');
      return err(createAppError(ErrorCode.LLM_RATE_LIMITED, 'Groq API rate limited', true, details));
    }

    if (status !== undefined && status >= 500) {
      log.error({ ...ctx, errorCode: ErrorCode.LLM_API_ERROR, retryable: true }, 'Groq server error');
      return err(createAppError(ErrorCode.LLM_API_ERROR, `Groq API returned ${status}`, true, details));
    }

    log.error({ ...ctx, errorCode: ErrorCode.LLM_API_ERROR, retryable: true }, 'Groq API call failed');
    return err(createAppError(ErrorCode.LLM_API_ERROR, 'Groq API call failed', true, details));
  }

  private extractStatus(cause: unknown): number | undefined {
    if (cause !== null && typeof cause === 'object' && 'status' in cause && typeof cause.status === 'number') {
      return cause.status;
    }
    return undefined;
  }
}
