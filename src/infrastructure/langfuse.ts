import { Langfuse } from 'langfuse';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { logger } from './logger.js';

/** A managed prompt, addressed by name and optional deployment label. */
export interface PromptRef {
  name: string;
  label?: string;
}

/** Where a resolved prompt came from: Langfuse, a fresh cache entry, or an expired one kept as fallback. */
export type PromptOrigin = 'fetched' | 'cached' | 'stale';

export interface ResolvedPrompt {
  name: string;
  version?: number;
  template: string;
  config: Record<string, unknown>;
  origin: PromptOrigin;
}

export interface ExtractionTrace {
  runId: string;
  model: string;
  systemPrompt: string;
  output: string;
  prompt?: { name: string; version?: number };
  /** Model calls made, including the malformed-JSON retry. */
  attempts: number;
  fieldCount: number;
  document: { mimeType: string; filename?: string };
  startTime: Date;
  endTime: Date;
}

interface GenerationClient {
  generation(params: {
    name: string;
    model: string;
    input: string;
    output: string;
    startTime: Date;
    endTime: Date;
    metadata?: Record<string, unknown>;
  }): void;
}

/** The slice of the Langfuse SDK the vision source relies on. */
export interface LangfuseClient {
  getPrompt(
    name: string,
    version?: number,
    options?: { label?: string; type?: 'text' },
  ): Promise<{ name: string; prompt: string; version?: number; config?: unknown }>;
  trace(params: { id: string; name: string; metadata?: Record<string, unknown> }): GenerationClient;
}

const PROMPT_TTL_MS = 5 * 60 * 1000;
const TRACE_NAME = 'vision-field-extraction';
const log = logger.child({ module: 'langfuse' });

/** Replaces each `{{name}}` placeholder; unknown placeholders are left as they are. */
export function compilePrompt(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (placeholder, key: string) =>
    Object.hasOwn(variables, key) ? variables[key] : placeholder,
  );
}

function refKey(ref: PromptRef): string {
  return ref.label ? `${ref.name}@${ref.label}` : ref.name;
}

export class LangfuseService {
  private readonly client: LangfuseClient;
  private readonly prompts = new Map<string, { prompt: ResolvedPrompt; expiresAt: number }>();

  constructor(client: LangfuseClient) {
    this.client = client;
  }

  /**
   * Resolves a prompt through a five-minute cache. When Langfuse cannot be
   * reached an expired entry is still served, marked `stale`.
   */
  async getPrompt(ref: PromptRef, runId?: string): Promise<Result<ResolvedPrompt, AppError>> {
    const ctx = { promptName: ref.name, label: ref.label, runId };
    const entry = this.prompts.get(refKey(ref));

    if (entry && Date.now() < entry.expiresAt) {
      const cached: ResolvedPrompt = { ...entry.prompt, origin: 'cached' };
      return ok(cached);
    }

    try {
      const fetched = await this.client.getPrompt(ref.name, undefined, { label: ref.label, type: 'text' });
      const prompt: ResolvedPrompt = {
        name: fetched.name,
        version: fetched.version,
        template: fetched.prompt,
        config: isRecord(fetched.config) ? fetched.config : {},
        origin: 'fetched',
      };
      this.prompts.set(refKey(ref), { prompt, expiresAt: Date.now() + PROMPT_TTL_MS });
      log.info({ ...ctx, version: prompt.version }, 'Fetched vision prompt');
      return ok(prompt);
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);

      if (entry) {
        log.warn({ ...ctx, version: entry.prompt.version, details }, 'Langfuse unavailable, serving stale prompt');
        const stale: ResolvedPrompt = { ...entry.prompt, origin: 'stale' };
        return ok(stale);
      }

      log.error({ ...ctx, errorCode: ErrorCode.LANGFUSE_UNAVAILABLE, details }, 'Langfuse unavailable and no prompt cached');
      return err(createAppError(
        ErrorCode.LANGFUSE_UNAVAILABLE,
        `Cannot fetch prompt '${ref.name}' from Langfuse and none is cached`,
        true,
        details,
      ));
    }
  }

  /** Records one vision extraction. Never throws; a tracing failure is only logged. */
  traceExtraction(trace: ExtractionTrace): void {
    try {
      this.client
        .trace({ id: trace.runId, name: TRACE_NAME, metadata: trace.document })
        .generation({
          name: TRACE_NAME,
          model: trace.model,
          input: trace.systemPrompt,
          output: trace.output,
          startTime: trace.startTime,
          endTime: trace.endTime,
          metadata: {
            promptName: trace.prompt?.name,
            promptVersion: trace.prompt?.version,
            attempts: trace.attempts,
            fieldCount: trace.fieldCount,
          },
        });
    } catch (cause) {
      log.warn(
        { runId: trace.runId, details: cause instanceof Error ? cause.message : String(cause) },
        'Failed to trace vision extraction',
      );
    }
  }

  /** Fetches the prompt ahead of the first request. Resolves false instead of failing. */
  async warm(ref: PromptRef): Promise<boolean> {
    const result = await this.getPrompt(ref);
    log.info({ promptName: ref.name, label: ref.label, warmed: result.ok }, 'Vision prompt warm-up finished');
    return result.ok;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Langfuse is optional: undefined when its keys are not configured. */
export function createLangfuseServiceFromEnv(
  env: Record<string, string | undefined> = process.env,
): LangfuseService | undefined {
  const publicKey = env.LANGFUSE_PUBLIC_KEY;
  const secretKey = env.LANGFUSE_SECRET_KEY;
  if (!publicKey || !secretKey) {
    log.info('Langfuse keys not set, vision source uses its built-in prompt without tracing');
    return undefined;
  }
  return new LangfuseService(
    new Langfuse({
      publicKey,
      secretKey,
      baseUrl: env.LANGFUSE_BASE_URL ?? 'https://cloud.langfuse.com',
    }),
  );
}
