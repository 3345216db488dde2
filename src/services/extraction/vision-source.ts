import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import { compilePrompt } from '../../infrastructure/langfuse.js';
import type { LLMProvider, LLMResponse } from '../../infrastructure/llm/types.js';
import { PASSPORT_FIELDS, type DocumentInput, type FieldSet } from '../../domain/types.js';
import type { ExtractionContext, ExtractionSource, VisionSourceDeps } from './types.js';

const log = logger.child({ module: 'vision-source' });

export const DEFAULT_VISION_PROMPT_NAME = 'passport-visual-zone-extraction';

export const BUILT_IN_VISION_PROMPT = `You read identity documents. Extract the following fields from the VISUAL ZONE
(the printed text), not from the machine-readable zone at the bottom of the page.
Return ONLY a JSON object with exactly these keys, using null for any field you cannot read:
{
  "surname": "family name exactly as printed, keeping diacritics",
  "given_names": "first and middle names exactly as printed",
  "date_of_birth": "YYYY-MM-DD",
  "nationality": "3-letter country code",
  "passport_number": "document number",
  "expiry_date": "YYYY-MM-DD",
  "sex": "M, F or X",
  "place_of_birth": "city or country as printed"
}
Fields to extract: {{fields}}`;

const USER_MESSAGE = 'Extract the fields from this document image.';
const CODE_FENCE = /```(?:json)?\s*\n?([\s\S]*?)\n?```/;

/**
 * Parses a vision-model reply into a FieldSet. Accepts bare JSON or JSON in a
 * markdown code fence. Numbers and booleans are stringified; nested values
 * are dropped.
 */
export function parseVisionResponse(
  content: string,
  fieldNames: readonly string[] = PASSPORT_FIELDS,
): Result<FieldSet, AppError> {
  const fenced = CODE_FENCE.exec(content);
  const body = (fenced ? fenced[1] : content).trim();

  if (body.length === 0) {
    return err(createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Vision model returned an empty response', false));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    return err(createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Vision model response is not valid JSON', false, details));
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return err(createAppError(
      ErrorCode.LLM_MALFORMED_RESPONSE,
      `Expected a JSON object from vision model, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
      false,
    ));
  }

  const fields: Record<string, string | null> = {};
  for (const name of fieldNames) {
    const value: unknown = Reflect.get(parsed, name);
    if (typeof value === 'string') fields[name] = value;
    else if (typeof value === 'number' || typeof value === 'boolean') fields[name] = String(value);
    else fields[name] = null;
  }

  return ok(Object.freeze(fields));
}

/** Probabilistic source: a vision LLM reading the printed zone of the image. */
export class VisionSource implements ExtractionSource {
  readonly kind = 'probabilistic' as const;
  readonly name: string;
  private readonly deps: VisionSourceDeps;
  private readonly fieldNames: readonly string[];

  constructor(deps: VisionSourceDeps, fieldNames: readonly string[] = PASSPORT_FIELDS) {
    this.deps = deps;
    this.fieldNames = fieldNames;
    this.name = `vision:${deps.llm.model}`;
  }

  async extract(document: DocumentInput, context: ExtractionContext): Promise<Result<FieldSet, AppError>> {
    const ctx = { runId: context.runId, source: this.name, step: 'vision_extraction' };
    log.info(ctx, 'Starting vision extraction');

    const promptResult = await this.resolvePrompt(context.runId);
    if (!promptResult.ok) return promptResult;
    const { systemPrompt, prompt } = promptResult.value;

    const imageUrl = `data:${document.mimeType};base64,${document.imageBase64}`;
    const startTime = new Date();

    const callResult = await this.callWithRetry(this.deps.llm, systemPrompt, imageUrl, context.signal, ctx);
    if (!callResult.ok) return callResult;
    const { response, fields, attempts } = callResult.value;
    const fieldCount = Object.values(fields).filter((v) => v !== null).length;

    this.deps.langfuse?.traceExtraction({
      runId: context.runId,
      model: response.model,
      systemPrompt,
      output: response.content,
      prompt,
      attempts,
      fieldCount,
      document: { mimeType: document.mimeType, filename: document.filename },
      startTime,
      endTime: new Date(),
    });

    log.info({ ...ctx, model: response.model, latencyMs: response.latencyMs, fieldCount, attempts }, 'Vision extraction completed');

    return ok(fields);
  }

  private async resolvePrompt(
    runId: string,
  ): Promise<Result<{ systemPrompt: string; prompt?: { name: string; version?: number } }, AppError>> {
    const variables = { fields: this.fieldNames.join(', ') };

    if (!this.deps.langfuse) {
      return ok({ systemPrompt: compilePrompt(BUILT_IN_VISION_PROMPT, variables) });
    }

    const resolved = await this.deps.langfuse.getPrompt(
      { name: this.deps.promptName, label: this.deps.promptLabel },
      runId,
    );
    if (!resolved.ok) return resolved;

    const { name, version, template, origin } = resolved.value;
    if (origin === 'stale') log.warn({ runId, promptName: name, version }, 'Using stale vision prompt');

    return ok({ systemPrompt: compilePrompt(template, variables), prompt: { name, version } });
  }

  /** One retry when the model answers with something that is not a JSON object. */
  private async callWithRetry(
    llm: LLMProvider,
    systemPrompt: string,
    imageUrl: string,
    signal: AbortSignal,
    ctx: Record<string, unknown>,
  ): Promise<Result<{ response: LLMResponse; fields: FieldSet; attempts: number }, AppError>> {
    const options = { responseFormat: 'json' as const, images: [imageUrl], signal };

    const first = await llm.chat(systemPrompt, USER_MESSAGE, options);
    if (!first.ok) return first;

    const parsed = parseVisionResponse(first.value.content, this.fieldNames);
    if (parsed.ok) return ok({ response: first.value, fields: parsed.value, attempts: 1 });

    log.warn({ ...ctx, errorCode: parsed.error.code, details: parsed.error.details }, 'Vision model returned malformed JSON, retrying once');

    const retry = await llm.chat(systemPrompt, USER_MESSAGE, options);
    if (!retry.ok) return retry;

    const retryParsed = parseVisionResponse(retry.value.content, this.fieldNames);
    if (retryParsed.ok) return ok({ response: retry.value, fields: retryParsed.value, attempts: 2 });

    log.error({ ...ctx, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false }, 'Vision model returned malformed JSON on both attempts');
    return err(
      createAppError(
        ErrorCode.LLM_MALFORMED_RESPONSE,
        'Vision model returned invalid JSON on both attempts',
        false,
        retry.value.content,
      ),
    );
  }
}
