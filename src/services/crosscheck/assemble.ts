import type {
  CrossCheckResult,
  CrossCheckStatus,
  FieldSet,
  SourceError,
  SourceSlot,
} from '../../domain/types.js';
import { crossValidate } from '../cross-validation/index.js';
import { buildConfidenceSet } from '../confidence/index.js';
import { collectDiscrepancies } from '../discrepancy/index.js';
import type { CrossCheckConfig } from './config.js';
import type { AssembleInput, SourceOutcome } from './types.js';

function fieldsOf(outcome: SourceOutcome): FieldSet | undefined {
  return outcome.status === 'succeeded' ? outcome.fields : undefined;
}

function errorOf(outcome: SourceOutcome): SourceError | null {
  return outcome.status === 'failed' ? outcome.error : null;
}

function statusFor(sourcesUsed: readonly SourceSlot[]): CrossCheckStatus {
  if (sourcesUsed.length === 2) return 'success';
  if (sourcesUsed.length === 1) return 'partial';
  return 'error';
}

/**
 * Builds the frozen result once both sources are terminal. Synchronous and
 * pure apart from the completion timestamp; the outcome order never matters.
 */
export function assembleCrossCheckResult(input: AssembleInput, config: CrossCheckConfig): CrossCheckResult {
  const fieldsA = fieldsOf(input.outcomeA);
  const fieldsB = fieldsOf(input.outcomeB);

  const sourcesUsed: SourceSlot[] = [];
  if (fieldsA) sourcesUsed.push('source_a');
  if (fieldsB) sourcesUsed.push('source_b');
  const status = statusFor(sourcesUsed);

  // With one side missing every present field comes back single-source.
  const { results, warnings } = status === 'error'
    ? { results: [], warnings: [] }
    : crossValidate(fieldsA, fieldsB, config);

  const confidences = buildConfidenceSet(results, config, input.runId);
  const discrepancies = collectDiscrepancies(results);

  // fromEntries keeps names like __proto__ as own keys.
  const mergedFields = Object.fromEntries(
    results.map((result): [string, string] => [result.fieldName, result.finalValue]),
  );

  return Object.freeze({
    status,
    mergedFields: Object.freeze(mergedFields),
    fieldConfidences: confidences.fieldConfidences,
    documentConfidence: confidences.documentConfidence,
    discrepancies: Object.freeze(discrepancies),
    validations: Object.freeze(results),
    warnings: Object.freeze(warnings),
    sourcesUsed: Object.freeze(sourcesUsed),
    sourceNames: Object.freeze({ ...input.sourceNames }),
    sourceAError: errorOf(input.outcomeA),
    sourceBError: errorOf(input.outcomeB),
    error: status === 'error' ? 'Both extraction sources failed' : null,
    timing: Object.freeze({
      sourceAMs: input.outcomeA.durationMs,
      sourceBMs: input.outcomeB.durationMs,
      totalMs: input.totalMs,
    }),
    completedAt: new Date().toISOString(),
  });
}
