import { logger } from '../../infrastructure/logger.js';
import type { ConfidenceSet, FieldValidationResult, SourceSlot } from '../../domain/types.js';
import type { CrossCheckConfig } from '../crosscheck/config.js';

export type ScorerConfig = Pick<
  CrossCheckConfig,
  | 'agreementConfidence'
  | 'disagreementBaseConfidence'
  | 'singleSourceDeterministicConfidence'
  | 'singleSourceProbabilisticConfidence'
  | 'criticalFieldWeight'
  | 'standardFieldWeight'
  | 'criticalFields'
>;

const log = logger.child({ module: 'confidence' });

/** Clamps to [0, 1]. NaN becomes 0. */
export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export function singleSourceConfidence(slot: SourceSlot, config: ScorerConfig): number {
  return clampConfidence(
    slot === 'source_a'
      ? config.singleSourceDeterministicConfidence
      : config.singleSourceProbabilisticConfidence,
  );
}

export function scoreField(result: FieldValidationResult, config: ScorerConfig): number {
  switch (result.outcome) {
    case 'agreed':
      return clampConfidence(config.agreementConfidence);
    case 'disagreed':
      return clampConfidence(config.disagreementBaseConfidence);
    case 'single_source':
      return singleSourceConfidence(result.singleSource ?? 'source_b', config);
  }
}

export function scoreFields(
  results: readonly FieldValidationResult[],
  config: ScorerConfig,
): Record<string, number> {
  return Object.fromEntries(
    results.map((result): [string, number] => [result.fieldName, scoreField(result, config)]),
  );
}

/**
 * Weighted mean of the field confidences; identity-defining fields count
 * `criticalFieldWeight` times. Null when there is nothing to score.
 */
export function scoreDocument(
  fieldConfidences: Readonly<Record<string, number>>,
  config: ScorerConfig,
): number | null {
  let weightedSum = 0;
  let totalWeight = 0;

  for (const [fieldName, confidence] of Object.entries(fieldConfidences)) {
    const weight = config.criticalFields.includes(fieldName)
      ? config.criticalFieldWeight
      : config.standardFieldWeight;
    weightedSum += clampConfidence(confidence) * weight;
    totalWeight += weight;
  }

  if (totalWeight <= 0) return null;
  return clampConfidence(weightedSum / totalWeight);
}

export function buildConfidenceSet(
  results: readonly FieldValidationResult[],
  config: ScorerConfig,
  runId?: string,
): ConfidenceSet {
  const fieldConfidences = scoreFields(results, config);
  const documentConfidence = scoreDocument(fieldConfidences, config);

  log.debug(
    { runId, fieldCount: results.length, documentConfidence },
    'Confidence computed',
  );

  return Object.freeze({ fieldConfidences: Object.freeze(fieldConfidences), documentConfidence });
}
