import type {
  FieldDiscrepancy,
  FieldValidationResult,
  Severity,
  SourceSlot,
} from '../../domain/types.js';
import type { CrossCheckConfig } from '../crosscheck/config.js';

export type ReporterConfig = Pick<
  CrossCheckConfig,
  'severities' | 'deterministicPreferredFields' | 'probabilisticPreferredFields'
>;

export type PreferenceRule =
  | 'deterministic_preferred'
  | 'probabilistic_preferred'
  | 'only_source_a'
  | 'only_source_b'
  | 'default_deterministic';

export interface Recommendation {
  value: string;
  source: SourceSlot;
  rule: PreferenceRule;
}

const SEVERITY_RANK: Record<Severity, number> = {
  critical: 0,
  warning: 1,
  informational: 2,
};

export function getSeverity(fieldName: string, config: Pick<ReporterConfig, 'severities'>): Severity {
  return Object.hasOwn(config.severities, fieldName) ? config.severities[fieldName] : 'informational';
}

/**
 * Source preference: machine-readable identifiers and dates come from the
 * deterministic source, names and free text from the vision source.
 */
export function recommendValue(
  fieldName: string,
  valueA: string | null,
  valueB: string | null,
  config: ReporterConfig,
): Recommendation | null {
  if (valueA !== null && valueB !== null) {
    if (config.deterministicPreferredFields.includes(fieldName)) {
      return { value: valueA, source: 'source_a', rule: 'deterministic_preferred' };
    }
    if (config.probabilisticPreferredFields.includes(fieldName)) {
      return { value: valueB, source: 'source_b', rule: 'probabilistic_preferred' };
    }
    return { value: valueA, source: 'source_a', rule: 'default_deterministic' };
  }
  if (valueA !== null) return { value: valueA, source: 'source_a', rule: 'only_source_a' };
  if (valueB !== null) return { value: valueB, source: 'source_b', rule: 'only_source_b' };
  return null;
}

export function describeRule(fieldName: string, rule: PreferenceRule): string {
  switch (rule) {
    case 'deterministic_preferred':
      return `Deterministic source preferred for ${fieldName}; check-digit validated machine-readable data`;
    case 'probabilistic_preferred':
      return `Vision source preferred for ${fieldName}; printed zone keeps diacritics and full spelling`;
    case 'only_source_a':
      return `Only the deterministic source has a value for ${fieldName}`;
    case 'only_source_b':
      return `Only the vision source has a value for ${fieldName}`;
    case 'default_deterministic':
      return `Deterministic source used as default for ${fieldName}; values differ`;
  }
}

export function createDiscrepancy(
  fieldName: string,
  valueA: string,
  valueB: string,
  config: ReporterConfig,
): FieldDiscrepancy {
  const recommendation = recommendValue(fieldName, valueA, valueB, config);
  const rule = recommendation?.rule ?? 'default_deterministic';

  return Object.freeze({
    fieldName,
    valueA,
    valueB,
    recommendedValue: recommendation?.value ?? valueA,
    severity: getSeverity(fieldName, config),
    reason: describeRule(fieldName, rule),
  });
}

/** Discrepancies of a validation run, critical first, then in field order. */
export function collectDiscrepancies(
  results: readonly FieldValidationResult[],
): FieldDiscrepancy[] {
  const indexed = results
    .map((r, index) => ({ discrepancy: r.discrepancy, index }))
    .filter((entry): entry is { discrepancy: FieldDiscrepancy; index: number } => entry.discrepancy !== null);

  indexed.sort((a, b) =>
    SEVERITY_RANK[a.discrepancy.severity] - SEVERITY_RANK[b.discrepancy.severity] || a.index - b.index,
  );

  return indexed.map((entry) => entry.discrepancy);
}
