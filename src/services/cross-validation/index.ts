import type {
  FieldSet,
  FieldValidationResult,
  FieldValue,
  NormalizationWarning,
  SourceSlot,
} from '../../domain/types.js';
import type { CrossCheckConfig } from '../crosscheck/config.js';
import { normalizeField, type NormalizerConfig } from '../normalization/index.js';
import { createDiscrepancy, recommendValue, type ReporterConfig } from '../discrepancy/index.js';

export type CrossValidatorConfig = NormalizerConfig & ReporterConfig & Pick<CrossCheckConfig, 'fieldOrder'>;

export interface CrossValidation {
  results: FieldValidationResult[];
  warnings: NormalizationWarning[];
}

/** A value counts as present only when it is a non-blank string. */
export function presentValue(value: FieldValue): string | null {
  if (typeof value !== 'string') return null;
  return value.trim().length > 0 ? value : null;
}

function ownValue(fields: FieldSet | undefined, fieldName: string): FieldValue {
  return fields && Object.hasOwn(fields, fieldName) ? fields[fieldName] : undefined;
}

/** Union of field names with at least one present value, configured order first. */
export function observedFieldNames(
  sourceA: FieldSet | undefined,
  sourceB: FieldSet | undefined,
  fieldOrder: readonly string[],
): string[] {
  const seen = new Set<string>();
  for (const fields of [sourceA, sourceB]) {
    if (!fields) continue;
    for (const [name, value] of Object.entries(fields)) {
      if (presentValue(value) !== null) seen.add(name);
    }
  }

  const ordered = fieldOrder.filter((name) => seen.has(name));
  const rest = [...seen].filter((name) => !fieldOrder.includes(name));
  return [...ordered, ...rest];
}

/**
 * Compares source A (deterministic) against source B (probabilistic) field by
 * field. Pure: same inputs and config always give the same output.
 */
export function crossValidate(
  sourceA: FieldSet | undefined,
  sourceB: FieldSet | undefined,
  config: CrossValidatorConfig,
): CrossValidation {
  const results: FieldValidationResult[] = [];
  const warnings: NormalizationWarning[] = [];

  for (const fieldName of observedFieldNames(sourceA, sourceB, config.fieldOrder)) {
    const valueA = presentValue(ownValue(sourceA, fieldName));
    const valueB = presentValue(ownValue(sourceB, fieldName));

    if (valueA !== null && valueB !== null) {
      const normalizedA = normalizeWithWarning(fieldName, valueA, 'source_a', config, warnings);
      const normalizedB = normalizeWithWarning(fieldName, valueB, 'source_b', config, warnings);

      if (normalizedA === normalizedB) {
        const preferred = recommendValue(fieldName, valueA, valueB, config);
        results.push(Object.freeze({
          fieldName,
          sourceAValue: valueA,
          sourceBValue: valueB,
          outcome: 'agreed',
          agreed: true,
          singleSource: null,
          finalValue: preferred?.value ?? valueA,
          discrepancy: null,
        }));
        continue;
      }

      const discrepancy = createDiscrepancy(fieldName, valueA, valueB, config);
      results.push(Object.freeze({
        fieldName,
        sourceAValue: valueA,
        sourceBValue: valueB,
        outcome: 'disagreed',
        agreed: false,
        singleSource: null,
        finalValue: discrepancy.recommendedValue,
        discrepancy,
      }));
      continue;
    }

    const slot: SourceSlot = valueA !== null ? 'source_a' : 'source_b';
    const value = valueA ?? valueB;
    if (value === null) continue;

    // Single-source values are still checked so an unparseable date is reported.
    normalizeWithWarning(fieldName, value, slot, config, warnings);
    results.push(Object.freeze({
      fieldName,
      sourceAValue: valueA,
      sourceBValue: valueB,
      outcome: 'single_source',
      agreed: false,
      singleSource: slot,
      finalValue: value,
      discrepancy: null,
    }));
  }

  return { results, warnings };
}

function normalizeWithWarning(
  fieldName: string,
  value: string,
  source: SourceSlot,
  config: NormalizerConfig,
  warnings: NormalizationWarning[],
): string {
  const { normalized, warning } = normalizeField(fieldName, value, config);
  if (warning !== undefined) {
    warnings.push(Object.freeze({ fieldName, source, value, message: warning }));
  }
  return normalized;
}
