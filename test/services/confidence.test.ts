import { describe, it, expect } from 'vitest';
import {
  buildConfidenceSet,
  clampConfidence,
  scoreDocument,
  scoreField,
  singleSourceConfidence,
} from '../../src/services/confidence/index.js';
import { crossValidate } from '../../src/services/cross-validation/index.js';
import { DEFAULT_CROSSCHECK_CONFIG } from '../../src/services/crosscheck/config.js';
import type { FieldValidationResult } from '../../src/domain/types.js';

const config = DEFAULT_CROSSCHECK_CONFIG;

function result(overrides: Partial<FieldValidationResult>): FieldValidationResult {
  return {
    fieldName: 'surname',
    sourceAValue: 'SMITH',
    sourceBValue: 'SMITH',
    outcome: 'agreed',
    agreed: true,
    singleSource: null,
    finalValue: 'SMITH',
    discrepancy: null,
    ...overrides,
  };
}

describe('clampConfidence', () => {
  it('clamps into [0, 1]', () => {
    expect(clampConfidence(-0.2)).toBe(0);
    expect(clampConfidence(1.3)).toBe(1);
    expect(clampConfidence(0.42)).toBe(0.42);
  });

  it('maps NaN to 0', () => {
    expect(clampConfidence(Number.NaN)).toBe(0);
  });
});

describe('scoreField', () => {
  it('scores agreement, disagreement and single-source values', () => {
    expect(scoreField(result({}), config)).toBe(1);
    expect(scoreField(result({ outcome: 'disagreed', agreed: false }), config)).toBe(0.4);
    expect(scoreField(result({ outcome: 'single_source', agreed: false, singleSource: 'source_a' }), config)).toBe(0.7);
    expect(scoreField(result({ outcome: 'single_source', agreed: false, singleSource: 'source_b' }), config)).toBe(0.5);
  });

  it('clamps out-of-range configured values', () => {
    expect(scoreField(result({}), { ...config, agreementConfidence: 1.5 })).toBe(1);
    expect(singleSourceConfidence('source_b', { ...config, singleSourceProbabilisticConfidence: -1 })).toBe(0);
  });
});

describe('scoreDocument', () => {
  it('returns null when there are no fields', () => {
    expect(scoreDocument({}, config)).toBeNull();
  });

  it('weights critical fields double', () => {
    // (0.4 * 2 + 1.0 * 2 + 0.7 * 1) / 5
    expect(scoreDocument({ passport_number: 0.4, surname: 1, sex: 0.7 }, config)).toBeCloseTo(0.7, 10);
  });

  it('equals the common value when every field has it', () => {
    expect(scoreDocument({ passport_number: 0.5, place_of_birth: 0.5 }, config)).toBeCloseTo(0.5, 10);
  });
});

describe('buildConfidenceSet', () => {
  it('scores every validated field and the document', () => {
    const { results } = crossValidate(
      { passport_number: 'AB1234567', surname: 'SMITH', sex: 'M' },
      { passport_number: 'AB1234560', surname: 'Smith' },
      config,
    );

    const confidences = buildConfidenceSet(results, config, 'run-1');

    expect(confidences.fieldConfidences).toEqual({ surname: 1, passport_number: 0.4, sex: 0.7 });
    expect(confidences.documentConfidence).toBeCloseTo(0.7, 10);
  });

  it('keeps every confidence within bounds', () => {
    const { results } = crossValidate(
      { surname: 'A', given_names: 'B', date_of_birth: 'bad', extra: 'x' },
      { surname: 'C', nationality: 'UTO', date_of_birth: 'worse' },
      config,
    );
    const confidences = buildConfidenceSet(results, config);

    for (const value of Object.values(confidences.fieldConfidences)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1);
    }
    expect(confidences.documentConfidence).not.toBeNull();
  });
});
