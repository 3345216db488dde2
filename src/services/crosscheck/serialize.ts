import type {
  CrossCheckResult,
  CrossCheckStatus,
  FieldDiscrepancy,
  Severity,
  SourceError,
  SourceSlot,
} from '../../domain/types.js';

export interface SerializedCrossCheckResult {
  status: CrossCheckStatus;
  merged_fields: Record<string, string>;
  field_confidences: Record<string, number>;
  document_confidence: number | null;
  discrepancies: Array<{
    field_name: string;
    value_a: string;
    value_b: string;
    recommended_value: string;
    severity: Severity;
    reason: string;
  }>;
  sources_used: SourceSlot[];
  errors: { source_a: SourceError | null; source_b: SourceError | null };
  warnings: Array<{ field_name: string; source: SourceSlot; value: string; message: string }>;
  metadata?: {
    source_a_ms: number | null;
    source_b_ms: number | null;
    total_ms: number;
    source_names: Partial<Record<SourceSlot, string>>;
    completed_at: string;
  };
}

export function hasDiscrepancies(result: CrossCheckResult): boolean {
  return result.discrepancies.length > 0;
}

export function getCriticalDiscrepancies(result: CrossCheckResult): FieldDiscrepancy[] {
  return result.discrepancies.filter((d) => d.severity === 'critical');
}

/** Flat snake_case JSON for API responses and the CLI. */
export function serializeCrossCheckResult(
  result: CrossCheckResult,
  options: { includeMetadata?: boolean } = {},
): SerializedCrossCheckResult {
  const serialized: SerializedCrossCheckResult = {
    status: result.status,
    merged_fields: { ...result.mergedFields },
    field_confidences: { ...result.fieldConfidences },
    document_confidence: result.documentConfidence,
    discrepancies: result.discrepancies.map((d) => ({
      field_name: d.fieldName,
      value_a: d.valueA,
      value_b: d.valueB,
      recommended_value: d.recommendedValue,
      severity: d.severity,
      reason: d.reason,
    })),
    sources_used: [...result.sourcesUsed],
    errors: {
      source_a: result.sourceAError ? { ...result.sourceAError } : null,
      source_b: result.sourceBError ? { ...result.sourceBError } : null,
    },
    warnings: result.warnings.map((w) => ({
      field_name: w.fieldName,
      source: w.source,
      value: w.value,
      message: w.message,
    })),
  };

  if (options.includeMetadata) {
    serialized.metadata = {
      source_a_ms: result.timing.sourceAMs,
      source_b_ms: result.timing.sourceBMs,
      total_ms: result.timing.totalMs,
      source_names: { ...result.sourceNames },
      completed_at: result.completedAt,
    };
  }

  return serialized;
}
