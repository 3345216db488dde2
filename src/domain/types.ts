export const PASSPORT_FIELDS = [
  'surname',
  'given_names',
  'date_of_birth',
  'nationality',
  'passport_number',
  'expiry_date',
  'sex',
  'place_of_birth',
] as const;

export const CROSSCHECK_STATUSES = ['success', 'partial', 'error'] as const;

export type CrossCheckStatus = (typeof CROSSCHECK_STATUSES)[number];

export const SEVERITIES = ['critical', 'warning', 'informational'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const SUPPORTED_MIME_TYPES = ['image/jpeg', 'image/png', 'image/webp', 'image/gif'] as const;

export type SupportedMimeType = (typeof SUPPORTED_MIME_TYPES)[number];

/** Slot a source occupies in a cross-check run: A is deterministic, B is probabilistic. */
export type SourceSlot = 'source_a' | 'source_b';

export type SourceKind = 'deterministic' | 'probabilistic';

export type FieldValue = string | null | undefined;

/** Raw output of one extraction source. Never mutated after a source returns it. */
export type FieldSet = Readonly<Record<string, FieldValue>>;

export type ValidationOutcome = 'agreed' | 'disagreed' | 'single_source';

export interface FieldDiscrepancy {
  readonly fieldName: string;
  readonly valueA: string;
  readonly valueB: string;
  readonly recommendedValue: string;
  readonly severity: Severity;
  readonly reason: string;
}

export interface FieldValidationResult {
  readonly fieldName: string;
  readonly sourceAValue: string | null;
  readonly sourceBValue: string | null;
  readonly outcome: ValidationOutcome;
  readonly agreed: boolean;
  readonly singleSource: SourceSlot | null;
  readonly finalValue: string;
  readonly discrepancy: FieldDiscrepancy | null;
}

export interface NormalizationWarning {
  readonly fieldName: string;
  readonly source: SourceSlot;
  readonly value: string;
  readonly message: string;
}

export interface ConfidenceSet {
  readonly fieldConfidences: Readonly<Record<string, number>>;
  readonly documentConfidence: number | null;
}

export type SourceErrorKind = 'failed' | 'timed_out' | 'not_configured';

export interface SourceError {
  readonly kind: SourceErrorKind;
  readonly code: string;
  readonly message: string;
}

export interface CrossCheckTiming {
  readonly sourceAMs: number | null;
  readonly sourceBMs: number | null;
  readonly totalMs: number;
}

export interface CrossCheckResult {
  readonly status: CrossCheckStatus;
  readonly mergedFields: Readonly<Record<string, string>>;
  readonly fieldConfidences: Readonly<Record<string, number>>;
  readonly documentConfidence: number | null;
  readonly discrepancies: readonly FieldDiscrepancy[];
  readonly validations: readonly FieldValidationResult[];
  readonly warnings: readonly NormalizationWarning[];
  readonly sourcesUsed: readonly SourceSlot[];
  readonly sourceNames: Readonly<Partial<Record<SourceSlot, string>>>;
  readonly sourceAError: SourceError | null;
  readonly sourceBError: SourceError | null;
  readonly error: string | null;
  readonly timing: CrossCheckTiming;
  readonly completedAt: string;
}

export interface DocumentInput {
  imageBase64: string;
  mimeType: SupportedMimeType;
  mrzText?: string;
  filename?: string;
}
