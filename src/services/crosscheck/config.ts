import { ConfigurationError } from '../../domain/errors.js';
import { crossCheckConfigSchema } from '../../domain/schemas.js';
import type { Severity } from '../../domain/types.js';

export interface CrossCheckConfig {
  /** Budget for the deterministic (MRZ) source. */
  readonly sourceATimeoutMs: number;
  /** Budget for the probabilistic (vision LLM) source. */
  readonly sourceBTimeoutMs: number;

  readonly agreementConfidence: number;
  readonly disagreementBaseConfidence: number;
  readonly singleSourceDeterministicConfidence: number;
  readonly singleSourceProbabilisticConfidence: number;
  readonly criticalFieldWeight: number;
  readonly standardFieldWeight: number;
  readonly criticalFields: readonly string[];

  /** Static severity per field name. Unlisted fields are informational. */
  readonly severities: Readonly<Record<string, Severity>>;
  readonly deterministicPreferredFields: readonly string[];
  readonly probabilisticPreferredFields: readonly string[];

  readonly dateFields: readonly string[];
  readonly identifierFields: readonly string[];
  readonly sexFields: readonly string[];
  /** Fields listed here come first in results, in this order. */
  readonly fieldOrder: readonly string[];
  /** Two-digit years below the pivot are 20yy, the rest 19yy. */
  readonly twoDigitYearPivot: number;
}

export const DEFAULT_CROSSCHECK_CONFIG: CrossCheckConfig = Object.freeze({
  sourceATimeoutMs: 30_000,
  sourceBTimeoutMs: 60_000,

  agreementConfidence: 1.0,
  disagreementBaseConfidence: 0.4,
  singleSourceDeterministicConfidence: 0.7,
  singleSourceProbabilisticConfidence: 0.5,
  criticalFieldWeight: 2.0,
  standardFieldWeight: 1.0,
  criticalFields: Object.freeze(['passport_number', 'date_of_birth', 'surname', 'given_names']),

  severities: Object.freeze({
    passport_number: 'critical',
    date_of_birth: 'critical',
    surname: 'warning',
    given_names: 'warning',
    expiry_date: 'warning',
    nationality: 'warning',
    sex: 'informational',
    place_of_birth: 'informational',
  } satisfies Record<string, Severity>),
  deterministicPreferredFields: Object.freeze(['passport_number', 'date_of_birth', 'expiry_date', 'nationality']),
  probabilisticPreferredFields: Object.freeze(['surname', 'given_names', 'place_of_birth']),

  dateFields: Object.freeze(['date_of_birth', 'expiry_date']),
  identifierFields: Object.freeze(['passport_number']),
  sexFields: Object.freeze(['sex']),
  fieldOrder: Object.freeze([
    'surname',
    'given_names',
    'date_of_birth',
    'nationality',
    'passport_number',
    'expiry_date',
    'sex',
    'place_of_birth',
  ]),
  twoDigitYearPivot: 50,
});

/** @throws {ConfigurationError} When any merged value is out of range */
export function createCrossCheckConfig(overrides: Partial<CrossCheckConfig> = {}): CrossCheckConfig {
  const parsed = crossCheckConfigSchema.safeParse({ ...DEFAULT_CROSSCHECK_CONFIG, ...overrides });
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid cross-check configuration: ${details}`);
  }
  return Object.freeze(parsed.data);
}

/** @throws {ConfigurationError} When a CROSSCHECK_* variable is not a valid number */
export function loadCrossCheckConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): CrossCheckConfig {
  const overrides: { -readonly [K in keyof CrossCheckConfig]?: CrossCheckConfig[K] } = {};

  if (env.CROSSCHECK_SOURCE_A_TIMEOUT_MS !== undefined) {
    overrides.sourceATimeoutMs = Number(env.CROSSCHECK_SOURCE_A_TIMEOUT_MS);
  }
  if (env.CROSSCHECK_SOURCE_B_TIMEOUT_MS !== undefined) {
    overrides.sourceBTimeoutMs = Number(env.CROSSCHECK_SOURCE_B_TIMEOUT_MS);
  }
  if (env.CROSSCHECK_TWO_DIGIT_YEAR_PIVOT !== undefined) {
    overrides.twoDigitYearPivot = Number(env.CROSSCHECK_TWO_DIGIT_YEAR_PIVOT);
  }

  return createCrossCheckConfig(overrides);
}
