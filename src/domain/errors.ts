export const ErrorCode = {
  // Extraction sources
  SOURCE_FAILED: 'SOURCE_FAILED',
  SOURCE_TIMEOUT: 'SOURCE_TIMEOUT',
  SOURCE_NOT_CONFIGURED: 'SOURCE_NOT_CONFIGURED',

  // MRZ decoding
  MRZ_NOT_FOUND: 'MRZ_NOT_FOUND',
  MRZ_PARSE_FAILED: 'MRZ_PARSE_FAILED',

  // LLM Extraction
  LLM_API_ERROR: 'LLM_API_ERROR',
  LLM_RATE_LIMITED: 'LLM_RATE_LIMITED',
  LLM_MALFORMED_RESPONSE: 'LLM_MALFORMED_RESPONSE',
  LLM_AUTH_ERROR: 'LLM_AUTH_ERROR',
  LLM_ABORTED: 'LLM_ABORTED',

  // Normalization
  DATE_UNPARSEABLE: 'DATE_UNPARSEABLE',

  // Request input
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  IMAGE_TOO_LARGE: 'IMAGE_TOO_LARGE',

  // Configuration
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Infrastructure
  LANGFUSE_UNAVAILABLE: 'LANGFUSE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

/**
 * Thrown for invalid weights, thresholds or timeouts. The only error in the
 * cross-check core that is raised instead of returned as data.
 */
export class ConfigurationError extends Error {
  readonly code = ErrorCode.CONFIGURATION_ERROR;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
