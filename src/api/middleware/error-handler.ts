import type { Request, Response, NextFunction } from 'express';
import { ConfigurationError, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

/** Body-parser errors carry an HTTP status and a `type` such as 'entity.too.large'. */
function bodyParserType(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string') {
    return value.type;
  }
  return undefined;
}

export function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case 'MRZ_PARSE_FAILED':
    case 'MRZ_NOT_FOUND':
      return 400;

    case 'IMAGE_TOO_LARGE':
      return 413;

    case 'VALIDATION_ERROR':
    case 'DATE_UNPARSEABLE':
      return 422;

    case 'SOURCE_FAILED':
    case 'SOURCE_TIMEOUT':
    case 'LLM_API_ERROR':
    case 'LLM_MALFORMED_RESPONSE':
    case 'LLM_ABORTED':
      return 502;

    case 'LLM_RATE_LIMITED':
    case 'LANGFUSE_UNAVAILABLE':
    case 'SOURCE_NOT_CONFIGURED':
      return 503;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (bodyParserType(err) === 'entity.too.large') {
    res.status(413).json(errorResponse('IMAGE_TOO_LARGE', 'Request body exceeds the size limit', undefined, false));
    return;
  }

  if (bodyParserType(err) === 'entity.parse.failed') {
    res.status(422).json(errorResponse('VALIDATION_ERROR', 'Request body is not valid JSON', err.message, false));
    return;
  }

  if (err instanceof ConfigurationError) {
    logger.error({ err: err.message, errorCode: err.code, retryable: false }, 'Configuration error');
    res.status(500).json(errorResponse(err.code, err.message, undefined, false));
    return;
  }

  if (isAppError(err)) {
    sendAppError(res, err);
    return;
  }

  logger.error({ err: err.message }, 'Unhandled error');
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred', undefined, false));
}
