/**
 * Structured error codes and typed results for the crawl path
 *
 * Error code format: CATEGORY_SPECIFIC_ERROR
 * Categories:
 * - NETWORK: fetch failures, never fatal to a crawl
 * - CONTENT: bodies that cannot be used as returned
 * - VALIDATION: CLI input errors
 * - REPORT: report persistence errors
 */

export const ErrorCode = {
  // Network (entry abandoned, crawl continues)
  NETWORK_TIMEOUT: 'NETWORK_TIMEOUT',
  NETWORK_FAILURE: 'NETWORK_FAILURE',
  NETWORK_CANCELLED: 'NETWORK_CANCELLED',

  // Content (degrade to partial or empty extraction)
  CONTENT_TOO_LARGE: 'CONTENT_TOO_LARGE',
  CONTENT_MALFORMED: 'CONTENT_MALFORMED',

  // Validation (CLI)
  VALIDATION_INVALID_URL: 'VALIDATION_INVALID_URL',
  VALIDATION_INVALID_DEPTH: 'VALIDATION_INVALID_DEPTH',
  VALIDATION_INVALID_OPTION: 'VALIDATION_INVALID_OPTION',

  // Report
  REPORT_WRITE_FAILED: 'REPORT_WRITE_FAILED',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Structured failure record
 */
export interface CrawlFailure {
  error: string;
  code: ErrorCodeType;
  message?: string;
  details?: Record<string, unknown>;
}

export function createError(
  code: ErrorCodeType,
  error: string,
  options?: {
    message?: string;
    details?: Record<string, unknown>;
  }
): CrawlFailure {
  return {
    error,
    code,
    ...(options?.message && { message: options.message }),
    ...(options?.details && { details: options.details }),
  };
}

/**
 * Common failures
 */
export const Errors = {
  timeout: (url: string, timeoutMs: number) =>
    createError(ErrorCode.NETWORK_TIMEOUT, `Request timed out after ${timeoutMs}ms`, {
      details: { url, timeout_ms: timeoutMs },
    }),

  network: (url: string, message?: string) =>
    createError(ErrorCode.NETWORK_FAILURE, 'Request failed', {
      message,
      details: { url },
    }),

  cancelled: (url: string) =>
    createError(ErrorCode.NETWORK_CANCELLED, 'Request cancelled', {
      details: { url },
    }),

  tooLarge: (url: string, limitBytes: number) =>
    createError(ErrorCode.CONTENT_TOO_LARGE, `Response body exceeds ${limitBytes} bytes`, {
      details: { url, limit_bytes: limitBytes },
    }),

  malformed: (url: string, message?: string) =>
    createError(ErrorCode.CONTENT_MALFORMED, 'Content could not be fully tokenized', {
      message,
      details: { url },
    }),

  invalidUrl: (value: string) =>
    createError(ErrorCode.VALIDATION_INVALID_URL, 'Invalid target. Must be a valid HTTP/HTTPS URL', {
      details: { value },
    }),

  invalidDepth: (value: string) =>
    createError(ErrorCode.VALIDATION_INVALID_DEPTH, 'Invalid depth. Must be a non-negative integer (0 for unlimited)', {
      details: { value },
    }),

  invalidOption: (field: string, expected: string, value: string) =>
    createError(ErrorCode.VALIDATION_INVALID_OPTION, `Invalid ${field}. ${expected}`, {
      details: { field, value },
    }),

  reportWriteFailed: (path: string, message?: string) =>
    createError(ErrorCode.REPORT_WRITE_FAILED, 'Report could not be written', {
      message,
      details: { path },
    }),
} as const;

// ───────────────── Typed results ──────────────────────────────────────────

export interface FailureResult {
  ok: false;
  failure: CrawlFailure;
}

export interface SuccessResult<T> {
  ok: true;
  data: T;
}

export type Result<T> = SuccessResult<T> | FailureResult;

export function describeFailure(failure: CrawlFailure): string {
  return failure.message ? `${failure.error}: ${failure.message}` : failure.error;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
