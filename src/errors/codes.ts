/**
 * Error Codes
 * @module errors/codes
 *
 * Error codes raised by the cache engine, their HTTP status mapping for
 * callers that surface them over an API, and retryability.
 */

// ============================================================================
// Error Code Definitions
// ============================================================================

export const CacheErrorCodes = {
  /** Store or transport failed or was unreachable */
  BACKEND_FAILURE: 'CACHE_BACKEND_FAILURE',
  /** Circuit breaker refused to run the operation */
  CIRCUIT_OPEN: 'CACHE_CIRCUIT_OPEN',
  /** Primary operation and its fallback both failed */
  FALLBACK_FAILED: 'CACHE_FALLBACK_FAILED',
  /** Inbound invalidation message could not be decoded */
  MESSAGE_DECODE_FAILED: 'CACHE_MESSAGE_DECODE_FAILED',
  /** Invalid configuration values */
  CONFIG_ERROR: 'CACHE_CONFIG_ERROR',
  /** Blank operation id or action passed to key generation */
  INVALID_KEY_INPUT: 'CACHE_INVALID_KEY_INPUT',
  /** Component used after dispose */
  DISPOSED: 'CACHE_DISPOSED',
  /** Operation exceeded its deadline */
  TIMEOUT: 'CACHE_TIMEOUT',
} as const;

export const GeneralErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type CacheErrorCode = typeof CacheErrorCodes[keyof typeof CacheErrorCodes];
export type ErrorCode = CacheErrorCode | typeof GeneralErrorCodes[keyof typeof GeneralErrorCodes];

// ============================================================================
// HTTP Status Mapping
// ============================================================================

const HTTP_STATUS_BY_CODE: Record<ErrorCode, number> = {
  CACHE_BACKEND_FAILURE: 503,
  CACHE_CIRCUIT_OPEN: 503,
  CACHE_FALLBACK_FAILED: 502,
  CACHE_MESSAGE_DECODE_FAILED: 400,
  CACHE_CONFIG_ERROR: 500,
  CACHE_INVALID_KEY_INPUT: 400,
  CACHE_DISPOSED: 500,
  CACHE_TIMEOUT: 504,
  INTERNAL_ERROR: 500,
};

/**
 * Get the HTTP status code for an error code
 */
export function getHttpStatusForCode(code: ErrorCode): number {
  return HTTP_STATUS_BY_CODE[code];
}

// ============================================================================
// Retryability
// ============================================================================

const RETRYABLE_CODES: Record<ErrorCode, boolean> = {
  CACHE_BACKEND_FAILURE: true,
  CACHE_CIRCUIT_OPEN: true,
  CACHE_FALLBACK_FAILED: false,
  CACHE_MESSAGE_DECODE_FAILED: false,
  CACHE_CONFIG_ERROR: false,
  CACHE_INVALID_KEY_INPUT: false,
  CACHE_DISPOSED: false,
  CACHE_TIMEOUT: true,
  INTERNAL_ERROR: false,
};

/**
 * Check whether an error code denotes a transient condition
 */
export function isRetryableError(code: ErrorCode): boolean {
  return RETRYABLE_CODES[code];
}
