/**
 * Cache Engine Errors
 * @module services/cache-engine/errors
 *
 * Distinct, inspectable error kinds raised by the cache engine.
 * Breaker-open and fallback failure are their own classes so callers can
 * branch on them without parsing messages.
 */

import { BaseError, ErrorContext, getErrorMessage } from '../../errors/base.js';
import { CacheErrorCode, CacheErrorCodes, isRetryableError } from '../../errors/codes.js';

// ============================================================================
// Base Cache Engine Error
// ============================================================================

export class CacheEngineError extends BaseError {
  public readonly retryable: boolean;

  constructor(message: string, code: CacheErrorCode, context: ErrorContext = {}) {
    super(message, code, context);
    this.retryable = isRetryableError(code);
  }

  // ==========================================================================
  // Static Factory Methods
  // ==========================================================================

  static configError(message: string, details?: Record<string, unknown>): CacheEngineError {
    return new CacheEngineError(`Invalid cache engine configuration: ${message}`, CacheErrorCodes.CONFIG_ERROR, {
      details,
    });
  }

  static invalidKeyInput(field: 'operationId' | 'action'): CacheEngineError {
    return new CacheEngineError(`Cache key ${field} must not be blank`, CacheErrorCodes.INVALID_KEY_INPUT, {
      details: { field },
    });
  }

  static backendFailure(operation: string, cause: unknown): CacheEngineError {
    return new CacheEngineError(
      `Cache backend failed during ${operation}: ${getErrorMessage(cause)}`,
      CacheErrorCodes.BACKEND_FAILURE,
      { operation, cause: cause instanceof Error ? cause : undefined }
    );
  }

  static messageDecodeFailed(reason: string, payload: string): CacheEngineError {
    return new CacheEngineError(`Invalid invalidation message: ${reason}`, CacheErrorCodes.MESSAGE_DECODE_FAILED, {
      details: { payloadLength: payload.length },
    });
  }

  static disposed(component: string): CacheEngineError {
    return new CacheEngineError(`${component} has been disposed`, CacheErrorCodes.DISPOSED, {
      details: { component },
    });
  }
}

// ============================================================================
// Circuit Breaker Errors
// ============================================================================

/**
 * Raised when the breaker refuses an operation and no fallback was supplied
 */
export class CircuitOpenError extends CacheEngineError {
  public readonly breakerName: string;
  public readonly operationName: string;
  public readonly retryAfterMs: number;

  constructor(breakerName: string, operationName: string, retryAfterMs: number) {
    super(
      `Circuit '${breakerName}' is open; '${operationName}' rejected, retry in ${retryAfterMs}ms`,
      CacheErrorCodes.CIRCUIT_OPEN,
      { operation: operationName, details: { breakerName, retryAfterMs } }
    );
    this.breakerName = breakerName;
    this.operationName = operationName;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Raised when both the primary operation and its fallback failed.
 * `primaryError` is the operation's failure, or the CircuitOpenError when
 * the breaker short-circuited.
 */
export class FallbackFailedError extends CacheEngineError {
  public readonly operationName: string;
  public readonly primaryError: unknown;
  public readonly fallbackError: unknown;

  constructor(operationName: string, primaryError: unknown, fallbackError: unknown) {
    super(
      `Operation '${operationName}' failed (${getErrorMessage(primaryError)}) and its fallback failed (${getErrorMessage(fallbackError)})`,
      CacheErrorCodes.FALLBACK_FAILED,
      {
        operation: operationName,
        cause: primaryError instanceof Error ? primaryError : undefined,
        details: { fallbackError: getErrorMessage(fallbackError) },
      }
    );
    this.operationName = operationName;
    this.primaryError = primaryError;
    this.fallbackError = fallbackError;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isCacheEngineError(error: unknown): error is CacheEngineError {
  return error instanceof CacheEngineError;
}

export function isCircuitOpenError(error: unknown): error is CircuitOpenError {
  return error instanceof CircuitOpenError;
}

export function isFallbackFailedError(error: unknown): error is FallbackFailedError {
  return error instanceof FallbackFailedError;
}
