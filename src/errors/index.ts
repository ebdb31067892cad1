/**
 * Errors
 * @module errors
 */

export {
  BaseError,
  isBaseError,
  hasErrorCode,
  wrapError,
  getErrorMessage,
} from './base.js';
export type { ErrorContext, SerializedError } from './base.js';

export {
  CacheErrorCodes,
  GeneralErrorCodes,
  getHttpStatusForCode,
  isRetryableError,
} from './codes.js';
export type { CacheErrorCode, ErrorCode } from './codes.js';

export {
  withTimeout,
  TimeoutError,
  Bulkhead,
} from './recovery.js';
export type { TimeoutOptions, BulkheadOptions } from './recovery.js';
