/**
 * Recovery Strategies
 * @module errors/recovery
 *
 * Timeout and concurrency-limiting primitives shared by the cache engine
 * components.
 */

import { BaseError } from './base.js';

// ============================================================================
// Timeout
// ============================================================================

/**
 * Timeout configuration
 */
export interface TimeoutOptions {
  /** Timeout duration in milliseconds */
  timeoutMs: number;
  /** Name of the operation, used in the error */
  operation?: string;
  /** Error message when timeout occurs */
  message?: string;
}

/**
 * Error thrown when an operation times out
 */
export class TimeoutError extends BaseError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, operation?: string, message?: string) {
    super(message ?? `Operation timed out after ${timeoutMs}ms`, 'CACHE_TIMEOUT', {
      operation,
      details: { timeoutMs },
    });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Execute an operation with a timeout. The timer is cleared once the
 * operation settles.
 *
 * @example
 * ```typescript
 * await withTimeout(() => task.drain(), { timeoutMs: 5000, operation: 'drain' });
 * ```
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, operation: name, message } = options;
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(timeoutMs, name, message));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

// ============================================================================
// Bulkhead Pattern
// ============================================================================

/**
 * Bulkhead options for limiting concurrent operations
 */
export interface BulkheadOptions {
  /** Maximum number of concurrent executions */
  maxConcurrent: number;
}

/**
 * Limits concurrent operations. With `maxConcurrent: 1` it serializes
 * callers like a mutex; waiting callers run in arrival order.
 *
 * @example
 * ```typescript
 * const lock = new Bulkhead('subscription', { maxConcurrent: 1 });
 * await lock.execute(() => transport.subscribe(channel, handler));
 * ```
 */
export class Bulkhead {
  private currentConcurrent = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(
    public readonly name: string,
    private readonly options: BulkheadOptions
  ) {}

  /**
   * Execute an operation through the bulkhead
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire();

    try {
      return await operation();
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (this.currentConcurrent < this.options.maxConcurrent) {
      this.currentConcurrent++;
      return;
    }

    return new Promise(resolve => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // The slot passes straight to the next waiter
      next();
    } else {
      this.currentConcurrent--;
    }
  }
}
