/**
 * Cache Circuit Breaker
 * @module services/cache-engine/circuit-breaker
 *
 * Guards cache operations against a degraded backend.
 *
 * State machine:
 * - CLOSED -> OPEN       once the failure count reaches the threshold
 * - OPEN -> HALF_OPEN    once `timeoutMs` has passed since the last failure,
 *                        checked on the next call (or forced by the health
 *                        check after twice the timeout)
 * - HALF_OPEN -> CLOSED  on the next success
 * - HALF_OPEN -> OPEN    on the next failure
 *
 * The trip decision uses one breaker-wide failure counter. Successes while
 * CLOSED decay that counter by one instead of clearing it. Per-operation
 * metrics are kept for observability only and never influence the state.
 */

import { z } from 'zod';
import { StructuredLogger, createModuleLogger } from '../../logging/logger.js';
import { CircuitBreakerConfigSchema, parseConfigSection } from './config.js';
import { CircuitOpenError, FallbackFailedError } from './errors.js';
import {
  CircuitBreakerStatistics,
  CircuitState,
  CircuitStateChange,
  CircuitStateListener,
  OperationMetricsSnapshot,
} from './interfaces.js';
import { PeriodicTask } from './utils/periodic-task.js';

// ============================================================================
// Types
// ============================================================================

const CircuitBreakerOptionsSchema = CircuitBreakerConfigSchema.omit({ enabled: true });

export type CircuitBreakerOptions = z.infer<typeof CircuitBreakerOptionsSchema>;

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  timeoutMs: 60_000,
  healthCheckIntervalMs: 30_000,
  metricRetentionMs: 3_600_000,
};

export interface CircuitBreakerDependencies {
  readonly config?: Partial<CircuitBreakerOptions>;
  readonly logger?: StructuredLogger;
}

/**
 * Value supplier used when the breaker is open or the operation fails
 */
export type Fallback<T> = () => T | Promise<T>;

export interface HealthCheckResult {
  readonly forcedHalfOpen: boolean;
  readonly sweptOperations: number;
}

interface OperationMetrics {
  totalOperations: number;
  successCount: number;
  failureCount: number;
  totalLatencyMs: number;
  lastAccess: number;
}

// ============================================================================
// Circuit Breaker Implementation
// ============================================================================

/**
 * @example
 * ```typescript
 * const breaker = new CacheCircuitBreaker('cache-store', { config: { failureThreshold: 3 } });
 *
 * const lookup = await breaker.execute(
 *   'cache.get',
 *   () => store.get(key),
 *   () => ({ found: false })
 * );
 * ```
 */
export class CacheCircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private lastFailureTime: number | null = null;
  private readonly options: CircuitBreakerOptions;
  private readonly logger: StructuredLogger;
  private readonly operations = new Map<string, OperationMetrics>();
  private readonly listeners = new Set<CircuitStateListener>();
  private readonly healthCheck: PeriodicTask;

  constructor(
    public readonly name: string,
    deps: CircuitBreakerDependencies = {}
  ) {
    this.options = parseConfigSection(
      CircuitBreakerOptionsSchema,
      { ...DEFAULT_CIRCUIT_BREAKER_OPTIONS, ...deps.config },
      'circuit breaker'
    );
    this.logger = deps.logger ?? createModuleLogger('cache-circuit-breaker');
    this.healthCheck = new PeriodicTask(
      `${name}.health-check`,
      () => {
        this.runHealthCheck();
      },
      { intervalMs: this.options.healthCheckIntervalMs },
      this.logger
    );
  }

  // =========================================================================
  // Execution
  // =========================================================================

  /**
   * Run an async operation through the breaker.
   *
   * When the breaker is open the fallback is used, or CircuitOpenError is
   * thrown without one. When the operation fails the failure is recorded
   * and the fallback is used, or the error is rethrown without one. A
   * failing fallback raises FallbackFailedError carrying both causes.
   */
  async execute<T>(operationName: string, operation: () => Promise<T>, fallback?: Fallback<T>): Promise<T> {
    if (!this.canExecute()) {
      const openError = this.openError(operationName);
      if (!fallback) {
        throw openError;
      }
      return this.runFallback(operationName, openError, fallback);
    }

    const started = Date.now();

    try {
      const result = await operation();
      this.recordSuccess(operationName, Date.now() - started);
      return result;
    } catch (error) {
      this.recordFailure(operationName, Date.now() - started);
      if (!fallback) {
        throw error;
      }
      return this.runFallback(operationName, error, fallback);
    }
  }

  /**
   * Synchronous counterpart of `execute`
   */
  executeSync<T>(operationName: string, operation: () => T, fallback?: () => T): T {
    if (!this.canExecute()) {
      const openError = this.openError(operationName);
      if (!fallback) {
        throw openError;
      }
      return this.runFallbackSync(operationName, openError, fallback);
    }

    const started = Date.now();

    try {
      const result = operation();
      this.recordSuccess(operationName, Date.now() - started);
      return result;
    } catch (error) {
      this.recordFailure(operationName, Date.now() - started);
      if (!fallback) {
        throw error;
      }
      return this.runFallbackSync(operationName, error, fallback);
    }
  }

  // =========================================================================
  // State
  // =========================================================================

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failures;
  }

  /**
   * Time until an open breaker lets the next call through
   */
  getRemainingTimeout(): number {
    if (this.state !== CircuitState.OPEN || this.lastFailureTime === null) {
      return 0;
    }
    return Math.max(0, this.options.timeoutMs - (Date.now() - this.lastFailureTime));
  }

  onStateChange(listener: CircuitStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Close the breaker and clear the failure count
   */
  reset(): void {
    this.failures = 0;
    this.lastFailureTime = null;
    this.transitionTo(CircuitState.CLOSED);
  }

  // =========================================================================
  // Metrics
  // =========================================================================

  getOperationMetrics(operationName: string): OperationMetricsSnapshot | undefined {
    const metrics = this.operations.get(operationName);
    return metrics ? snapshot(operationName, metrics) : undefined;
  }

  getStatistics(): CircuitBreakerStatistics {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failures,
      lastFailureTime: this.lastFailureTime === null ? null : new Date(this.lastFailureTime),
      operations: Array.from(this.operations, ([operationName, metrics]) => snapshot(operationName, metrics)),
    };
  }

  // =========================================================================
  // Health Check
  // =========================================================================

  startHealthCheck(): void {
    this.healthCheck.start();
  }

  /**
   * Force a breaker stuck open for twice the timeout into HALF_OPEN and
   * drop operation metrics idle past the retention period.
   */
  runHealthCheck(): HealthCheckResult {
    const now = Date.now();
    let forcedHalfOpen = false;

    if (
      this.state === CircuitState.OPEN &&
      this.lastFailureTime !== null &&
      now - this.lastFailureTime >= this.options.timeoutMs * 2
    ) {
      this.logger.warn({ breaker: this.name, failureCount: this.failures }, 'Circuit stuck open, forcing half-open');
      this.transitionTo(CircuitState.HALF_OPEN);
      forcedHalfOpen = true;
    }

    const cutoff = now - this.options.metricRetentionMs;
    let sweptOperations = 0;
    for (const [operationName, metrics] of Array.from(this.operations)) {
      if (metrics.lastAccess < cutoff) {
        this.operations.delete(operationName);
        sweptOperations++;
      }
    }

    return { forcedHalfOpen, sweptOperations };
  }

  async dispose(): Promise<void> {
    await this.healthCheck.stop();
    this.listeners.clear();
  }

  // =========================================================================
  // Helper Methods
  // =========================================================================

  private canExecute(): boolean {
    if (
      this.state === CircuitState.OPEN &&
      this.lastFailureTime !== null &&
      Date.now() - this.lastFailureTime >= this.options.timeoutMs
    ) {
      this.transitionTo(CircuitState.HALF_OPEN);
    }
    return this.state !== CircuitState.OPEN;
  }

  private openError(operationName: string): CircuitOpenError {
    return new CircuitOpenError(this.name, operationName, this.getRemainingTimeout());
  }

  private async runFallback<T>(operationName: string, primaryError: unknown, fallback: Fallback<T>): Promise<T> {
    try {
      return await fallback();
    } catch (fallbackError) {
      throw new FallbackFailedError(operationName, primaryError, fallbackError);
    }
  }

  private runFallbackSync<T>(operationName: string, primaryError: unknown, fallback: () => T): T {
    try {
      return fallback();
    } catch (fallbackError) {
      throw new FallbackFailedError(operationName, primaryError, fallbackError);
    }
  }

  private recordSuccess(operationName: string, latencyMs: number): void {
    const metrics = this.touch(operationName, latencyMs, 'success');
    metrics.successCount++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.failures = 0;
      this.transitionTo(CircuitState.CLOSED);
    } else if (this.state === CircuitState.CLOSED && this.failures > 0) {
      this.failures--;
    }
  }

  private recordFailure(operationName: string, latencyMs: number): void {
    const metrics = this.touch(operationName, latencyMs, 'failure');
    metrics.failureCount++;

    this.failures++;
    this.lastFailureTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.OPEN);
    } else if (this.state === CircuitState.CLOSED && this.failures >= this.options.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  private touch(operationName: string, latencyMs: number, outcome: 'success' | 'failure'): OperationMetrics {
    this.logger.performanceMetric(operationName, latencyMs, { breaker: this.name, outcome });

    let metrics = this.operations.get(operationName);
    if (!metrics) {
      metrics = { totalOperations: 0, successCount: 0, failureCount: 0, totalLatencyMs: 0, lastAccess: 0 };
      this.operations.set(operationName, metrics);
    }
    metrics.totalOperations++;
    metrics.totalLatencyMs += latencyMs;
    metrics.lastAccess = Date.now();
    return metrics;
  }

  private transitionTo(newState: CircuitState): void {
    const previousState = this.state;
    if (previousState === newState) {
      return;
    }

    this.state = newState;

    const change: CircuitStateChange = {
      previousState,
      newState,
      failureCount: this.failures,
      timestamp: new Date(),
    };

    this.logger.circuitStateChanged({
      breaker: this.name,
      previousState,
      newState,
      failureCount: this.failures,
    });

    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        this.logger.error({ err: error, breaker: this.name }, 'Circuit state listener threw');
      }
    }
  }
}

function snapshot(operationName: string, metrics: OperationMetrics): OperationMetricsSnapshot {
  return {
    operationName,
    totalOperations: metrics.totalOperations,
    successCount: metrics.successCount,
    failureCount: metrics.failureCount,
    averageLatencyMs: metrics.totalOperations > 0 ? metrics.totalLatencyMs / metrics.totalOperations : 0,
    lastAccess: new Date(metrics.lastAccess),
  };
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCacheCircuitBreaker(name: string, deps?: CircuitBreakerDependencies): CacheCircuitBreaker {
  return new CacheCircuitBreaker(name, deps);
}
