/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Provides structured logging with Pino for the cache engine.
 * Includes domain-specific logging methods for invalidation, circuit
 * breaker transitions and hot-key detection.
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  module?: string;
  operation?: string;
  instanceId?: string;
  correlationId?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Minimal logging surface accepted by every engine component.
 * Both pino loggers and test doubles satisfy it.
 */
export interface LoggerLike {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export interface InvalidationLogEvent {
  targets: readonly string[];
  attempted: number;
  invalidated: number;
  durationMs: number;
  source: 'local' | 'remote';
}

export interface CircuitStateLogEvent {
  breaker: string;
  previousState: string;
  newState: string;
  failureCount: number;
}

/**
 * Logger with cache-domain event methods
 */
export interface StructuredLogger extends LoggerLike {
  child(bindings: LogContext): StructuredLogger;

  invalidationCompleted(event: InvalidationLogEvent): void;
  invalidationFailed(targets: readonly string[], error: unknown): void;
  circuitStateChanged(event: CircuitStateLogEvent): void;
  hotKeysDetected(keys: readonly string[]): void;
  performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void;
}

// ============================================================================
// Default Configuration
// ============================================================================

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || 'info',
  pretty: process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development',
  redact: ['password', 'token', 'secret', 'authorization', 'redis.password'],
  service: process.env.SERVICE_NAME || 'cache-engine',
  version: process.env.SERVICE_VERSION || '1.0.0',
  environment: process.env.NODE_ENV || 'development',
};

// ============================================================================
// Redaction Utilities
// ============================================================================

function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
  }

  return expandedPaths;
}

function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Wraps a Pino logger with the cache-domain methods
 */
function withDomainMethods(base: Logger): StructuredLogger {
  return {
    debug: (obj, msg) => base.debug(obj, msg),
    info: (obj, msg) => base.info(obj, msg),
    warn: (obj, msg) => base.warn(obj, msg),
    error: (obj, msg) => base.error(obj, msg),

    child(bindings: LogContext): StructuredLogger {
      return withDomainMethods(base.child(bindings));
    },

    invalidationCompleted(event: InvalidationLogEvent): void {
      base.info(
        {
          event: 'invalidation_completed',
          targets: event.targets,
          attempted: event.attempted,
          invalidated: event.invalidated,
          durationMs: event.durationMs,
          source: event.source,
        },
        `Invalidated ${event.invalidated}/${event.attempted} keys for ${event.targets.join(', ')}`
      );
    },

    invalidationFailed(targets: readonly string[], error: unknown): void {
      base.error(
        {
          event: 'invalidation_failed',
          targets,
          err: error,
          errorCode: errorCodeOf(error),
        },
        `Invalidation failed for ${targets.join(', ')}`
      );
    },

    circuitStateChanged(event: CircuitStateLogEvent): void {
      base.warn(
        {
          event: 'circuit_state_changed',
          ...event,
        },
        `Circuit ${event.breaker}: ${event.previousState} -> ${event.newState}`
      );
    },

    hotKeysDetected(keys: readonly string[]): void {
      base.info(
        {
          event: 'hot_keys_detected',
          count: keys.length,
          keys,
        },
        `Detected ${keys.length} hot keys`
      );
    },

    performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void {
      base.debug(
        {
          event: 'performance_metric',
          operation,
          durationMs: duration,
          ...metadata,
        },
        `${operation}: ${duration}ms`
      );
    },
  };
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(name: string, baseContext?: LogContext): StructuredLogger {
  const config = { ...defaultConfig };

  if (process.env.LOG_LEVEL) {
    config.level = process.env.LOG_LEVEL;
  }

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    try {
      destination = pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      });
    } catch {
      // pino-pretty not installed, fall back to JSON on stdout
      destination = undefined;
    }
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return withDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('cache-engine');
  }
  return rootLogger;
}

/**
 * Initializes the root logger with custom context
 */
export function initLogger(context?: LogContext): StructuredLogger {
  rootLogger = createLogger('cache-engine', context);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().child({ module: moduleName });
}
