/**
 * Cache Engine Configuration
 * @module services/cache-engine/config
 *
 * Configuration management for the cache engine.
 * Provides type-safe configuration with Zod validation,
 * environment variable overrides, and sensible defaults.
 *
 * Configuration Hierarchy:
 * 1. Default values
 * 2. Environment-specific defaults
 * 3. Environment variable overrides
 * 4. Programmatic overrides
 */

import { z } from 'zod';
import { createModuleLogger } from '../../logging/logger.js';
import { CacheErrorCodes } from '../../errors/codes.js';
import { CacheEngineError } from './errors.js';

const logger = createModuleLogger('cache-engine-config');

// ============================================================================
// Environment Variable Names
// ============================================================================

export const CacheEngineEnvVars = {
  // Key Settings
  NAMESPACE: 'CACHE_ENGINE_NAMESPACE',
  VERSION: 'CACHE_ENGINE_VERSION',
  KEY_SEPARATOR: 'CACHE_ENGINE_KEY_SEPARATOR',
  DEFAULT_EXPIRATION_MINUTES: 'CACHE_ENGINE_DEFAULT_EXPIRATION_MINUTES',
  MAX_RELATED_DEPTH: 'CACHE_ENGINE_MAX_RELATED_DEPTH',

  // Error Handling
  SILENT_FALLBACK: 'CACHE_ENGINE_SILENT_FALLBACK',

  // Circuit Breaker
  CIRCUIT_BREAKER_ENABLED: 'CACHE_ENGINE_CIRCUIT_BREAKER_ENABLED',
  CIRCUIT_BREAKER_FAILURE_THRESHOLD: 'CACHE_ENGINE_CIRCUIT_BREAKER_FAILURE_THRESHOLD',
  CIRCUIT_BREAKER_TIMEOUT_MS: 'CACHE_ENGINE_CIRCUIT_BREAKER_TIMEOUT_MS',

  // Distributed Invalidation
  DISTRIBUTED_ENABLED: 'CACHE_ENGINE_DISTRIBUTED_ENABLED',

  // Intelligent Caching
  INTELLIGENT_ENABLED: 'CACHE_ENGINE_INTELLIGENT_ENABLED',
  HOT_KEY_THRESHOLD: 'CACHE_ENGINE_HOT_KEY_THRESHOLD',
  METRIC_RETENTION_MS: 'CACHE_ENGINE_METRIC_RETENTION_MS',

  // Logging
  LOG_INVALIDATION: 'CACHE_ENGINE_LOG_INVALIDATION',
  LOG_CACHE_HIT_MISS: 'CACHE_ENGINE_LOG_CACHE_HIT_MISS',
  LOG_KEY_GENERATION: 'CACHE_ENGINE_LOG_KEY_GENERATION',

  // Redis
  REDIS_HOST: 'REDIS_HOST',
  REDIS_PORT: 'REDIS_PORT',
  REDIS_PASSWORD: 'REDIS_PASSWORD',
  REDIS_DB: 'REDIS_DB',
  REDIS_KEY_PREFIX: 'REDIS_KEY_PREFIX',
} as const;

export type CacheEngineEnvVar = typeof CacheEngineEnvVars[keyof typeof CacheEngineEnvVars];

// ============================================================================
// Zod Schemas
// ============================================================================

export const LoggingConfigSchema = z.object({
  logInvalidation: z.boolean().default(true),
  logCacheHitMiss: z.boolean().default(false),
  logKeyGeneration: z.boolean().default(false),
});

export const ErrorHandlingConfigSchema = z.object({
  /** Swallow backend errors and degrade to bypass-cache behavior */
  silentFallback: z.boolean().default(true),
});

export const CircuitBreakerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  failureThreshold: z.number().int().min(1).max(1000).default(5),
  timeoutMs: z.number().int().min(1).default(60_000),
  healthCheckIntervalMs: z.number().int().min(1).default(30_000),
  metricRetentionMs: z.number().int().min(1).default(3_600_000),
});

export const DistributedConfigSchema = z.object({
  enabled: z.boolean().default(false),
});

export const IntelligentConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Accesses per minute at which a key counts as hot */
  hotKeyThreshold: z.number().positive().default(10),
  metricRetentionMs: z.number().int().min(1).default(86_400_000),
  maxHotKeys: z.number().int().min(1).default(100),
  accessHistoryLimit: z.number().int().min(1).default(1000),
  detectionIntervalMs: z.number().int().min(1).default(60_000),
  minTtlMs: z.number().int().min(1).default(300_000),
  maxTtlMs: z.number().int().min(1).default(86_400_000),
});

export const RedisConfigSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(6379),
  password: z.string().optional(),
  db: z.number().int().min(0).max(15).default(0),
  keyPrefix: z.string().default(''),
});

export const CacheEngineConfigSchema = z
  .object({
    namespace: z.string().min(1).default('app-cache'),
    version: z.string().default('v1'),
    keySeparator: z.string().min(1).default('_'),
    trackingPrefix: z.string().min(1).default('table'),
    defaultExpirationMinutes: z.number().int().min(1).max(10_080).default(30),
    maxRelatedDepth: z.number().int().min(1).max(10).default(3),
    keyMemoCapacity: z.number().int().min(0).default(1000),
    logging: LoggingConfigSchema.default({}),
    errorHandling: ErrorHandlingConfigSchema.default({}),
    circuitBreaker: CircuitBreakerConfigSchema.default({}),
    distributed: DistributedConfigSchema.default({}),
    intelligent: IntelligentConfigSchema.default({}),
    redis: RedisConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.intelligent.minTtlMs > config.intelligent.maxTtlMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['intelligent', 'minTtlMs'],
        message: 'minTtlMs must not exceed maxTtlMs',
      });
    }
  });

// ============================================================================
// Type Exports
// ============================================================================

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ErrorHandlingConfig = z.infer<typeof ErrorHandlingConfigSchema>;
export type CircuitBreakerConfig = z.infer<typeof CircuitBreakerConfigSchema>;
export type DistributedConfig = z.infer<typeof DistributedConfigSchema>;
export type IntelligentConfig = z.infer<typeof IntelligentConfigSchema>;
export type RedisConfig = z.infer<typeof RedisConfigSchema>;
export type CacheEngineConfig = z.infer<typeof CacheEngineConfigSchema>;
export type PartialCacheEngineConfig = z.input<typeof CacheEngineConfigSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: CacheEngineConfig = {
  namespace: 'app-cache',
  version: 'v1',
  keySeparator: '_',
  trackingPrefix: 'table',
  defaultExpirationMinutes: 30,
  maxRelatedDepth: 3,
  keyMemoCapacity: 1000,
  logging: {
    logInvalidation: true,
    logCacheHitMiss: false,
    logKeyGeneration: false,
  },
  errorHandling: {
    silentFallback: true,
  },
  circuitBreaker: {
    enabled: true,
    failureThreshold: 5,
    timeoutMs: 60_000,
    healthCheckIntervalMs: 30_000,
    metricRetentionMs: 3_600_000,
  },
  distributed: {
    enabled: false,
  },
  intelligent: {
    enabled: true,
    hotKeyThreshold: 10,
    metricRetentionMs: 86_400_000,
    maxHotKeys: 100,
    accessHistoryLimit: 1000,
    detectionIntervalMs: 60_000,
    minTtlMs: 300_000,
    maxTtlMs: 86_400_000,
  },
  redis: {
    host: 'localhost',
    port: 6379,
    password: undefined,
    db: 0,
    keyPrefix: '',
  },
};

// ============================================================================
// Environment Variable Loading
// ============================================================================

function safeParseInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function safeParseFloat(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === 'true';
}

/**
 * Load cache engine configuration from environment variables.
 * Unset or unparseable values are left undefined and skipped when merging.
 */
export function loadConfigFromEnv(): PartialCacheEngineConfig {
  const env = process.env;

  return {
    namespace: env[CacheEngineEnvVars.NAMESPACE],
    version: env[CacheEngineEnvVars.VERSION],
    keySeparator: env[CacheEngineEnvVars.KEY_SEPARATOR],
    defaultExpirationMinutes: safeParseInt(env[CacheEngineEnvVars.DEFAULT_EXPIRATION_MINUTES]),
    maxRelatedDepth: safeParseInt(env[CacheEngineEnvVars.MAX_RELATED_DEPTH]),
    logging: {
      logInvalidation: parseBoolean(env[CacheEngineEnvVars.LOG_INVALIDATION]),
      logCacheHitMiss: parseBoolean(env[CacheEngineEnvVars.LOG_CACHE_HIT_MISS]),
      logKeyGeneration: parseBoolean(env[CacheEngineEnvVars.LOG_KEY_GENERATION]),
    },
    errorHandling: {
      silentFallback: parseBoolean(env[CacheEngineEnvVars.SILENT_FALLBACK]),
    },
    circuitBreaker: {
      enabled: parseBoolean(env[CacheEngineEnvVars.CIRCUIT_BREAKER_ENABLED]),
      failureThreshold: safeParseInt(env[CacheEngineEnvVars.CIRCUIT_BREAKER_FAILURE_THRESHOLD]),
      timeoutMs: safeParseInt(env[CacheEngineEnvVars.CIRCUIT_BREAKER_TIMEOUT_MS]),
    },
    distributed: {
      enabled: parseBoolean(env[CacheEngineEnvVars.DISTRIBUTED_ENABLED]),
    },
    intelligent: {
      enabled: parseBoolean(env[CacheEngineEnvVars.INTELLIGENT_ENABLED]),
      hotKeyThreshold: safeParseFloat(env[CacheEngineEnvVars.HOT_KEY_THRESHOLD]),
      metricRetentionMs: safeParseInt(env[CacheEngineEnvVars.METRIC_RETENTION_MS]),
    },
    redis: {
      host: env[CacheEngineEnvVars.REDIS_HOST],
      port: safeParseInt(env[CacheEngineEnvVars.REDIS_PORT]),
      password: env[CacheEngineEnvVars.REDIS_PASSWORD] || undefined,
      db: safeParseInt(env[CacheEngineEnvVars.REDIS_DB]),
      keyPrefix: env[CacheEngineEnvVars.REDIS_KEY_PREFIX],
    },
  };
}

// ============================================================================
// Environment-Specific Defaults
// ============================================================================

export function getEnvironmentDefaults(env: string): PartialCacheEngineConfig {
  const defaults: Record<string, PartialCacheEngineConfig> = {
    development: {
      logging: {
        logCacheHitMiss: true,
        logKeyGeneration: true,
      },
    },
    test: {
      logging: {
        logInvalidation: false,
      },
      distributed: {
        enabled: false,
      },
    },
    production: {
      logging: {
        logCacheHitMiss: false,
        logKeyGeneration: false,
      },
    },
  };

  return defaults[env] ?? defaults.development;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Configuration validation error
 */
export class CacheEngineConfigValidationError extends CacheEngineError {
  public readonly errors: z.ZodError;
  public readonly configSection?: string;

  constructor(zodError: z.ZodError, configSection?: string) {
    const formattedErrors = zodError.errors.map(e => ({
      path: e.path.join('.'),
      message: e.message,
    }));

    const prefix = configSection
      ? `Cache engine ${configSection} configuration`
      : 'Cache engine configuration';

    super(
      `${prefix} validation failed:\n${formattedErrors.map(e => `  - ${e.path}: ${e.message}`).join('\n')}`,
      CacheErrorCodes.CONFIG_ERROR,
      { details: { errors: formattedErrors } }
    );

    this.errors = zodError;
    this.configSection = configSection;
  }
}

/**
 * Validate a full cache engine configuration
 */
export function validateConfig(config: unknown): CacheEngineConfig {
  return parseConfigSection(CacheEngineConfigSchema, config);
}

/**
 * Validate one configuration section. Components call this with their own
 * options so invalid values fail at construction.
 */
export function parseConfigSection<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  section?: string
): z.infer<S> {
  const result = schema.safeParse(input);

  if (!result.success) {
    logger.error({ errors: result.error.errors, section }, 'Cache engine configuration validation failed');
    throw new CacheEngineConfigValidationError(result.error, section);
  }

  return result.data;
}

export function isValidConfig(config: unknown): config is CacheEngineConfig {
  return CacheEngineConfigSchema.safeParse(config).success;
}

// ============================================================================
// Configuration Merging
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects; undefined source values are skipped
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (sourceValue === undefined) {
      continue;
    }

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      deepMerge(targetValue, sourceValue);
    } else if (isPlainObject(sourceValue)) {
      const copy: Record<string, unknown> = {};
      deepMerge(copy, sourceValue);
      target[key] = copy;
    } else {
      target[key] = sourceValue;
    }
  }
}

/**
 * Deep merge configurations (later configs override earlier) and validate
 */
export function mergeConfigs(...configs: PartialCacheEngineConfig[]): CacheEngineConfig {
  const merged: Record<string, unknown> = {};

  for (const config of configs) {
    deepMerge(merged, config);
  }

  return validateConfig(merged);
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create cache engine configuration with all sources merged
 *
 * @param overrides - Programmatic configuration overrides
 * @param environment - Environment name (defaults to NODE_ENV)
 */
export function createConfig(
  overrides?: PartialCacheEngineConfig,
  environment?: string
): CacheEngineConfig {
  const env = environment ?? process.env.NODE_ENV ?? 'development';

  const config = mergeConfigs(
    DEFAULT_CONFIG,
    getEnvironmentDefaults(env),
    loadConfigFromEnv(),
    overrides ?? {}
  );

  logger.info(
    {
      environment: env,
      namespace: config.namespace,
      version: config.version,
      circuitBreakerEnabled: config.circuitBreaker.enabled,
      distributedEnabled: config.distributed.enabled,
      intelligentEnabled: config.intelligent.enabled,
    },
    'Cache engine configuration created'
  );

  return config;
}

/**
 * Create configuration for testing. Environment variables are ignored.
 */
export function createTestConfig(overrides?: PartialCacheEngineConfig): CacheEngineConfig {
  return mergeConfigs(DEFAULT_CONFIG, getEnvironmentDefaults('test'), overrides ?? {});
}

// ============================================================================
// Configuration Singleton
// ============================================================================

let configInstance: CacheEngineConfig | null = null;

export function getConfig(): CacheEngineConfig {
  if (!configInstance) {
    configInstance = createConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}

/**
 * Initialize configuration with specific overrides.
 * Returns the existing configuration when already initialized.
 */
export function initConfig(overrides?: PartialCacheEngineConfig): CacheEngineConfig {
  if (configInstance) {
    logger.warn({}, 'Configuration already initialized, returning existing config');
    return configInstance;
  }

  configInstance = createConfig(overrides);
  return configInstance;
}

/**
 * Default entry TTL in milliseconds
 */
export function getDefaultExpirationMs(config: Pick<CacheEngineConfig, 'defaultExpirationMinutes'>): number {
  return config.defaultExpirationMinutes * 60_000;
}
