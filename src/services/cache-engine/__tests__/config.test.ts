/**
 * Cache Engine Configuration Tests
 * @module services/cache-engine/__tests__/config.test
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  CacheEngineConfigValidationError,
  CacheEngineEnvVars,
  DEFAULT_CONFIG,
  createConfig,
  createTestConfig,
  getConfig,
  getDefaultExpirationMs,
  getEnvironmentDefaults,
  initConfig,
  isValidConfig,
  loadConfigFromEnv,
  mergeConfigs,
  resetConfig,
  validateConfig,
} from '../config.js';
import { CacheErrorCodes } from '../../../errors/codes.js';

describe('Cache Engine Configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  // =========================================================================
  // Defaults
  // =========================================================================

  describe('defaults', () => {
    it('should accept the default configuration', () => {
      expect(isValidConfig(DEFAULT_CONFIG)).toBe(true);
      expect(validateConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it('should apply test environment defaults', () => {
      const config = createTestConfig();

      expect(config.logging.logInvalidation).toBe(false);
      expect(config.distributed.enabled).toBe(false);
      expect(config.namespace).toBe('app-cache');
      expect(config.defaultExpirationMinutes).toBe(30);
    });

    it('should fall back to development defaults for unknown environments', () => {
      expect(getEnvironmentDefaults('staging')).toEqual(getEnvironmentDefaults('development'));
    });

    it('should convert the default expiration to milliseconds', () => {
      expect(getDefaultExpirationMs({ defaultExpirationMinutes: 30 })).toBe(1_800_000);
    });
  });

  // =========================================================================
  // Environment Variables
  // =========================================================================

  describe('environment variables', () => {
    it('should read overrides from the environment', () => {
      vi.stubEnv(CacheEngineEnvVars.NAMESPACE, 'env-cache');
      vi.stubEnv(CacheEngineEnvVars.SILENT_FALLBACK, 'false');
      vi.stubEnv(CacheEngineEnvVars.HOT_KEY_THRESHOLD, '2.5');

      const config = createConfig(undefined, 'production');

      expect(config.namespace).toBe('env-cache');
      expect(config.errorHandling.silentFallback).toBe(false);
      expect(config.intelligent.hotKeyThreshold).toBe(2.5);
    });

    it('should skip unparseable numbers', () => {
      vi.stubEnv(CacheEngineEnvVars.MAX_RELATED_DEPTH, 'deep');

      expect(loadConfigFromEnv().maxRelatedDepth).toBeUndefined();
      expect(createConfig(undefined, 'production').maxRelatedDepth).toBe(3);
    });

    it('should let programmatic overrides win over the environment', () => {
      vi.stubEnv(CacheEngineEnvVars.NAMESPACE, 'env-cache');

      expect(createConfig({ namespace: 'explicit' }, 'production').namespace).toBe('explicit');
    });
  });

  // =========================================================================
  // Validation and Merging
  // =========================================================================

  describe('validation', () => {
    it('should reject a minimum TTL above the maximum', () => {
      expect(() => createTestConfig({ intelligent: { minTtlMs: 10_000, maxTtlMs: 5_000 } })).toThrow(
        CacheEngineConfigValidationError
      );
    });

    it('should report every failing path', () => {
      let caught: unknown;
      try {
        validateConfig({ maxRelatedDepth: 0, redis: { port: 70_000 } });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CacheEngineConfigValidationError);
      expect(caught).toMatchObject({
        code: CacheErrorCodes.CONFIG_ERROR,
        context: {
          details: {
            errors: [
              { path: 'maxRelatedDepth', message: expect.any(String) },
              { path: 'redis.port', message: expect.any(String) },
            ],
          },
        },
      });
    });

    it('should deep merge later configurations over earlier ones', () => {
      const config = mergeConfigs(
        { circuitBreaker: { failureThreshold: 3, timeoutMs: 1000 } },
        { circuitBreaker: { timeoutMs: 2000 } }
      );

      expect(config.circuitBreaker).toEqual({
        enabled: true,
        failureThreshold: 3,
        timeoutMs: 2000,
        healthCheckIntervalMs: 30_000,
        metricRetentionMs: 3_600_000,
      });
    });
  });

  // =========================================================================
  // Singleton
  // =========================================================================

  describe('singleton', () => {
    it('should cache the configuration until reset', () => {
      const first = getConfig();

      expect(getConfig()).toBe(first);
      resetConfig();
      expect(getConfig()).not.toBe(first);
    });

    it('should keep the first initialized configuration', () => {
      const first = initConfig({ namespace: 'first' });
      const second = initConfig({ namespace: 'second' });

      expect(second).toBe(first);
      expect(second.namespace).toBe('first');
    });
  });
});
