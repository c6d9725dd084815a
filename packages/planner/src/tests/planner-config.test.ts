import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import {
  getPlannerConfig,
  isPlannerConfigured,
  loadPlannerConfig,
  resetPlannerConfigCache,
  validatePlannerConfig,
} from '../lib/config/planner.js';
import { ValidationError } from '../lib/errors.js';
import { DEFAULT_RUN_OPTIONS } from '../plan/run-options.js';

const ENV_FILE = fileURLToPath(new URL('./fixtures/planner.env', import.meta.url));

const PLANNER_ENV = [
  'ANALYSIS_SERVICE_URL',
  'ANALYSIS_SERVICE_USERNAME',
  'ANALYSIS_SERVICE_PASSWORD',
  'PLAN_TIMEOUT_MINUTES',
  'PLAN_POLL_INTERVAL_SECONDS',
  'PLAN_MAX_RETRY',
  'PLAN_ABORT_TIMEOUT_MINUTES',
  'PLAN_ABORT_POLL_INTERVAL_SECONDS',
  'LOG_LEVEL',
];

function clearPlannerEnv() {
  for (const name of PLANNER_ENV) {
    delete process.env[name];
  }
}

describe('Planner Config Validation', () => {
  beforeEach(() => {
    clearPlannerEnv();
    resetPlannerConfigCache();
  });

  afterEach(() => {
    clearPlannerEnv();
    resetPlannerConfigCache();
  });

  describe('validatePlannerConfig', () => {
    it('returns null when no env vars are set', () => {
      expect(validatePlannerConfig()).toBeNull();
    });

    it('treats blank values as unset', () => {
      process.env.ANALYSIS_SERVICE_URL = '   ';
      expect(validatePlannerConfig()).toBeNull();
    });

    it('returns defaults when only the URL is set', () => {
      process.env.ANALYSIS_SERVICE_URL = 'http://analysis.test/api/v2/';

      expect(validatePlannerConfig()).toEqual({
        serviceUrl: 'http://analysis.test/api/v2/',
        credentials: null,
        runOptions: DEFAULT_RUN_OPTIONS,
        logLevel: 'info',
      });
    });

    it('reads credentials and run options', () => {
      process.env.ANALYSIS_SERVICE_URL = 'http://analysis.test/api/v2/';
      process.env.ANALYSIS_SERVICE_USERNAME = 'tester';
      process.env.ANALYSIS_SERVICE_PASSWORD = 'test-secret';
      process.env.PLAN_TIMEOUT_MINUTES = '30';
      process.env.PLAN_MAX_RETRY = '5';

      const config = validatePlannerConfig();

      expect(config?.credentials).toEqual({ username: 'tester', password: 'test-secret' });
      expect(config?.runOptions).toEqual({ ...DEFAULT_RUN_OPTIONS, timeoutMinutes: 30, maxRetry: 5 });
    });

    it('throws when the username has no password', () => {
      process.env.ANALYSIS_SERVICE_URL = 'http://analysis.test/api/v2/';
      process.env.ANALYSIS_SERVICE_USERNAME = 'tester';

      expect(() => validatePlannerConfig()).toThrow('partially configured');
      expect(() => validatePlannerConfig()).toThrow('ANALYSIS_SERVICE_PASSWORD');
    });

    it('throws when credentials are set without a URL', () => {
      process.env.ANALYSIS_SERVICE_USERNAME = 'tester';
      process.env.ANALYSIS_SERVICE_PASSWORD = 'test-secret';

      expect(() => validatePlannerConfig()).toThrow(
        'Analysis service is partially configured. Missing environment variables: ANALYSIS_SERVICE_URL',
      );
    });

    it('rejects a malformed URL', () => {
      process.env.ANALYSIS_SERVICE_URL = 'not a url';
      expect(() => validatePlannerConfig()).toThrow('Invalid analysis service configuration');
    });

    it('rejects out of range run options', () => {
      process.env.ANALYSIS_SERVICE_URL = 'http://analysis.test/api/v2/';
      process.env.PLAN_MAX_RETRY = '0';
      expect(() => validatePlannerConfig()).toThrow(ValidationError);
    });

    it('rejects an unknown log level', () => {
      process.env.ANALYSIS_SERVICE_URL = 'http://analysis.test/api/v2/';
      process.env.LOG_LEVEL = 'loud';
      expect(() => validatePlannerConfig()).toThrow('Invalid analysis service configuration');
    });

    it('caches the result until reset', () => {
      process.env.ANALYSIS_SERVICE_URL = 'http://analysis.test/api/v2/';
      const first = validatePlannerConfig();

      process.env.ANALYSIS_SERVICE_URL = 'http://other.test/';
      expect(validatePlannerConfig()).toBe(first);

      resetPlannerConfigCache();
      expect(validatePlannerConfig()?.serviceUrl).toBe('http://other.test/');
    });
  });

  describe('getPlannerConfig', () => {
    it('throws when the service is not configured', () => {
      expect(() => getPlannerConfig()).toThrow('Analysis service is not configured');
    });

    it('returns the config when configured', () => {
      process.env.ANALYSIS_SERVICE_URL = 'http://analysis.test/api/v2/';
      expect(getPlannerConfig().serviceUrl).toBe('http://analysis.test/api/v2/');
    });
  });

  describe('isPlannerConfigured', () => {
    it('returns false when not configured', () => {
      expect(isPlannerConfigured()).toBe(false);
    });

    it('returns false when partially configured', () => {
      process.env.ANALYSIS_SERVICE_PASSWORD = 'test-secret';
      expect(isPlannerConfigured()).toBe(false);
    });

    it('returns true when configured', () => {
      process.env.ANALYSIS_SERVICE_URL = 'http://analysis.test/api/v2/';
      expect(isPlannerConfigured()).toBe(true);
    });
  });

  describe('loadPlannerConfig', () => {
    it('reads an environment file', () => {
      const config = loadPlannerConfig({ envFile: ENV_FILE });

      expect(config).toEqual({
        serviceUrl: 'http://analysis.test/api/v2/',
        credentials: { username: 'tester', password: 'test-secret' },
        runOptions: { ...DEFAULT_RUN_OPTIONS, pollIntervalSeconds: 15 },
        logLevel: 'debug',
      });
    });

    it('keeps variables that are already set', () => {
      process.env.LOG_LEVEL = 'warn';
      expect(loadPlannerConfig({ envFile: ENV_FILE })?.logLevel).toBe('warn');
    });

    it('throws when the environment file cannot be read', () => {
      expect(() => loadPlannerConfig({ envFile: '/nonexistent/planner.env' })).toThrow(
        'Unable to read environment file /nonexistent/planner.env',
      );
    });
  });
});
