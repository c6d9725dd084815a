import { config as loadDotenv } from 'dotenv';
import type { LevelWithSilent } from 'pino';
import { ValidationError } from '../errors.js';
import { plannerEnvSchema } from '../../schemas/run-options.schema.js';
import { parseRunOptions, type RunOptions } from '../../plan/run-options.js';

export interface ServiceCredentials {
  username: string;
  password: string;
}

export interface PlannerConfig {
  serviceUrl: string;
  credentials: ServiceCredentials | null;
  runOptions: RunOptions;
  logLevel: LevelWithSilent;
}

export interface LoadPlannerConfigOptions {
  /** dotenv file read before validation. Variables already set win. */
  envFile?: string;
}

let cachedConfig: PlannerConfig | null | undefined;

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Validate the analysis service environment variables.
 * Returns null when the service is not configured at all.
 * Throws ValidationError if partially configured or a value is malformed.
 */
export function validatePlannerConfig(): PlannerConfig | null {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const serviceUrl = readEnv('ANALYSIS_SERVICE_URL');
  const username = readEnv('ANALYSIS_SERVICE_USERNAME');
  const password = readEnv('ANALYSIS_SERVICE_PASSWORD');

  if (!serviceUrl && !username && !password) {
    cachedConfig = null;
    return null;
  }

  const missing: string[] = [];
  if (!serviceUrl) missing.push('ANALYSIS_SERVICE_URL');
  if (username && !password) missing.push('ANALYSIS_SERVICE_PASSWORD');
  if (password && !username) missing.push('ANALYSIS_SERVICE_USERNAME');

  if (missing.length > 0) {
    throw new ValidationError(
      `Analysis service is partially configured. Missing environment variables: ${missing.join(', ')}`,
      { missing }
    );
  }

  const parsed = plannerEnvSchema.safeParse({
    ANALYSIS_SERVICE_URL: serviceUrl,
    ANALYSIS_SERVICE_USERNAME: username,
    ANALYSIS_SERVICE_PASSWORD: password,
    PLAN_TIMEOUT_MINUTES: readEnv('PLAN_TIMEOUT_MINUTES'),
    PLAN_POLL_INTERVAL_SECONDS: readEnv('PLAN_POLL_INTERVAL_SECONDS'),
    PLAN_MAX_RETRY: readEnv('PLAN_MAX_RETRY'),
    PLAN_ABORT_TIMEOUT_MINUTES: readEnv('PLAN_ABORT_TIMEOUT_MINUTES'),
    PLAN_ABORT_POLL_INTERVAL_SECONDS: readEnv('PLAN_ABORT_POLL_INTERVAL_SECONDS'),
    LOG_LEVEL: readEnv('LOG_LEVEL'),
  });

  if (!parsed.success) {
    throw new ValidationError('Invalid analysis service configuration', {
      issues: parsed.error.flatten().fieldErrors,
    });
  }

  const env = parsed.data;
  const config: PlannerConfig = {
    serviceUrl: env.ANALYSIS_SERVICE_URL,
    credentials:
      env.ANALYSIS_SERVICE_USERNAME && env.ANALYSIS_SERVICE_PASSWORD
        ? { username: env.ANALYSIS_SERVICE_USERNAME, password: env.ANALYSIS_SERVICE_PASSWORD }
        : null,
    runOptions: parseRunOptions({
      timeoutMinutes: env.PLAN_TIMEOUT_MINUTES,
      pollIntervalSeconds: env.PLAN_POLL_INTERVAL_SECONDS,
      maxRetry: env.PLAN_MAX_RETRY,
      abortTimeoutMinutes: env.PLAN_ABORT_TIMEOUT_MINUTES,
      abortPollIntervalSeconds: env.PLAN_ABORT_POLL_INTERVAL_SECONDS,
    }),
    logLevel: env.LOG_LEVEL,
  };

  cachedConfig = config;
  return config;
}

/**
 * Load an optional dotenv file, then validate. The result is cached like
 * validatePlannerConfig().
 */
export function loadPlannerConfig(options: LoadPlannerConfigOptions = {}): PlannerConfig | null {
  if (options.envFile) {
    const result = loadDotenv({ path: options.envFile });
    if (result.error) {
      throw new ValidationError(`Unable to read environment file ${options.envFile}`, {
        cause: result.error.message,
      });
    }
  }
  return validatePlannerConfig();
}

/**
 * Get the validated config or throw if the service is not configured.
 */
export function getPlannerConfig(): PlannerConfig {
  const config = validatePlannerConfig();
  if (!config) {
    throw new ValidationError(
      'Analysis service is not configured. Set ANALYSIS_SERVICE_URL (and optionally ANALYSIS_SERVICE_USERNAME and ANALYSIS_SERVICE_PASSWORD).'
    );
  }
  return config;
}

/**
 * Check whether the analysis service is configured (without throwing).
 */
export function isPlannerConfigured(): boolean {
  try {
    return validatePlannerConfig() !== null;
  } catch {
    return false;
  }
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetPlannerConfigCache(): void {
  cachedConfig = undefined;
}
