import { z } from 'zod';

// Plan run options. Durations are minutes, intervals are seconds.
export const runOptionsSchema = z.object({
  /** 0 disables the run timeout. */
  timeoutMinutes: z.number().min(0).default(0),
  /** 0 selects the adaptive polling interval. */
  pollIntervalSeconds: z.number().min(0).default(0),
  maxRetry: z.number().int().min(1).default(3),
  abortTimeoutMinutes: z.number().min(0).default(5),
  abortPollIntervalSeconds: z.number().min(0).default(5),
  ignoreConstraints: z.boolean().default(false),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;
export type RunOptionsInput = z.input<typeof runOptionsSchema>;

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

// Environment values arrive as strings
const minutesEnv = z.coerce.number().min(0);
const secondsEnv = z.coerce.number().min(0);

export const plannerEnvSchema = z.object({
  ANALYSIS_SERVICE_URL: z.string().url(),
  ANALYSIS_SERVICE_USERNAME: z.string().min(1).optional(),
  ANALYSIS_SERVICE_PASSWORD: z.string().min(1).optional(),
  PLAN_TIMEOUT_MINUTES: minutesEnv.optional(),
  PLAN_POLL_INTERVAL_SECONDS: secondsEnv.optional(),
  PLAN_MAX_RETRY: z.coerce.number().int().min(1).optional(),
  PLAN_ABORT_TIMEOUT_MINUTES: minutesEnv.optional(),
  PLAN_ABORT_POLL_INTERVAL_SECONDS: secondsEnv.optional(),
  LOG_LEVEL: logLevelSchema.default('info'),
});

export type PlannerEnv = z.infer<typeof plannerEnvSchema>;
