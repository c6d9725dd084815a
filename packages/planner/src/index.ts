export * from './types/index.js';
export * from './lib/errors.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './lib/logger.js';
export { systemClock, type Clock } from './lib/clock.js';
export { compareVersions, isAtLeast, parseVersion } from './lib/version.js';
export { epochToTimestamp, generateScenarioName } from './lib/dates.js';
export { canonicalJson } from './lib/json.js';
export {
  getPlannerConfig,
  isPlannerConfigured,
  loadPlannerConfig,
  resetPlannerConfigCache,
  validatePlannerConfig,
  type PlannerConfig,
  type ServiceCredentials,
} from './lib/config/planner.js';
export * from './engine/index.js';
export {
  PlanSpec,
  type ChangeEntityOptions,
  type CloudOsMapping,
  type CloudOsProfileOptions,
  type PlanSpecOptions,
} from './plan/plan-spec.js';
export {
  Plan,
  DEFAULT_BASE_MARKET,
  SYSTEM_MARKETS,
  type DeleteOptions,
  type PlanHook,
  type PlanOptions,
} from './plan/plan.js';
export { PlanPhase, canTransition } from './plan/lifecycle.js';
export { adaptiveIntervalSeconds } from './plan/polling.js';
export { DEFAULT_RUN_OPTIONS, parseRunOptions, type RunOptions, type RunOptionsInput } from './plan/run-options.js';
export {
  AnalysisServiceClient,
  type AnalysisServiceClientOptions,
  type FetchLike,
} from './client/analysis-service.client.js';
