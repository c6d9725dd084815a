import type { SettingTag } from '../types/settings.js';
import type { MarketState } from '../types/enums.js';

export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

export type CompilationFailure =
  | 'missing-definition'
  | 'unresolved-substitution'
  | 'unresolved-translation'
  | 'invalid-group'
  | 'no-version'
  | 'unsupported-version';

export interface CompilationErrorDetails {
  tag?: SettingTag;
  field?: string;
  version?: string;
}

/** Settings could not be rendered for the target protocol version. Never retried. */
export class CompilationError extends Error {
  public reason: CompilationFailure;
  public tag?: SettingTag;
  public field?: string;
  public version?: string;

  constructor(reason: CompilationFailure, message: string, details: CompilationErrorDetails = {}) {
    super(message);
    this.name = 'CompilationError';
    this.reason = reason;
    this.tag = details.tag;
    this.field = details.field;
    this.version = details.version;
  }
}

export class UnsupportedVersionError extends CompilationError {
  constructor(version: string) {
    super('unsupported-version', `No protocol definitions for version ${version}`, { version });
    this.name = 'UnsupportedVersionError';
  }
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export class TransportError extends Error {
  public statusCode: number;

  constructor(statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.statusCode = statusCode;
  }
}

/** 4xx responses. */
export class ClientTransportError extends TransportError {
  constructor(statusCode: number, message: string, options?: { cause?: unknown }) {
    super(statusCode, message, options);
    this.name = 'ClientTransportError';
  }
}

/** 5xx responses. */
export class ServerTransportError extends TransportError {
  constructor(statusCode: number, message: string, options?: { cause?: unknown }) {
    super(statusCode, message, options);
    this.name = 'ServerTransportError';
  }
}

export class BadGatewayError extends ServerTransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(502, message, options);
    this.name = 'BadGatewayError';
  }
}

export function transportErrorFor(statusCode: number, message: string): TransportError {
  if (statusCode === 502) return new BadGatewayError(message);
  if (statusCode >= 500) return new ServerTransportError(statusCode, message);
  if (statusCode >= 400) return new ClientTransportError(statusCode, message);
  return new TransportError(statusCode, message);
}

// ---------------------------------------------------------------------------
// Plan execution
// ---------------------------------------------------------------------------

export class PlanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlanError';
  }
}

/** The market never left CREATED after submission. */
export class PlanRunFailure extends PlanError {
  public marketId: string | null;
  public scenarioId: string | null;

  constructor(message: string, marketId: string | null, scenarioId: string | null) {
    super(message);
    this.name = 'PlanRunFailure';
    this.marketId = marketId;
    this.scenarioId = scenarioId;
  }
}

export class PlanExecutionExceeded extends PlanError {
  public lastState: MarketState | null;

  constructor(lastState: MarketState | null) {
    super(`Plan execution time exceeded maximum allowed, market state: ${lastState ?? 'unknown'}`);
    this.name = 'PlanExecutionExceeded';
    this.lastState = lastState;
  }
}

/** The service answered a stop request with HTTP 500. */
export class PlanStopError extends PlanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlanStopError';
  }
}

export class PlanStopTimeoutError extends PlanError {
  public abortTimeoutMinutes: number;

  constructor(abortTimeoutMinutes: number) {
    super(`Market did not stop within ${abortTimeoutMinutes} minute(s)`);
    this.name = 'PlanStopTimeoutError';
    this.abortTimeoutMinutes = abortTimeoutMinutes;
  }
}

export class PlanDeprovisionError extends PlanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlanDeprovisionError';
  }
}

export class PlanRetryExhaustedError extends PlanError {
  public attempts: number;

  constructor(attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
    super(`Retry limit reached after ${attempts} attempt(s). Last error: ${detail}`, { cause });
    this.name = 'PlanRetryExhaustedError';
    this.attempts = attempts;
  }
}

/** Illegal lifecycle transition. A programming error, never retried. */
export class PlanStateError extends Error {
  public currentPhase: string;
  public attemptedPhase: string;

  constructor(currentPhase: string, attemptedPhase: string) {
    super(`Illegal plan transition from ${currentPhase} to ${attemptedPhase}`);
    this.name = 'PlanStateError';
    this.currentPhase = currentPhase;
    this.attemptedPhase = attemptedPhase;
  }
}

// ---------------------------------------------------------------------------
// Markets
// ---------------------------------------------------------------------------

export class MarketError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MarketError';
  }
}

export class InvalidMarketError extends MarketError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMarketError';
  }
}

/**
 * Errors the run envelope recovers from by starting a fresh attempt:
 * server-side transport failures and plan-domain errors.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof ServerTransportError || error instanceof PlanError;
}
