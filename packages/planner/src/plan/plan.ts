import type { Logger } from 'pino';
import { resolveProtocol, type ProtocolStrategy } from '../engine/protocol/protocol-strategy.js';
import { systemClock, type Clock } from '../lib/clock.js';
import { generateMarketName, parseServerTimestamp } from '../lib/dates.js';
import {
  BadGatewayError,
  InvalidMarketError,
  PlanDeprovisionError,
  PlanError,
  PlanExecutionExceeded,
  PlanRetryExhaustedError,
  PlanRunFailure,
  PlanStopError,
  PlanStopTimeoutError,
  TransportError,
  isRetryableError,
} from '../lib/errors.js';
import { silentLogger } from '../lib/logger.js';
import { MarketState } from '../types/enums.js';
import type { MarketStatsPeriod, RemoteMarket, RemoteService } from '../types/remote.js';
import { PlanPhase, assertTransition, phaseForMarketState } from './lifecycle.js';
import type { PlanSpec } from './plan-spec.js';
import { isTerminalState, pollIntervalMs } from './polling.js';

/** Markets owned by the analysis service itself. Never deleted. */
export const SYSTEM_MARKETS: readonly string[] = ['Market', 'Market_Default'];

export const DEFAULT_BASE_MARKET = 'Market';

export type PlanHook = (plan: Plan) => void | Promise<void>;

export interface PlanOptions {
  /** Market the plan market is derived from. */
  baseMarket?: string;
  /** Plan market name. Defaults to `CUSTOM_<username>_<epoch seconds>`. */
  marketName?: string;
  clock?: Clock;
  logger?: Logger;
  /** Delete the market and scenario of a failed attempt before retrying. */
  deprovisionOnRetry?: boolean;
}

export interface DeleteOptions {
  keepScenario?: boolean;
}

interface RemoteIds {
  scenarioId: string | null;
  marketId: string | null;
}

/**
 * Runtime handle on one what-if plan: creates the scenario and market,
 * supervises execution and tears the remote resources down.
 */
export class Plan {
  readonly spec: PlanSpec;
  readonly protocol: ProtocolStrategy;
  readonly baseMarket: string;

  private readonly remote: RemoteService;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly deprovisionOnRetry: boolean;
  private readonly requestedMarketName: string | null;

  private phaseValue: PlanPhase = PlanPhase.NEW;
  private initializedValue = false;
  private scenarioIdValue: string | null = null;
  private scenarioNameValue: string | null;
  private marketIdValue: string | null = null;
  private marketNameValue: string | null;
  private stateValue: MarketState | null = null;
  private snapshot: RemoteMarket | null = null;
  private startedAt: number | null = null;
  private scriptDurationValue: number | null = null;
  private serverDurationValue: number | null = null;
  private unplacedValue: boolean | null = null;
  private resultValue: MarketState | null = null;

  private preRunHook: PlanHook | null = null;
  private postRunHook: PlanHook | null = null;

  constructor(remote: RemoteService, spec: PlanSpec, options: PlanOptions = {}) {
    this.remote = remote;
    this.spec = spec;
    this.baseMarket = options.baseMarket ?? DEFAULT_BASE_MARKET;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child({ scenario: spec.name });
    this.deprovisionOnRetry = options.deprovisionOnRetry ?? false;
    this.requestedMarketName = options.marketName ?? null;
    this.marketNameValue = this.requestedMarketName;
    this.scenarioNameValue = spec.name;

    if (spec.version === null) {
      spec.version = remote.reportedProtocolVersion();
    }
    this.protocol = resolveProtocol(spec.version, this.logger);

    this.logger.debug(
      { version: spec.version, generation: this.protocol.generation },
      'plan initialized',
    );
  }

  get phase(): PlanPhase {
    return this.phaseValue;
  }

  /** Last market state read from the service. */
  get state(): MarketState | null {
    return this.stateValue;
  }

  get initialized(): boolean {
    return this.initializedValue;
  }

  get start(): Date | null {
    return this.startedAt === null ? null : new Date(this.startedAt);
  }

  /** Server duration when known, otherwise script duration, in seconds. */
  get duration(): number | null {
    return this.serverDurationValue ?? this.scriptDurationValue;
  }

  get serverDuration(): number | null {
    return this.serverDurationValue;
  }

  get scriptDuration(): number | null {
    return this.scriptDurationValue;
  }

  get scenarioId(): string | null {
    return this.scenarioIdValue;
  }

  get scenarioName(): string | null {
    return this.scenarioNameValue;
  }

  get marketId(): string | null {
    return this.marketIdValue;
  }

  get marketName(): string | null {
    return this.marketNameValue;
  }

  get unplacedEntities(): boolean | null {
    return this.unplacedValue;
  }

  /** Terminal market state of the last successful run. */
  get result(): MarketState | null {
    return this.resultValue;
  }

  registerPreRunHook(hook: PlanHook): void {
    this.preRunHook = hook;
  }

  registerPostRunHook(hook: PlanHook): void {
    this.postRunHook = hook;
  }

  isSystem(): boolean {
    return this.marketNameValue !== null && SYSTEM_MARKETS.includes(this.marketNameValue);
  }

  async getState(): Promise<MarketState | null> {
    const marketId = this.requireMarket();
    const market = await this.remote.getMarketState(marketId);
    this.snapshot = market;
    this.stateValue = market.state;
    this.initializedValue = true;
    return market.state;
  }

  async isState(state: MarketState): Promise<boolean> {
    return (await this.getState()) === state;
  }

  isComplete(): Promise<boolean> {
    return this.isState(MarketState.SUCCEEDED);
  }

  isReady(): Promise<boolean> {
    return this.isState(MarketState.READY_TO_START);
  }

  isStopped(): Promise<boolean> {
    return this.isState(MarketState.STOPPED);
  }

  isRunning(): Promise<boolean> {
    return this.isState(MarketState.RUNNING);
  }

  getStats(): Promise<MarketStatsPeriod[]> {
    return this.remote.getMarketStats(this.requireMarket());
  }

  /**
   * Create and supervise the plan until it reaches a terminal state,
   * retrying failed attempts with a fresh scenario and market.
   */
  async run(): Promise<MarketState> {
    if (this.preRunHook) {
      await this.preRunHook(this);
    }

    const { maxRetry } = this.spec.runOptions;
    let result: MarketState | null = null;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxRetry && result === null; attempt++) {
      try {
        result = await this.execute();
      } catch (error) {
        const abandoned: RemoteIds = { scenarioId: this.scenarioIdValue, marketId: this.marketIdValue };
        this.fail();

        if (!isRetryableError(error)) {
          throw error;
        }

        lastError = error;
        this.logger.warn({ err: error, attempt, maxRetry, ...abandoned }, 'plan attempt failed');

        if (attempt < maxRetry) {
          await this.release(abandoned);
        }
      }
    }

    if (result === null) {
      throw new PlanRetryExhaustedError(maxRetry, lastError);
    }

    this.resultValue = result;
    this.logger.info(
      { result, marketId: this.marketIdValue, duration: this.duration },
      'plan completed',
    );

    if (this.postRunHook) {
      await this.postRunHook(this);
    }
    return result;
  }

  /**
   * Create the scenario and market and return at once. Polling, timeout,
   * retry, hooks and durations do not apply.
   */
  async runAsync(): Promise<MarketState | null> {
    try {
      await this.create();
      return await this.getState();
    } catch (error) {
      this.fail();
      throw error;
    }
  }

  /**
   * Ask the service to stop the market and wait for it to settle. Transport
   * errors propagate unchanged.
   */
  async stop(): Promise<MarketState> {
    const marketId = this.requireMarket();

    if (this.phaseValue === PlanPhase.RUNNING) {
      this.transition(PlanPhase.ABORTING);
    }

    this.logger.info({ marketId }, 'stopping market');
    await this.remote.stopMarket(marketId);
    const state = await this.waitForStop();

    if (this.startedAt !== null) {
      this.scriptDurationValue = (this.clock.now() - this.startedAt) / 1000;
    }
    return state;
  }

  /** Remove the market and, unless `keepScenario`, the scenario. */
  async delete({ keepScenario = false }: DeleteOptions = {}): Promise<true> {
    if (this.isSystem()) {
      throw new InvalidMarketError('Attempting to delete system market');
    }
    if (!this.initializedValue || this.marketIdValue === null) {
      throw new InvalidMarketError('Market does not exist');
    }

    await this.deprovision({
      marketId: this.marketIdValue,
      scenarioId: keepScenario ? null : this.scenarioIdValue,
    });

    this.initializedValue = false;
    this.transition(PlanPhase.DELETED);
    this.logger.info({ marketId: this.marketIdValue, keepScenario }, 'plan deleted');
    return true;
  }

  private async execute(): Promise<MarketState> {
    await this.create();
    const result = await this.waitForPlan();
    this.syncServerData();

    if (this.startedAt !== null) {
      this.scriptDurationValue = (this.clock.now() - this.startedAt) / 1000;
    }
    return result;
  }

  private async create(): Promise<void> {
    this.beginAttempt();

    const dto = this.protocol.compile(this.spec.getSettings());
    const scenario = await this.protocol.createScenario(this.remote, dto, this.spec.name);
    this.scenarioIdValue = scenario.id;
    this.scenarioNameValue = scenario.displayName;
    this.transition(PlanPhase.SCENARIO_CREATED);
    this.logger.info({ scenarioId: scenario.id }, 'scenario created');

    const marketName =
      this.requestedMarketName ??
      generateMarketName(await this.remote.currentUsername(), this.clock.now());
    const market = await this.remote.createMarket(scenario.id, this.baseMarket, {
      marketName,
      ignoreConstraints: this.spec.getParams()?.ignoreConstraints,
    });
    this.marketIdValue = market.id;
    this.marketNameValue = market.displayName;
    this.initializedValue = true;
    this.transition(PlanPhase.MARKET_CREATED);
    this.logger.info({ marketId: market.id, marketName: market.displayName }, 'market created');

    this.startedAt = this.clock.now();
    this.transition(PlanPhase.RUNNING);
  }

  private async waitForPlan(): Promise<MarketState> {
    const { timeoutMinutes, pollIntervalSeconds } = this.spec.runOptions;
    const startedAt = this.startedAt ?? this.clock.now();
    let state = await this.getState();

    for (;;) {
      if (isTerminalState(state)) {
        this.settle(state);
        return state;
      }

      const elapsedMs = this.clock.now() - startedAt;
      if (timeoutMinutes > 0 && elapsedMs >= timeoutMinutes * 60_000) {
        await this.abortOnTimeout();
        throw new PlanExecutionExceeded(this.stateValue);
      }

      const waitMs = pollIntervalMs(pollIntervalSeconds, elapsedMs);
      this.logger.debug({ state, waitMs }, 'waiting for plan');
      await this.clock.sleep(waitMs);

      state = await this.getState();
      if (state === MarketState.CREATED) {
        throw new PlanRunFailure(
          `Plan failed to properly initialize. Market ID: [${this.marketIdValue}], Scenario ID: [${this.scenarioIdValue}]`,
          this.marketIdValue,
          this.scenarioIdValue,
        );
      }
    }
  }

  private async abortOnTimeout(): Promise<void> {
    this.logger.warn(
      { marketId: this.marketIdValue, timeoutMinutes: this.spec.runOptions.timeoutMinutes },
      'plan timeout reached, stopping market',
    );
    this.transition(PlanPhase.ABORTING);

    try {
      await this.stop();
    } catch (error) {
      if (error instanceof BadGatewayError) {
        this.logger.warn({ err: error }, 'bad gateway while stopping market, continuing');
      } else if (error instanceof TransportError && error.statusCode === 500) {
        throw new PlanStopError('Server error stopping plan', { cause: error });
      } else if (error instanceof TransportError) {
        throw new PlanError('Plan stop command error', { cause: error });
      } else if (error instanceof PlanStopTimeoutError) {
        this.logger.warn({ err: error }, 'market did not stop within the abort timeout');
      } else {
        throw error;
      }
    }
  }

  private async waitForStop(): Promise<MarketState> {
    const { abortTimeoutMinutes, abortPollIntervalSeconds } = this.spec.runOptions;
    const timeoutMs = abortTimeoutMinutes * 60_000;
    const pollMs = Math.min(abortPollIntervalSeconds * 1000, timeoutMs);
    const start = this.clock.now();

    for (;;) {
      const state = await this.getState();
      if (isTerminalState(state)) {
        this.settle(state);
        return state;
      }
      if (this.clock.now() - start >= timeoutMs) {
        throw new PlanStopTimeoutError(abortTimeoutMinutes);
      }
      await this.clock.sleep(pollMs);
    }
  }

  private syncServerData(): void {
    const market = this.snapshot;
    if (!market) return;

    this.marketNameValue = market.displayName;
    this.unplacedValue = market.unplacedEntities;

    const runDate = parseServerTimestamp(market.runDate);
    const completeDate = parseServerTimestamp(market.completeDate);
    this.serverDurationValue =
      runDate && completeDate ? (completeDate.getTime() - runDate.getTime()) / 1000 : null;
  }

  private async deprovision(ids: RemoteIds): Promise<void> {
    const removed: boolean[] = [];

    try {
      if (ids.marketId !== null) removed.push(await this.remote.deleteMarket(ids.marketId));
      if (ids.scenarioId !== null) removed.push(await this.remote.deleteScenario(ids.scenarioId));
    } catch (error) {
      throw new PlanDeprovisionError('Error removing the plan', { cause: error });
    }

    if (removed.includes(false)) {
      throw new PlanDeprovisionError(
        `Plan only partially removed. Market ID: [${ids.marketId}], Scenario ID: [${ids.scenarioId}]`,
      );
    }
  }

  /** Dispose of, or just report, the resources of a failed attempt. */
  private async release(ids: RemoteIds): Promise<void> {
    if (!this.deprovisionOnRetry) {
      this.logger.info(ids, 'abandoning resources of failed attempt');
      return;
    }

    try {
      await this.deprovision(ids);
      this.logger.info(ids, 'removed resources of failed attempt');
    } catch (error) {
      this.logger.warn({ err: error, ...ids }, 'unable to remove resources of failed attempt');
    }
  }

  private beginAttempt(): void {
    if (this.phaseValue !== PlanPhase.NEW) {
      this.transition(PlanPhase.NEW);
    }
    this.initializedValue = false;
    this.scenarioIdValue = null;
    this.scenarioNameValue = this.spec.name;
    this.marketIdValue = null;
    this.marketNameValue = this.requestedMarketName;
    this.stateValue = null;
    this.snapshot = null;
    this.startedAt = null;
    this.scriptDurationValue = null;
    this.serverDurationValue = null;
    this.unplacedValue = null;
  }

  // Only an in-flight plan follows the market; a settled one keeps its phase.
  private settle(state: MarketState): void {
    const phase = phaseForMarketState(state);
    if (phase !== null && (this.phaseValue === PlanPhase.RUNNING || this.phaseValue === PlanPhase.ABORTING)) {
      this.transition(phase);
    }
  }

  private fail(): void {
    this.transition(PlanPhase.FAILED);
  }

  private transition(to: PlanPhase): void {
    assertTransition(this.phaseValue, to);
    if (this.phaseValue !== to) {
      this.logger.debug({ from: this.phaseValue, to }, 'plan phase changed');
      this.phaseValue = to;
    }
  }

  private requireMarket(): string {
    if (this.marketIdValue === null) {
      throw new InvalidMarketError('Market does not exist');
    }
    return this.marketIdValue;
  }
}
