import { PlanStateError } from '../lib/errors.js';
import { MarketState } from '../types/enums.js';

export const PlanPhase = {
  NEW: 'NEW',
  SCENARIO_CREATED: 'SCENARIO_CREATED',
  MARKET_CREATED: 'MARKET_CREATED',
  RUNNING: 'RUNNING',
  ABORTING: 'ABORTING',
  SUCCEEDED: 'SUCCEEDED',
  STOPPED: 'STOPPED',
  FAILED: 'FAILED',
  DELETED: 'DELETED',
} as const;

export type PlanPhase = (typeof PlanPhase)[keyof typeof PlanPhase];

/**
 * Allowed transitions. FAILED is reachable from every phase. A plan left
 * RUNNING by runAsync or ABORTING by an unfinished stop may start over.
 */
const TRANSITIONS: Record<PlanPhase, readonly PlanPhase[]> = {
  NEW: ['SCENARIO_CREATED'],
  SCENARIO_CREATED: ['MARKET_CREATED'],
  MARKET_CREATED: ['RUNNING', 'DELETED'],
  RUNNING: ['SUCCEEDED', 'STOPPED', 'ABORTING', 'DELETED', 'NEW'],
  ABORTING: ['STOPPED', 'SUCCEEDED', 'DELETED', 'NEW'],
  SUCCEEDED: ['NEW', 'DELETED'],
  STOPPED: ['NEW', 'DELETED'],
  FAILED: ['NEW', 'DELETED'],
  DELETED: ['NEW'],
};

export function canTransition(from: PlanPhase, to: PlanPhase): boolean {
  return from === to || to === PlanPhase.FAILED || TRANSITIONS[from].includes(to);
}

export function assertTransition(from: PlanPhase, to: PlanPhase): void {
  if (!canTransition(from, to)) {
    throw new PlanStateError(from, to);
  }
}

/** Phase a plan settles in when the market reaches `state`. */
export function phaseForMarketState(state: MarketState): PlanPhase | null {
  switch (state) {
    case MarketState.SUCCEEDED:
      return PlanPhase.SUCCEEDED;
    case MarketState.STOPPED:
    case MarketState.USER_STOPPED:
      return PlanPhase.STOPPED;
    default:
      return null;
  }
}
