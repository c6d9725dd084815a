import { describe, it, expect } from 'vitest';
import { PlanPhase, assertTransition, canTransition, phaseForMarketState } from '../plan/lifecycle.js';
import { PlanStateError } from '../lib/errors.js';
import { MarketState } from '../types/enums.js';

describe('plan lifecycle', () => {
  it('follows the run path', () => {
    expect(canTransition(PlanPhase.NEW, PlanPhase.SCENARIO_CREATED)).toBe(true);
    expect(canTransition(PlanPhase.SCENARIO_CREATED, PlanPhase.MARKET_CREATED)).toBe(true);
    expect(canTransition(PlanPhase.MARKET_CREATED, PlanPhase.RUNNING)).toBe(true);
    expect(canTransition(PlanPhase.RUNNING, PlanPhase.SUCCEEDED)).toBe(true);
    expect(canTransition(PlanPhase.RUNNING, PlanPhase.ABORTING)).toBe(true);
    expect(canTransition(PlanPhase.ABORTING, PlanPhase.STOPPED)).toBe(true);
  });

  it('allows FAILED from any phase', () => {
    for (const phase of Object.values(PlanPhase)) {
      expect(canTransition(phase, PlanPhase.FAILED)).toBe(true);
    }
  });

  it('allows a fresh attempt from settled and in-flight phases', () => {
    expect(canTransition(PlanPhase.FAILED, PlanPhase.NEW)).toBe(true);
    expect(canTransition(PlanPhase.SUCCEEDED, PlanPhase.NEW)).toBe(true);
    expect(canTransition(PlanPhase.DELETED, PlanPhase.NEW)).toBe(true);
    expect(canTransition(PlanPhase.RUNNING, PlanPhase.NEW)).toBe(true);
    expect(canTransition(PlanPhase.ABORTING, PlanPhase.NEW)).toBe(true);
    expect(canTransition(PlanPhase.MARKET_CREATED, PlanPhase.NEW)).toBe(false);
  });

  it('rejects skipping phases', () => {
    expect(canTransition(PlanPhase.NEW, PlanPhase.RUNNING)).toBe(false);
    expect(canTransition(PlanPhase.SCENARIO_CREATED, PlanPhase.DELETED)).toBe(false);
    expect(canTransition(PlanPhase.DELETED, PlanPhase.RUNNING)).toBe(false);
  });

  it('throws PlanStateError on illegal transitions', () => {
    expect(() => assertTransition(PlanPhase.NEW, PlanPhase.SUCCEEDED)).toThrow(PlanStateError);
    expect(() => assertTransition(PlanPhase.NEW, PlanPhase.SUCCEEDED)).toThrow(
      'Illegal plan transition from NEW to SUCCEEDED',
    );
    expect(() => assertTransition(PlanPhase.RUNNING, PlanPhase.RUNNING)).not.toThrow();
  });

  it('maps terminal market states to phases', () => {
    expect(phaseForMarketState(MarketState.SUCCEEDED)).toBe(PlanPhase.SUCCEEDED);
    expect(phaseForMarketState(MarketState.USER_STOPPED)).toBe(PlanPhase.STOPPED);
    expect(phaseForMarketState(MarketState.RUNNING)).toBeNull();
  });
});
