import { TERMINAL_MARKET_STATES, type MarketState } from '../types/enums.js';

const ADAPTIVE_WINDOW_SECONDS = 600;
const ADAPTIVE_CEILING_SECONDS = 60;
const MIN_INTERVAL_SECONDS = 5;

function roundUpTo(value: number, multiple: number): number {
  return Math.ceil(value / multiple) * multiple;
}

/**
 * Poll interval for a plan that has been running for `elapsedSeconds`:
 * a twelfth of the elapsed time rounded up to 5 s steps, then a flat
 * minute after ten minutes.
 */
export function adaptiveIntervalSeconds(elapsedSeconds: number): number {
  if (elapsedSeconds >= ADAPTIVE_WINDOW_SECONDS) {
    return ADAPTIVE_CEILING_SECONDS;
  }
  const interval = roundUpTo(Math.ceil(elapsedSeconds / 12), MIN_INTERVAL_SECONDS);
  // 5 s floor: at elapsed 0 the formula alone would poll again at once.
  return Math.max(MIN_INTERVAL_SECONDS, interval);
}

export function pollIntervalMs(pollIntervalSeconds: number, elapsedMs: number): number {
  const seconds = pollIntervalSeconds > 0 ? pollIntervalSeconds : adaptiveIntervalSeconds(elapsedMs / 1000);
  return seconds * 1000;
}

export function isTerminalState(state: MarketState | null): state is MarketState {
  return state !== null && TERMINAL_MARKET_STATES.includes(state);
}
