import { format, isValid, parseISO } from 'date-fns';

// Largest epoch second date-fns can represent before year 10000; anything
// larger is read as milliseconds.
const MAX_EPOCH_SECONDS = 253_402_300_799;

/** Normalise an epoch given in seconds or milliseconds to milliseconds. */
export function epochToMillis(value: number): number {
  return Math.abs(value) > MAX_EPOCH_SECONDS ? value : value * 1000;
}

/** `YYYY-MM-DDTHH:MM:SSZ` in UTC. */
export function epochToTimestamp(value: number): string {
  const date = new Date(epochToMillis(value));
  if (!isValid(date)) {
    throw new RangeError(`Epoch value ${value} is out of range`);
  }
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/** Default scenario name, from local time. */
export function generateScenarioName(date: Date): string {
  return `CUSTOM_${format(date, 'yyyyMMdd_HHmmss')}`;
}

export function generateMarketName(username: string, nowMs: number): string {
  return `CUSTOM_${username}_${Math.floor(nowMs / 1000)}`;
}

/**
 * Parse a server timestamp such as `2024-03-01T10:15:00-0500`.
 * Returns null for absent or unparseable values.
 */
export function parseServerTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : null;
}
