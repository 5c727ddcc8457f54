import { InvalidIntervalError } from '../core';

export interface IntervalSpec {
  label: string;
  seconds: number;
}

export const INTERVAL_SECONDS: Readonly<Record<string, number>> = {
  '1m': 60,
  '5m': 5 * 60,
  '15m': 15 * 60,
  '1h': 60 * 60,
  '4h': 4 * 60 * 60,
  '1d': 24 * 60 * 60,
};

export const DEFAULT_INTERVALS = Object.keys(INTERVAL_SECONDS);

/** Resolves a label within the configured set; anything else is InvalidIntervalError. */
export function parseInterval(label: string, supported: readonly string[] = DEFAULT_INTERVALS): IntervalSpec {
  const seconds = INTERVAL_SECONDS[label];
  if (seconds === undefined || !supported.includes(label)) {
    throw new InvalidIntervalError(label, supported.filter(s => s in INTERVAL_SECONDS));
  }
  return { label, seconds };
}

export function alignToInterval(ts: number, seconds: number): number {
  return ts - (ts % seconds);
}
