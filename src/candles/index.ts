export { buildCandles, validateCandleSeries } from './ohlcv-builder';
export type { BuildOptions } from './ohlcv-builder';
export { parseInterval, alignToInterval, INTERVAL_SECONDS, DEFAULT_INTERVALS } from './intervals';
export type { IntervalSpec } from './intervals';
