import { compareTrades } from '../core';
import type { CanonicalTrade, Candle, DataConflict } from '../core';
import { alignToInterval } from './intervals';
import type { IntervalSpec } from './intervals';

export interface BuildOptions {
  tokenAddress?: string;
  /** Window bounds, seconds. Trades outside are ignored. */
  from?: number;
  to?: number;
  /** Last known close before `from`; lets the series start at the window's first bucket. */
  seedClose?: number | null;
  conflicts?: DataConflict[];
}

/**
 * Buckets trades into epoch-aligned candles with no gaps. A bucket without a priced
 * trade repeats the previous close as open/high/low/close ("flat-fill") and keeps
 * whatever unpriced volume it had. Without a seed close the series starts at the
 * first bucket holding a priced trade.
 */
export function buildCandles(trades: CanonicalTrade[], interval: IntervalSpec, options: BuildOptions = {}): Candle[] {
  const { seconds, label } = interval;
  const { from, to } = options;
  const seed = options.seedClose ?? null;

  const ordered = trades
    .filter(t => (from === undefined || t.timestamp >= from) && (to === undefined || t.timestamp <= to))
    .sort(compareTrades);
  const tokenAddress = options.tokenAddress ?? ordered[0]?.tokenAddress ?? '';

  const buckets = new Map<number, CanonicalTrade[]>();
  for (const trade of ordered) {
    const bucket = alignToInterval(trade.timestamp, seconds);
    const list = buckets.get(bucket);
    if (list) {
      list.push(trade);
    } else {
      buckets.set(bucket, [trade]);
    }
  }

  const firstPriced = ordered.find(t => t.unitPrice !== null);
  let start: number;
  if (from !== undefined && seed !== null) {
    start = alignToInterval(from, seconds);
  } else if (firstPriced) {
    start = alignToInterval(firstPriced.timestamp, seconds);
  } else {
    return [];
  }

  const lastTrade = ordered[ordered.length - 1];
  let end = lastTrade ? alignToInterval(lastTrade.timestamp, seconds) : start;
  if (to !== undefined) end = Math.max(end, alignToInterval(to, seconds));

  const candles: Candle[] = [];
  let prevClose = seed;
  for (let bucketStart = start; bucketStart <= end; bucketStart += seconds) {
    const bucketTrades = buckets.get(bucketStart) ?? [];
    const volume = bucketTrades.reduce((sum, t) => sum + t.baseAmount, 0);
    const prices: number[] = [];
    for (const t of bucketTrades) {
      if (t.unitPrice !== null) prices.push(t.unitPrice);
    }

    const first = prices[0];
    const last = prices[prices.length - 1];
    if (first !== undefined && last !== undefined) {
      candles.push({
        tokenAddress,
        interval: label,
        bucketStart,
        open: first,
        high: Math.max(...prices),
        low: Math.min(...prices),
        close: last,
        volume,
        tradeCount: bucketTrades.length,
        flatFilled: false,
        conflicts: [],
      });
      prevClose = last;
    } else if (prevClose !== null) {
      candles.push({
        tokenAddress,
        interval: label,
        bucketStart,
        open: prevClose,
        high: prevClose,
        low: prevClose,
        close: prevClose,
        volume,
        tradeCount: bucketTrades.length,
        flatFilled: true,
        conflicts: [],
      });
    }
  }

  if (options.conflicts && options.conflicts.length > 0) {
    const byBucket = new Map(candles.map(c => [c.bucketStart, c]));
    for (const conflict of options.conflicts) {
      if (conflict.tokenAddress !== tokenAddress) continue;
      byBucket.get(alignToInterval(conflict.timestamp, seconds))?.conflicts.push(conflict);
    }
  }

  return candles;
}

/** Describes every broken OHLC or contiguity invariant; empty when the series is sound. */
export function validateCandleSeries(candles: Candle[], seconds: number): string[] {
  const problems: string[] = [];
  candles.forEach((c, i) => {
    if (c.bucketStart % seconds !== 0) problems.push(`${c.bucketStart}: not aligned to ${seconds}s`);
    if (c.low > Math.min(c.open, c.close)) problems.push(`${c.bucketStart}: low above open/close`);
    if (c.high < Math.max(c.open, c.close)) problems.push(`${c.bucketStart}: high below open/close`);
    if (c.volume < 0) problems.push(`${c.bucketStart}: negative volume`);
    const prev = candles[i - 1];
    if (prev && c.bucketStart - prev.bucketStart !== seconds) {
      problems.push(`${prev.bucketStart} → ${c.bucketStart}: gap`);
    }
  });
  return problems;
}
