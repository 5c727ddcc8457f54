import crypto from 'crypto';
import type { SourceAggregator } from '../aggregator';
import { CacheLayer, cacheKeyId } from '../cache';
import type { CacheKey } from '../cache';
import { alignToInterval, buildCandles, parseInterval } from '../candles';
import { InvalidRequestError, mergeKey } from '../core';
import type { CanonicalTrade, EngineWarning, PnLEvent, Subject, TimeRange } from '../core';
import { LotMatcher, openAmount, unrealizedPnl } from '../pnl';
import type { TradeStore } from '../store';
import { createLogger } from '../utils';
import type { EngineConfig } from '../utils';
import type { CandleSeries, SyncResult, TradeHistory, UnrealizedSnapshot, WalletPnl } from './types';

const log = createLogger('engine');

export const MAX_CANDLES_PER_REQUEST = 10_000;
export const WALLET_LOOKBACK_SECONDS = 90 * 24 * 60 * 60;
export const DEFAULT_TRADE_LIMIT = 100;
export const MAX_TRADES_PER_REQUEST = 1_000;

export interface MarketEngineDeps {
  config: Pick<EngineConfig, 'cache' | 'supportedIntervals'>;
  aggregator: SourceAggregator;
  store: TradeStore;
  matcher?: LotMatcher;
  /** Unix seconds. */
  now?: () => number;
}

export function fingerprintTrades(trades: readonly CanonicalTrade[]): string {
  const hash = crypto.createHash('sha1');
  for (const t of trades) hash.update(`${mergeKey(t)}|${t.source}\n`);
  return hash.digest('hex');
}

function subjectKey(subject: Subject, range: TimeRange): string {
  return `${subject.kind}:${subject.address}:${range.from}:${range.to}`;
}

function validateWindow(window: TimeRange) {
  if (!Number.isInteger(window.from) || !Number.isInteger(window.to) || window.from < 0) {
    throw new InvalidRequestError('Window bounds must be non-negative integer seconds');
  }
  if (window.from > window.to) {
    throw new InvalidRequestError(`Window start ${window.from} is after its end ${window.to}`);
  }
}

function validateLimit(limit: number, max: number) {
  if (!Number.isInteger(limit) || limit < 1 || limit > max) {
    throw new InvalidRequestError(`Limit must be an integer between 1 and ${max}, got ${limit}`);
  }
}

function validateAddress(label: string, address: string) {
  if (!address || !/^[1-9A-HJ-NP-Za-km-z]{32,44}$/.test(address)) {
    throw new InvalidRequestError(`Invalid ${label} address "${address}"`);
  }
}

function lastPrice(trades: readonly CanonicalTrade[]): number | null {
  for (let i = trades.length - 1; i >= 0; i--) {
    const price = trades[i]?.unitPrice;
    if (price !== null && price !== undefined) return price;
  }
  return null;
}

/**
 * Public face of the engine: candles, wallet PnL and sync over the trade store,
 * with derived results memoized until new trades touch them.
 */
export class MarketEngine {
  private readonly candleCache: CacheLayer<CandleSeries>;
  private readonly pnlCache: CacheLayer<WalletPnl>;
  private readonly matcher: LotMatcher;
  private readonly syncsInFlight = new Map<string, Promise<SyncResult>>();
  private readonly now: () => number;

  constructor(private readonly deps: MarketEngineDeps) {
    const { capacity, ttlMs } = deps.config.cache;
    this.candleCache = new CacheLayer<CandleSeries>({ capacity, ttlMs });
    this.pnlCache = new CacheLayer<WalletPnl>({ capacity, ttlMs });
    this.matcher = deps.matcher ?? new LotMatcher();
    this.now = deps.now ?? (() => Math.floor(Date.now() / 1000));
  }

  /** `limit` keeps only the latest candles of the series. */
  async getCandles(token: string, interval: string, window: TimeRange, limit?: number): Promise<CandleSeries> {
    validateAddress('token', token);
    const step = parseInterval(interval, this.deps.config.supportedIntervals);
    validateWindow(window);
    if (limit !== undefined) validateLimit(limit, MAX_CANDLES_PER_REQUEST);
    const buckets = Math.floor(window.to / step.seconds) - Math.floor(window.from / step.seconds) + 1;
    if (buckets > MAX_CANDLES_PER_REQUEST) {
      throw new InvalidRequestError(`Window spans ${buckets} ${interval} candles (max ${MAX_CANDLES_PER_REQUEST})`);
    }

    // No flat-filled candles past the present
    const end = Math.max(window.from, Math.min(window.to, this.now()));
    const key: CacheKey = {
      kind: 'candles',
      token,
      interval,
      from: window.from,
      to: window.to,
      until: alignToInterval(end, step.seconds),
    };
    const series = await this.candleCache.getOrCompute(key, async () => {
      const { store } = this.deps;
      const warnings: EngineWarning[] = [];
      let trades = await store.load({ token, from: window.from, to: window.to });

      if (trades.length === 0) {
        const synced = await this.syncOnce({ kind: 'token', address: token }, window, key);
        warnings.push(...synced.warnings.filter(w => w.kind === 'ProviderFailed'));
        trades = await store.load({ token, from: window.from, to: window.to });
      }

      const earlier = window.from > 0 ? await store.load({ token, to: window.from - 1 }) : [];
      const conflicts = await store.loadConflicts({ token, from: window.from, to: window.to });
      warnings.push(...conflicts);

      const candles = buildCandles(trades, step, {
        tokenAddress: token,
        from: window.from,
        to: end,
        seedClose: lastPrice(earlier),
        conflicts,
      });

      log.debug('Candles built', { token, interval, trades: trades.length, candles: candles.length });
      return {
        payload: { tokenAddress: token, interval, window, candles, warnings },
        fingerprint: fingerprintTrades(trades),
      };
    });
    if (limit === undefined || series.candles.length <= limit) return series;
    return { ...series, candles: series.candles.slice(-limit) };
  }

  async getWalletPnl(wallet: string, token: string | '*' = '*', asOf?: number): Promise<WalletPnl> {
    validateAddress('wallet', wallet);
    if (token !== '*') validateAddress('token', token);
    const at = asOf ?? this.now();
    if (!Number.isInteger(at) || at <= 0) {
      throw new InvalidRequestError(`Invalid asOf ${at}`);
    }

    const key: CacheKey = { kind: 'pnl', wallet, token, asOf: at };
    return this.pnlCache.getOrCompute(key, async () => {
      const { store } = this.deps;
      const warnings: EngineWarning[] = [];
      const query = { wallet, token: token === '*' ? undefined : token, to: at };
      let trades = await store.load(query);

      if (trades.length === 0) {
        const synced = await this.syncOnce(
          { kind: 'wallet', address: wallet },
          { from: Math.max(0, at - WALLET_LOOKBACK_SECONDS), to: at },
          key,
        );
        warnings.push(...synced.warnings.filter(w => w.kind === 'ProviderFailed'));
        trades = await store.load(query);
      }

      const tokens = Array.from(new Set(trades.map(t => t.tokenAddress))).sort();
      const realized: PnLEvent[] = [];
      const unrealized: UnrealizedSnapshot[] = [];

      for (const tokenAddress of tokens) {
        const conflicts = await store.loadConflicts({ token: tokenAddress, to: at });
        const ledger = await this.matcher.replay(wallet, tokenAddress, trades, conflicts);
        realized.push(...ledger.events);

        for (const skipped of ledger.skipped) {
          warnings.push({ kind: 'SkippedTrade', tradeId: skipped.tradeId, tokenAddress, reason: skipped.reason });
        }
        for (const event of ledger.events) {
          if (event.shortfall) {
            warnings.push({
              kind: 'ShortfallDetected',
              walletAddress: wallet,
              tokenAddress,
              closingTradeId: event.closingTradeId,
              amount: event.shortfall.amount,
            });
          }
          warnings.push(...event.conflicts);
        }

        if (ledger.lots.length === 0) continue;
        const markPrice = lastPrice(await store.load({ token: tokenAddress, to: at }));
        if (markPrice === null) {
          warnings.push({ kind: 'MissingMarkPrice', walletAddress: wallet, tokenAddress });
        }
        unrealized.push({
          tokenAddress,
          openAmount: openAmount(ledger.lots),
          markPrice,
          unrealized: markPrice === null ? 0 : unrealizedPnl(ledger.lots, markPrice),
          lots: ledger.lots,
        });
      }

      realized.sort((a, b) => a.timestamp - b.timestamp
        || (a.closingTradeId < b.closingTradeId ? -1 : a.closingTradeId > b.closingTradeId ? 1 : 0));

      return {
        payload: {
          walletAddress: wallet,
          token,
          asOf: at,
          realized,
          unrealized,
          totals: {
            realized: realized.reduce((sum, e) => sum + (e.realized ?? 0), 0),
            unrealized: unrealized.reduce((sum, u) => sum + u.unrealized, 0),
          },
          warnings,
        },
        fingerprint: fingerprintTrades(trades),
      };
    });
  }

  /**
   * Stored trades of a wallet, newest first, optionally for one token. A wallet
   * with nothing stored is synced over the lookback window first.
   */
  async getTrades(wallet: string, token?: string, limit = DEFAULT_TRADE_LIMIT): Promise<TradeHistory> {
    validateAddress('wallet', wallet);
    if (token !== undefined) validateAddress('token', token);
    validateLimit(limit, MAX_TRADES_PER_REQUEST);

    const { store } = this.deps;
    const warnings: EngineWarning[] = [];
    const query = { wallet, token };
    let trades = await store.load(query);

    if (trades.length === 0) {
      const at = this.now();
      const synced = await this.syncOnce(
        { kind: 'wallet', address: wallet },
        { from: Math.max(0, at - WALLET_LOOKBACK_SECONDS), to: at },
      );
      warnings.push(...synced.warnings.filter(w => w.kind === 'ProviderFailed'));
      trades = await store.load(query);
    }

    return {
      walletAddress: wallet,
      token: token ?? null,
      trades: trades.slice(-limit).reverse(),
      total: trades.length,
      warnings,
    };
  }

  /**
   * Fetch → aggregate → persist for one subject and window, then drop every cached
   * result the new trades could change. Concurrent identical syncs share one run.
   */
  async sync(subject: Subject, range: TimeRange): Promise<SyncResult> {
    return this.syncOnce(subject, range);
  }

  /** `origin` is the cache computation waiting on this sync; it reloads afterwards, so it is kept. */
  private async syncOnce(subject: Subject, range: TimeRange, origin?: CacheKey): Promise<SyncResult> {
    validateAddress(subject.kind, subject.address);
    validateWindow(range);

    const id = subjectKey(subject, range);
    const running = this.syncsInFlight.get(id);
    if (running) return running;

    const promise = this.runSync(subject, range, origin).finally(() => {
      this.syncsInFlight.delete(id);
    });
    this.syncsInFlight.set(id, promise);
    return promise;
  }

  private async runSync(subject: Subject, range: TimeRange, origin?: CacheKey): Promise<SyncResult> {
    const { aggregator, store } = this.deps;
    const collected = await aggregator.collect({ subject, range });

    const added = await store.append(collected.trades);
    await store.appendConflicts(collected.conflicts);
    if (added.length > 0) this.invalidateFor(added, origin);

    const warnings: EngineWarning[] = [
      ...collected.failures.map(f => ({ kind: 'ProviderFailed' as const, ...f })),
      ...collected.conflicts,
    ];

    log.info('Sync complete', {
      subject,
      range,
      fetched: collected.fetched,
      merged: collected.trades.length,
      ingested: added.length,
      warnings: warnings.length,
    });

    return {
      subject,
      range,
      ingested: added.length,
      fetched: collected.fetched,
      merged: collected.trades.length,
      warnings,
    };
  }

  /**
   * Candle windows depend on their own trades and on earlier ones (the flat-fill
   * seed); PnL depends on the wallet's trades and on any trade setting the mark.
   */
  private invalidateFor(trades: readonly CanonicalTrade[], origin?: CacheKey) {
    const originId = origin ? cacheKeyId(origin) : null;
    const dropped =
      this.candleCache.invalidateWhere(key =>
        key.kind === 'candles' &&
        cacheKeyId(key) !== originId &&
        trades.some(t => t.tokenAddress === key.token && t.timestamp <= key.to),
      ) +
      this.pnlCache.invalidateWhere(key =>
        key.kind === 'pnl' &&
        cacheKeyId(key) !== originId &&
        trades.some(t => t.timestamp <= key.asOf && (key.token === '*' || key.token === t.tokenAddress)),
      );
    log.debug('Cache invalidated after sync', { trades: trades.length, dropped });
  }

  cacheStats() {
    return { candles: this.candleCache.stats(), pnl: this.pnlCache.stats() };
  }

  get providers() {
    return this.deps.aggregator.providers;
  }
}
