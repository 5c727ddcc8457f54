import { SourceAggregator, compareCandidates } from '../aggregator';
import type { CallPolicy } from '../aggregator';
import type { ProviderName } from '../core';
import { createAdapters } from '../providers';
import type { ProviderAdapter } from '../providers';
import { JsonlTradeStore } from '../store';
import type { TradeStore } from '../store';
import type { EngineConfig } from '../utils';
import { MarketEngine } from './market-engine';

export function callPolicies(cfg: EngineConfig): Record<ProviderName, CallPolicy> {
  const { birdeye, solscan, helius } = cfg.providers;
  return {
    birdeye: { retry: birdeye.retry, timeoutMs: birdeye.timeoutMs },
    solscan: { retry: solscan.retry, timeoutMs: solscan.timeoutMs },
    helius: { retry: helius.retry, timeoutMs: helius.timeoutMs },
  };
}

/** Wires the configured adapters, the JSONL store and the caches into an engine. */
export function createEngine(
  cfg: EngineConfig,
  overrides: { adapters?: ProviderAdapter[]; store?: TradeStore } = {},
): MarketEngine {
  const mergeOptions = {
    primaryProviders: cfg.primaryProviders,
    conflictTolerance: cfg.conflictTolerance,
    canonicalDecimals: cfg.canonicalDecimals,
  };
  const aggregator = new SourceAggregator(overrides.adapters ?? createAdapters(cfg), callPolicies(cfg), mergeOptions);
  return new MarketEngine({
    config: cfg,
    aggregator,
    // A later sync that reaches the primary provider replaces a fallback record
    store: overrides.store ?? new JsonlTradeStore(cfg.dataDir, (a, b) => compareCandidates(a, b, mergeOptions)),
  });
}

export {
  MarketEngine, fingerprintTrades, DEFAULT_TRADE_LIMIT, MAX_CANDLES_PER_REQUEST, MAX_TRADES_PER_REQUEST, WALLET_LOOKBACK_SECONDS,
} from './market-engine';
export type { MarketEngineDeps } from './market-engine';
export { toApiResult } from './envelope';
export type { ApiError, ApiResult, CandleSeries, SyncResult, TradeHistory, UnrealizedSnapshot, WalletPnl } from './types';
