import type { Candle, CanonicalTrade, EngineWarning, Lot, PnLEvent, Subject, TimeRange } from '../core';

export interface CandleSeries {
  tokenAddress: string;
  interval: string;
  window: TimeRange;
  candles: Candle[];
  warnings: EngineWarning[];
}

export interface UnrealizedSnapshot {
  tokenAddress: string;
  openAmount: number;
  /** Latest known price at or before `asOf`; null when the token never traded. */
  markPrice: number | null;
  unrealized: number;
  lots: readonly Lot[];
}

export interface WalletPnl {
  walletAddress: string;
  token: string | '*';
  asOf: number;
  realized: PnLEvent[];
  unrealized: UnrealizedSnapshot[];
  totals: {
    realized: number;
    unrealized: number;
  };
  warnings: EngineWarning[];
}

/** Newest first. `total` counts every stored match before `limit` applied. */
export interface TradeHistory {
  walletAddress: string;
  token: string | null;
  trades: CanonicalTrade[];
  total: number;
  warnings: EngineWarning[];
}

export interface SyncResult {
  subject: Subject;
  range: TimeRange;
  ingested: number;
  fetched: number;
  merged: number;
  warnings: EngineWarning[];
}

export type ApiError = { kind: string; message: string } & Record<string, unknown>;

export type ApiResult<T> =
  | { success: true; data: T; warnings: EngineWarning[] }
  | { success: false; error: ApiError };
