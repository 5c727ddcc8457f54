import type { ProviderName } from '../utils/config';

export type { ProviderName };

export type TradeSide = 'buy' | 'sell';

/** Unix seconds, inclusive on both ends. */
export interface TimeRange {
  from: number;
  to: number;
}

export type Subject =
  | { kind: 'token'; address: string }
  | { kind: 'wallet'; address: string };

export interface CanonicalTrade {
  readonly chain: string;
  readonly tokenAddress: string;
  readonly walletAddress: string;
  readonly side: TradeSide;
  readonly baseAmount: number;
  readonly quoteAmount: number | null;
  readonly unitPrice: number | null;
  readonly timestamp: number; // seconds, UTC
  readonly source: ProviderName;
  readonly provenanceId: string;
}

export interface DataConflict {
  kind: 'DataConflict';
  provenanceId: string;
  tokenAddress: string;
  field: 'unitPrice' | 'baseAmount' | 'quoteAmount';
  timestamp: number;
  kept: { source: ProviderName; value: number | null };
  discarded: { source: ProviderName; value: number | null }[];
}

export interface Candle {
  tokenAddress: string;
  interval: string;
  bucketStart: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  tradeCount: number;
  flatFilled: boolean;
  conflicts: DataConflict[];
}

export interface Lot {
  readonly id: string;
  readonly walletAddress: string;
  readonly tokenAddress: string;
  readonly openedAmount: number;
  readonly remainingAmount: number;
  readonly unitCostBasis: number;
  readonly openedAt: number;
}

export interface Shortfall {
  amount: number;
}

/** `realized` and `proceeds` are null when the sell carried no price. */
export interface PnLEvent {
  readonly walletAddress: string;
  readonly tokenAddress: string;
  readonly realized: number | null;
  readonly matchedLotIds: readonly string[];
  readonly closingTradeId: string;
  readonly timestamp: number;
  readonly soldAmount: number;
  readonly proceeds: number | null;
  readonly costBasis: number;
  readonly shortfall: Shortfall | null;
  readonly priceMissing: boolean;
  readonly conflicts: readonly DataConflict[];
}

export interface UpstreamFailure {
  provider: ProviderName;
  reason: UpstreamReason;
  message: string;
  window: TimeRange;
  timedOut: boolean;
}

export type UpstreamReason = 'transient' | 'permanent' | 'rate_limited';

export type EngineWarning =
  | DataConflict
  | ({ kind: 'ProviderFailed' } & UpstreamFailure)
  | { kind: 'ShortfallDetected'; walletAddress: string; tokenAddress: string; closingTradeId: string; amount: number }
  | { kind: 'SkippedTrade'; tradeId: string; tokenAddress: string; reason: string }
  | { kind: 'MissingMarkPrice'; walletAddress: string; tokenAddress: string };
