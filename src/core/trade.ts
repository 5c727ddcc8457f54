import type { ProviderName } from '../utils/config';
import type { CanonicalTrade, TradeSide } from './types';

export interface TradeInput {
  chain: string;
  tokenAddress: string;
  walletAddress: string;
  side: TradeSide;
  baseAmount: number;
  quoteAmount?: number | null;
  unitPrice?: number | null;
  timestamp: number;
  source: ProviderName;
  provenanceId: string;
}

const MS_THRESHOLD = 10_000_000_000;

function positiveOrNull(value: number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  return Number.isFinite(value) && value > 0 ? value : null;
}

/** Second-resolution timestamp; 13-digit millisecond values are converted. */
export function toSeconds(ts: number): number {
  return Math.floor(ts > MS_THRESHOLD ? ts / 1000 : ts);
}

/**
 * Builds an immutable CanonicalTrade. Throws on records no adapter should emit
 * (non-positive base amount, missing ids).
 */
export function makeTrade(input: TradeInput): CanonicalTrade {
  if (!input.provenanceId) throw new Error('Trade is missing a provenance id');
  if (!input.tokenAddress) throw new Error(`Trade ${input.provenanceId} is missing a token address`);
  if (!Number.isFinite(input.baseAmount) || input.baseAmount <= 0) {
    throw new Error(`Trade ${input.provenanceId} has non-positive base amount ${input.baseAmount}`);
  }
  if (!Number.isFinite(input.timestamp) || input.timestamp <= 0) {
    throw new Error(`Trade ${input.provenanceId} has invalid timestamp ${input.timestamp}`);
  }

  const quoteAmount = positiveOrNull(input.quoteAmount);
  let unitPrice = positiveOrNull(input.unitPrice);
  if (unitPrice === null && quoteAmount !== null) {
    unitPrice = quoteAmount / input.baseAmount;
  }

  return Object.freeze({
    chain: input.chain,
    tokenAddress: input.tokenAddress,
    walletAddress: input.walletAddress,
    side: input.side,
    baseAmount: input.baseAmount,
    quoteAmount,
    unitPrice,
    timestamp: toSeconds(input.timestamp),
    source: input.source,
    provenanceId: input.provenanceId,
  });
}

/** Cross-provider identity: one transaction can carry trades of several tokens. */
export function mergeKey(trade: Pick<CanonicalTrade, 'provenanceId' | 'tokenAddress'>): string {
  return `${trade.provenanceId}:${trade.tokenAddress}`;
}

export function uniquenessKey(trade: Pick<CanonicalTrade, 'provenanceId' | 'source'>): string {
  return `${trade.source}:${trade.provenanceId}`;
}

/** Count of optional fields that are present and usable. */
export function completeness(trade: CanonicalTrade): number {
  let score = 0;
  if (trade.unitPrice !== null) score++;
  if (trade.quoteAmount !== null) score++;
  if (trade.walletAddress) score++;
  return score;
}

/** Timestamp, then provenance id, then token, side and source so replays are stable. */
export function compareTrades(a: CanonicalTrade, b: CanonicalTrade): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  if (a.provenanceId !== b.provenanceId) return a.provenanceId < b.provenanceId ? -1 : 1;
  if (a.tokenAddress !== b.tokenAddress) return a.tokenAddress < b.tokenAddress ? -1 : 1;
  if (a.side !== b.side) return a.side < b.side ? -1 : 1;
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  return 0;
}

export function inRange(trade: CanonicalTrade, range: { from: number; to: number }): boolean {
  return trade.timestamp >= range.from && trade.timestamp <= range.to;
}
