import { compareTrades, mergeKey } from '../core';
import type { CanonicalTrade, DataConflict } from '../core';
import { createLogger } from '../utils';

const log = createLogger('trade-store');

export interface TradeQuery {
  token?: string;
  wallet?: string;
  /** Inclusive bounds, seconds. */
  from?: number;
  to?: number;
}

/**
 * Durable source of truth for canonical trades. Everything derived (candles,
 * ledgers) is recomputed from what `load` returns.
 */
export interface TradeStore {
  /**
   * Appends records not already stored (by transaction + token), or that outrank
   * the stored record for their transaction; returns those taken.
   */
  append(trades: readonly CanonicalTrade[]): Promise<CanonicalTrade[]>;
  /** Matching trades in replay order. */
  load(query: TradeQuery): Promise<CanonicalTrade[]>;
  appendConflicts(conflicts: readonly DataConflict[]): Promise<void>;
  loadConflicts(query: TradeQuery): Promise<DataConflict[]>;
}

/** Negative when `a` should replace `b`. Without one, the first record stored stays. */
export type TradePreference = (a: CanonicalTrade, b: CanonicalTrade) => number;

function conflictKey(c: DataConflict): string {
  return `${c.provenanceId}:${c.tokenAddress}:${c.field}`;
}

function matches(query: TradeQuery, token: string, timestamp: number): boolean {
  if (query.token !== undefined && token !== query.token) return false;
  if (query.from !== undefined && timestamp < query.from) return false;
  if (query.to !== undefined && timestamp > query.to) return false;
  return true;
}

export class MemoryTradeStore implements TradeStore {
  protected readonly trades = new Map<string, CanonicalTrade>();
  protected readonly conflicts = new Map<string, DataConflict>();

  constructor(private readonly preference?: TradePreference) {}

  /** Adds to the in-memory index only; returns the records that were new or superseding. */
  protected index(trades: readonly CanonicalTrade[]): CanonicalTrade[] {
    const added: CanonicalTrade[] = [];
    for (const trade of trades) {
      const key = mergeKey(trade);
      const stored = this.trades.get(key);
      if (stored) {
        if (!this.preference || this.preference(trade, stored) >= 0) continue;
        log.debug('Stored record superseded', { key, from: stored.source, to: trade.source });
      }
      this.trades.set(key, trade);
      added.push(trade);
    }
    return added;
  }

  protected indexConflicts(conflicts: readonly DataConflict[]): DataConflict[] {
    const added: DataConflict[] = [];
    for (const conflict of conflicts) {
      const key = conflictKey(conflict);
      if (this.conflicts.has(key)) continue;
      this.conflicts.set(key, conflict);
      added.push(conflict);
    }
    return added;
  }

  async append(trades: readonly CanonicalTrade[]): Promise<CanonicalTrade[]> {
    return this.index(trades);
  }

  async load(query: TradeQuery): Promise<CanonicalTrade[]> {
    const out: CanonicalTrade[] = [];
    for (const trade of this.trades.values()) {
      if (query.wallet !== undefined && trade.walletAddress !== query.wallet) continue;
      if (matches(query, trade.tokenAddress, trade.timestamp)) out.push(trade);
    }
    return out.sort(compareTrades);
  }

  async appendConflicts(conflicts: readonly DataConflict[]): Promise<void> {
    this.indexConflicts(conflicts);
  }

  async loadConflicts(query: TradeQuery): Promise<DataConflict[]> {
    const out: DataConflict[] = [];
    for (const conflict of this.conflicts.values()) {
      if (matches(query, conflict.tokenAddress, conflict.timestamp)) out.push(conflict);
    }
    return out.sort((a, b) => a.timestamp - b.timestamp);
  }

  get size(): number {
    return this.trades.size;
  }
}
