import { compareTrades, mergeKey } from '../core';
import type { CanonicalTrade, DataConflict, Lot, PnLEvent } from '../core';
import { KeyedMutex, createLogger } from '../utils';

const log = createLogger('lot-matcher');

// Remainders below this are rounding noise, not an open position
const DUST = 1e-9;

interface MutableLot {
  id: string;
  walletAddress: string;
  tokenAddress: string;
  openedAmount: number;
  remainingAmount: number;
  unitCostBasis: number;
  openedAt: number;
}

export interface SkippedTrade {
  tradeId: string;
  reason: string;
}

export interface LedgerSnapshot {
  walletAddress: string;
  tokenAddress: string;
  lots: readonly Lot[];
  events: readonly PnLEvent[];
  skipped: readonly SkippedTrade[];
  realized: number;
}

export function ledgerKey(walletAddress: string, tokenAddress: string): string {
  return `${walletAddress}:${tokenAddress}`;
}

/** FIFO queue of open lots for one wallet+token, plus the events it produced. */
class LotLedger {
  private queue: MutableLot[] = [];
  private events: PnLEvent[] = [];
  private skipped: SkippedTrade[] = [];

  constructor(
    readonly walletAddress: string,
    readonly tokenAddress: string,
  ) {}

  reset() {
    this.queue = [];
    this.events = [];
    this.skipped = [];
  }

  apply(trade: CanonicalTrade, conflicts: DataConflict[]): PnLEvent | null {
    const tradeId = mergeKey(trade);

    if (trade.side === 'buy') {
      if (trade.unitPrice === null) {
        this.skipped.push({ tradeId, reason: 'missing unit price' });
        return null;
      }
      this.queue.push({
        id: tradeId,
        walletAddress: this.walletAddress,
        tokenAddress: this.tokenAddress,
        openedAmount: trade.baseAmount,
        remainingAmount: trade.baseAmount,
        unitCostBasis: trade.unitPrice,
        openedAt: trade.timestamp,
      });
      return null;
    }

    // An unpriced sell still closes lots; only its PnL is unknown
    const sellPrice = trade.unitPrice;
    if (sellPrice === null) {
      this.skipped.push({ tradeId, reason: 'missing unit price; lots closed without realized PnL' });
    }

    let unmatched = trade.baseAmount;
    let realized = 0;
    let costBasis = 0;
    const matchedLotIds: string[] = [];

    while (unmatched > DUST) {
      const lot = this.queue[0];
      if (!lot) break;
      const q = Math.min(lot.remainingAmount, unmatched);
      realized += q * ((sellPrice ?? 0) - lot.unitCostBasis);
      costBasis += q * lot.unitCostBasis;
      lot.remainingAmount -= q;
      unmatched -= q;
      matchedLotIds.push(lot.id);
      if (lot.remainingAmount <= DUST) {
        lot.remainingAmount = 0;
        this.queue.shift();
      }
    }

    // Holdings we never saw an acquisition for count at zero cost
    let shortfall: PnLEvent['shortfall'] = null;
    if (unmatched > DUST) {
      shortfall = { amount: unmatched };
      realized += unmatched * (sellPrice ?? 0);
    }

    const event: PnLEvent = Object.freeze({
      walletAddress: this.walletAddress,
      tokenAddress: this.tokenAddress,
      realized: sellPrice === null ? null : realized,
      matchedLotIds: Object.freeze(matchedLotIds),
      closingTradeId: tradeId,
      timestamp: trade.timestamp,
      soldAmount: trade.baseAmount,
      proceeds: sellPrice === null ? null : trade.baseAmount * sellPrice,
      costBasis,
      shortfall,
      priceMissing: sellPrice === null,
      conflicts: Object.freeze(conflicts),
    });
    this.events.push(event);
    return event;
  }

  snapshot(): LedgerSnapshot {
    return Object.freeze({
      walletAddress: this.walletAddress,
      tokenAddress: this.tokenAddress,
      lots: Object.freeze(this.queue.map(l => Object.freeze({ ...l }))),
      events: Object.freeze([...this.events]),
      skipped: Object.freeze(this.skipped.map(s => ({ ...s }))),
      realized: this.events.reduce((sum, e) => sum + (e.realized ?? 0), 0),
    });
  }
}

function applyTrades(ledger: LotLedger, trades: readonly CanonicalTrade[], conflicts: readonly DataConflict[]): number {
  const { walletAddress, tokenAddress } = ledger;
  const ordered = trades
    .filter(t => t.walletAddress === walletAddress && t.tokenAddress === tokenAddress)
    .sort(compareTrades);

  for (const trade of ordered) {
    const tradeConflicts = conflicts.filter(
      c => c.provenanceId === trade.provenanceId && c.tokenAddress === trade.tokenAddress,
    );
    const event = ledger.apply(trade, tradeConflicts);
    if (event?.shortfall) {
      log.warn('Sell exceeds tracked holdings', {
        wallet: walletAddress,
        token: tokenAddress,
        trade: event.closingTradeId,
        shortfall: event.shortfall.amount,
      });
    }
  }
  return ordered.length;
}

/** The replay of `LotMatcher.replay` on a throwaway ledger; the arena is untouched. */
export function matchTrades(
  walletAddress: string,
  tokenAddress: string,
  trades: readonly CanonicalTrade[],
  conflicts: readonly DataConflict[] = [],
): LedgerSnapshot {
  const ledger = new LotLedger(walletAddress, tokenAddress);
  applyTrades(ledger, trades, conflicts);
  return ledger.snapshot();
}

/** Ledgers indexed by wallet+token. Only LotMatcher mutates them. */
export class LedgerArena {
  private readonly ledgers = new Map<string, LotLedger>();

  /** @internal */
  ledger(walletAddress: string, tokenAddress: string): LotLedger {
    const key = ledgerKey(walletAddress, tokenAddress);
    let ledger = this.ledgers.get(key);
    if (!ledger) {
      ledger = new LotLedger(walletAddress, tokenAddress);
      this.ledgers.set(key, ledger);
    }
    return ledger;
  }

  snapshot(walletAddress: string, tokenAddress: string): LedgerSnapshot | undefined {
    return this.ledgers.get(ledgerKey(walletAddress, tokenAddress))?.snapshot();
  }

  get size(): number {
    return this.ledgers.size;
  }
}

export class LotMatcher {
  private readonly mutex = new KeyedMutex();

  constructor(private readonly arena: LedgerArena = new LedgerArena()) {}

  /**
   * Rebuilds the wallet+token ledger from scratch. Trades are replayed in
   * timestamp order, ties by provenance id, so arrival order never matters.
   */
  async replay(
    walletAddress: string,
    tokenAddress: string,
    trades: readonly CanonicalTrade[],
    conflicts: readonly DataConflict[] = [],
  ): Promise<LedgerSnapshot> {
    return this.mutex.runExclusive(ledgerKey(walletAddress, tokenAddress), () => {
      const ledger = this.arena.ledger(walletAddress, tokenAddress);
      ledger.reset();

      const applied = applyTrades(ledger, trades, conflicts);

      const snapshot = ledger.snapshot();
      log.debug('Ledger replayed', {
        wallet: walletAddress,
        token: tokenAddress,
        trades: applied,
        openLots: snapshot.lots.length,
        events: snapshot.events.length,
      });
      return snapshot;
    });
  }

  snapshot(walletAddress: string, tokenAddress: string): LedgerSnapshot | undefined {
    return this.arena.snapshot(walletAddress, tokenAddress);
  }
}

/** Σ remaining · (mark − basis) over open lots. */
export function unrealizedPnl(lots: readonly Lot[], markPrice: number): number {
  return lots.reduce((sum, lot) => sum + lot.remainingAmount * (markPrice - lot.unitCostBasis), 0);
}

export function openAmount(lots: readonly Lot[]): number {
  return lots.reduce((sum, lot) => sum + lot.remainingAmount, 0);
}
