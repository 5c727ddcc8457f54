import bs58 from 'bs58';
import { makeTrade } from '../core';
import type { CanonicalTrade, ProviderName, Subject } from '../core';
import { createLogger } from '../utils';
import type { AdapterOptions } from './types';

const log = createLogger('swap');

/** One wallet's view of a swap: what left the wallet and what arrived. */
export interface SwapLegs {
  provenanceId: string;
  timestamp: number;
  owner: string;
  sold: { mint: string; amount: number };
  bought: { mint: string; amount: number };
}

/** Solana transaction signatures are 64 bytes, base58-encoded. */
export function isTxSignature(sig: string): boolean {
  try {
    return bs58.decode(sig).length === 64;
  } catch {
    return false;
  }
}

/**
 * Translates a swap against the quote mint into a CanonicalTrade.
 * Swaps between two non-quote tokens, or outside the queried subject, yield null.
 */
export function swapToTrade(
  swap: SwapLegs,
  subject: Subject,
  source: ProviderName,
  opts: AdapterOptions,
): CanonicalTrade | null {
  const { quoteMint } = opts;
  let side: 'buy' | 'sell';
  let token: string;
  let baseAmount: number;
  let quoteAmount: number;

  if (swap.sold.mint === quoteMint && swap.bought.mint !== quoteMint) {
    side = 'buy';
    token = swap.bought.mint;
    baseAmount = swap.bought.amount;
    quoteAmount = swap.sold.amount;
  } else if (swap.bought.mint === quoteMint && swap.sold.mint !== quoteMint) {
    side = 'sell';
    token = swap.sold.mint;
    baseAmount = swap.sold.amount;
    quoteAmount = swap.bought.amount;
  } else {
    return null;
  }

  if (subject.kind === 'token' && token !== subject.address) return null;
  if (subject.kind === 'wallet' && swap.owner !== subject.address) return null;

  if (!isTxSignature(swap.provenanceId)) {
    log.debug('Dropping swap with malformed signature', { source, sig: swap.provenanceId });
    return null;
  }
  if (!(baseAmount > 0)) return null;

  try {
    return makeTrade({
      chain: opts.chain,
      tokenAddress: token,
      walletAddress: swap.owner,
      side,
      baseAmount,
      quoteAmount,
      timestamp: swap.timestamp,
      source,
      provenanceId: swap.provenanceId,
    });
  } catch (err) {
    log.debug('Dropping untranslatable swap', { source, sig: swap.provenanceId, error: err });
    return null;
  }
}
