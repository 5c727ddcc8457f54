import bs58 from 'bs58';
import { PublicKey } from '@solana/web3.js';
import { makeTrade } from '../src/core';
import type { CanonicalTrade, ProviderName } from '../src/core';
import type { TradeInput } from '../src/core';
import type { CallPolicy } from '../src/aggregator';
import type { FetchQuery, ProviderAdapter } from '../src/providers';
import { WSOL_MINT } from '../src/utils';

/** Deterministic base58 public key. */
export function addr(seed: number): string {
  return new PublicKey(Buffer.alloc(32, seed)).toBase58();
}

/** Deterministic 64-byte transaction signature. */
export function sig(seed: number): string {
  return bs58.encode(Buffer.alloc(64, seed));
}

export const TOKEN = addr(7);
export const OTHER_TOKEN = addr(8);
export const WALLET = addr(9);
export const OTHER_WALLET = addr(10);
export const QUOTE = WSOL_MINT;

export const ADAPTER_OPTS = { chain: 'solana', quoteMint: QUOTE, maxPages: 5 };

export function trade(overrides: Partial<TradeInput> & { seed?: number } = {}): CanonicalTrade {
  const { seed = 1, ...rest } = overrides;
  return makeTrade({
    chain: 'solana',
    tokenAddress: TOKEN,
    walletAddress: WALLET,
    side: 'buy',
    baseAmount: 1,
    unitPrice: 1,
    timestamp: 1_700_000_000,
    source: 'birdeye',
    provenanceId: sig(seed),
    ...rest,
  });
}

export type FakeStep = CanonicalTrade[] | Error | ((signal?: AbortSignal) => Promise<CanonicalTrade[]>);

/**
 * Adapter that plays back one scripted step per call; the last step repeats.
 */
export class FakeAdapter implements ProviderAdapter {
  calls: FetchQuery[] = [];

  constructor(
    readonly name: ProviderName,
    private readonly steps: FakeStep[],
  ) {}

  async fetch(query: FetchQuery, signal?: AbortSignal): Promise<CanonicalTrade[]> {
    this.calls.push(query);
    const step = this.steps[Math.min(this.calls.length - 1, this.steps.length - 1)];
    if (step === undefined) return [];
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(signal);
    return step;
  }
}

export function policy(overrides: Partial<{ maxAttempts: number; backoffBaseMs: number; timeoutMs: number }> = {}): CallPolicy {
  return {
    retry: { maxAttempts: overrides.maxAttempts ?? 3, backoffBaseMs: overrides.backoffBaseMs ?? 1 },
    timeoutMs: overrides.timeoutMs ?? 1_000,
  };
}

export function policies(p: CallPolicy = policy()): Record<ProviderName, CallPolicy> {
  return { birdeye: p, solscan: p, helius: p };
}

export const MERGE_OPTS = {
  primaryProviders: { solana: 'birdeye' as const },
  conflictTolerance: 0.001,
  canonicalDecimals: 9,
};
