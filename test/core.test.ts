import { describe, it, expect } from 'vitest';
import {
  compareTrades, completeness, makeTrade, mergeKey, rawToHuman, roundTo, toSeconds, withinTolerance,
  UpstreamError,
} from '../src/core';
import { WALLET, TOKEN, sig, trade } from './fixtures';

describe('makeTrade', () => {
  it('derives unit price from quote and base amounts', () => {
    const t = trade({ baseAmount: 4, quoteAmount: 2, unitPrice: null });
    expect(t.unitPrice).toBe(0.5);
    expect(t.quoteAmount).toBe(2);
  });

  it('converts millisecond timestamps to seconds', () => {
    expect(trade({ timestamp: 1_700_000_000_123 }).timestamp).toBe(1_700_000_000);
    expect(toSeconds(1_700_000_000)).toBe(1_700_000_000);
  });

  it('treats non-positive prices and quotes as missing', () => {
    const t = trade({ unitPrice: 0, quoteAmount: -1 });
    expect(t.unitPrice).toBeNull();
    expect(t.quoteAmount).toBeNull();
  });

  it('rejects non-positive base amounts', () => {
    expect(() => trade({ baseAmount: 0 })).toThrow('non-positive base amount');
  });

  it('rejects a missing provenance id', () => {
    expect(() => makeTrade({
      chain: 'solana', tokenAddress: TOKEN, walletAddress: WALLET, side: 'buy',
      baseAmount: 1, timestamp: 1, source: 'helius', provenanceId: '',
    })).toThrow('missing a provenance id');
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(trade())).toBe(true);
  });
});

describe('trade ordering and identity', () => {
  it('orders by timestamp, then provenance id', () => {
    const a = trade({ seed: 2, timestamp: 100 });
    const b = trade({ seed: 1, timestamp: 100 });
    const c = trade({ seed: 3, timestamp: 50 });
    const sorted = [a, b, c].sort(compareTrades);
    expect(sorted.map(t => t.provenanceId)).toEqual([c.provenanceId, ...[a, b].map(t => t.provenanceId).sort()]);
  });

  it('keys merges by transaction and token', () => {
    const t = trade({ seed: 4 });
    expect(mergeKey(t)).toBe(`${sig(4)}:${TOKEN}`);
  });

  it('scores completeness over price, quote and wallet', () => {
    expect(completeness(trade({ baseAmount: 2, quoteAmount: 1, unitPrice: null }))).toBe(3);
    expect(completeness(trade({ unitPrice: null, walletAddress: '' }))).toBe(0);
  });
});

describe('precision helpers', () => {
  it('rounds to a fixed number of decimals', () => {
    expect(roundTo(1.23456789012, 9)).toBe(1.23456789);
  });

  it('compares relative to the larger magnitude', () => {
    expect(withinTolerance(100, 100.05, 0.001)).toBe(true);
    expect(withinTolerance(100, 100.2, 0.001)).toBe(false);
  });

  it('scales raw integer amounts by decimals', () => {
    expect(rawToHuman('2500000', 6)).toBe(2.5);
    expect(rawToHuman(1_000_000_000, 9)).toBe(1);
    expect(rawToHuman('not-a-number', 6)).toBe(0);
  });
});

describe('UpstreamError', () => {
  const window = { from: 1, to: 2 };

  it('retries transient failures only', () => {
    expect(new UpstreamError('birdeye', 'transient', 'boom', window).retryable).toBe(true);
    expect(new UpstreamError('birdeye', 'rate_limited', 'slow down', window).retryable).toBe(false);
    expect(new UpstreamError('birdeye', 'permanent', 'bad key', window).retryable).toBe(false);
  });

  it('does not retry timeouts', () => {
    const err = new UpstreamError('helius', 'transient', 'timed out', window, { timedOut: true });
    expect(err.retryable).toBe(false);
    expect(err.toFailure()).toEqual({
      provider: 'helius', reason: 'transient', message: 'helius: timed out', window, timedOut: true,
    });
  });
});
