import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { compareCandidates } from '../src/aggregator';
import { JsonlTradeStore, MemoryTradeStore } from '../src/store';
import type { TradePreference } from '../src/store';
import type { DataConflict } from '../src/core';
import { MERGE_OPTS, OTHER_TOKEN, OTHER_WALLET, TOKEN, sig, trade } from './fixtures';

const T0 = 1_700_000_000;

const preferPrimary: TradePreference = (a, b) => compareCandidates(a, b, MERGE_OPTS);

const conflict: DataConflict = {
  kind: 'DataConflict',
  provenanceId: sig(1),
  tokenAddress: TOKEN,
  field: 'baseAmount',
  timestamp: T0,
  kept: { source: 'helius', value: 10 },
  discarded: [{ source: 'solscan', value: 11 }],
};

describe('MemoryTradeStore', () => {
  it('appends each transaction and token once', async () => {
    const store = new MemoryTradeStore();
    const a = trade({ seed: 1, timestamp: T0 });
    const sameTxOtherSource = trade({ seed: 1, timestamp: T0, source: 'solscan' });
    const sameTxOtherToken = trade({ seed: 1, timestamp: T0, tokenAddress: OTHER_TOKEN });

    expect(await store.append([a])).toEqual([a]);
    expect(await store.append([a, sameTxOtherSource])).toEqual([]);
    expect(await store.append([sameTxOtherToken])).toEqual([sameTxOtherToken]);
    expect(store.size).toBe(2);
  });

  it('replaces a stored record with one from the primary provider', async () => {
    const store = new MemoryTradeStore(preferPrimary);
    const fallback = trade({ seed: 1, timestamp: T0, source: 'solscan', unitPrice: 5 });
    const primary = trade({ seed: 1, timestamp: T0, source: 'birdeye', unitPrice: 1 });

    expect(await store.append([fallback])).toEqual([fallback]);
    expect(await store.append([primary])).toEqual([primary]);
    expect(await store.load({ token: TOKEN })).toEqual([primary]);

    expect(await store.append([fallback])).toEqual([]);
    expect(await store.append([primary])).toEqual([]);
    expect(store.size).toBe(1);
  });

  it('filters by token, wallet and inclusive time bounds', async () => {
    const store = new MemoryTradeStore();
    const early = trade({ seed: 1, timestamp: T0 });
    const late = trade({ seed: 2, timestamp: T0 + 100 });
    const otherWallet = trade({ seed: 3, timestamp: T0 + 50, walletAddress: OTHER_WALLET });
    const otherToken = trade({ seed: 4, timestamp: T0 + 50, tokenAddress: OTHER_TOKEN });
    await store.append([late, otherWallet, early, otherToken]);

    expect(await store.load({ token: TOKEN })).toEqual([early, otherWallet, late]);
    expect(await store.load({ token: TOKEN, from: T0, to: T0 + 50 })).toEqual([early, otherWallet]);
    expect(await store.load({ wallet: OTHER_WALLET })).toEqual([otherWallet]);
  });

  it('keeps one conflict per transaction, token and field', async () => {
    const store = new MemoryTradeStore();
    await store.appendConflicts([conflict, { ...conflict, discarded: [] }]);
    expect(await store.loadConflicts({ token: TOKEN })).toEqual([conflict]);
    expect(await store.loadConflicts({ token: OTHER_TOKEN })).toEqual([]);
  });
});

describe('JsonlTradeStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'trade-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('restores trades and conflicts written by an earlier instance', async () => {
    const first = new JsonlTradeStore(dir);
    const a = trade({ seed: 1, timestamp: T0, baseAmount: 10, quoteAmount: 5, unitPrice: null });
    const b = trade({ seed: 2, timestamp: T0 + 1, tokenAddress: OTHER_TOKEN });
    await first.append([a, b]);
    await first.appendConflicts([conflict]);

    const reopened = new JsonlTradeStore(dir);
    expect(reopened.size).toBe(2);
    expect(await reopened.load({ token: TOKEN })).toEqual([a]);
    expect(await reopened.loadConflicts({})).toEqual([conflict]);
    expect(fs.readdirSync(path.join(dir, 'trades')).sort()).toEqual([`${OTHER_TOKEN}.jsonl`, `${TOKEN}.jsonl`].sort());
  });

  it('does not write a trade twice', async () => {
    const store = new JsonlTradeStore(dir);
    const a = trade({ seed: 1, timestamp: T0 });
    await store.append([a]);
    await store.append([a]);
    const lines = fs.readFileSync(path.join(dir, 'trades', `${TOKEN}.jsonl`), 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
  });

  it('restores the superseding record after reopening', async () => {
    const fallback = trade({ seed: 1, timestamp: T0, source: 'solscan', unitPrice: 5 });
    const primary = trade({ seed: 1, timestamp: T0, source: 'birdeye', unitPrice: 1 });
    const first = new JsonlTradeStore(dir, preferPrimary);
    await first.append([fallback]);
    await first.append([primary]);

    const lines = fs.readFileSync(path.join(dir, 'trades', `${TOKEN}.jsonl`), 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);

    const reopened = new JsonlTradeStore(dir, preferPrimary);
    expect(await reopened.load({})).toEqual([primary]);
  });

  it('skips malformed lines when restoring', async () => {
    const a = trade({ seed: 1, timestamp: T0 });
    fs.mkdirSync(path.join(dir, 'trades'));
    fs.writeFileSync(
      path.join(dir, 'trades', `${TOKEN}.jsonl`),
      [JSON.stringify(a), '{not json', JSON.stringify({ ...a, side: 'hold' }), ''].join('\n'),
    );

    const store = new JsonlTradeStore(dir);
    expect(await store.load({})).toEqual([a]);
  });
});
