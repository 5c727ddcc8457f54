import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  BirdeyeAdapter, HeliusRpcAdapter, SolscanAdapter, classifyStatus, createAdapters, isTxSignature, swapToTrade,
  tradeFromTransaction,
} from '../src/providers';
import type { ParsedTxView, RpcSource, SignatureInfoView } from '../src/providers';
import { UpstreamError } from '../src/core';
import { loadConfig } from '../src/utils';
import { ADAPTER_OPTS, OTHER_TOKEN, QUOTE, TOKEN, WALLET, sig } from './fixtures';

const T0 = 1_700_000_000;
const RANGE = { from: T0, to: T0 + 3_600 };
const TOKEN_QUERY = { subject: { kind: 'token' as const, address: TOKEN }, range: RANGE };
const WALLET_QUERY = { subject: { kind: 'wallet' as const, address: WALLET }, range: RANGE };

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) throw new Error('unexpected request');
    return next;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('swap translation', () => {
  it('recognises 64-byte signatures', () => {
    expect(isTxSignature(sig(1))).toBe(true);
    expect(isTxSignature('abc')).toBe(false);
    expect(isTxSignature('0OIl')).toBe(false);
  });

  it('turns quote-in swaps into buys and quote-out swaps into sells', () => {
    const buy = swapToTrade(
      { provenanceId: sig(1), timestamp: T0, owner: WALLET, sold: { mint: QUOTE, amount: 2 }, bought: { mint: TOKEN, amount: 100 } },
      TOKEN_QUERY.subject, 'birdeye', ADAPTER_OPTS,
    );
    expect(buy).toMatchObject({ side: 'buy', baseAmount: 100, quoteAmount: 2, unitPrice: 0.02, tokenAddress: TOKEN });

    const sell = swapToTrade(
      { provenanceId: sig(2), timestamp: T0, owner: WALLET, sold: { mint: TOKEN, amount: 40 }, bought: { mint: QUOTE, amount: 1 } },
      TOKEN_QUERY.subject, 'birdeye', ADAPTER_OPTS,
    );
    expect(sell).toMatchObject({ side: 'sell', baseAmount: 40, quoteAmount: 1, unitPrice: 0.025 });
  });

  it('ignores swaps without the quote mint or outside the subject', () => {
    const legs = { provenanceId: sig(3), timestamp: T0, owner: WALLET };
    expect(swapToTrade({ ...legs, sold: { mint: OTHER_TOKEN, amount: 1 }, bought: { mint: TOKEN, amount: 1 } },
      TOKEN_QUERY.subject, 'birdeye', ADAPTER_OPTS)).toBeNull();
    expect(swapToTrade({ ...legs, sold: { mint: QUOTE, amount: 1 }, bought: { mint: OTHER_TOKEN, amount: 1 } },
      TOKEN_QUERY.subject, 'birdeye', ADAPTER_OPTS)).toBeNull();
  });
});

describe('classifyStatus', () => {
  it('maps HTTP statuses to failure kinds', () => {
    expect(classifyStatus(429)).toBe('rate_limited');
    expect(classifyStatus(503)).toBe('transient');
    expect(classifyStatus(408)).toBe('transient');
    expect(classifyStatus(401)).toBe('permanent');
    expect(classifyStatus(404)).toBe('permanent');
  });
});

describe('BirdeyeAdapter', () => {
  const adapter = new BirdeyeAdapter('test-secret', ADAPTER_OPTS, 'https://birdeye.test');

  function item(n: number, blockUnixTime: number, from: string, fromAmount: number, to: string, toAmount: number) {
    return {
      txHash: sig(n), blockUnixTime, owner: WALLET,
      from: { address: from, uiAmount: fromAmount }, to: { address: to, uiAmount: toAmount },
    };
  }

  it('translates token swaps and stops at the window start', async () => {
    const fetchMock = stubFetch(jsonResponse({
      success: true,
      data: {
        items: [
          item(1, T0 + 20, TOKEN, 40, QUOTE, 1),
          item(2, T0 + 10, QUOTE, 2, TOKEN, 100),
          item(3, T0 + 5, OTHER_TOKEN, 1, TOKEN, 1),
          item(4, T0 - 5, QUOTE, 1, TOKEN, 1),
        ],
        hasNext: true,
      },
    }));

    const trades = await adapter.fetch(TOKEN_QUERY);
    expect(trades.map(t => [t.provenanceId, t.side, t.baseAmount, t.unitPrice])).toEqual([
      [sig(1), 'sell', 40, 0.025],
      [sig(2), 'buy', 100, 0.02],
    ]);
    expect(trades[0]?.source).toBe('birdeye');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe(
      `https://birdeye.test/defi/txs/token?address=${TOKEN}&tx_type=swap&sort_type=desc&offset=0&limit=50`,
    );
    expect(init?.headers).toMatchObject({ 'X-API-KEY': 'test-secret', 'x-chain': 'solana' });
  });

  it('pages through full pages', async () => {
    const full = Array.from({ length: 50 }, (_, i) => item(i + 1, T0 + 100 - i, QUOTE, 1, TOKEN, 10));
    const fetchMock = stubFetch(
      jsonResponse({ success: true, data: { items: full, hasNext: true } }),
      jsonResponse({ success: true, data: { items: [item(60, T0 + 1, QUOTE, 1, TOKEN, 10)], hasNext: false } }),
    );

    const trades = await adapter.fetch(TOKEN_QUERY);
    expect(trades).toHaveLength(51);
    expect(String(fetchMock.mock.calls[1]?.[0])).toContain('offset=50');
  });

  it('queries wallet history by time', async () => {
    const fetchMock = stubFetch(jsonResponse({ success: true, data: { items: [item(1, T0 + 1, QUOTE, 1, TOKEN, 10)] } }));
    const trades = await adapter.fetch(WALLET_QUERY);
    expect(trades).toHaveLength(1);
    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.pathname).toBe('/trader/txs/seek_by_time');
    expect(url.searchParams.get('after_time')).toBe(String(RANGE.from));
    expect(url.searchParams.get('before_time')).toBe(String(RANGE.to));
  });

  it('rejects success=false as a permanent failure', async () => {
    stubFetch(jsonResponse({ success: false, data: null, message: 'address not found' }));
    await expect(adapter.fetch(TOKEN_QUERY)).rejects.toMatchObject({
      provider: 'birdeye', reason: 'permanent', message: 'birdeye: request rejected: address not found',
    });
  });

  it('fails when the page cap is hit before the window start', async () => {
    const capped = new BirdeyeAdapter('test-secret', { ...ADAPTER_OPTS, maxPages: 2 }, 'https://birdeye.test');
    const newer = (base: number) =>
      Array.from({ length: 50 }, (_, i) => item(base + i, RANGE.to + 1_000 - base - i, QUOTE, 1, TOKEN, 10));
    const fetchMock = stubFetch(
      jsonResponse({ success: true, data: { items: newer(1), hasNext: true } }),
      jsonResponse({ success: true, data: { items: newer(51), hasNext: true } }),
    );

    const err = await capped.fetch(TOKEN_QUERY).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ reason: 'permanent', message: 'birdeye: history truncated after 2 pages before window start' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('classifies HTTP failures', async () => {
    stubFetch(jsonResponse({ message: 'Too many requests' }, 429));
    const err = await adapter.fetch(TOKEN_QUERY).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ provider: 'birdeye', reason: 'rate_limited' });
  });

  it('rejects payloads of the wrong shape as permanent', async () => {
    stubFetch(jsonResponse({ success: true, data: { items: [{ txHash: 1 }] } }));
    await expect(adapter.fetch(TOKEN_QUERY)).rejects.toMatchObject({ reason: 'permanent' });
  });

  it('reports network errors as transient', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));
    await expect(adapter.fetch(TOKEN_QUERY)).rejects.toMatchObject({ reason: 'transient' });
  });
});

describe('SolscanAdapter', () => {
  const adapter = new SolscanAdapter('test-secret', ADAPTER_OPTS, 'https://solscan.test');

  it('scales raw amounts by token decimals', async () => {
    const fetchMock = stubFetch(jsonResponse({
      success: true,
      data: [{
        trans_id: sig(5),
        block_time: T0 + 30,
        from_address: WALLET,
        routers: {
          token1: QUOTE, token1_decimals: 9, amount1: '2000000000',
          token2: TOKEN, token2_decimals: 6, amount2: 100_000_000,
        },
      }],
    }));

    const trades = await adapter.fetch(TOKEN_QUERY);
    expect(trades).toHaveLength(1);
    expect(trades[0]).toMatchObject({
      provenanceId: sig(5), side: 'buy', baseAmount: 100, quoteAmount: 2, unitPrice: 0.02, source: 'solscan',
    });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(new URL(String(url)).pathname).toBe('/v2.0/token/defi/activities');
    expect(init?.headers).toMatchObject({ token: 'test-secret' });
  });

  function activity(n: number, blockTime: number) {
    return {
      trans_id: sig(n),
      block_time: blockTime,
      from_address: WALLET,
      routers: { token1: QUOTE, token1_decimals: 9, amount1: 1_000_000_000, token2: TOKEN, token2_decimals: 6, amount2: 10_000_000 },
    };
  }

  it('rejects success=false as a permanent failure', async () => {
    stubFetch(jsonResponse({ success: false, data: null }));
    await expect(adapter.fetch(TOKEN_QUERY)).rejects.toMatchObject({ provider: 'solscan', reason: 'permanent' });
  });

  it('fails when every allowed page comes back full', async () => {
    const capped = new SolscanAdapter('test-secret', { ...ADAPTER_OPTS, maxPages: 1 }, 'https://solscan.test');
    stubFetch(jsonResponse({ success: true, data: Array.from({ length: 100 }, (_, i) => activity(i + 1, T0 + 100)) }));
    await expect(capped.fetch(TOKEN_QUERY)).rejects.toMatchObject({
      message: 'solscan: history truncated after 1 pages before window start',
    });
  });

  it('surfaces server errors as transient', async () => {
    stubFetch(new Response('bad gateway', { status: 502 }));
    const err = await adapter.fetch(WALLET_QUERY).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    if (err instanceof UpstreamError) {
      expect(err.reason).toBe('transient');
      expect(err.status).toBe(502);
    }
  });
});

describe('Helius RPC', () => {
  function key(address: string, signer: boolean) {
    return { pubkey: { toBase58: () => address }, signer };
  }

  function balance(owner: string, mint: string, uiAmount: number) {
    return { owner, mint, uiTokenAmount: { uiAmount } };
  }

  function wsolBuy(signature: string, blockTime: number): ParsedTxView {
    return {
      blockTime,
      transaction: { signatures: [signature], message: { accountKeys: [key(WALLET, true)] } },
      meta: {
        err: null,
        fee: 5_000,
        preBalances: [1_000_000_000],
        postBalances: [999_995_000],
        preTokenBalances: [balance(WALLET, QUOTE, 5)],
        postTokenBalances: [balance(WALLET, QUOTE, 3), balance(WALLET, TOKEN, 100)],
      },
    };
  }

  it('reads a swap from token balance changes', () => {
    const t = tradeFromTransaction(wsolBuy(sig(1), T0 + 5), WALLET_QUERY.subject, ADAPTER_OPTS);
    expect(t).toMatchObject({
      walletAddress: WALLET, tokenAddress: TOKEN, side: 'buy', baseAmount: 100, quoteAmount: 2, source: 'helius',
    });
  });

  it('falls back to the fee-corrected native balance for the quote leg', () => {
    const tx: ParsedTxView = {
      blockTime: T0 + 5,
      transaction: { signatures: [sig(2)], message: { accountKeys: [key(WALLET, true)] } },
      meta: {
        err: null,
        fee: 5_000,
        preBalances: [2_000_000_000],
        postBalances: [2_999_995_000],
        preTokenBalances: [balance(WALLET, TOKEN, 100)],
        postTokenBalances: [balance(WALLET, TOKEN, 60)],
      },
    };
    const t = tradeFromTransaction(tx, TOKEN_QUERY.subject, ADAPTER_OPTS);
    expect(t).toMatchObject({ side: 'sell', baseAmount: 40, quoteAmount: 1, unitPrice: 0.025 });
  });

  it('skips failed transactions', () => {
    const tx = wsolBuy(sig(3), T0);
    const failed: ParsedTxView = { ...tx, meta: tx.meta && { ...tx.meta, err: { InstructionError: [0, 'Custom'] } } };
    expect(tradeFromTransaction(failed, WALLET_QUERY.subject, ADAPTER_OPTS)).toBeNull();
  });

  it('walks signatures back to the window start and parses each transaction', async () => {
    const signatures: SignatureInfoView[] = [
      { signature: sig(11), blockTime: RANGE.to + 10, err: null },
      { signature: sig(12), blockTime: T0 + 20, err: null },
      { signature: sig(13), blockTime: T0 + 15, err: { InstructionError: [0, 'Custom'] } },
      { signature: sig(14), blockTime: T0 - 1, err: null },
    ];
    const parsed: string[] = [];
    const rpc: RpcSource = {
      getSignaturesForAddress: async () => signatures,
      getParsedTransaction: async (signature: string) => {
        parsed.push(signature);
        return wsolBuy(signature, T0 + 20);
      },
    };

    const trades = await new HeliusRpcAdapter(rpc, ADAPTER_OPTS).fetch(WALLET_QUERY);
    expect(parsed).toEqual([sig(12)]);
    expect(trades.map(t => t.provenanceId)).toEqual([sig(12)]);
  });

  it('fails when signature paging stops short of the window start', async () => {
    const full: SignatureInfoView[] = Array.from({ length: 100 }, (_, i) => ({
      signature: sig(i + 1), blockTime: RANGE.to + 500, err: null,
    }));
    const rpc: RpcSource = {
      getSignaturesForAddress: async () => full,
      getParsedTransaction: async () => null,
    };
    const capped = new HeliusRpcAdapter(rpc, { ...ADAPTER_OPTS, maxPages: 2 });
    await expect(capped.fetch(WALLET_QUERY)).rejects.toMatchObject({
      provider: 'helius', reason: 'permanent', message: 'helius: history truncated after 2 pages before window start',
    });
  });

  it('classifies RPC rate limiting', async () => {
    const rpc: RpcSource = {
      getSignaturesForAddress: async () => {
        throw new Error('429 Too Many Requests');
      },
      getParsedTransaction: async () => null,
    };
    await expect(new HeliusRpcAdapter(rpc, ADAPTER_OPTS).fetch(WALLET_QUERY)).rejects.toMatchObject({
      provider: 'helius', reason: 'rate_limited',
    });
  });

  it('rejects addresses that are not public keys', async () => {
    const rpc: RpcSource = {
      getSignaturesForAddress: async () => [],
      getParsedTransaction: async () => null,
    };
    const query = { subject: { kind: 'wallet' as const, address: 'not-a-key' }, range: RANGE };
    await expect(new HeliusRpcAdapter(rpc, ADAPTER_OPTS).fetch(query)).rejects.toMatchObject({ reason: 'permanent' });
  });
});

describe('createAdapters', () => {
  it('includes only providers with credentials', () => {
    const cfg = loadConfig({ BIRDEYE_API_KEY: 'test-secret' });
    expect(createAdapters(cfg).map(a => a.name)).toEqual(['birdeye']);
  });

  it('uses an injected RPC source for Helius', () => {
    const rpc: RpcSource = { getSignaturesForAddress: async () => [], getParsedTransaction: async () => null };
    const cfg = loadConfig({ SOLSCAN_API_KEY: 'test-secret' });
    expect(createAdapters(cfg, rpc).map(a => a.name)).toEqual(['solscan', 'helius']);
  });
});
