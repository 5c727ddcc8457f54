import { PublicKey } from '@solana/web3.js';
import type { Finality, SignaturesForAddressOptions } from '@solana/web3.js';
import { UpstreamError } from '../core';
import type { CanonicalTrade, Subject, TimeRange } from '../core';
import { createLogger } from '../utils';
import { truncatedHistory } from './http';
import { swapToTrade } from './swap';
import type { AdapterOptions, FetchQuery, ProviderAdapter } from './types';

const log = createLogger('helius');

const SIGNATURE_PAGE = 100;
const MAX_CONCURRENT_TX_FETCHES = 3;
const LAMPORTS_PER_SOL = 1e9;

interface TokenBalanceView {
  mint: string;
  owner?: string;
  uiTokenAmount: { uiAmount: number | null };
}

/** The parts of a parsed transaction the adapter reads. */
export interface ParsedTxView {
  blockTime?: number | null;
  transaction: {
    signatures: string[];
    message: { accountKeys: { pubkey: { toBase58(): string }; signer: boolean }[] };
  };
  meta: {
    err: unknown;
    fee: number;
    preBalances: number[];
    postBalances: number[];
    preTokenBalances?: TokenBalanceView[] | null;
    postTokenBalances?: TokenBalanceView[] | null;
  } | null;
}

export interface SignatureInfoView {
  signature: string;
  blockTime?: number | null;
  err: unknown;
}

/** Subset of `Connection` used here; a `Connection` satisfies it. */
export interface RpcSource {
  getSignaturesForAddress(
    address: PublicKey,
    options?: SignaturesForAddressOptions,
    commitment?: Finality,
  ): Promise<SignatureInfoView[]>;
  getParsedTransaction(
    signature: string,
    config?: { maxSupportedTransactionVersion?: number; commitment?: Finality },
  ): Promise<ParsedTxView | null>;
}

/**
 * Derives the subject's swap from pre/post token balances. For a token subject the
 * owner with the largest absolute delta on that mint is the trader; native SOL
 * (fee-corrected) stands in for the quote when no wSOL account moved.
 */
export function tradeFromTransaction(
  tx: ParsedTxView,
  subject: Subject,
  opts: AdapterOptions,
): CanonicalTrade | null {
  const meta = tx.meta;
  if (!meta || meta.err) return null;
  const signature = tx.transaction.signatures[0];
  if (!signature || !tx.blockTime) return null;

  const deltaMap = new Map<string, Map<string, number>>();
  function addDelta(owner: string, mint: string, amount: number) {
    let ownerMap = deltaMap.get(owner);
    if (!ownerMap) {
      ownerMap = new Map();
      deltaMap.set(owner, ownerMap);
    }
    ownerMap.set(mint, (ownerMap.get(mint) ?? 0) + amount);
  }

  for (const b of meta.preTokenBalances ?? []) {
    if (b.owner) addDelta(b.owner, b.mint, -(b.uiTokenAmount.uiAmount ?? 0));
  }
  for (const b of meta.postTokenBalances ?? []) {
    if (b.owner) addDelta(b.owner, b.mint, b.uiTokenAmount.uiAmount ?? 0);
  }

  let owner = '';
  if (subject.kind === 'wallet') {
    owner = subject.address;
  } else {
    let bestDelta = 0;
    for (const [candidate, mints] of deltaMap) {
      const delta = mints.get(subject.address) ?? 0;
      if (Math.abs(delta) > Math.abs(bestDelta)) {
        bestDelta = delta;
        owner = candidate;
      }
    }
  }
  if (!owner) return null;

  const deltas = new Map(deltaMap.get(owner) ?? []);

  // Native SOL fallback for swaps that bypass a wSOL token account
  if (!deltas.get(opts.quoteMint)) {
    const idx = tx.transaction.message.accountKeys.findIndex(k => k.pubkey.toBase58() === owner);
    if (idx >= 0) {
      const pre = meta.preBalances[idx] ?? 0;
      const post = meta.postBalances[idx] ?? 0;
      const fee = tx.transaction.message.accountKeys[idx]?.signer ? meta.fee : 0;
      const solDelta = (post - pre + fee) / LAMPORTS_PER_SOL;
      if (solDelta !== 0) deltas.set(opts.quoteMint, solDelta);
    }
  }

  let sold: { mint: string; amount: number } | null = null;
  let bought: { mint: string; amount: number } | null = null;
  for (const [mint, delta] of deltas) {
    if (delta < 0 && (!sold || -delta > sold.amount)) sold = { mint, amount: -delta };
    if (delta > 0 && (!bought || delta > bought.amount)) bought = { mint, amount: delta };
  }
  if (!sold || !bought) return null;

  return swapToTrade(
    { provenanceId: signature, timestamp: tx.blockTime, owner, sold, bought },
    subject,
    'helius',
    opts,
  );
}

function rpcError(err: unknown, window: TimeRange): UpstreamError {
  if (err instanceof UpstreamError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const reason = message.includes('429') ? 'rate_limited' : 'transient';
  return new UpstreamError('helius', reason, `RPC error: ${message}`, window, { cause: err });
}

export class HeliusRpcAdapter implements ProviderAdapter {
  readonly name = 'helius' as const;

  constructor(
    private readonly rpc: RpcSource,
    private readonly opts: AdapterOptions,
  ) {}

  private async listSignatures(address: PublicKey, range: TimeRange, signal?: AbortSignal): Promise<string[]> {
    const out: string[] = [];
    let before: string | undefined;

    for (let page = 0; page < this.opts.maxPages; page++) {
      signal?.throwIfAborted();
      const sigs = await this.rpc.getSignaturesForAddress(address, { limit: SIGNATURE_PAGE, before }, 'confirmed');
      let reachedStart = false;
      for (const s of sigs) {
        if (s.err) continue;
        if (s.blockTime != null && s.blockTime < range.from) {
          reachedStart = true;
          continue;
        }
        if (s.blockTime != null && s.blockTime > range.to) continue;
        out.push(s.signature);
      }
      if (reachedStart || sigs.length < SIGNATURE_PAGE) return out;
      before = sigs[sigs.length - 1]?.signature;
    }
    throw truncatedHistory(this.name, this.opts.maxPages, range);
  }

  async fetch(query: FetchQuery, signal?: AbortSignal): Promise<CanonicalTrade[]> {
    const { subject, range } = query;
    let address: PublicKey;
    try {
      address = new PublicKey(subject.address);
    } catch {
      throw new UpstreamError(this.name, 'permanent', `invalid address ${subject.address}`, range);
    }

    try {
      const signatures = await this.listSignatures(address, range, signal);
      const trades: CanonicalTrade[] = [];

      for (let i = 0; i < signatures.length; i += MAX_CONCURRENT_TX_FETCHES) {
        signal?.throwIfAborted();
        const batch = signatures.slice(i, i + MAX_CONCURRENT_TX_FETCHES);
        const txs = await Promise.all(
          batch.map(sig => this.rpc.getParsedTransaction(sig, { maxSupportedTransactionVersion: 0, commitment: 'confirmed' })),
        );
        for (const tx of txs) {
          if (!tx) continue;
          const trade = tradeFromTransaction(tx, subject, this.opts);
          if (trade && trade.timestamp >= range.from && trade.timestamp <= range.to) trades.push(trade);
        }
      }

      log.debug('Helius fetch complete', { address: subject.address, signatures: signatures.length, trades: trades.length });
      return trades;
    } catch (err) {
      if (signal?.aborted && signal.reason instanceof UpstreamError) throw signal.reason;
      throw rpcError(err, range);
    }
  }
}
