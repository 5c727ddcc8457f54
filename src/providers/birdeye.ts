import { z } from 'zod';
import { UpstreamError } from '../core';
import type { CanonicalTrade } from '../core';
import { createLogger } from '../utils';
import { buildUrl, getJson, truncatedHistory } from './http';
import { swapToTrade } from './swap';
import type { AdapterOptions, FetchQuery, ProviderAdapter } from './types';

const log = createLogger('birdeye');

export const BIRDEYE_BASE = 'https://public-api.birdeye.so';
const PAGE_SIZE = 50;

const legSchema = z.object({
  address: z.string(),
  uiAmount: z.number().nonnegative(),
  price: z.number().nullish(),
});

const swapSchema = z.object({
  txHash: z.string(),
  blockUnixTime: z.number().int().positive(),
  owner: z.string(),
  from: legSchema,
  to: legSchema,
});

const responseSchema = z.object({
  success: z.boolean(),
  data: z.object({
    items: z.array(swapSchema),
    hasNext: z.boolean().optional(),
  }).nullish(),
  message: z.string().optional(),
});

export type BirdeyeSwap = z.infer<typeof swapSchema>;

export class BirdeyeAdapter implements ProviderAdapter {
  readonly name = 'birdeye' as const;

  constructor(
    private readonly apiKey: string,
    private readonly opts: AdapterOptions,
    private readonly baseUrl = BIRDEYE_BASE,
  ) {}

  private headers(): Record<string, string> {
    return { 'X-API-KEY': this.apiKey, 'x-chain': this.opts.chain };
  }

  private pageUrl(query: FetchQuery, offset: number): string {
    const { subject, range } = query;
    if (subject.kind === 'token') {
      return buildUrl(this.baseUrl, '/defi/txs/token', {
        address: subject.address,
        tx_type: 'swap',
        sort_type: 'desc',
        offset,
        limit: PAGE_SIZE,
      });
    }
    return buildUrl(this.baseUrl, '/trader/txs/seek_by_time', {
      address: subject.address,
      tx_type: 'swap',
      after_time: range.from,
      before_time: range.to,
      offset,
      limit: PAGE_SIZE,
    });
  }

  async fetch(query: FetchQuery, signal?: AbortSignal): Promise<CanonicalTrade[]> {
    const trades: CanonicalTrade[] = [];
    const { range } = query;
    let complete = false;

    for (let page = 0; page < this.opts.maxPages; page++) {
      const json = await getJson({
        provider: this.name,
        url: this.pageUrl(query, page * PAGE_SIZE),
        headers: this.headers(),
        schema: responseSchema,
        window: range,
        signal,
      });

      // Birdeye answers unknown addresses with success=false
      if (!json.success) {
        throw new UpstreamError(this.name, 'permanent', `request rejected: ${json.message ?? 'success=false'}`, range);
      }
      if (!json.data) {
        complete = true;
        break;
      }

      const items = json.data.items;
      let reachedStart = false;
      for (const item of items) {
        if (item.blockUnixTime < range.from) {
          reachedStart = true;
          continue;
        }
        if (item.blockUnixTime > range.to) continue;

        const trade = swapToTrade(
          {
            provenanceId: item.txHash,
            timestamp: item.blockUnixTime,
            owner: item.owner,
            sold: { mint: item.from.address, amount: item.from.uiAmount },
            bought: { mint: item.to.address, amount: item.to.uiAmount },
          },
          query.subject,
          this.name,
          this.opts,
        );
        if (trade) trades.push(trade);
      }

      if (reachedStart || items.length < PAGE_SIZE || json.data.hasNext === false) {
        complete = true;
        break;
      }
    }
    if (!complete) throw truncatedHistory(this.name, this.opts.maxPages, range);

    log.debug('Birdeye fetch complete', { address: query.subject.address, trades: trades.length });
    return trades;
  }
}
