import { z } from 'zod';
import { UpstreamError, rawToHuman } from '../core';
import type { CanonicalTrade } from '../core';
import { createLogger } from '../utils';
import { buildUrl, getJson, truncatedHistory } from './http';
import { swapToTrade } from './swap';
import type { AdapterOptions, FetchQuery, ProviderAdapter } from './types';

const log = createLogger('solscan');

export const SOLSCAN_BASE = 'https://pro-api.solscan.io';
const PAGE_SIZE = 100;

// Solscan reports raw integer amounts, sometimes as strings
const rawAmount = z.union([z.number(), z.string().regex(/^\d+$/)]);

const activitySchema = z.object({
  trans_id: z.string(),
  block_time: z.number().int().positive(),
  from_address: z.string(),
  routers: z.object({
    token1: z.string(),
    token1_decimals: z.number().int().nonnegative(),
    amount1: rawAmount,
    token2: z.string(),
    token2_decimals: z.number().int().nonnegative(),
    amount2: rawAmount,
  }),
});

const responseSchema = z.object({
  success: z.boolean(),
  data: z.array(activitySchema).nullish(),
});

export type SolscanActivity = z.infer<typeof activitySchema>;

export class SolscanAdapter implements ProviderAdapter {
  readonly name = 'solscan' as const;

  constructor(
    private readonly apiToken: string,
    private readonly opts: AdapterOptions,
    private readonly baseUrl = SOLSCAN_BASE,
  ) {}

  async fetch(query: FetchQuery, signal?: AbortSignal): Promise<CanonicalTrade[]> {
    const { subject, range } = query;
    const path = subject.kind === 'token' ? '/v2.0/token/defi/activities' : '/v2.0/account/defi/activities';
    const trades: CanonicalTrade[] = [];
    let complete = false;

    for (let page = 1; page <= this.opts.maxPages; page++) {
      const json = await getJson({
        provider: this.name,
        url: buildUrl(this.baseUrl, path, {
          address: subject.address,
          'activity_type[]': 'ACTIVITY_TOKEN_SWAP',
          from_time: range.from,
          to_time: range.to,
          page,
          page_size: PAGE_SIZE,
          sort_by: 'block_time',
          sort_order: 'desc',
        }),
        headers: { token: this.apiToken },
        schema: responseSchema,
        window: range,
        signal,
      });

      if (!json.success) {
        throw new UpstreamError(this.name, 'permanent', 'request rejected: success=false', range);
      }
      const items = json.data ?? [];
      for (const item of items) {
        if (item.block_time < range.from || item.block_time > range.to) continue;
        const r = item.routers;
        const trade = swapToTrade(
          {
            provenanceId: item.trans_id,
            timestamp: item.block_time,
            owner: item.from_address,
            sold: { mint: r.token1, amount: rawToHuman(r.amount1, r.token1_decimals) },
            bought: { mint: r.token2, amount: rawToHuman(r.amount2, r.token2_decimals) },
          },
          subject,
          this.name,
          this.opts,
        );
        if (trade) trades.push(trade);
      }

      if (items.length < PAGE_SIZE) {
        complete = true;
        break;
      }
    }
    if (!complete) throw truncatedHistory(this.name, this.opts.maxPages, range);

    log.debug('Solscan fetch complete', { address: subject.address, trades: trades.length });
    return trades;
  }
}
