import type { EngineConfig } from '../utils';
import { createLogger, getConnection } from '../utils';
import { BirdeyeAdapter } from './birdeye';
import { HeliusRpcAdapter } from './helius';
import type { RpcSource } from './helius';
import { SolscanAdapter } from './solscan';
import type { AdapterOptions, ProviderAdapter } from './types';

const log = createLogger('providers');

/**
 * The fixed adapter set for this process. A provider is included only when its
 * credentials are configured.
 */
export function createAdapters(cfg: EngineConfig, rpc?: RpcSource): ProviderAdapter[] {
  const base: Omit<AdapterOptions, 'maxPages'> = { chain: cfg.chain, quoteMint: cfg.quoteMint };
  const adapters: ProviderAdapter[] = [];
  const { birdeye, solscan, helius } = cfg.providers;

  if (birdeye.apiKey) {
    adapters.push(new BirdeyeAdapter(birdeye.apiKey, { ...base, maxPages: birdeye.maxPages }));
  }
  if (solscan.apiKey) {
    adapters.push(new SolscanAdapter(solscan.apiKey, { ...base, maxPages: solscan.maxPages }));
  }
  if (helius.rpcUrl || rpc) {
    adapters.push(new HeliusRpcAdapter(rpc ?? getConnection(helius.rpcUrl), { ...base, maxPages: helius.maxPages }));
  }

  log.info('Provider adapters configured', { providers: adapters.map(a => a.name) });
  return adapters;
}

export { BirdeyeAdapter, BIRDEYE_BASE } from './birdeye';
export { SolscanAdapter, SOLSCAN_BASE } from './solscan';
export { HeliusRpcAdapter, tradeFromTransaction } from './helius';
export type { ParsedTxView, RpcSource, SignatureInfoView } from './helius';
export { classifyStatus, getJson } from './http';
export { isTxSignature, swapToTrade } from './swap';
export type { SwapLegs } from './swap';
export type { AdapterOptions, FetchQuery, ProviderAdapter } from './types';
