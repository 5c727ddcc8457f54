import dotenv from 'dotenv';
import path from 'path';
import { createLogger } from './logger';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const log = createLogger('config');

export type ProviderName = 'birdeye' | 'solscan' | 'helius';

export const PROVIDER_NAMES: readonly ProviderName[] = ['birdeye', 'solscan', 'helius'];

export const WSOL_MINT = 'So11111111111111111111111111111111111111112';

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
}

export interface ProviderSettings {
  apiKey: string;
  retry: RetryPolicy;
  timeoutMs: number;
  maxPages: number;
}

export interface EngineConfig {
  chain: string;
  quoteMint: string;
  primaryProviders: Record<string, ProviderName>;
  providers: {
    birdeye: ProviderSettings;
    solscan: ProviderSettings;
    helius: ProviderSettings & { rpcUrl: string };
  };
  cache: {
    capacity: number;
    ttlMs: number;
  };
  supportedIntervals: string[];
  conflictTolerance: number;
  canonicalDecimals: number;
  dataDir: string;
  apiPort: number;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, key: string, fallback: string): string {
  return env[key] || fallback;
}

function numeric(env: Env, key: string, fallback: number, opts: { integer?: boolean; min?: number } = {}): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const val = opts.integer ? parseInt(raw, 10) : parseFloat(raw);
  if (isNaN(val) || (opts.min !== undefined && val < opts.min)) {
    log.warn('Invalid numeric option, using default', { key, value: raw, fallback });
    return fallback;
  }
  return val;
}

function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some(p => p === value);
}

/** Parses `solana:birdeye,eclipse:helius` into a chain → provider map. */
function parsePrimaryProviders(raw: string): Record<string, ProviderName> {
  const out: Record<string, ProviderName> = {};
  for (const pair of raw.split(',')) {
    const [chain, provider] = pair.split(':').map(s => s.trim());
    if (!chain || !provider) continue;
    if (!isProviderName(provider)) {
      log.warn('Unknown primary provider ignored', { chain, provider });
      continue;
    }
    out[chain] = provider;
  }
  return out;
}

function providerSettings(env: Env, name: ProviderName, apiKey: string): ProviderSettings {
  const prefix = name.toUpperCase();
  const maxAttempts = numeric(env, 'RETRY_MAX_ATTEMPTS', 3, { integer: true, min: 1 });
  const backoffBaseMs = numeric(env, 'RETRY_BACKOFF_MS', 500, { min: 0 });
  const timeoutMs = numeric(env, 'PROVIDER_TIMEOUT_MS', 15_000, { integer: true, min: 1 });
  const maxPages = numeric(env, 'PROVIDER_MAX_PAGES', 20, { integer: true, min: 1 });

  return {
    apiKey,
    retry: {
      maxAttempts: numeric(env, `${prefix}_RETRY_MAX_ATTEMPTS`, maxAttempts, { integer: true, min: 1 }),
      backoffBaseMs: numeric(env, `${prefix}_RETRY_BACKOFF_MS`, backoffBaseMs, { min: 0 }),
    },
    timeoutMs: numeric(env, `${prefix}_TIMEOUT_MS`, timeoutMs, { integer: true, min: 1 }),
    maxPages,
  };
}

export function loadConfig(env: Env): EngineConfig {
  const heliusKey = optional(env, 'HELIUS_API_KEY', '');
  const defaultRpc = heliusKey ? `https://mainnet.helius-rpc.com/?api-key=${heliusKey}` : '';

  return {
    chain: optional(env, 'CHAIN', 'solana'),
    quoteMint: optional(env, 'QUOTE_MINT', WSOL_MINT),
    primaryProviders: parsePrimaryProviders(optional(env, 'PRIMARY_PROVIDERS', 'solana:birdeye')),
    providers: {
      birdeye: providerSettings(env, 'birdeye', optional(env, 'BIRDEYE_API_KEY', '')),
      solscan: providerSettings(env, 'solscan', optional(env, 'SOLSCAN_API_KEY', '')),
      helius: {
        ...providerSettings(env, 'helius', heliusKey),
        rpcUrl: optional(env, 'HELIUS_RPC_URL', defaultRpc),
      },
    },
    cache: {
      capacity: numeric(env, 'CACHE_CAPACITY', 256, { integer: true, min: 1 }),
      ttlMs: numeric(env, 'CACHE_TTL_MS', 0, { integer: true, min: 0 }),
    },
    supportedIntervals: optional(env, 'SUPPORTED_INTERVALS', '1m,5m,15m,1h,4h,1d')
      .split(',')
      .map(s => s.trim())
      .filter(s => s.length > 0),
    conflictTolerance: numeric(env, 'CONFLICT_TOLERANCE', 0.001, { min: 0 }),
    canonicalDecimals: numeric(env, 'CANONICAL_DECIMALS', 9, { integer: true, min: 0 }),
    dataDir: path.resolve(optional(env, 'DATA_DIR', path.resolve(__dirname, '../../data'))),
    apiPort: numeric(env, 'API_PORT', 3848, { integer: true, min: 1 }),
  };
}

/** Returns the names of missing provider credentials. Never throws. */
export function validateConfig(cfg: EngineConfig): string[] {
  const missing: string[] = [];
  if (!cfg.providers.birdeye.apiKey) missing.push('BIRDEYE_API_KEY');
  if (!cfg.providers.solscan.apiKey) missing.push('SOLSCAN_API_KEY');
  if (!cfg.providers.helius.rpcUrl) missing.push('HELIUS_API_KEY');

  if (missing.length > 0) {
    log.warn('Missing provider credentials, those providers are disabled', { missing });
  }
  return missing;
}

export const config = loadConfig(process.env);
