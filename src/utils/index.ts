export { config, loadConfig, validateConfig, PROVIDER_NAMES, WSOL_MINT } from './config';
export type { EngineConfig, ProviderName, ProviderSettings, RetryPolicy } from './config';
export { createLogger } from './logger';
export { getConnection } from './rpc';
export { KeyedMutex } from './keyed-mutex';
export { sleep } from './sleep';
