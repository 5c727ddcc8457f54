import { startApiServer, stopApiServer } from './api';
import { createEngine } from './engine';
import { config, createLogger, validateConfig } from './utils';

const log = createLogger('main');

async function main() {
  validateConfig(config);
  const engine = createEngine(config);

  log.info('Market data engine starting', {
    chain: config.chain,
    providers: engine.providers,
    primaryProviders: config.primaryProviders,
    intervals: config.supportedIntervals,
    dataDir: config.dataDir,
  });

  if (engine.providers.length === 0) {
    log.warn('No providers configured; only stored trades will be served');
  }

  await startApiServer(engine, config.apiPort);

  const shutdown = async () => {
    log.info('Shutting down...');
    log.info('Cache stats', engine.cacheStats());
    await stopApiServer();
    log.info('Goodbye');
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  log.error('Fatal error', err);
  process.exit(1);
});
