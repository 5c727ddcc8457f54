import { Connection } from '@solana/web3.js';
import { createLogger } from './logger';

const log = createLogger('rpc');

const connections = new Map<string, Connection>();

export function getConnection(rpcUrl: string): Connection {
  let conn = connections.get(rpcUrl);
  if (!conn) {
    conn = new Connection(rpcUrl, { commitment: 'confirmed' });
    connections.set(rpcUrl, conn);
    log.info('RPC connection initialized', {
      rpc: rpcUrl.replace(/api-key=[^&]*/, 'api-key=***'),
    });
  }
  return conn;
}
