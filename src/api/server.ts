import http from 'http';
import type { MarketEngine } from '../engine';
import { createLogger } from '../utils';
import { routeRequest } from './routes';

const log = createLogger('api');

const MAX_BODY_BYTES = 64 * 1024;

let server: http.Server | null = null;

class BodyError extends Error {}

function readBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new BodyError(`Request body exceeds ${MAX_BODY_BYTES} bytes`));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      const text = Buffer.concat(chunks).toString('utf-8').trim();
      if (!text) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(text));
      } catch {
        reject(new BodyError('Request body is not valid JSON'));
      }
    });
    req.on('error', reject);
  });
}

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function handle(engine: MarketEngine, req: http.IncomingMessage, res: http.ServerResponse) {
  const method = req.method || 'GET';
  const url = req.url || '/';

  let body: unknown;
  if (method === 'POST') {
    try {
      body = await readBody(req);
    } catch (err) {
      if (!(err instanceof BodyError)) throw err;
      sendJson(res, 400, { success: false, error: { kind: 'invalid_request', message: err.message } });
      return;
    }
  }

  const started = Date.now();
  const { status, body: payload } = await routeRequest({ engine }, method, url, body);
  sendJson(res, status, payload);
  log.debug('Request served', { method, url, status, ms: Date.now() - started });
}

export function createRequestHandler(engine: MarketEngine) {
  return (req: http.IncomingMessage, res: http.ServerResponse) => {
    // CORS headers for local dev
    res.setHeader('Access-Control-Allow-Origin', '*');

    handle(engine, req, res).catch(err => {
      log.error('Request handler error', { error: err instanceof Error ? err.message : String(err) });
      if (!res.writableEnded) {
        sendJson(res, 500, { success: false, error: { kind: 'internal', message: 'Internal error' } });
      }
    });
  };
}

export function startApiServer(engine: MarketEngine, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server = http.createServer(createRequestHandler(engine));
    server.once('error', reject);
    server.listen(port, () => {
      log.info(`API listening at http://localhost:${port}`);
      resolve();
    });
  });
}

export function stopApiServer(): Promise<void> {
  return new Promise((resolve) => {
    if (server) {
      server.close(() => resolve());
      server = null;
    } else {
      resolve();
    }
  });
}
