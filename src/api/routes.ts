import { z } from 'zod';
import { InvalidRequestError } from '../core';
import type { Subject, TimeRange } from '../core';
import { toApiResult } from '../engine';
import type { ApiResult, MarketEngine } from '../engine';

const DEFAULT_WINDOW_HOURS = 24;

export interface RouteContext {
  engine: MarketEngine;
  /** Unix seconds. */
  now?: () => number;
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

const syncBodySchema = z
  .object({
    token: z.string().min(1).optional(),
    wallet: z.string().min(1).optional(),
    from: z.number().int().nonnegative().optional(),
    to: z.number().int().nonnegative().optional(),
    hours: z.number().positive().optional(),
  })
  .refine(b => (b.token === undefined) !== (b.wallet === undefined), {
    message: 'Exactly one of "token" or "wallet" is required',
  });

export function statusFor(result: ApiResult<unknown>): number {
  if (result.success) return 200;
  switch (result.error.kind) {
    case 'invalid_interval':
    case 'invalid_request':
      return 400;
    case 'source_unavailable':
      return 503;
    case 'upstream':
      return 502;
    case 'not_found':
      return 404;
    default:
      return 500;
  }
}

function intParam(params: URLSearchParams, name: string): number | undefined {
  const raw = params.get(name);
  if (raw === null || raw === '') return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new InvalidRequestError(`Query parameter "${name}" must be a non-negative integer, got "${raw}"`);
  }
  return Number(raw);
}

/** Fills missing bounds with a trailing window ending now (or at `to`). */
export function resolveWindow(
  bounds: { from?: number; to?: number; hours?: number },
  nowSeconds: number,
): TimeRange {
  const to = bounds.to ?? nowSeconds;
  const hours = bounds.hours ?? DEFAULT_WINDOW_HOURS;
  const from = bounds.from ?? Math.max(0, to - Math.round(hours * 3600));
  return { from, to };
}

function respond(result: ApiResult<unknown>): RouteResponse {
  return { status: statusFor(result), body: result };
}

function notFound(method: string, pathname: string): RouteResponse {
  return respond({
    success: false,
    error: { kind: 'not_found', message: `No route for ${method} ${pathname}` },
  });
}

/**
 * Dispatches one API request. `body` is the parsed JSON body, or undefined when
 * the request had none.
 */
export async function routeRequest(
  ctx: RouteContext,
  method: string,
  rawUrl: string,
  body?: unknown,
): Promise<RouteResponse> {
  const { engine } = ctx;
  const nowSeconds = ctx.now ? ctx.now() : Math.floor(Date.now() / 1000);
  const url = new URL(rawUrl, 'http://localhost');
  let segments: string[];
  try {
    segments = url.pathname.split('/').filter(Boolean).map(segment => decodeURIComponent(segment));
  } catch (err) {
    if (!(err instanceof URIError)) throw err;
    return respond({
      success: false,
      error: { kind: 'invalid_request', message: `Malformed escape in path ${url.pathname}` },
    });
  }

  if (segments[0] !== 'api') return notFound(method, url.pathname);
  const [, route, param] = segments;

  if (method === 'GET' && route === 'health' && segments.length === 2) {
    return {
      status: 200,
      body: {
        success: true,
        data: {
          status: 'ok',
          providers: engine.providers,
          cache: engine.cacheStats(),
          timestamp: nowSeconds,
        },
        warnings: [],
      },
    };
  }

  if (method === 'GET' && route === 'candles' && param !== undefined && segments.length === 3) {
    return respond(await toApiResult(async () => {
      const interval = url.searchParams.get('interval') ?? '1m';
      const window = resolveWindow(
        { from: intParam(url.searchParams, 'from'), to: intParam(url.searchParams, 'to') },
        nowSeconds,
      );
      return engine.getCandles(param, interval, window, intParam(url.searchParams, 'limit'));
    }));
  }

  if (method === 'GET' && route === 'trades' && param !== undefined && segments.length === 3) {
    return respond(await toApiResult(async () => {
      const token = url.searchParams.get('token') || undefined;
      return engine.getTrades(param, token, intParam(url.searchParams, 'limit'));
    }));
  }

  if (method === 'GET' && route === 'pnl' && param !== undefined && segments.length === 3) {
    return respond(await toApiResult(async () => {
      const token = url.searchParams.get('token') || '*';
      return engine.getWalletPnl(param, token, intParam(url.searchParams, 'asOf'));
    }));
  }

  if (method === 'POST' && route === 'sync' && segments.length === 2) {
    return respond(await toApiResult(async () => {
      const parsed = syncBodySchema.safeParse(body ?? {});
      if (!parsed.success) {
        throw new InvalidRequestError(parsed.error.issues.map(i => i.message).join('; '));
      }
      const { token, wallet, ...bounds } = parsed.data;
      const subject: Subject = token !== undefined
        ? { kind: 'token', address: token }
        : { kind: 'wallet', address: wallet ?? '' };
      return engine.sync(subject, resolveWindow(bounds, nowSeconds));
    }));
  }

  return notFound(method, url.pathname);
}
