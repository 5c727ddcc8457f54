import { z } from 'zod';
import { UpstreamError } from '../core';
import type { ProviderName, TimeRange, UpstreamReason } from '../core';
import { createLogger } from '../utils';

const log = createLogger('provider-http');

export function classifyStatus(status: number): UpstreamReason {
  if (status === 429) return 'rate_limited';
  if (status >= 500 || status === 408) return 'transient';
  return 'permanent';
}

export interface GetJsonOptions<T> {
  provider: ProviderName;
  url: string;
  headers: Record<string, string>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  window: TimeRange;
  signal?: AbortSignal;
}

/**
 * GET + JSON decode + schema validation. Every failure comes out as an
 * UpstreamError classified by kind; an aborted request rethrows the abort reason
 * when it already is one (the timeout path sets it).
 */
export async function getJson<T>(opts: GetJsonOptions<T>): Promise<T> {
  const { provider, url, headers, schema, window, signal } = opts;

  let res: Response;
  try {
    res = await fetch(url, { headers: { accept: 'application/json', ...headers }, signal });
  } catch (err) {
    if (signal?.aborted && signal.reason instanceof UpstreamError) throw signal.reason;
    throw new UpstreamError(provider, 'transient', `network error: ${err instanceof Error ? err.message : String(err)}`, window, { cause: err });
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    const reason = classifyStatus(res.status);
    log.warn('Provider HTTP error', { provider, status: res.status, reason });
    throw new UpstreamError(provider, reason, `HTTP ${res.status}: ${text.slice(0, 200)}`, window, { status: res.status });
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    if (signal?.aborted && signal.reason instanceof UpstreamError) throw signal.reason;
    throw new UpstreamError(provider, 'permanent', 'response is not JSON', window, { status: res.status, cause: err });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UpstreamError(
      provider,
      'permanent',
      `malformed response: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'schema mismatch'}`,
      window,
      { status: res.status },
    );
  }
  return parsed.data;
}

/** Paging stopped at the page cap while the provider still had older history. */
export function truncatedHistory(provider: ProviderName, pages: number, window: TimeRange): UpstreamError {
  log.warn('Provider history truncated', { provider, pages, window });
  return new UpstreamError(provider, 'permanent', `history truncated after ${pages} pages before window start`, window);
}

export function buildUrl(base: string, path: string, params: Record<string, string | number>): string {
  const url = new URL(path, base);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}
