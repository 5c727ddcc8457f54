import { UpstreamError } from '../core';
import type { CanonicalTrade, ProviderName, TimeRange } from '../core';
import type { FetchQuery, ProviderAdapter } from '../providers';
import { createLogger, sleep } from '../utils';
import type { RetryPolicy } from '../utils';

const log = createLogger('call-policy');

export interface CallPolicy {
  retry: RetryPolicy;
  timeoutMs: number;
}

export function backoffMs(policy: RetryPolicy, attempt: number): number {
  return policy.backoffBaseMs * Math.pow(2, attempt - 1);
}

function toUpstreamError(err: unknown, provider: ProviderName, window: TimeRange, signal: AbortSignal): UpstreamError {
  if (err instanceof UpstreamError) return err;
  if (signal.aborted && signal.reason instanceof UpstreamError) return signal.reason;
  const message = err instanceof Error ? err.message : String(err);
  // Anything an adapter did not classify is a defect on our side, not worth retrying
  return new UpstreamError(provider, 'permanent', `adapter failure: ${message}`, window, { cause: err });
}

/** Settles with the work, or rejects with the abort reason as soon as the signal fires. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal, provider: ProviderName): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      log.debug('Provider call abandoned', { provider });
      reject(signal.reason);
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      err => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Runs one provider fetch under a single deadline of `timeoutMs`, retrying only
 * transient failures, at most `maxAttempts` times with exponential backoff.
 * Permanent and rate-limited failures are thrown on first sight.
 */
export async function callWithPolicy(
  adapter: ProviderAdapter,
  query: FetchQuery,
  policy: CallPolicy,
): Promise<CanonicalTrade[]> {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(
      new UpstreamError(adapter.name, 'transient', `timed out after ${policy.timeoutMs}ms`, query.range, { timedOut: true }),
    );
  }, policy.timeoutMs);

  try {
    for (let attempt = 1; ; attempt++) {
      try {
        return await raceAbort(adapter.fetch(query, controller.signal), controller.signal, adapter.name);
      } catch (err) {
        const upstream = toUpstreamError(err, adapter.name, query.range, controller.signal);
        if (!upstream.retryable || attempt >= policy.retry.maxAttempts) throw upstream;

        const waitMs = backoffMs(policy.retry, attempt);
        log.warn('Transient provider failure, retrying', {
          provider: adapter.name,
          attempt,
          maxAttempts: policy.retry.maxAttempts,
          waitMs,
          error: upstream.message,
        });
        await sleep(waitMs, controller.signal);
      }
    }
  } finally {
    clearTimeout(timer);
  }
}
