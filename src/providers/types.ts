import type { CanonicalTrade, ProviderName, Subject, TimeRange } from '../core';

export interface FetchQuery {
  subject: Subject;
  range: TimeRange;
}

/**
 * One upstream source. Translates its provider's shapes and units into
 * CanonicalTrade; no cross-source reasoning. Failures are UpstreamError.
 */
export interface ProviderAdapter {
  readonly name: ProviderName;
  fetch(query: FetchQuery, signal?: AbortSignal): Promise<CanonicalTrade[]>;
}

export interface AdapterOptions {
  chain: string;
  quoteMint: string;
  maxPages: number;
}
