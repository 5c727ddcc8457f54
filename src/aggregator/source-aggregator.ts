import {
  SourceUnavailableError, UpstreamError, compareTrades, completeness, inRange, mergeKey, roundTo, uniquenessKey,
  withinTolerance,
} from '../core';
import type { CanonicalTrade, DataConflict, ProviderName, TimeRange, UpstreamFailure } from '../core';
import type { FetchQuery, ProviderAdapter } from '../providers';
import { createLogger } from '../utils';
import { callWithPolicy } from './policy';
import type { CallPolicy } from './policy';

const log = createLogger('aggregator');

export interface MergeOptions {
  primaryProviders: Record<string, ProviderName>;
  conflictTolerance: number;
  canonicalDecimals: number;
}

export interface ProviderResult {
  provider: ProviderName;
  trades: CanonicalTrade[];
}

export interface MergeResult {
  trades: CanonicalTrade[];
  conflicts: DataConflict[];
}

export interface CollectResult extends MergeResult {
  failures: UpstreamFailure[];
  fetched: number;
}

type ComparedField = DataConflict['field'];
const COMPARED_FIELDS: ComparedField[] = ['unitPrice', 'baseAmount', 'quoteAmount'];

/**
 * Candidate order for one transaction: the chain's primary provider, then the
 * most complete record, then provider name so the pick never depends on arrival.
 * Negative when `a` is preferred.
 */
export function compareCandidates(a: CanonicalTrade, b: CanonicalTrade, opts: Pick<MergeOptions, 'primaryProviders'>): number {
  const aPrimary = opts.primaryProviders[a.chain] === a.source ? 1 : 0;
  const bPrimary = opts.primaryProviders[b.chain] === b.source ? 1 : 0;
  if (aPrimary !== bPrimary) return bPrimary - aPrimary;
  const byCompleteness = completeness(b) - completeness(a);
  if (byCompleteness !== 0) return byCompleteness;
  return a.source < b.source ? -1 : a.source > b.source ? 1 : 0;
}

function rankCandidates(candidates: CanonicalTrade[], opts: MergeOptions): CanonicalTrade[] {
  return [...candidates].sort((a, b) => compareCandidates(a, b, opts));
}

function detectConflicts(winner: CanonicalTrade, others: CanonicalTrade[], opts: MergeOptions): DataConflict[] {
  const conflicts: DataConflict[] = [];
  for (const field of COMPARED_FIELDS) {
    const kept = winner[field];
    if (kept === null) continue;
    const keptRounded = roundTo(kept, opts.canonicalDecimals);

    const discarded = others
      .filter(o => {
        const value = o[field];
        if (value === null) return false;
        return !withinTolerance(keptRounded, roundTo(value, opts.canonicalDecimals), opts.conflictTolerance);
      })
      .map(o => ({ source: o.source, value: o[field] }));

    if (discarded.length > 0) {
      conflicts.push({
        kind: 'DataConflict',
        provenanceId: winner.provenanceId,
        tokenAddress: winner.tokenAddress,
        field,
        timestamp: winner.timestamp,
        kept: { source: winner.source, value: kept },
        discarded,
      });
    }
  }
  return conflicts;
}

/**
 * Deduplicates per-provider results into one ordered trade sequence. Records for
 * the same transaction and token collapse to one; disagreements beyond the
 * tolerance are reported, never fatal.
 */
export function mergeTrades(results: ProviderResult[], range: TimeRange, opts: MergeOptions): MergeResult {
  const groups = new Map<string, CanonicalTrade[]>();
  const seen = new Set<string>();

  for (const { trades } of results) {
    for (const trade of trades) {
      if (!inRange(trade, range)) continue;
      // A provider repeating itself across pages is not a second opinion
      const ownKey = `${uniquenessKey(trade)}:${trade.tokenAddress}`;
      if (seen.has(ownKey)) continue;
      seen.add(ownKey);

      const key = mergeKey(trade);
      const group = groups.get(key);
      if (group) {
        group.push(trade);
      } else {
        groups.set(key, [trade]);
      }
    }
  }

  const merged: CanonicalTrade[] = [];
  const conflicts: DataConflict[] = [];
  for (const candidates of groups.values()) {
    const [winner, ...others] = rankCandidates(candidates, opts);
    if (!winner) continue;
    merged.push(winner);
    if (others.length > 0) {
      const found = detectConflicts(winner, others, opts);
      for (const c of found) {
        log.warn('Provider disagreement', {
          sig: c.provenanceId,
          token: c.tokenAddress,
          field: c.field,
          kept: c.kept,
          discarded: c.discarded,
        });
      }
      conflicts.push(...found);
    }
  }

  merged.sort(compareTrades);
  conflicts.sort((a, b) => a.timestamp - b.timestamp || (a.provenanceId < b.provenanceId ? -1 : a.provenanceId > b.provenanceId ? 1 : 0));
  return { trades: merged, conflicts };
}

export class SourceAggregator {
  constructor(
    private readonly adapters: ProviderAdapter[],
    private readonly policies: Record<ProviderName, CallPolicy>,
    private readonly opts: MergeOptions,
  ) {}

  get providers(): ProviderName[] {
    return this.adapters.map(a => a.name);
  }

  /**
   * Fetches every configured provider concurrently and waits for all of them.
   * Throws SourceUnavailableError when none answered, so an empty result always
   * means no trades occurred.
   */
  async collect(query: FetchQuery): Promise<CollectResult> {
    if (this.adapters.length === 0) {
      throw new SourceUnavailableError(query.subject, query.range, []);
    }

    const settled = await Promise.allSettled(
      this.adapters.map(adapter => callWithPolicy(adapter, query, this.policies[adapter.name])),
    );

    const results: ProviderResult[] = [];
    const failures: UpstreamFailure[] = [];
    settled.forEach((outcome, i) => {
      const adapter = this.adapters[i];
      if (!adapter) return;
      if (outcome.status === 'fulfilled') {
        results.push({ provider: adapter.name, trades: outcome.value });
        return;
      }
      const err = outcome.reason instanceof UpstreamError
        ? outcome.reason
        : new UpstreamError(adapter.name, 'permanent', String(outcome.reason), query.range);
      log.warn('Provider unavailable for window', { ...err.toFailure(), subject: query.subject });
      failures.push(err.toFailure());
    });

    if (results.length === 0) {
      throw new SourceUnavailableError(query.subject, query.range, failures);
    }

    const fetched = results.reduce((sum, r) => sum + r.trades.length, 0);
    const { trades, conflicts } = mergeTrades(results, query.range, this.opts);
    log.info('Aggregated provider results', {
      subject: query.subject,
      providers: results.map(r => r.provider),
      fetched,
      merged: trades.length,
      conflicts: conflicts.length,
      failed: failures.map(f => f.provider),
    });
    return { trades, conflicts, failures, fetched };
  }
}
