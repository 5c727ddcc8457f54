export { SourceAggregator, compareCandidates, mergeTrades } from './source-aggregator';
export type { CollectResult, MergeOptions, MergeResult, ProviderResult } from './source-aggregator';
export { callWithPolicy, backoffMs } from './policy';
export type { CallPolicy } from './policy';
