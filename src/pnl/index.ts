export { LotMatcher, LedgerArena, ledgerKey, matchTrades, unrealizedPnl, openAmount } from './lot-matcher';
export type { LedgerSnapshot, SkippedTrade } from './lot-matcher';
