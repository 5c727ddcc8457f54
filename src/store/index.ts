export { MemoryTradeStore } from './trade-store';
export type { TradePreference, TradeQuery, TradeStore } from './trade-store';
export { JsonlTradeStore } from './jsonl-store';
