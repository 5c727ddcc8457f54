export type {
  CanonicalTrade, Candle, DataConflict, EngineWarning, Lot, PnLEvent, ProviderName,
  Shortfall, Subject, TimeRange, TradeSide, UpstreamFailure, UpstreamReason,
} from './types';
export {
  EngineError, UpstreamError, SourceUnavailableError, InvalidIntervalError, InvalidRequestError, isEngineError,
} from './errors';
export type { EngineErrorKind } from './errors';
export { makeTrade, mergeKey, uniquenessKey, completeness, compareTrades, inRange, toSeconds } from './trade';
export type { TradeInput } from './trade';
export { roundTo, withinTolerance, rawToHuman } from './precision';
