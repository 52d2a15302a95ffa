/**
 * sheetmotion - Scheduler Domain
 * Frame tickers and update-cycle hooks supplied by the host
 */

export {
  createFrameTickerProvider,
  scheduleEndOfFrame,
  type Ticker,
  type TickerProvider,
  type TickCallback,
} from "./ticker";

export {
  createManualTickerProvider,
  createManualCycleScheduler,
  type ManualTickerProvider,
  type ManualCycleScheduler,
} from "./manual";
