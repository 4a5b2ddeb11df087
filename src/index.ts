// ============================================================
// Polymarket Paper Arbitrage — Main Entry Point
// ============================================================

export { ScanLoop } from "./agent/scan-loop.js";
export { MarketScanner } from "./agent/market-scanner.js";
export { VirtualTrader } from "./agent/virtual-trader.js";
export { SettlementReconciler } from "./agent/settlement-reconciler.js";
export { GammaClient } from "./api/gamma-client.js";
export type { MarketDataSource, MarketWindow } from "./api/gamma-client.js";
export { RunLedger, parseLedger, tradeResult, unsettledTrades } from "./ledger/run-ledger.js";
export {
  decodeMarket,
  normalizeMarkets,
  hoursUntilEnd,
  maxProbability,
  dominantOutcome,
  dominantPrice,
} from "./utils/market-normalizer.js";
export { filterEligible, rejectionReason, isExcludedQuestion } from "./utils/market-filter.js";
export { buildReport, summarizeLedger } from "./utils/report.js";
export { loadConfig } from "./utils/config.js";
export { createLogger } from "./utils/logger.js";
export type * from "./types/index.js";
