// ============================================================
// Settlement Reconciler — checks unsettled trades upstream
// ============================================================

import {
  CANCELLED_RESOLUTION,
  type ExecutedTrade,
  type LedgerData,
  type SettledTrade,
  type SettlementReport,
} from "../types/index.js";
import type { MarketDataSource } from "../api/gamma-client.js";
import { unsettledTrades, type RunLedger } from "../ledger/run-ledger.js";
import { isRecord, toBoolean } from "../utils/market-normalizer.js";
import type { Logger } from "../utils/logger.js";

type MarketState =
  | { kind: "resolved"; resolution: string }
  | { kind: "open" };

/** Read closed/resolution off a raw market record */
export function readMarketState(raw: unknown): MarketState {
  if (!isRecord(raw) || !toBoolean(raw.closed, false)) return { kind: "open" };

  const resolution = raw.resolution;
  if (typeof resolution === "string" && resolution.trim() !== "" && resolution !== "null") {
    return { kind: "resolved", resolution };
  }
  if ((typeof resolution === "number" && resolution !== 0) || resolution === true) {
    return { kind: "resolved", resolution: String(resolution) };
  }
  // Closed without an outcome: voided, stakes refunded
  return { kind: "resolved", resolution: CANCELLED_RESOLUTION };
}

export class SettlementReconciler {
  private source: MarketDataSource;
  private logger: Logger;

  constructor(source: MarketDataSource, logger: Logger) {
    this.source = source;
    this.logger = logger;
  }

  /**
   * Query upstream for every distinct unsettled market in the ledger.
   * Read-only: the ledger is not modified.
   */
  async check(ledger: LedgerData): Promise<SettlementReport> {
    const report: SettlementReport = { resolved: [], unresolved: [], newlyResolved: [] };

    // First trade per market wins; later trades on the same market are not re-queried
    const pending = new Map<string, ExecutedTrade>();
    for (const trade of unsettledTrades(ledger)) {
      if (trade.marketId && !pending.has(trade.marketId)) {
        pending.set(trade.marketId, trade);
      }
    }

    if (pending.size === 0) return report;
    this.logger.info(`Checking settlement for ${pending.size} markets`);

    for (const [marketId, trade] of pending) {
      let state: MarketState;
      try {
        state = readMarketState(await this.source.getMarket(marketId));
      } catch (err) {
        this.logger.error(`Settlement lookup failed for ${marketId}: ${err}`);
        report.unresolved.push(trade);
        continue;
      }

      if (state.kind === "open") {
        report.unresolved.push(trade);
        continue;
      }

      const settled: SettledTrade = { ...trade, settled: true, resolution: state.resolution };
      report.resolved.push(settled);
      if (!trade.settled) {
        report.newlyResolved.push(settled);
        this.logger.info(`Settled: ${trade.question.slice(0, 40)} → ${state.resolution}`);
      }
    }

    this.logger.info(
      `Settlement check: ${report.resolved.length} resolved, ${report.unresolved.length} pending`
    );
    return report;
  }

  /** check() and write newly resolved trades back to the ledger */
  async reconcile(ledger: RunLedger): Promise<SettlementReport> {
    const report = await this.check(ledger.getData());
    if (report.newlyResolved.length > 0) {
      await ledger.applySettlements(report.newlyResolved);
    }
    return report;
  }
}
