// ============================================================
// Reporting — ledger statistics and the periodic text report
// ============================================================

import type { LedgerData, SettlementReport } from "../types/index.js";
import { tradeResult } from "../ledger/run-ledger.js";

export interface LedgerStats {
  balance: number;            // initial balance minus cost still at stake
  totalInvested: number;
  pendingCost: number;
  cancelledCost: number;
  potentialPayout: number;    // shares of pending trades
  potentialProfit: number;
  realizedProfit: number;     // wins pay $1/share, losses forfeit cost
  totalRuns: number;
  totalTrades: number;
  wins: number;
  losses: number;
  cancelled: number;
  pending: number;
  roi: number;                // potentialProfit / pendingCost, in percent
}

export function summarizeLedger(data: LedgerData, initialBalance: number): LedgerStats {
  const trades = data.runs.flatMap((r) => r.executedTrades);

  let pendingCost = 0;
  let cancelledCost = 0;
  let potentialPayout = 0;
  let realizedProfit = 0;
  const counts = { win: 0, loss: 0, cancelled: 0, pending: 0 };

  for (const t of trades) {
    const result = tradeResult(t);
    counts[result]++;
    switch (result) {
      case "pending":
        pendingCost += t.cost;
        potentialPayout += t.shares;
        break;
      case "cancelled":
        cancelledCost += t.cost;
        break;
      case "win":
        realizedProfit += t.shares - t.cost;
        break;
      case "loss":
        realizedProfit -= t.cost;
        break;
    }
  }

  const potentialProfit = potentialPayout - pendingCost;

  return {
    balance: initialBalance - pendingCost,
    totalInvested: trades.reduce((sum, t) => sum + t.cost, 0),
    pendingCost,
    cancelledCost,
    potentialPayout,
    potentialProfit,
    realizedProfit,
    totalRuns: data.runs.length,
    totalTrades: trades.length,
    wins: counts.win,
    losses: counts.loss,
    cancelled: counts.cancelled,
    pending: counts.pending,
    roi: pendingCost > 0 ? (potentialProfit / pendingCost) * 100 : 0,
  };
}

const MAX_PENDING_LINES = 3;

export function buildReport(
  data: LedgerData,
  settlement: SettlementReport,
  initialBalance: number
): string {
  const latest = data.runs.at(-1);
  if (!latest) return "No runs recorded yet";

  const stats = summarizeLedger(data, initialBalance);
  const lines = [
    "Polymarket Scan Report",
    "=".repeat(30),
    "Latest scan:",
    `  API returned: ${latest.scanInfo.totalApi} markets`,
    `  Eligible:     ${latest.scanInfo.filtered}`,
    "",
    "Wallet:",
    `  Balance:          $${latest.summary.balanceAfter.toFixed(2)}`,
    `  Invested:         $${latest.summary.totalInvested.toFixed(2)}`,
    `  Potential payout: $${latest.summary.potentialPayout.toFixed(2)}`,
    "",
    "Ledger:",
    `  Runs: ${stats.totalRuns} | Trades: ${stats.totalTrades}`,
    `  Won: ${stats.wins} | Lost: ${stats.losses} | Cancelled: ${stats.cancelled} | Pending: ${stats.pending}`,
    `  Realized P&L: ${stats.realizedProfit >= 0 ? "+" : "-"}$${Math.abs(stats.realizedProfit).toFixed(2)}`,
  ];

  if (settlement.newlyResolved.length > 0) {
    lines.push("", `Settled (${settlement.newlyResolved.length}):`);
    for (const t of settlement.newlyResolved) {
      const result = tradeResult(t);
      const mark = result === "win" ? "WIN " : result === "cancelled" ? "VOID" : "LOSS";
      lines.push(`  ${mark} ${t.outcome} → ${t.resolution}`);
    }
  }

  if (settlement.unresolved.length > 0) {
    lines.push("", `Pending (${settlement.unresolved.length}):`);
    for (const t of settlement.unresolved.slice(0, MAX_PENDING_LINES)) {
      lines.push(`  ${t.outcome} @ $${t.price.toFixed(2)} - ${t.question.slice(0, 25)}...`);
    }
  }

  return lines.join("\n");
}
