// ============================================================
// Virtual Trader — simulated buys against a bounded balance
// ============================================================

import type { ExecutedTrade, Market, Position } from "../types/index.js";
import { dominantOutcome, dominantPrice } from "../utils/market-normalizer.js";
import type { Logger } from "../utils/logger.js";

export class VirtualTrader {
  private trades: ExecutedTrade[] = [];
  private positions: Position[] = [];
  private balance: number;
  private initialBalance: number;
  private sharesPerTrade: number;
  private logger: Logger;

  /**
   * @param sharesPerTrade - fixed share count bought on every trade; the
   *   dollar cost therefore scales with price
   */
  constructor(initialBalanceUsd: number, sharesPerTrade: number, logger: Logger) {
    this.balance = initialBalanceUsd;
    this.initialBalance = initialBalanceUsd;
    this.sharesPerTrade = sharesPerTrade;
    this.logger = logger;
    this.logger.info(`Virtual trader initialized with $${initialBalanceUsd.toFixed(2)} balance`);
  }

  /**
   * Buy the dominant side of a market. Returns null (no state change) when
   * the balance cannot cover the cost or the market has no usable price.
   */
  execute(market: Market, now: Date = new Date()): ExecutedTrade | null {
    const outcome = dominantOutcome(market);
    const price = dominantPrice(market);
    const shares = this.sharesPerTrade;
    const cost = price * shares;

    if (price <= 0) {
      this.logger.warn(`No usable price for ${market.id}, skipping`);
      return null;
    }

    if (this.balance < cost) {
      this.logger.warn(
        `Insufficient balance for ${market.id}: need $${cost.toFixed(2)}, have $${this.balance.toFixed(2)}`
      );
      return null;
    }

    this.balance -= cost;

    const trade: ExecutedTrade = {
      marketId: market.id,
      question: market.question,
      outcome,
      price,
      shares,
      cost,
      timestamp: now.toISOString(),
      status: "simulated",
      startDate: market.startDate,
      endDate: market.endDate,
      createdAt: market.createdAt,
    };

    this.positions.push({
      marketId: market.id,
      question: market.question,
      outcome,
      price,
      shares,
      cost,
      potentialPayout: shares, // $1 per winning share
      profitIfWin: shares - cost,
      timestamp: trade.timestamp,
    });
    this.trades.push(trade);

    this.logger.info(
      `[PAPER] Executed: BUY ${shares}x ${outcome} ${market.id} @ $${price.toFixed(2)} ($${cost.toFixed(2)})`
    );

    return trade;
  }

  getBalance(): number {
    return this.balance;
  }

  getInitialBalance(): number {
    return this.initialBalance;
  }

  getTotalInvested(): number {
    return this.positions.reduce((sum, p) => sum + p.cost, 0);
  }

  getPotentialPayout(): number {
    return this.positions.reduce((sum, p) => sum + p.potentialPayout, 0);
  }

  getTotalProfitIfWin(): number {
    return this.positions.reduce((sum, p) => sum + p.profitIfWin, 0);
  }

  getPositions(): Position[] {
    return [...this.positions];
  }

  getTrades(): ExecutedTrade[] {
    return [...this.trades];
  }

  /** Print a summary report */
  printSummary(): void {
    console.log("\n" + "=".repeat(60));
    console.log("  PAPER TRADING SUMMARY");
    console.log("=".repeat(60));
    console.log(`  Initial Balance:   $${this.initialBalance.toFixed(2)}`);
    console.log(`  Current Balance:   $${this.balance.toFixed(2)}`);
    console.log(`  Positions:         ${this.positions.length}`);
    console.log(`  Total Invested:    $${this.getTotalInvested().toFixed(2)}`);
    console.log(`  Potential Payout:  $${this.getPotentialPayout().toFixed(2)}`);
    console.log(`  Profit If All Win: +$${this.getTotalProfitIfWin().toFixed(2)}`);
    console.log("=".repeat(60));

    if (this.positions.length > 0) {
      console.log("\n  POSITIONS:");
      for (const pos of this.positions) {
        console.log(
          `  ${pos.outcome.padEnd(4)} ${pos.shares}x ${pos.marketId.padEnd(12)} @ $${pos.price.toFixed(2)} — ${pos.question.slice(0, 50)}`
        );
      }
    }
    console.log("");
  }
}
