// ============================================================
// Scan Loop — settle, scan, trade, record; once per interval
// ============================================================

import type {
  BotConfig,
  ExecutedTrade,
  Market,
  PlannedTrade,
  RunRecord,
} from "../types/index.js";
import { GammaClient, type MarketDataSource } from "../api/gamma-client.js";
import { RunLedger } from "../ledger/run-ledger.js";
import { MarketScanner } from "./market-scanner.js";
import { SettlementReconciler } from "./settlement-reconciler.js";
import { VirtualTrader } from "./virtual-trader.js";
import {
  dominantOutcome,
  dominantPrice,
  hoursUntilEnd,
  maxProbability,
} from "../utils/market-normalizer.js";
import type { Logger } from "../utils/logger.js";

// Granularity at which the inter-cycle wait notices stop()
const STOP_POLL_MS = 500;

export interface ScanLoopDeps {
  source?: MarketDataSource;
  ledger?: RunLedger;
  trader?: VirtualTrader;
  clock?: () => Date;
}

export class ScanLoop {
  private scanner: MarketScanner;
  private reconciler: SettlementReconciler;
  private trader: VirtualTrader;
  private ledger: RunLedger;
  private config: BotConfig;
  private logger: Logger;
  private clock: () => Date;
  private running = false;
  private loaded = false;

  constructor(config: BotConfig, logger: Logger, deps: ScanLoopDeps = {}) {
    this.config = config;
    this.logger = logger;

    const source = deps.source ?? new GammaClient(config, logger);
    this.scanner = new MarketScanner(source, config, logger);
    this.reconciler = new SettlementReconciler(source, logger);
    this.ledger = deps.ledger ?? new RunLedger(config.ledgerPath, logger);
    this.trader =
      deps.trader ??
      new VirtualTrader(config.trading.virtualBalance, config.trading.sharesPerTrade, logger);
    this.clock = deps.clock ?? (() => new Date());
  }

  getTrader(): VirtualTrader {
    return this.trader;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Run a single cycle. Returns the recorded run, or null if the cycle failed. */
  async runCycle(): Promise<RunRecord | null> {
    this.logger.info("--- Starting scan cycle ---");

    try {
      if (!this.loaded) {
        await this.ledger.load();
        this.loaded = true;
      }

      // 1. Settle trades from earlier runs
      const settlement = await this.reconciler.reconcile(this.ledger);
      if (settlement.newlyResolved.length > 0) {
        this.logger.info(`${settlement.newlyResolved.length} newly settled markets`);
      }

      const now = this.clock();
      const balanceBefore = this.trader.getBalance();
      this.logger.info(`Virtual balance: $${balanceBefore.toFixed(2)}`);

      // 2. Scan and rank
      const { markets, stats } = await this.scanner.scan(now);
      if (markets.length === 0) {
        this.logger.info("No eligible markets this cycle");
      }

      // 3. Plan and execute
      const plannedTrades = markets.map((m) => this.planTrade(m, now));
      const executedTrades = this.executeCandidates(markets, now);

      // 4. Record
      const balanceAfter = this.trader.getBalance();
      const record = await this.ledger.append(
        {
          balanceBefore,
          scanInfo: stats,
          plannedTrades,
          executedTrades,
          summary: {
            marketsSelected: markets.length,
            tradesPlanned: plannedTrades.length,
            tradesExecuted: executedTrades.length,
            runInvested: executedTrades.reduce((sum, t) => sum + t.cost, 0),
            totalInvested: this.trader.getTotalInvested(),
            potentialPayout: this.trader.getPotentialPayout(),
            profitIfWin: this.trader.getTotalProfitIfWin(),
            balanceAfter,
          },
        },
        now
      );

      this.logger.info(
        `--- Cycle complete: ${executedTrades.length} trades | balance $${balanceAfter.toFixed(2)} | ` +
          `invested $${this.trader.getTotalInvested().toFixed(2)} | ` +
          `potential payout $${this.trader.getPotentialPayout().toFixed(2)} | ` +
          `profit if win $${this.trader.getTotalProfitIfWin().toFixed(2)} ---`
      );
      return record;
    } catch (err) {
      this.logger.error(`Cycle failed: ${err}`);
      return null;
    }
  }

  /** Start the continuous scan loop; resolves once stop() is called */
  async start(): Promise<void> {
    this.running = true;
    const { scanIntervalSeconds } = this.config.trading;
    this.logger.info(`Bot starting — scanning every ${scanIntervalSeconds}s`);

    while (this.running) {
      await this.runCycle();
      this.trader.printSummary();

      if (!this.running) break;
      this.logger.info(`Sleeping ${scanIntervalSeconds}s until next cycle...`);
      await this.waitForNextCycle(scanIntervalSeconds * 1000);
    }

    this.logger.info("Bot stopped");
  }

  /** Stop the loop; an in-flight cycle finishes its current request */
  stop(): void {
    this.running = false;
    this.logger.info("Bot stopping...");
  }

  // --- Private ---

  private planTrade(market: Market, now: Date): PlannedTrade {
    return {
      marketId: market.id,
      question: market.question,
      outcome: dominantOutcome(market),
      price: dominantPrice(market),
      amount: this.config.trading.tradeAmount,
      reason:
        `Probability ${(maxProbability(market) * 100).toFixed(1)}%, ` +
        `ends in ${hoursUntilEnd(market, now).toFixed(1)}h, fee ${market.fee}`,
    };
  }

  /**
   * Trade candidates in rank order. Stops once the balance falls below the
   * configured trade amount; a refused trade is skipped.
   */
  private executeCandidates(markets: Market[], now: Date): ExecutedTrade[] {
    const executed: ExecutedTrade[] = [];

    for (const market of markets) {
      if (this.trader.getBalance() < this.config.trading.tradeAmount) {
        this.logger.warn("Balance below trade amount, skipping remaining candidates");
        break;
      }

      const trade = this.trader.execute(market, now);
      if (trade) {
        executed.push(trade);
      } else {
        this.logger.warn(`Trade refused: ${market.question.slice(0, 40)}`);
      }
    }

    return executed;
  }

  private async waitForNextCycle(ms: number): Promise<void> {
    const deadline = Date.now() + ms;
    while (this.running && Date.now() < deadline) {
      await sleep(Math.min(STOP_POLL_MS, deadline - Date.now()));
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
