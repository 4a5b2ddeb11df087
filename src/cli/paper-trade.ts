#!/usr/bin/env tsx
// ============================================================
// CLI: Run the bot in paper trading mode
// ============================================================

import { loadConfig } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import { ScanLoop } from "../agent/scan-loop.js";
import { VirtualTrader } from "../agent/virtual-trader.js";

function readBalanceFlag(argv: string[]): number | undefined {
  const idx = argv.findIndex((a) => a === "--balance" || a === "-b");
  if (idx === -1) return undefined;
  const value = Number(argv[idx + 1]);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`--balance expects a non-negative number, got "${argv[idx + 1] ?? ""}"`);
  }
  return value;
}

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, { logDir: config.logDir });
  const { trading } = config;
  const balance = readBalanceFlag(process.argv) ?? trading.virtualBalance;

  console.log(`
╔══════════════════════════════════════════════════════════════╗
║          Polymarket Paper Arbitrage — Paper Trading          ║
╠══════════════════════════════════════════════════════════════╣
║  Balance:      $${balance.toFixed(2).padEnd(45)}║
║  Probability:  ${`${(trading.minProbability * 100).toFixed(0)}%–${(trading.maxProbability * 100).toFixed(0)}%`.padEnd(46)}║
║  Ends within:  ${`${trading.maxHoursUntilEnd}h`.padEnd(46)}║
║  Min volume:   ${String(trading.minVolume).padEnd(46)}║
║  Max fee:      ${String(trading.maxFee).padEnd(46)}║
║  Shares/trade: ${String(trading.sharesPerTrade).padEnd(46)}║
║  Scan every:   ${`${trading.scanIntervalSeconds}s`.padEnd(46)}║
╚══════════════════════════════════════════════════════════════╝
  `);

  const loop = new ScanLoop(config, logger, {
    trader: new VirtualTrader(balance, trading.sharesPerTrade, logger),
  });

  // Graceful shutdown
  process.on("SIGINT", () => {
    logger.info("Received SIGINT, shutting down...");
    loop.stop();
  });
  process.on("SIGTERM", () => {
    logger.info("Received SIGTERM, shutting down...");
    loop.stop();
  });

  const singleCycle = process.argv.includes("--once") || process.argv.includes("-o");
  if (singleCycle) {
    await loop.runCycle();
    loop.getTrader().printSummary();
  } else {
    await loop.start();
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
