#!/usr/bin/env tsx
// ============================================================
// CLI: Scan markets for candidates (one-shot, no trading)
// ============================================================

import { loadConfig } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import { GammaClient } from "../api/gamma-client.js";
import { MarketScanner } from "../agent/market-scanner.js";
import {
  dominantOutcome,
  dominantPrice,
  hoursUntilEnd,
} from "../utils/market-normalizer.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, { logDir: config.logDir });

  logger.info("=== Polymarket Market Scanner ===");

  const scanner = new MarketScanner(new GammaClient(config, logger), config, logger);
  const now = new Date();
  const { markets, stats } = await scanner.scan(now);

  console.log("\n" + "=".repeat(70));
  console.log("  MARKET SCAN RESULTS");
  console.log("=".repeat(70));
  console.log(
    `  API: ${stats.totalApi} | non-crypto: ${stats.nonCrypto} | ` +
      `parsed: ${stats.totalParsed} | eligible: ${stats.filtered}`
  );

  if (markets.length > 0) {
    console.log(`\n  CANDIDATES (${markets.length}):\n`);
    for (const m of markets) {
      console.log(
        `  ${dominantOutcome(m).padEnd(4)} @ $${dominantPrice(m).toFixed(3)} | ` +
          `ends in ${hoursUntilEnd(m, now).toFixed(1)}h | ` +
          `vol ${m.volume.toFixed(0)} | ${m.question.slice(0, 60)}`
      );
    }
  } else {
    console.log("\n  No markets matched the filters.");
  }

  console.log("\n" + "=".repeat(70) + "\n");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
