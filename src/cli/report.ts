#!/usr/bin/env tsx
// ============================================================
// CLI: Print the settlement report (reads the ledger, never writes it)
// ============================================================

import { loadConfig } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import { GammaClient } from "../api/gamma-client.js";
import { RunLedger } from "../ledger/run-ledger.js";
import { SettlementReconciler } from "../agent/settlement-reconciler.js";
import { buildReport } from "../utils/report.js";

async function main() {
  const config = loadConfig();
  // Keep stdout for the report itself
  const logger = createLogger("warn", { logDir: config.logDir });

  const ledger = new RunLedger(config.ledgerPath, logger, { readOnly: true });
  const data = await ledger.load();

  const reconciler = new SettlementReconciler(new GammaClient(config, logger), logger);
  const settlement = await reconciler.check(data);

  console.log(buildReport(data, settlement, config.trading.virtualBalance));
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
