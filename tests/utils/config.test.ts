import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "../../src/utils/config.js";

describe("loadConfig", () => {
  it("applies defaults when nothing is set", () => {
    const config = loadConfig({});
    assert.equal(config.api.gammaBaseUrl, "https://gamma-api.polymarket.com");
    assert.equal(config.api.requestTimeoutMs, 30_000);
    assert.equal(config.api.settlementTimeoutMs, 10_000);
    assert.equal(config.api.marketFetchLimit, 500);
    assert.deepEqual(config.trading, {
      virtualBalance: 1000,
      maxTradesPerRun: 5,
      minProbability: 0.9,
      maxProbability: 0.98,
      maxHoursUntilEnd: 4,
      minVolume: 1000,
      maxFee: 0,
      tradeAmount: 5,
      sharesPerTrade: 5,
      scanIntervalSeconds: 3600,
      excludedKeywords: ["bitcoin", "btc", "ethereum", "eth", "solana", "xrp", "up or down"],
    });
    assert.equal(config.ledgerPath, "data/trades.json");
    assert.equal(config.logLevel, "info");
    assert.equal(config.logDir, "logs");
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      GAMMA_API_URL: "http://localhost:8080/",
      VIRTUAL_BALANCE: "250.5",
      MAX_TRADES_PER_RUN: "3",
      SHARES_PER_TRADE: "10",
      EXCLUDED_KEYWORDS: " Doge , ,Weather ",
      LEDGER_PATH: "/tmp/ledger.json",
    });
    assert.equal(config.api.gammaBaseUrl, "http://localhost:8080");
    assert.equal(config.trading.virtualBalance, 250.5);
    assert.equal(config.trading.maxTradesPerRun, 3);
    assert.equal(config.trading.sharesPerTrade, 10);
    assert.deepEqual(config.trading.excludedKeywords, ["doge", "weather"]);
    assert.equal(config.ledgerPath, "/tmp/ledger.json");
  });

  it("treats blank values as unset", () => {
    assert.equal(loadConfig({ MIN_VOLUME: "  " }).trading.minVolume, 1000);
  });

  it("rejects non-numeric values", () => {
    assert.throws(
      () => loadConfig({ MIN_VOLUME: "lots" }),
      /Invalid numeric environment variable MIN_VOLUME: "lots"/
    );
  });

  it("rejects fractional integer settings", () => {
    assert.throws(() => loadConfig({ MAX_TRADES_PER_RUN: "2.5" }), /MAX_TRADES_PER_RUN must be a non-negative integer/);
  });

  it("rejects an inverted probability band", () => {
    assert.throws(
      () => loadConfig({ MIN_PROBABILITY: "0.99", MAX_PROBABILITY: "0.95" }),
      /MIN_PROBABILITY \(0.99\) must not exceed MAX_PROBABILITY \(0.95\)/
    );
  });
});
