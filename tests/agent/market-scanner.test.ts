import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { MarketScanner } from "../../src/agent/market-scanner.js";
import { FakeMarketSource, NOW, rawMarket, silentLogger, testConfig } from "../helpers.js";

describe("MarketScanner", () => {
  it("requests open markets ending within the horizon", async () => {
    const source = new FakeMarketSource();
    const scanner = new MarketScanner(source, testConfig(), silentLogger);

    await scanner.scan(NOW);

    assert.equal(source.windows.length, 1);
    const [window] = source.windows;
    assert.equal(window.endDateMin.toISOString(), "2025-06-01T12:00:00.000Z");
    assert.equal(window.endDateMax.toISOString(), "2025-06-01T16:00:00.000Z");
    assert.equal(window.limit, 500);
  });

  it("excludes crypto questions, skips malformed records and ranks the rest", async () => {
    const source = new FakeMarketSource();
    source.openMarkets = [
      rawMarket("a", 0.96),
      rawMarket("btc", 0.95, { question: "Bitcoin Up or Down - 3PM ET" }),
      rawMarket("b", 0.91),
      { question: "Record without an id" },
      rawMarket("thin", 0.93, { volume: "10" }),
    ];
    const scanner = new MarketScanner(source, testConfig(), silentLogger);

    const { markets, stats } = await scanner.scan(NOW);

    assert.deepEqual(
      markets.map((m) => m.id),
      ["b", "a"]
    );
    assert.deepEqual(stats, { totalApi: 5, nonCrypto: 4, totalParsed: 3, filtered: 2 });
  });

  it("turns an upstream failure into an empty scan", async () => {
    const source = new FakeMarketSource();
    source.failOpenMarkets = true;
    const scanner = new MarketScanner(source, testConfig(), silentLogger);

    const { markets, stats } = await scanner.scan(NOW);

    assert.deepEqual(markets, []);
    assert.deepEqual(stats, { totalApi: 0, nonCrypto: 0, totalParsed: 0, filtered: 0 });
  });
});
