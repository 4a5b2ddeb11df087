import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { VirtualTrader } from "../../src/agent/virtual-trader.js";
import { closeTo, makeMarket, NOW, silentLogger } from "../helpers.js";

describe("VirtualTrader", () => {
  it("buys a fixed share count and deducts price × shares", () => {
    const trader = new VirtualTrader(10, 5, silentLogger);
    const market = makeMarket({ outcomePrices: [0.97, 0.03] });

    const first = trader.execute(market, NOW);
    assert.ok(first);
    assert.equal(first.shares, 5);
    assert.ok(closeTo(first.cost, 4.85));
    assert.ok(closeTo(trader.getBalance(), 5.15));

    const second = trader.execute(market, NOW);
    assert.ok(second);
    assert.ok(closeTo(trader.getBalance(), 0.3));

    const third = trader.execute(market, NOW);
    assert.equal(third, null);
    assert.ok(closeTo(trader.getBalance(), 0.3));
    assert.equal(trader.getTrades().length, 2);
  });

  it("records the trade with market details", () => {
    const trader = new VirtualTrader(100, 5, silentLogger);
    const market = makeMarket({
      id: "m7",
      question: "Will the vote pass?",
      outcomePrices: [0.04, 0.96],
      startDate: "2025-05-01T00:00:00Z",
      endDate: "2025-06-01T14:00:00Z",
      createdAt: "2025-04-30T00:00:00Z",
    });

    const trade = trader.execute(market, NOW);
    assert.ok(trade);
    assert.equal(trade.marketId, "m7");
    assert.equal(trade.question, "Will the vote pass?");
    assert.equal(trade.outcome, "NO");
    assert.equal(trade.price, 0.96);
    assert.equal(trade.status, "simulated");
    assert.equal(trade.timestamp, "2025-06-01T12:00:00.000Z");
    assert.equal(trade.startDate, "2025-05-01T00:00:00Z");
    assert.equal(trade.endDate, "2025-06-01T14:00:00Z");
    assert.equal(trade.createdAt, "2025-04-30T00:00:00Z");
    assert.equal(trade.settled, undefined);
  });

  it("keeps position aggregates in step with executed trades", () => {
    const trader = new VirtualTrader(100, 5, silentLogger);
    trader.execute(makeMarket({ id: "a", outcomePrices: [0.9, 0.1] }), NOW);
    trader.execute(makeMarket({ id: "b", outcomePrices: [0.2, 0.8] }), NOW);

    assert.ok(closeTo(trader.getTotalInvested(), 8.5));
    assert.equal(trader.getPotentialPayout(), 10);
    assert.ok(closeTo(trader.getTotalProfitIfWin(), 1.5));

    const [pa, pb] = trader.getPositions();
    assert.equal(pa.potentialPayout, 5);
    assert.ok(closeTo(pa.profitIfWin, 0.5));
    assert.equal(pb.outcome, "NO");
    assert.ok(closeTo(pb.profitIfWin, 1));
  });

  it("ignores the dollar trade amount when sizing", () => {
    const trader = new VirtualTrader(100, 3, silentLogger);
    const trade = trader.execute(makeMarket({ outcomePrices: [0.5, 0.5] }), NOW);
    assert.ok(trade);
    assert.equal(trade.shares, 3);
    assert.equal(trade.cost, 1.5);
  });

  it("refuses markets without a usable price", () => {
    const trader = new VirtualTrader(100, 5, silentLogger);
    assert.equal(trader.execute(makeMarket({ outcomePrices: [0, 0] }), NOW), null);
    assert.equal(trader.getBalance(), 100);
    assert.deepEqual(trader.getPositions(), []);
  });

  it("accepts a trade that spends the balance exactly", () => {
    const trader = new VirtualTrader(2.5, 5, silentLogger);
    assert.ok(trader.execute(makeMarket({ outcomePrices: [0.5, 0.5] }), NOW));
    assert.equal(trader.getBalance(), 0);
  });

  it("never lets the balance go negative", () => {
    const trader = new VirtualTrader(20, 5, silentLogger);
    const prices = [0.95, 0.91, 0.97, 0.93, 0.98, 0.9, 0.96];

    for (const price of prices) {
      const before = trader.getBalance();
      const trade = trader.execute(makeMarket({ outcomePrices: [price, 1 - price] }), NOW);
      if (trade) {
        assert.ok(before >= trade.cost);
        assert.ok(closeTo(trade.cost, trade.price * trade.shares));
        assert.ok(closeTo(trader.getBalance(), before - trade.cost));
      } else {
        assert.equal(trader.getBalance(), before);
      }
      assert.ok(trader.getBalance() >= 0);
    }
    assert.equal(trader.getTrades().length, 4);
  });

  it("returns copies of its internal lists", () => {
    const trader = new VirtualTrader(100, 5, silentLogger);
    trader.execute(makeMarket(), NOW);
    trader.getTrades().pop();
    trader.getPositions().pop();
    assert.equal(trader.getTrades().length, 1);
    assert.equal(trader.getPositions().length, 1);
    assert.equal(trader.getInitialBalance(), 100);
  });
});
