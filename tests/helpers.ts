import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { MarketDataSource, MarketWindow } from "../src/api/gamma-client.js";
import type { BotConfig, ExecutedTrade, FilterCriteria, Market } from "../src/types/index.js";
import { loadConfig } from "../src/utils/config.js";
import { createLogger } from "../src/utils/logger.js";

export const NOW = new Date("2025-06-01T12:00:00.000Z");

export const silentLogger = createLogger("error", { silent: true });

export const DEFAULT_CRITERIA: FilterCriteria = {
  minProbability: 0.9,
  maxProbability: 0.98,
  maxHoursUntilEnd: 4,
  maxFee: 0,
  minVolume: 1000,
  maxTradesPerRun: 5,
};

export function hoursFromNow(hours: number, now: Date = NOW): string {
  return new Date(now.getTime() + hours * 3_600_000).toISOString();
}

export function closeTo(actual: number, expected: number, epsilon = 1e-9): boolean {
  return Math.abs(actual - expected) < epsilon;
}

export function makeMarket(overrides: Partial<Market> = {}): Market {
  return {
    id: "m1",
    question: "Will the council approve the budget?",
    endDate: hoursFromNow(2),
    outcomePrices: [0.95, 0.05],
    clobTokenIds: [],
    volume: 5000,
    liquidity: 2000,
    fee: 0,
    closed: false,
    acceptingOrders: true,
    ...overrides,
  };
}

/** Raw Gamma-shaped record, as the API returns it */
export function rawMarket(
  id: string,
  yes: number,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    id,
    question: `Question ${id}?`,
    endDate: hoursFromNow(2),
    outcomePrices: JSON.stringify([String(yes), String(Math.round((1 - yes) * 100) / 100)]),
    clobTokenIds: JSON.stringify([`${id}-yes`, `${id}-no`]),
    volume: "5000",
    liquidity: "2000",
    closed: false,
    acceptingOrders: true,
    ...overrides,
  };
}

export function makeTrade(overrides: Partial<ExecutedTrade> = {}): ExecutedTrade {
  return {
    marketId: "m1",
    question: "Will the council approve the budget?",
    outcome: "YES",
    price: 0.95,
    shares: 5,
    cost: 4.75,
    timestamp: NOW.toISOString(),
    status: "simulated",
    ...overrides,
  };
}

export function testConfig(env: Record<string, string> = {}): BotConfig {
  return loadConfig({ SCAN_INTERVAL_SECONDS: "60", ...env });
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "paper-arb-"));
}

/** In-process stand-in for the Gamma API */
export class FakeMarketSource implements MarketDataSource {
  openMarkets: unknown[] = [];
  markets = new Map<string, unknown>();
  failOpenMarkets = false;
  failingIds = new Set<string>();
  windows: MarketWindow[] = [];
  lookups: string[] = [];

  async getOpenMarkets(window: MarketWindow): Promise<unknown[]> {
    this.windows.push(window);
    if (this.failOpenMarkets) throw new Error("Gamma API error 503: unavailable");
    return this.openMarkets;
  }

  async getMarket(marketId: string): Promise<unknown> {
    this.lookups.push(marketId);
    if (this.failingIds.has(marketId)) throw new Error("timeout");
    return this.markets.get(marketId) ?? { id: marketId, closed: false };
  }
}
