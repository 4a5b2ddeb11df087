// ============================================================
// Polymarket Gamma API Client
// Read-only market data over plain REST
// ============================================================

import type { BotConfig } from "../types/index.js";
import type { Logger } from "../utils/logger.js";

export interface MarketWindow {
  endDateMin: Date;
  endDateMax: Date;
  limit: number;
}

/** The slice of the market API the bot depends on */
export interface MarketDataSource {
  /** Open markets whose end date falls inside the window (raw records) */
  getOpenMarkets(window: MarketWindow): Promise<unknown[]>;
  /** A single market by id (raw record) */
  getMarket(marketId: string): Promise<unknown>;
}

export class GammaClient implements MarketDataSource {
  private basePath: string;
  private requestTimeoutMs: number;
  private settlementTimeoutMs: number;
  private logger: Logger;

  constructor(config: BotConfig, logger: Logger) {
    this.basePath = config.api.gammaBaseUrl;
    this.requestTimeoutMs = config.api.requestTimeoutMs;
    this.settlementTimeoutMs = config.api.settlementTimeoutMs;
    this.logger = logger;
  }

  private async request(path: string, timeoutMs: number): Promise<unknown> {
    const url = `${this.basePath}${path}`;

    this.logger.debug(`API GET ${path}`);
    const response = await fetch(url, {
      method: "GET",
      headers: {
        Accept: "application/json",
        "User-Agent": "Mozilla/5.0 (compatible; PaperArbScanner/1.0)",
      },
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Gamma API error ${response.status}: ${errorText}`);
    }

    const data: unknown = await response.json();
    return data;
  }

  // --- Market Data ---

  async getOpenMarkets(window: MarketWindow): Promise<unknown[]> {
    const query = new URLSearchParams({
      limit: window.limit.toString(),
      closed: "false",
      end_date_min: window.endDateMin.toISOString(),
      end_date_max: window.endDateMax.toISOString(),
    });

    const data = await this.request(`/markets?${query.toString()}`, this.requestTimeoutMs);
    if (!Array.isArray(data)) {
      throw new Error("Gamma API returned a non-array market list");
    }

    this.logger.debug(`Fetched ${data.length} markets`);
    return data;
  }

  async getMarket(marketId: string): Promise<unknown> {
    return this.request(`/markets/${encodeURIComponent(marketId)}`, this.settlementTimeoutMs);
  }
}
