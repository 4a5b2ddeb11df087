// ============================================================
// Market Scanner — fetch, exclude, normalize, filter
// ============================================================

import type { BotConfig, Market, ScanInfo } from "../types/index.js";
import type { MarketDataSource } from "../api/gamma-client.js";
import { normalizeMarkets, rawQuestion } from "../utils/market-normalizer.js";
import { countRejections, filterEligible, isExcludedQuestion } from "../utils/market-filter.js";
import type { Logger } from "../utils/logger.js";

export interface ScanResult {
  markets: Market[];
  stats: ScanInfo;
}

export class MarketScanner {
  private source: MarketDataSource;
  private config: BotConfig;
  private logger: Logger;

  constructor(source: MarketDataSource, config: BotConfig, logger: Logger) {
    this.source = source;
    this.config = config;
    this.logger = logger;
  }

  /** Run one scan. Upstream failures produce an empty scan, never a throw. */
  async scan(now: Date = new Date()): Promise<ScanResult> {
    const { trading } = this.config;

    const records = await this.fetchRecords(now);
    const nonCrypto = records.filter(
      (r) => !isExcludedQuestion(rawQuestion(r), trading.excludedKeywords)
    );
    this.logger.info(`API returned ${records.length} markets, ${nonCrypto.length} after keyword exclusion`);

    const parsed = normalizeMarkets(nonCrypto, this.logger);
    this.logger.info(`Parsed ${parsed.length} markets`);

    const markets = filterEligible(parsed, trading, now);

    const rejections = countRejections(parsed, trading, now);
    if (rejections.size > 0) {
      const detail = [...rejections.entries()].map(([k, v]) => `${k}:${v}`).join(", ");
      this.logger.debug(`Rejected: ${detail}`);
    }

    this.logger.info(`Eligible markets: ${markets.length}`);

    return {
      markets,
      stats: {
        totalApi: records.length,
        nonCrypto: nonCrypto.length,
        totalParsed: parsed.length,
        filtered: markets.length,
      },
    };
  }

  private async fetchRecords(now: Date): Promise<unknown[]> {
    try {
      return await this.source.getOpenMarkets({
        endDateMin: now,
        endDateMax: new Date(now.getTime() + this.config.trading.maxHoursUntilEnd * 3_600_000),
        limit: this.config.api.marketFetchLimit,
      });
    } catch (err) {
      this.logger.error(`Failed to fetch markets: ${err}`);
      return [];
    }
  }
}
