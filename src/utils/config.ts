import "dotenv/config";
import type { BotConfig } from "../types/index.js";

const DEFAULT_EXCLUDED_KEYWORDS = "bitcoin,btc,ethereum,eth,solana,xrp,up or down";

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): BotConfig {
  const minProbability = numberEnv(env, "MIN_PROBABILITY", 0.9);
  const maxProbability = numberEnv(env, "MAX_PROBABILITY", 0.98);
  if (minProbability > maxProbability) {
    throw new Error(
      `MIN_PROBABILITY (${minProbability}) must not exceed MAX_PROBABILITY (${maxProbability})`
    );
  }

  return {
    api: {
      gammaBaseUrl: (env.GAMMA_API_URL ?? "https://gamma-api.polymarket.com").replace(/\/+$/, ""),
      requestTimeoutMs: intEnv(env, "REQUEST_TIMEOUT_MS", 30_000),
      settlementTimeoutMs: intEnv(env, "SETTLEMENT_TIMEOUT_MS", 10_000),
      marketFetchLimit: intEnv(env, "MARKET_FETCH_LIMIT", 500),
    },
    trading: {
      virtualBalance: numberEnv(env, "VIRTUAL_BALANCE", 1000),
      maxTradesPerRun: intEnv(env, "MAX_TRADES_PER_RUN", 5),
      minProbability,
      maxProbability,
      maxHoursUntilEnd: numberEnv(env, "MAX_HOURS_UNTIL_END", 4),
      minVolume: numberEnv(env, "MIN_VOLUME", 1000),
      maxFee: numberEnv(env, "MAX_FEE", 0),
      tradeAmount: numberEnv(env, "TRADE_AMOUNT", 5),
      sharesPerTrade: numberEnv(env, "SHARES_PER_TRADE", 5),
      scanIntervalSeconds: numberEnv(env, "SCAN_INTERVAL_SECONDS", 3600),
      excludedKeywords: (env.EXCLUDED_KEYWORDS ?? DEFAULT_EXCLUDED_KEYWORDS)
        .split(",")
        .map((s) => s.trim().toLowerCase())
        .filter(Boolean),
    },
    ledgerPath: env.LEDGER_PATH ?? "data/trades.json",
    logLevel: env.LOG_LEVEL ?? "info",
    logDir: env.LOG_DIR ?? "logs",
  };
}

function numberEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const val = Number(raw);
  if (!Number.isFinite(val)) {
    throw new Error(`Invalid numeric environment variable ${name}: "${raw}"`);
  }
  return val;
}

function intEnv(env: Env, name: string, fallback: number): number {
  const val = numberEnv(env, name, fallback);
  if (!Number.isInteger(val) || val < 0) {
    throw new Error(`Environment variable ${name} must be a non-negative integer, got ${val}`);
  }
  return val;
}
