// ============================================================
// Run Ledger — durable record of every scan cycle
// ============================================================

import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import {
  CANCELLED_RESOLUTION,
  type ExecutedTrade,
  type LedgerData,
  type Outcome,
  type PlannedTrade,
  type RunInput,
  type RunRecord,
  type RunSummary,
  type ScanInfo,
  type SettledTrade,
} from "../types/index.js";
import { isRecord } from "../utils/market-normalizer.js";
import type { Logger } from "../utils/logger.js";

export type TradeResult = "win" | "loss" | "cancelled" | "pending";

export function emptyLedger(): LedgerData {
  return { runs: [], totalInvested: 0, totalPayout: 0, winCount: 0, lossCount: 0 };
}

/** Classify a trade against its settlement ("Yes"/"No" compared case-insensitively) */
export function tradeResult(trade: ExecutedTrade): TradeResult {
  if (!trade.settled || trade.resolution === undefined) return "pending";
  if (trade.resolution === CANCELLED_RESOLUTION) return "cancelled";
  return trade.resolution.toUpperCase() === trade.outcome ? "win" : "loss";
}

/** Every executed trade not yet marked settled, in run order */
export function unsettledTrades(data: LedgerData): ExecutedTrade[] {
  return data.runs.flatMap((run) => run.executedTrades.filter((t) => !t.settled));
}

export interface RunLedgerOptions {
  /** Never touch the store: no saves, corrupt files are left in place */
  readOnly?: boolean;
}

export class RunLedger {
  private filePath: string;
  private logger: Logger;
  private readOnly: boolean;
  private data: LedgerData = emptyLedger();

  constructor(filePath: string, logger: Logger, options: RunLedgerOptions = {}) {
    this.filePath = filePath;
    this.logger = logger;
    this.readOnly = options.readOnly ?? false;
  }

  /**
   * Load the ledger from disk. A missing store yields an empty ledger; a
   * corrupt one is moved to `<path>.corrupt` and replaced by an empty ledger.
   */
  async load(): Promise<LedgerData> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.info(`No ledger at ${this.filePath}, starting fresh`);
      } else {
        this.logger.warn(`Ledger unreadable (${err}), starting fresh`);
      }
      this.data = emptyLedger();
      return this.data;
    }

    const parsed = parseLedger(raw);
    if (parsed) {
      this.data = parsed;
      this.logger.info(`Loaded ledger with ${parsed.runs.length} runs`);
    } else {
      this.logger.warn(`Ledger at ${this.filePath} is corrupt, starting fresh`);
      if (!this.readOnly) await this.quarantine();
      this.data = emptyLedger();
    }
    return this.data;
  }

  getData(): LedgerData {
    return this.data;
  }

  /** Record one run, then rewrite the whole store */
  async append(input: RunInput, now: Date = new Date()): Promise<RunRecord> {
    const record: RunRecord = {
      runId: randomUUID().slice(0, 8),
      timestamp: now.toISOString(),
      balanceBefore: input.balanceBefore,
      scanInfo: { ...input.scanInfo },
      plannedTrades: [...input.plannedTrades],
      executedTrades: input.executedTrades.map((t) => ({ ...t })),
      summary: { ...input.summary },
    };

    this.data.runs.push(record);
    this.data.totalInvested += record.executedTrades.reduce((sum, t) => sum + t.cost, 0);

    await this.save();
    this.logger.info(`Run ${record.runId} recorded`);
    return record;
  }

  /**
   * Mark every unsettled trade on each settled market and update the
   * win/loss counters. Persists only when something changed.
   * Returns the number of trades updated.
   */
  async applySettlements(settled: SettledTrade[]): Promise<number> {
    const byMarket = new Map(settled.map((s) => [s.marketId, s.resolution]));
    let updated = 0;

    for (const run of this.data.runs) {
      for (const trade of run.executedTrades) {
        if (trade.settled) continue;
        const resolution = byMarket.get(trade.marketId);
        if (resolution === undefined) continue;

        trade.settled = true;
        trade.resolution = resolution;
        updated++;

        const result = tradeResult(trade);
        if (result === "win") {
          this.data.winCount++;
          this.data.totalPayout += trade.shares;
        } else if (result === "loss") {
          this.data.lossCount++;
        }
      }
    }

    if (updated > 0) {
      await this.save();
      this.logger.info(`Settled ${updated} trades in ledger`);
    }
    return updated;
  }

  /** Write to a temp file and rename over the store so readers never see a partial file */
  async save(): Promise<void> {
    if (this.readOnly) {
      throw new Error(`Ledger ${this.filePath} was opened read-only`);
    }
    const tmpPath = `${this.filePath}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify(this.data, null, 2), "utf8");
    await fs.rename(tmpPath, this.filePath);
  }

  private async quarantine(): Promise<void> {
    const target = `${this.filePath}.corrupt`;
    try {
      await fs.rename(this.filePath, target);
      this.logger.warn(`Moved corrupt ledger to ${target}`);
    } catch (err) {
      this.logger.warn(`Could not move corrupt ledger aside: ${err}`);
    }
  }
}

// --- Decoding ---

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}

function counter(value: unknown): number {
  return isNumber(value) ? value : 0;
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isOptional<T>(value: unknown, guard: (v: unknown) => v is T): boolean {
  return value === undefined || guard(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

function isOutcome(value: unknown): value is Outcome {
  return value === "YES" || value === "NO";
}

function hasNumbers(value: unknown, keys: readonly string[]): boolean {
  return isRecord(value) && keys.every((k) => isNumber(value[k]));
}

const SCAN_INFO_KEYS: readonly (keyof ScanInfo)[] = [
  "totalApi",
  "nonCrypto",
  "totalParsed",
  "filtered",
];

const SUMMARY_KEYS: readonly (keyof RunSummary)[] = [
  "marketsSelected",
  "tradesPlanned",
  "tradesExecuted",
  "runInvested",
  "totalInvested",
  "potentialPayout",
  "profitIfWin",
  "balanceAfter",
];

function isPlannedTrade(value: unknown): value is PlannedTrade {
  return (
    isRecord(value) &&
    isString(value.marketId) &&
    isString(value.question) &&
    isOutcome(value.outcome) &&
    isNumber(value.price) &&
    isNumber(value.amount) &&
    isString(value.reason)
  );
}

function isExecutedTrade(value: unknown): value is ExecutedTrade {
  return (
    isRecord(value) &&
    isString(value.marketId) &&
    isString(value.question) &&
    isOutcome(value.outcome) &&
    isNumber(value.price) &&
    isNumber(value.shares) &&
    isNumber(value.cost) &&
    isString(value.timestamp) &&
    value.status === "simulated" &&
    isOptional(value.startDate, isString) &&
    isOptional(value.endDate, isString) &&
    isOptional(value.createdAt, isString) &&
    isOptional(value.settled, isBoolean) &&
    isOptional(value.resolution, isString)
  );
}

// Every field the loop and the report read must be present and well typed
function isRunRecord(value: unknown): value is RunRecord {
  return (
    isRecord(value) &&
    isString(value.runId) &&
    isString(value.timestamp) &&
    isNumber(value.balanceBefore) &&
    hasNumbers(value.scanInfo, SCAN_INFO_KEYS) &&
    hasNumbers(value.summary, SUMMARY_KEYS) &&
    Array.isArray(value.plannedTrades) &&
    value.plannedTrades.every(isPlannedTrade) &&
    Array.isArray(value.executedTrades) &&
    value.executedTrades.every(isExecutedTrade)
  );
}

/** null when the text is not a ledger this version can read */
export function parseLedger(text: string): LedgerData | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.runs)) return null;
  const runs: unknown[] = parsed.runs;
  if (!runs.every(isRunRecord)) return null;

  return {
    runs: runs.filter(isRunRecord),
    totalInvested: counter(parsed.totalInvested),
    totalPayout: counter(parsed.totalPayout),
    winCount: counter(parsed.winCount),
    lossCount: counter(parsed.lossCount),
  };
}
