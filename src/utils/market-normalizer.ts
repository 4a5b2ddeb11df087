// ============================================================
// Market Normalizer — raw Gamma records → typed Market
// ============================================================

import type { Market, Outcome } from "../types/index.js";
import type { Logger } from "./logger.js";

export type MarketDecodeResult =
  | { ok: true; market: Market }
  | { ok: false; reason: string };

type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode one raw market record. Individual fields fall back to defaults
 * (0, false, empty list); only a non-object record or a missing id fails.
 */
export function decodeMarket(raw: unknown): MarketDecodeResult {
  if (!isRecord(raw)) {
    return { ok: false, reason: "record is not an object" };
  }

  const id = toText(raw.id);
  if (!id) {
    return { ok: false, reason: "missing market id" };
  }

  const prices = decodeJsonList(raw.outcomePrices).map(toNumber);

  return {
    ok: true,
    market: {
      id,
      question: toText(raw.question) ?? "",
      endDate: toText(raw.endDate),
      startDate: toText(raw.startDate),
      createdAt: toText(raw.createdAt),
      outcomePrices: [prices[0] ?? 0, prices[1] ?? 0],
      clobTokenIds: decodeJsonList(raw.clobTokenIds).map((t) => String(t)),
      volume: toNumber(raw.volume),
      liquidity: toNumber(raw.liquidity),
      fee: toNumber(raw.fee),
      closed: toBoolean(raw.closed, false),
      acceptingOrders: toBoolean(raw.acceptingOrders, true),
    },
  };
}

/** Decode a batch, skipping (and logging) records that fail */
export function normalizeMarkets(records: unknown[], logger: Logger): Market[] {
  const markets: Market[] = [];
  for (const raw of records) {
    const result = decodeMarket(raw);
    if (result.ok) {
      markets.push(result.market);
    } else {
      logger.warn(`Skipping malformed market record: ${result.reason}`);
    }
  }
  return markets;
}

/** Question text of a raw record, used for keyword exclusion before decoding */
export function rawQuestion(raw: unknown): string {
  return isRecord(raw) ? toText(raw.question) ?? "" : "";
}

// --- Field coercion ---

/** The fallback applies only to an absent field; an explicit null reads as false */
export function toBoolean(value: unknown, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return value.trim().toLowerCase() === "true";
  return false;
}

export function toNumber(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function toText(value: unknown): string | undefined {
  if (typeof value === "string") return value === "" ? undefined : value;
  if (typeof value === "number") return String(value);
  return undefined;
}

/** Gamma encodes list fields as JSON strings, e.g. outcomePrices: "[\"0.97\", \"0.03\"]" */
export function decodeJsonList(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (typeof value !== "string" || value.trim() === "") return [];
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : [];
  } catch {
    return [];
  }
}

// --- Derived values ---

const TIMEZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d/;

/** Parse an ISO timestamp, reading zone-less date-times as UTC. NaN when unparsable. */
export function parseTimestamp(value: string): number {
  let iso = value.trim();
  if (DATE_TIME.test(iso) && !TIMEZONE_SUFFIX.test(iso)) {
    iso = `${iso.replace(" ", "T")}Z`;
  }
  return Date.parse(iso);
}

/** Hours until the market ends; +Infinity when the end date is absent or unparsable */
export function hoursUntilEnd(market: Market, now: Date = new Date()): number {
  if (!market.endDate) return Infinity;
  const end = parseTimestamp(market.endDate);
  if (Number.isNaN(end)) return Infinity;
  return (end - now.getTime()) / 3_600_000;
}

export function maxProbability(market: Market): number {
  const [yes, no] = market.outcomePrices;
  return Math.max(yes, no);
}

/** Side with the higher price; ties go to YES */
export function dominantOutcome(market: Market): Outcome {
  const [yes, no] = market.outcomePrices;
  return yes >= no ? "YES" : "NO";
}

export function dominantPrice(market: Market): number {
  const [yes, no] = market.outcomePrices;
  return dominantOutcome(market) === "YES" ? yes : no;
}
