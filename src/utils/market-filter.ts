// ============================================================
// Market filtering — eligibility predicates and ranking
// ============================================================

import type { FilterCriteria, Market } from "../types/index.js";
import { dominantPrice, hoursUntilEnd, maxProbability } from "./market-normalizer.js";

export type RejectionReason =
  | "closed"
  | "ended"
  | "too_far"
  | "probability_out_of_band"
  | "fee_too_high"
  | "low_volume";

/**
 * First predicate the market fails, or null if it is eligible.
 * Predicates run in a fixed order and short-circuit.
 */
export function rejectionReason(
  market: Market,
  criteria: FilterCriteria,
  now: Date = new Date()
): RejectionReason | null {
  if (market.closed || !market.acceptingOrders) return "closed";

  const hours = hoursUntilEnd(market, now);
  if (hours <= 0) return "ended";
  if (hours > criteria.maxHoursUntilEnd) return "too_far";

  // High but not certain: the band is inclusive at both ends
  const prob = maxProbability(market);
  if (prob < criteria.minProbability || prob > criteria.maxProbability) {
    return "probability_out_of_band";
  }

  if (market.fee > criteria.maxFee) return "fee_too_high";
  if (market.volume < criteria.minVolume) return "low_volume";

  return null;
}

/**
 * Eligible markets ranked by dominant price (cheapest first, i.e. best
 * risk/reward inside the band), capped at maxTradesPerRun.
 * Array.prototype.sort is stable, so equal prices keep input order.
 */
export function filterEligible(
  markets: Market[],
  criteria: FilterCriteria,
  now: Date = new Date()
): Market[] {
  return markets
    .filter((m) => rejectionReason(m, criteria, now) === null)
    .sort((a, b) => dominantPrice(a) - dominantPrice(b))
    .slice(0, criteria.maxTradesPerRun);
}

/** Tally of rejection reasons, for scan diagnostics */
export function countRejections(
  markets: Market[],
  criteria: FilterCriteria,
  now: Date = new Date()
): Map<RejectionReason, number> {
  const counts = new Map<RejectionReason, number>();
  for (const m of markets) {
    const reason = rejectionReason(m, criteria, now);
    if (reason) counts.set(reason, (counts.get(reason) ?? 0) + 1);
  }
  return counts;
}

// Crypto up/down markets resolve on minute-level price moves; keep them out
// before decoding. Plain substring match, case-insensitive.
export function isExcludedQuestion(question: string, keywords: readonly string[]): boolean {
  const q = question.toLowerCase();
  return keywords.some((kw) => q.includes(kw.toLowerCase()));
}
