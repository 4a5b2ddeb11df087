// ============================================================
// Core types for the Polymarket paper-arbitrage bot
// ============================================================

export type Outcome = "YES" | "NO";

/** Resolution written when a market closes without an outcome (voided / refunded) */
export const CANCELLED_RESOLUTION = "CANCELLED";

/** A Gamma market normalized to the fields the pipeline uses */
export interface Market {
  id: string;
  question: string;
  endDate?: string;
  startDate?: string;
  createdAt?: string;
  outcomePrices: [yes: number, no: number];   // 0–1 each, 0 when unparsable
  clobTokenIds: string[];
  volume: number;
  liquidity: number;
  fee: number;
  closed: boolean;
  acceptingOrders: boolean;
}

/** A trade we intend to place this cycle */
export interface PlannedTrade {
  readonly marketId: string;
  readonly question: string;
  readonly outcome: Outcome;
  readonly price: number;
  readonly amount: number;
  readonly reason: string;
}

/** A simulated purchase; settlement fields are filled in by the reconciler */
export interface ExecutedTrade {
  marketId: string;
  question: string;
  outcome: Outcome;
  price: number;            // cost per share (0-1)
  shares: number;
  cost: number;             // price × shares
  timestamp: string;
  status: "simulated";
  startDate?: string;
  endDate?: string;
  createdAt?: string;
  settled?: boolean;
  resolution?: string;      // "Yes" | "No" | CANCELLED, verbatim from upstream
}

/** In-memory bookkeeping view of an executed trade */
export interface Position {
  marketId: string;
  question: string;
  outcome: Outcome;
  price: number;
  shares: number;
  cost: number;
  potentialPayout: number;  // shares × $1
  profitIfWin: number;      // potentialPayout - cost
  timestamp: string;
}

export interface ScanInfo {
  totalApi: number;
  nonCrypto: number;
  totalParsed: number;
  filtered: number;
}

export interface RunSummary {
  marketsSelected: number;
  tradesPlanned: number;
  tradesExecuted: number;
  runInvested: number;
  totalInvested: number;
  potentialPayout: number;
  profitIfWin: number;
  balanceAfter: number;
}

/** One scan cycle as persisted in the ledger */
export interface RunRecord {
  runId: string;
  timestamp: string;
  balanceBefore: number;
  scanInfo: ScanInfo;
  plannedTrades: PlannedTrade[];
  executedTrades: ExecutedTrade[];
  summary: RunSummary;
}

export type RunInput = Omit<RunRecord, "runId" | "timestamp">;

export interface LedgerData {
  runs: RunRecord[];
  totalInvested: number;
  totalPayout: number;
  winCount: number;
  lossCount: number;
}

/** An executed trade with its settlement known */
export type SettledTrade = ExecutedTrade & { settled: true; resolution: string };

export interface SettlementReport {
  resolved: SettledTrade[];
  unresolved: ExecutedTrade[];
  newlyResolved: SettledTrade[];   // resolved trades that were not yet marked settled
}

/** Thresholds applied by the eligibility filter */
export interface FilterCriteria {
  minProbability: number;
  maxProbability: number;
  maxHoursUntilEnd: number;
  maxFee: number;
  minVolume: number;
  maxTradesPerRun: number;
}

/** Bot configuration (loaded from env) */
export interface BotConfig {
  readonly api: {
    readonly gammaBaseUrl: string;
    readonly requestTimeoutMs: number;
    readonly settlementTimeoutMs: number;
    readonly marketFetchLimit: number;
  };
  readonly trading: Readonly<FilterCriteria> & {
    readonly virtualBalance: number;
    readonly tradeAmount: number;
    readonly sharesPerTrade: number;
    readonly scanIntervalSeconds: number;
    readonly excludedKeywords: readonly string[];
  };
  readonly ledgerPath: string;
  readonly logLevel: string;
  readonly logDir: string;
}
