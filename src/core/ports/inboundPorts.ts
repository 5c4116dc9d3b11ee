import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { HistoryRange } from "../entities/bar";
import type {
  FundamentalField,
  FundamentalsSection,
} from "../entities/fundamentals";

export type HistoryRequest = {
  ticker: string;
  range: HistoryRange;
};

/**
 * One provider history row. Numeric gaps are reported as null.
 */
export type RawPriceRow = {
  timestamp: Date;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
};

export type FundamentalsRequest = {
  ticker: string;
  section: FundamentalsSection;
};

export type RawKeyValueRow = Record<string, unknown>;

/**
 * Providers answer either with a table (rows ordered most recent first) or a single mapping.
 */
export type RawFundamentalRows = RawKeyValueRow[] | RawKeyValueRow;

/**
 * Raw key each section reports a fundamental field under.
 */
export const fundamentalsSourceKeys: Record<
  FundamentalsSection,
  Partial<Record<FundamentalField, string>>
> = {
  summary: {
    marketCap: "marketCap",
    forwardPe: "forwardPE",
    pegRatio: "pegRatio",
  },
  financials: {
    revenue: "annualTotalRevenue",
    ebit: "annualEBIT",
    depreciation: "annualReconciledDepreciation",
    dilutedEps: "annualDilutedEPS",
  },
  balance_sheet: {
    cash: "annualCashAndCashEquivalents",
    longTermDebt: "annualLongTermDebt",
    currentDebt: "annualCurrentDebtAndCapitalLeaseObligation",
    bookValue: "annualTotalEquityGrossMinorityInterest",
  },
};

export const QUOTE_TYPE_KEY = "quoteType";

export interface QuoteProviderPort {
  readonly name: string;
  getHistory(
    request: HistoryRequest,
  ): Promise<Result<RawPriceRow[], AppBoundaryError>>;
  getFundamentals(
    request: FundamentalsRequest,
  ): Promise<Result<RawFundamentalRows, AppBoundaryError>>;
}

export interface TickerSourcePort {
  loadTickers(): Promise<string[]>;
}
