import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { HistoryRange } from "../../../core/entities/bar";
import type {
  FundamentalsRequest,
  HistoryRequest,
  QuoteProviderPort,
  RawFundamentalRows,
  RawPriceRow,
} from "../../../core/ports/inboundPorts";
import type { ClockPort } from "../../../core/ports/outboundPorts";

const DAY_MS = 24 * 60 * 60 * 1000;

const RANGE_DAYS: Record<HistoryRange, number> = {
  "1mo": 30,
  "3mo": 90,
  "6mo": 180,
  "1y": 365,
  "2y": 730,
  "5y": 1825,
};

const MOCK_FUNDS = new Set(["GLD", "SPY", "QQQ"]);

const hashTicker = (ticker: string): number => {
  let hash = 0;
  for (const char of ticker) {
    hash = (hash * 31 + char.charCodeAt(0)) >>> 0;
  }
  return hash;
};

/**
 * Numerical Recipes LCG; enough for a repeatable random walk.
 */
const seededRandom = (seed: number) => {
  let state = seed >>> 0;
  return (): number => {
    state = (Math.imul(state, 1_664_525) + 1_013_904_223) >>> 0;
    return state / 2 ** 32;
  };
};

/**
 * Offline provider: the same ticker and clock always yield the same bars and fundamentals.
 */
export class MockQuoteProvider implements QuoteProviderPort {
  readonly name = "mock";

  constructor(private readonly clock: ClockPort) {}

  async getHistory(
    request: HistoryRequest,
  ): Promise<Result<RawPriceRow[], AppBoundaryError>> {
    const ticker = request.ticker.toUpperCase();
    const days = RANGE_DAYS[request.range];
    const next = seededRandom(hashTicker(ticker));
    const end = this.clock.now().getTime();
    let close = 100 + (hashTicker(ticker) % 50);

    const rows: RawPriceRow[] = [];
    for (let offset = days - 1; offset >= 0; offset -= 1) {
      const open = close;
      close = Math.max(1, close * (1 + (next() - 0.5) * 0.04));
      rows.push({
        timestamp: new Date(end - offset * DAY_MS),
        open,
        high: Math.max(open, close),
        low: Math.min(open, close),
        close,
        volume: 1_000_000 + Math.floor(next() * 500_000),
      });
    }

    return ok(rows);
  }

  async getFundamentals(
    request: FundamentalsRequest,
  ): Promise<Result<RawFundamentalRows, AppBoundaryError>> {
    const ticker = request.ticker.toUpperCase();
    const fund = MOCK_FUNDS.has(ticker);

    switch (request.section) {
      case "summary":
        return ok({
          marketCap: fund ? "512.3B" : { raw: 2_450_000_000, fmt: "2.45B" },
          quoteType: fund ? "ETF" : "EQUITY",
          forwardPE: fund ? null : "21.7",
          pegRatio: fund ? null : { raw: 1.8, fmt: "1.80" },
        });
      case "financials":
        return ok([
          {
            asOfDate: "2025-12-31",
            annualTotalRevenue: "8.71B",
            annualEBIT: "1.2B",
            annualReconciledDepreciation: "439.26M",
            annualDilutedEPS: 4.35,
          },
          {
            asOfDate: "2024-12-31",
            annualTotalRevenue: "7.9B",
            annualEBIT: "1.05B",
            annualReconciledDepreciation: "410M",
            annualDilutedEPS: 3.9,
          },
        ]);
      case "balance_sheet":
        return ok([
          {
            asOfDate: "2025-12-31",
            annualCashAndCashEquivalents: "650M",
            annualLongTermDebt: "1.1B",
            annualCurrentDebtAndCapitalLeaseObligation: "N/A",
            annualTotalEquityGrossMinorityInterest: "3.4B",
          },
        ]);
    }
  }
}
