import { err, ok } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  QuoteProviderPort,
  RawFundamentalRows,
  RawPriceRow,
} from "../../../core/ports/inboundPorts";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import { HistoricalDataFetcher } from "../historicalDataFetcher";
import { MomentumCalculator } from "../momentumCalculator";
import { defaultRetryPolicy, ResilientCaller } from "../resilientCaller";
import { TickerMetricsService } from "../tickerMetricsService";
import { ValuationCalculator } from "../valuationCalculator";
import { ValuationDataFetcher } from "../valuationDataFetcher";

const DAY_MS = 24 * 60 * 60 * 1000;

export const fixedClock = (iso: string): ClockPort => ({
  now: () => new Date(iso),
});

export const instantCaller = (): ResilientCaller =>
  new ResilientCaller(
    {
      ...defaultRetryPolicy,
      baseDelayMs: 0,
      throttleMinMs: 0,
      throttleMaxMs: 0,
      rateLimitCooldownMinMs: 0,
      rateLimitCooldownMaxMs: 0,
    },
    { sleep: async () => undefined },
    { next: () => 0 },
  );

/**
 * Daily rows ending on the clock's date, oldest first.
 */
export const dailyRows = (clock: ClockPort, closes: number[]): RawPriceRow[] => {
  const end = clock.now().getTime();
  return closes.map((close, index) => ({
    timestamp: new Date(end - (closes.length - 1 - index) * DAY_MS),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1_000,
  }));
};

export const flatCloses = (count: number, close: number): number[] =>
  Array.from({ length: count }, () => close);

const equityFundamentals: Record<string, RawFundamentalRows> = {
  summary: { marketCap: "2.5B", forwardPE: 18.4, quoteType: "EQUITY" },
  financials: [{ annualDilutedEPS: 4, annualTotalRevenue: 1_000_000_000 }],
  balance_sheet: [{ annualTotalEquityGrossMinorityInterest: 500_000_000 }],
};

export type ScriptedProvider = QuoteProviderPort & {
  calls: string[];
};

/**
 * History per ticker is either closes or a provider error returned on every call.
 */
export const scriptedProvider = (
  clock: ClockPort,
  history: Record<string, number[] | AppBoundaryError>,
): ScriptedProvider => {
  const calls: string[] = [];
  return {
    name: "scripted",
    calls,
    getHistory: async ({ ticker }) => {
      calls.push(`history:${ticker}`);
      const scripted = history[ticker];
      if (scripted === undefined) {
        return ok([]);
      }
      return Array.isArray(scripted)
        ? ok(dailyRows(clock, scripted))
        : err(scripted);
    },
    getFundamentals: async ({ ticker, section }) => {
      calls.push(`${section}:${ticker}`);
      return ok(equityFundamentals[section] ?? {});
    },
  };
};

export const buildTickerMetricsService = (
  provider: QuoteProviderPort,
  clock: ClockPort,
  lookbackDays = 200,
): TickerMetricsService => {
  const caller = instantCaller();
  return new TickerMetricsService(
    {
      historyFetcher: new HistoricalDataFetcher(provider, caller),
      valuationFetcher: new ValuationDataFetcher(provider, caller),
      momentumCalculator: new MomentumCalculator(),
      valuationCalculator: new ValuationCalculator(),
      clock,
    },
    lookbackDays,
  );
};
