import { err, ok, type Result } from "neverthrow";
import type { FetchFailure } from "../../core/entities/appError";
import type {
  Bar,
  HistoricalSeries,
  HistoryRange,
} from "../../core/entities/bar";
import type {
  QuoteProviderPort,
  RawPriceRow,
} from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";
import type { ResilientCaller } from "./resilientCaller";

const DAY_MS = 24 * 60 * 60 * 1000;

const RANGE_BUCKETS: Array<{ maxDays: number; range: HistoryRange }> = [
  { maxDays: 30, range: "1mo" },
  { maxDays: 90, range: "3mo" },
  { maxDays: 180, range: "6mo" },
  { maxDays: 365, range: "1y" },
  { maxDays: 730, range: "2y" },
];

/**
 * Smallest provider range that covers the requested span.
 */
export const selectHistoryRange = (start: Date, end: Date): HistoryRange => {
  const spanDays = Math.floor((end.getTime() - start.getTime()) / DAY_MS);
  const bucket = RANGE_BUCKETS.find((item) => spanDays <= item.maxDays);
  return bucket?.range ?? "5y";
};

const toBar = (row: RawPriceRow): Bar | null => {
  if (Number.isNaN(row.timestamp.getTime())) {
    return null;
  }
  if (row.close === null || !Number.isFinite(row.close)) {
    return null;
  }

  return {
    timestamp: row.timestamp,
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    volume: row.volume,
  };
};

/**
 * Keeps bars at or after `start`, ascending, one per timestamp (later rows win).
 */
export const normalizeBars = (rows: RawPriceRow[], start: Date): Bar[] => {
  const byTime = new Map<number, Bar>();
  const startMs = start.getTime();

  for (const row of rows) {
    const bar = toBar(row);
    if (!bar || bar.timestamp.getTime() < startMs) {
      continue;
    }
    byTime.set(bar.timestamp.getTime(), bar);
  }

  return [...byTime.entries()]
    .sort(([left], [right]) => left - right)
    .map(([, bar]) => bar);
};

export class HistoricalDataFetcher {
  constructor(
    private readonly provider: QuoteProviderPort,
    private readonly caller: ResilientCaller,
  ) {}

  /**
   * Resolves to `null` when the provider has no usable bars in the window; failures come back only after retries.
   */
  async fetch(
    ticker: string,
    start: Date,
    end: Date,
  ): Promise<Result<HistoricalSeries | null, FetchFailure>> {
    const range = selectHistoryRange(start, end);
    const response = await this.caller.call(
      { ticker, operation: "history" },
      () => this.provider.getHistory({ ticker, range }),
    );

    if (response.isErr()) {
      return err(response.error);
    }

    const { value: rows, attempts } = response.value;
    const bars = normalizeBars(rows, start);
    if (bars.length === 0) {
      logger.warn(
        { ticker, range, rawRows: rows.length },
        "No price history in requested window",
      );
      return ok(null);
    }

    logger.debug(
      { ticker, range, bars: bars.length, attempts },
      "Fetched price history",
    );
    return ok({ ticker, bars });
  }
}
