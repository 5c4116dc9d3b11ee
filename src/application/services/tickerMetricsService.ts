import { err, ok, type Result } from "neverthrow";
import {
  metricsRecordSchema,
  type MetricsRecord,
} from "../../core/entities/metricsRecord";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { HistoricalDataFetcher } from "./historicalDataFetcher";
import type { MomentumCalculator } from "./momentumCalculator";
import type { ValuationCalculator } from "./valuationCalculator";
import type { ValuationDataFetcher } from "./valuationDataFetcher";

const DAY_MS = 24 * 60 * 60 * 1000;

export type TickerFailureKind =
  | "no_data"
  | "insufficient_data"
  | "fetch_failed"
  | "invalid_record";

export type TickerFailure = {
  ticker: string;
  kind: TickerFailureKind;
  message: string;
};

/**
 * Outcomes the batch reports as skips rather than failures.
 */
export const isSkipKind = (
  kind: TickerFailureKind,
): kind is "no_data" | "insufficient_data" =>
  kind === "no_data" || kind === "insufficient_data";

export type TickerMetricsDependencies = {
  historyFetcher: HistoricalDataFetcher;
  valuationFetcher: ValuationDataFetcher;
  momentumCalculator: MomentumCalculator;
  valuationCalculator: ValuationCalculator;
  clock: ClockPort;
};

/**
 * Runs the per-ticker pipeline: history, momentum, fundamentals, valuation, then schema validation.
 */
export class TickerMetricsService {
  constructor(
    private readonly deps: TickerMetricsDependencies,
    private readonly lookbackDays: number,
  ) {}

  async compute(ticker: string): Promise<Result<MetricsRecord, TickerFailure>> {
    const end = this.deps.clock.now();
    const start = new Date(end.getTime() - this.lookbackDays * DAY_MS);

    const history = await this.deps.historyFetcher.fetch(ticker, start, end);
    if (history.isErr()) {
      return err({
        ticker,
        kind: "fetch_failed",
        message: `history: ${history.error.message}`,
      });
    }
    if (!history.value) {
      return err({
        ticker,
        kind: "no_data",
        message: "No price history in the lookback window.",
      });
    }

    const momentum = this.deps.momentumCalculator.compute(history.value);
    if (momentum.isErr()) {
      return err({
        ticker,
        kind: "insufficient_data",
        message: `Need ${momentum.error.required} bars, got ${momentum.error.available}.`,
      });
    }

    const snapshot = await this.deps.valuationFetcher.fetch(
      ticker,
      momentum.value.lastPrice,
    );
    if (snapshot.isErr()) {
      logger.warn(
        { ticker, reason: snapshot.error.message },
        "Fundamentals unavailable; valuation fields left empty",
      );
    }

    const valuation = this.deps.valuationCalculator.compute(
      snapshot.isOk() ? snapshot.value : null,
      momentum.value.lastPrice,
    );

    const parsed = metricsRecordSchema.safeParse({
      ticker,
      ...momentum.value,
      ...valuation,
    });
    if (!parsed.success) {
      return err({
        ticker,
        kind: "invalid_record",
        message: parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      });
    }

    return ok(parsed.data);
  }
}
