import type { MetricsRecord } from "../../core/entities/metricsRecord";
import type { MetricsRepositoryPort } from "../../core/ports/outboundPorts";
import { mapWithConcurrency } from "../../shared/concurrency/mapWithConcurrency";
import { logger } from "../../shared/logger/logger";
import { partitionByFreshness } from "./freshness";
import {
  isSkipKind,
  type TickerFailureKind,
  type TickerMetricsService,
} from "./tickerMetricsService";

export type BatchSettings = {
  concurrency: number;
  batchSize: number;
  freshnessWindowMs: number;
};

export type TickerOutcome =
  | { ticker: string; status: "success" }
  | {
      ticker: string;
      status: "skipped";
      reason: "fresh" | "no_data" | "insufficient_data";
    }
  | {
      ticker: string;
      status: "failed";
      reason: TickerFailureKind | "unexpected_error";
      message: string;
    };

export type BatchTally = {
  total: number;
  skippedFresh: number;
  skippedNoData: number;
  succeeded: number;
  failed: number;
};

export type BatchResult = {
  records: MetricsRecord[];
  outcomes: TickerOutcome[];
  tally: BatchTally;
};

export type RunOptions = {
  concurrency?: number;
  force?: boolean;
};

export const emptyTally = (): BatchTally => ({
  total: 0,
  skippedFresh: 0,
  skippedNoData: 0,
  succeeded: 0,
  failed: 0,
});

const addTallies = (left: BatchTally, right: BatchTally): BatchTally => ({
  total: left.total + right.total,
  skippedFresh: left.skippedFresh + right.skippedFresh,
  skippedNoData: left.skippedNoData + right.skippedNoData,
  succeeded: left.succeeded + right.succeeded,
  failed: left.failed + right.failed,
});

const tallyOutcomes = (outcomes: TickerOutcome[]): BatchTally => {
  const tally = emptyTally();
  tally.total = outcomes.length;
  for (const outcome of outcomes) {
    if (outcome.status === "success") tally.succeeded += 1;
    else if (outcome.status === "failed") tally.failed += 1;
    else if (outcome.reason === "fresh") tally.skippedFresh += 1;
    else tally.skippedNoData += 1;
  }
  return tally;
};

const chunk = <T>(items: T[], size: number): T[][] => {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += step) {
    chunks.push(items.slice(index, index + step));
  }
  return chunks;
};

/**
 * Skips tickers refreshed within the freshness window and fans the rest out over a bounded pool.
 * Per-ticker failures are counted, never thrown; storage errors during the freshness check are.
 */
export class BatchOrchestratorService {
  constructor(
    private readonly tickerMetrics: TickerMetricsService,
    private readonly repository: MetricsRepositoryPort,
    private readonly settings: BatchSettings,
  ) {}

  async run(tickers: string[], options: RunOptions = {}): Promise<BatchResult> {
    const concurrency = options.concurrency ?? this.settings.concurrency;
    const windowMs = options.force ? 0 : this.settings.freshnessWindowMs;
    const { fresh, stale } = await partitionByFreshness(
      this.repository,
      tickers,
      windowMs,
    );

    const outcomes: TickerOutcome[] = fresh.map((ticker): TickerOutcome => ({
      ticker,
      status: "skipped",
      reason: "fresh",
    }));
    for (const ticker of fresh) {
      logger.debug({ ticker }, "Skipping recently refreshed ticker");
    }

    const records: MetricsRecord[] = [];
    let done = 0;
    const settled = await mapWithConcurrency(
      stale,
      concurrency,
      (ticker) => this.tickerMetrics.compute(ticker),
      (_settlement, _index, ticker) => {
        done += 1;
        logger.debug({ ticker, done, total: stale.length }, "Ticker settled");
      },
    );

    settled.forEach((settlement, index) => {
      const ticker = stale[index] ?? "";
      if (settlement.status === "rejected") {
        const message =
          settlement.reason instanceof Error
            ? settlement.reason.message
            : String(settlement.reason);
        logger.error({ ticker, err: settlement.reason }, "Ticker task crashed");
        outcomes.push({
          ticker,
          status: "failed",
          reason: "unexpected_error",
          message,
        });
        return;
      }

      const result = settlement.value;
      if (result.isOk()) {
        records.push(result.value);
        outcomes.push({ ticker, status: "success" });
        return;
      }

      const { kind, message } = result.error;
      if (isSkipKind(kind)) {
        logger.info(
          { ticker, reason: kind, detail: message },
          "Skipping ticker",
        );
        outcomes.push({ ticker, status: "skipped", reason: kind });
        return;
      }

      logger.warn({ ticker, reason: kind, detail: message }, "Ticker failed");
      outcomes.push({ ticker, status: "failed", reason: kind, message });
    });

    const tally = tallyOutcomes(outcomes);
    logger.info({ ...tally, concurrency }, "Batch finished");
    return { records, outcomes, tally };
  }

  /**
   * Runs the batch in chunks of `batchSize`, persisting each chunk before starting the next.
   */
  async refreshAndPersist(
    tickers: string[],
    options: RunOptions = {},
  ): Promise<BatchTally> {
    let total = emptyTally();
    const chunks = chunk(tickers, this.settings.batchSize);

    for (const [index, group] of chunks.entries()) {
      logger.info(
        { chunk: index + 1, chunks: chunks.length, tickers: group.length },
        "Processing ticker chunk",
      );
      const { records, tally } = await this.run(group, options);
      if (records.length > 0) {
        await this.repository.upsertMany(records);
      }
      total = addTallies(total, tally);
    }

    return total;
  }
}
