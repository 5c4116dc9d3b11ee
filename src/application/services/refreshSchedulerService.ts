import type {
  MetricsRepositoryPort,
  QueuePort,
  TaskFactoryPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { partitionByFreshness } from "./freshness";

export type EnqueueSummary = {
  enqueued: string[];
  skippedFresh: string[];
};

/**
 * Owns queue handoff policy so the CLI and any future trigger dedupe tickers the same way.
 */
export class RefreshSchedulerService {
  constructor(
    private readonly queue: QueuePort,
    private readonly taskFactory: TaskFactoryPort,
    private readonly repository: MetricsRepositoryPort,
    private readonly freshnessWindowMs: number,
  ) {}

  /**
   * Queues one job per stale ticker. `force` bypasses both the freshness check and the hourly job dedupe.
   */
  async enqueueTickers(
    tickers: string[],
    force = false,
  ): Promise<EnqueueSummary> {
    const { fresh, stale } = await partitionByFreshness(
      this.repository,
      tickers,
      force ? 0 : this.freshnessWindowMs,
    );

    for (const ticker of stale) {
      const task = this.taskFactory.create(ticker);
      const idempotencyKey = force
        ? `${task.idempotencyKey}-force-${task.id}`
        : task.idempotencyKey;

      await this.queue.enqueue({
        taskId: task.id,
        ticker: task.ticker,
        idempotencyKey,
        requestedAt: task.requestedAt.toISOString(),
      });
    }

    logger.info(
      { enqueued: stale.length, skippedFresh: fresh.length, force },
      "Refresh jobs enqueued",
    );
    return { enqueued: stale, skippedFresh: fresh };
  }
}
