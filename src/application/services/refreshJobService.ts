import type {
  JobPayload,
  MetricsRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { isSkipKind, type TickerMetricsService } from "./tickerMetricsService";

export type RefreshJobOutcome = "stored" | "skipped";

/**
 * Queue consumer for one ticker. Skips complete the job; fetch or validation failures throw so the job is marked failed.
 */
export class RefreshJobService {
  constructor(
    private readonly tickerMetrics: TickerMetricsService,
    private readonly repository: MetricsRepositoryPort,
  ) {}

  async run(payload: JobPayload): Promise<RefreshJobOutcome> {
    const result = await this.tickerMetrics.compute(payload.ticker);

    if (result.isErr()) {
      const { kind, message } = result.error;
      if (isSkipKind(kind)) {
        logger.info(
          { ticker: payload.ticker, taskId: payload.taskId, reason: kind },
          "Refresh job skipped",
        );
        return "skipped";
      }
      throw new Error(
        `Refresh failed for ${payload.ticker} (${kind}): ${message}`,
      );
    }

    await this.repository.upsertMany([result.value]);
    return "stored";
  }
}
