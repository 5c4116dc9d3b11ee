import type {
  MetricsRecord,
  StoredMetricsRecord,
} from "../../core/entities/metricsRecord";
import type {
  ClockPort,
  MetricsRepositoryPort,
} from "../../core/ports/outboundPorts";

/**
 * Process-local store for dry runs and tests. Same upsert semantics as the Postgres table.
 */
export class InMemoryMetricsRepositoryService implements MetricsRepositoryPort {
  private readonly rows = new Map<string, StoredMetricsRecord>();

  constructor(private readonly clock: ClockPort) {}

  async isRecentlyUpdated(ticker: string, maxAgeMs: number): Promise<boolean> {
    const row = this.rows.get(ticker.toUpperCase());
    if (!row) return false;
    return row.updatedAt.getTime() > this.clock.now().getTime() - maxAgeMs;
  }

  async upsertMany(records: MetricsRecord[]): Promise<void> {
    const updatedAt = this.clock.now();
    for (const record of records) {
      this.rows.set(record.ticker.toUpperCase(), { ...record, updatedAt });
    }
  }

  async latestByTicker(ticker: string): Promise<StoredMetricsRecord | null> {
    return this.rows.get(ticker.toUpperCase()) ?? null;
  }

  async listAll(): Promise<StoredMetricsRecord[]> {
    return [...this.rows.values()].sort((left, right) =>
      left.ticker.localeCompare(right.ticker),
    );
  }
}
