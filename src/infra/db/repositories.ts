import { asc, and, eq, gt, sql } from "drizzle-orm";
import type {
  MetricsRecord,
  StoredMetricsRecord,
} from "../../core/entities/metricsRecord";
import type {
  ClockPort,
  MetricsRepositoryPort,
} from "../../core/ports/outboundPorts";
import type { Database } from "./client";
import { tickerMetricsTable } from "./schema";

/**
 * Keeps the last record per ticker; Postgres rejects an upsert that touches one row twice.
 */
export const lastRecordPerTicker = (
  records: MetricsRecord[],
): MetricsRecord[] =>
  Array.from(new Map(records.map((record) => [record.ticker, record])).values());

/**
 * One row per ticker. A batch is written as a single INSERT ... ON CONFLICT statement,
 * so it lands whole or not at all.
 */
export class PostgresMetricsRepositoryService implements MetricsRepositoryPort {
  constructor(
    private readonly db: Database,
    private readonly clock: ClockPort,
  ) {}

  async isRecentlyUpdated(ticker: string, maxAgeMs: number): Promise<boolean> {
    const cutoff = new Date(this.clock.now().getTime() - maxAgeMs);
    const [row] = await this.db
      .select({ ticker: tickerMetricsTable.ticker })
      .from(tickerMetricsTable)
      .where(
        and(
          eq(tickerMetricsTable.ticker, ticker.toUpperCase()),
          gt(tickerMetricsTable.updatedAt, cutoff),
        ),
      )
      .limit(1);

    return row !== undefined;
  }

  async upsertMany(records: MetricsRecord[]): Promise<void> {
    if (records.length === 0) return;
    const updatedAt = this.clock.now();

    await this.db
      .insert(tickerMetricsTable)
      .values(
        lastRecordPerTicker(records).map((record) => ({ ...record, updatedAt })),
      )
      .onConflictDoUpdate({
        target: tickerMetricsTable.ticker,
        set: {
          lastPrice: sql`excluded.last_price`,
          ma100: sql`excluded.ma_100`,
          ema100: sql`excluded.ema_100`,
          pctAboveMa100: sql`excluded.pct_above_ma_100`,
          pctAboveEma100: sql`excluded.pct_above_ema_100`,
          peRatio: sql`excluded.pe_ratio`,
          pbRatio: sql`excluded.pb_ratio`,
          psRatio: sql`excluded.ps_ratio`,
          pegRatio: sql`excluded.peg_ratio`,
          forwardPe: sql`excluded.forward_pe`,
          marketCap: sql`excluded.market_cap`,
          enterpriseValue: sql`excluded.enterprise_value`,
          ebitda: sql`excluded.ebitda`,
          ebitdaToEv: sql`excluded.ebitda_to_ev`,
          updatedAt: sql`excluded.updated_at`,
        },
      });
  }

  async latestByTicker(ticker: string): Promise<StoredMetricsRecord | null> {
    const [row] = await this.db
      .select()
      .from(tickerMetricsTable)
      .where(eq(tickerMetricsTable.ticker, ticker.toUpperCase()))
      .limit(1);

    return row ?? null;
  }

  async listAll(): Promise<StoredMetricsRecord[]> {
    return this.db
      .select()
      .from(tickerMetricsTable)
      .orderBy(asc(tickerMetricsTable.ticker));
  }
}
