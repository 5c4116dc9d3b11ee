import { describe, expect, it } from "vitest";
import {
  emptyValuationMetrics,
  type MetricsRecord,
} from "../../core/entities/metricsRecord";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { InMemoryMetricsRepositoryService } from "./inMemoryMetricsRepository";

const HOUR_MS = 60 * 60 * 1000;

const record = (ticker: string, lastPrice: number): MetricsRecord => ({
  ticker,
  lastPrice,
  ma100: 100,
  ema100: 100,
  pctAboveMa100: lastPrice - 100,
  pctAboveEma100: lastPrice - 100,
  ...emptyValuationMetrics(),
});

const steppingClock = (iso: string) => {
  let current = new Date(iso);
  const clock: ClockPort = { now: () => current };
  const advance = (ms: number) => {
    current = new Date(current.getTime() + ms);
  };
  return { clock, advance };
};

describe("InMemoryMetricsRepositoryService", () => {
  it("keeps one record per ticker with the later write and timestamp", async () => {
    const { clock, advance } = steppingClock("2026-03-02T10:00:00.000Z");
    const repository = new InMemoryMetricsRepositoryService(clock);

    await repository.upsertMany([record("AAPL", 101)]);
    advance(HOUR_MS);
    await repository.upsertMany([record("AAPL", 105)]);

    const all = await repository.listAll();
    expect(all).toHaveLength(1);
    expect(all[0]?.lastPrice).toBe(105);
    expect(all[0]?.updatedAt.toISOString()).toBe("2026-03-02T11:00:00.000Z");
  });

  it("treats a record as fresh only inside the window", async () => {
    const { clock, advance } = steppingClock("2026-03-02T10:00:00.000Z");
    const repository = new InMemoryMetricsRepositoryService(clock);
    await repository.upsertMany([record("MSFT", 300)]);

    advance(23 * HOUR_MS);
    expect(await repository.isRecentlyUpdated("msft", 24 * HOUR_MS)).toBe(true);

    advance(HOUR_MS);
    expect(await repository.isRecentlyUpdated("MSFT", 24 * HOUR_MS)).toBe(
      false,
    );
    expect(await repository.isRecentlyUpdated("NVDA", 24 * HOUR_MS)).toBe(
      false,
    );
  });

  it("lists records by ticker and looks them up case-insensitively", async () => {
    const { clock } = steppingClock("2026-03-02T10:00:00.000Z");
    const repository = new InMemoryMetricsRepositoryService(clock);
    await repository.upsertMany([record("NVDA", 1), record("AAPL", 2)]);

    expect((await repository.listAll()).map((row) => row.ticker)).toEqual([
      "AAPL",
      "NVDA",
    ]);
    expect((await repository.latestByTicker("nvda"))?.lastPrice).toBe(1);
    expect(await repository.latestByTicker("TSLA")).toBeNull();
  });
});
