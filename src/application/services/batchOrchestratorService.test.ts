import { describe, expect, it } from "vitest";
import { emptyValuationMetrics } from "../../core/entities/metricsRecord";
import type { MetricsRepositoryPort } from "../../core/ports/outboundPorts";
import { InMemoryMetricsRepositoryService } from "../../infra/db/inMemoryMetricsRepository";
import {
  buildTickerMetricsService,
  fixedClock,
  flatCloses,
  scriptedProvider,
} from "./__fixtures__/pipeline";
import { BatchOrchestratorService } from "./batchOrchestratorService";

const HOUR_MS = 60 * 60 * 1000;
const clock = fixedClock("2026-03-02T21:00:00.000Z");

const settings = {
  concurrency: 3,
  batchSize: 50,
  freshnessWindowMs: 24 * HOUR_MS,
};

const alwaysDown = {
  source: "history" as const,
  code: "transport_error" as const,
  provider: "scripted",
  message: "socket hang up",
  retryable: true,
};

describe("BatchOrchestratorService", () => {
  it("returns records for healthy tickers and counts the one that keeps failing", async () => {
    const provider = scriptedProvider(clock, {
      AAPL: flatCloses(120, 10),
      MSFT: flatCloses(120, 20),
      DOWN: alwaysDown,
      NVDA: flatCloses(120, 30),
    });
    const orchestrator = new BatchOrchestratorService(
      buildTickerMetricsService(provider, clock),
      new InMemoryMetricsRepositoryService(clock),
      settings,
    );

    const result = await orchestrator.run(["AAPL", "MSFT", "DOWN", "NVDA"]);

    expect(result.records.map((record) => record.ticker).sort()).toEqual([
      "AAPL",
      "MSFT",
      "NVDA",
    ]);
    expect(result.tally).toEqual({
      total: 4,
      skippedFresh: 0,
      skippedNoData: 0,
      succeeded: 3,
      failed: 1,
    });
    expect(result.outcomes).toContainEqual({
      ticker: "DOWN",
      status: "failed",
      reason: "fetch_failed",
      message: "history: socket hang up",
    });
    expect(
      provider.calls.filter((call) => call === "history:DOWN"),
    ).toHaveLength(5);
  });

  it("skips fresh tickers without any provider call", async () => {
    const repository = new InMemoryMetricsRepositoryService(clock);
    await repository.upsertMany([
      {
        ticker: "AAPL",
        lastPrice: 10,
        ma100: 10,
        ema100: 10,
        pctAboveMa100: 0,
        pctAboveEma100: 0,
        ...emptyValuationMetrics(),
      },
    ]);
    const provider = scriptedProvider(clock, {
      AAPL: flatCloses(120, 10),
      MSFT: flatCloses(120, 20),
    });
    const orchestrator = new BatchOrchestratorService(
      buildTickerMetricsService(provider, clock),
      repository,
      settings,
    );

    const result = await orchestrator.run(["AAPL", "MSFT"]);

    expect(provider.calls.some((call) => call.endsWith(":AAPL"))).toBe(false);
    expect(result.tally.skippedFresh).toBe(1);
    expect(result.tally.succeeded).toBe(1);
    expect(result.outcomes).toContainEqual({
      ticker: "AAPL",
      status: "skipped",
      reason: "fresh",
    });
  });

  it("refetches fresh tickers when forced", async () => {
    const repository = new InMemoryMetricsRepositoryService(clock);
    await repository.upsertMany([
      {
        ticker: "AAPL",
        lastPrice: 1,
        ma100: 1,
        ema100: 1,
        pctAboveMa100: 0,
        pctAboveEma100: 0,
        ...emptyValuationMetrics(),
      },
    ]);
    const provider = scriptedProvider(clock, { AAPL: flatCloses(120, 10) });
    const orchestrator = new BatchOrchestratorService(
      buildTickerMetricsService(provider, clock),
      repository,
      settings,
    );

    const result = await orchestrator.run(["AAPL"], { force: true });

    expect(result.tally.succeeded).toBe(1);
    expect(provider.calls[0]).toBe("history:AAPL");
  });

  it("reports no-data and short histories as skips", async () => {
    const provider = scriptedProvider(clock, { SHORT: flatCloses(40, 5) });
    const orchestrator = new BatchOrchestratorService(
      buildTickerMetricsService(provider, clock),
      new InMemoryMetricsRepositoryService(clock),
      settings,
    );

    const result = await orchestrator.run(["SHORT", "EMPTY"]);

    expect(result.records).toEqual([]);
    expect(result.tally).toEqual({
      total: 2,
      skippedFresh: 0,
      skippedNoData: 2,
      succeeded: 0,
      failed: 0,
    });
    expect(result.outcomes).toContainEqual({
      ticker: "SHORT",
      status: "skipped",
      reason: "insufficient_data",
    });
  });

  it("persists chunk by chunk and sums the tallies", async () => {
    const repository = new InMemoryMetricsRepositoryService(clock);
    const upserts: string[][] = [];
    const recordingRepository: MetricsRepositoryPort = {
      isRecentlyUpdated: (ticker, maxAgeMs) =>
        repository.isRecentlyUpdated(ticker, maxAgeMs),
      latestByTicker: (ticker) => repository.latestByTicker(ticker),
      listAll: () => repository.listAll(),
      upsertMany: async (records) => {
        upserts.push(records.map((record) => record.ticker));
        await repository.upsertMany(records);
      },
    };
    const provider = scriptedProvider(clock, {
      AAA: flatCloses(120, 1),
      BBB: flatCloses(120, 2),
      CCC: flatCloses(120, 3),
    });
    const orchestrator = new BatchOrchestratorService(
      buildTickerMetricsService(provider, clock),
      recordingRepository,
      { ...settings, batchSize: 2 },
    );

    const tally = await orchestrator.refreshAndPersist(["AAA", "BBB", "CCC"]);

    expect(upserts).toEqual([["AAA", "BBB"], ["CCC"]]);
    expect(tally).toEqual({
      total: 3,
      skippedFresh: 0,
      skippedNoData: 0,
      succeeded: 3,
      failed: 0,
    });
    expect((await repository.listAll()).map((row) => row.ticker)).toEqual([
      "AAA",
      "BBB",
      "CCC",
    ]);
  });

  it("propagates storage failures from the freshness check", async () => {
    const repository: MetricsRepositoryPort = {
      isRecentlyUpdated: async () => {
        throw new Error("connection refused");
      },
      upsertMany: async () => undefined,
      latestByTicker: async () => null,
      listAll: async () => [],
    };
    const orchestrator = new BatchOrchestratorService(
      buildTickerMetricsService(scriptedProvider(clock, {}), clock),
      repository,
      settings,
    );

    await expect(orchestrator.run(["AAPL"])).rejects.toThrow(
      "connection refused",
    );
  });

  it("leaves records with non-finite fields out of storage and counts them as failed", async () => {
    const repository = new InMemoryMetricsRepositoryService(clock);
    const provider = scriptedProvider(clock, {
      AAPL: flatCloses(120, 10),
      BIG: flatCloses(120, 1e307),
    });
    const orchestrator = new BatchOrchestratorService(
      buildTickerMetricsService(provider, clock),
      repository,
      settings,
    );

    const result = await orchestrator.run(["AAPL", "BIG"]);
    const tally = await orchestrator.refreshAndPersist(["BIG"]);

    expect(result.records.map((record) => record.ticker)).toEqual(["AAPL"]);
    expect(result.tally.failed).toBe(1);
    expect(result.outcomes).toContainEqual({
      ticker: "BIG",
      status: "failed",
      reason: "invalid_record",
      message:
        "ma100: Number must be finite; pctAboveMa100: Expected number, received nan",
    });
    expect(tally.failed).toBe(1);
    expect(await repository.latestByTicker("BIG")).toBeNull();
  });
});
