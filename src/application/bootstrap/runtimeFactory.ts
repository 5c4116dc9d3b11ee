import type {
  QuoteProviderPort,
  TickerSourcePort,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  MetricsRepositoryPort,
} from "../../core/ports/outboundPorts";
import { createDb } from "../../infra/db/client";
import { InMemoryMetricsRepositoryService } from "../../infra/db/inMemoryMetricsRepository";
import { PostgresMetricsRepositoryService } from "../../infra/db/repositories";
import { MockQuoteProvider } from "../../infra/providers/mocks/mockQuoteProvider";
import { YahooQuoteProvider } from "../../infra/providers/yahoo/yahooQuoteProvider";
import {
  BullMqQueue,
  redisConfigFromUrl,
} from "../../infra/queue/bullMqQueue";
import {
  MathRandomSource,
  SystemClock,
  TaskFactory,
  TimerSleeper,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";
import {
  CsvTickerSource,
  StaticTickerSource,
} from "../../infra/tickers/tickerSources";
import {
  appTickers,
  env,
  tickerFiles,
  type AppEnv,
} from "../../shared/config/env";
import { BatchOrchestratorService } from "../services/batchOrchestratorService";
import { HistoricalDataFetcher } from "../services/historicalDataFetcher";
import { MomentumCalculator } from "../services/momentumCalculator";
import { RefreshJobService } from "../services/refreshJobService";
import { RefreshSchedulerService } from "../services/refreshSchedulerService";
import { ResilientCaller } from "../services/resilientCaller";
import { TickerMetricsService } from "../services/tickerMetricsService";
import { ValuationCalculator } from "../services/valuationCalculator";
import { ValuationDataFetcher } from "../services/valuationDataFetcher";
import { loadSettings } from "./settings";

const createQuoteProvider = (
  appEnv: AppEnv,
  clock: ClockPort,
): QuoteProviderPort => {
  if (appEnv.QUOTE_PROVIDER === "yahoo") {
    return new YahooQuoteProvider(
      appEnv.YAHOO_BASE_URL,
      appEnv.YAHOO_USER_AGENT,
      appEnv.YAHOO_TIMEOUT_MS,
    );
  }

  return new MockQuoteProvider(clock);
};

const createRepository = (
  appEnv: AppEnv,
  clock: ClockPort,
): { repository: MetricsRepositoryPort; close: () => Promise<void> } => {
  if (appEnv.STORAGE_DRIVER === "postgres") {
    const { db, sql } = createDb(appEnv.POSTGRES_URL);
    return {
      repository: new PostgresMetricsRepositoryService(db, clock),
      close: () => sql.end(),
    };
  }

  return {
    repository: new InMemoryMetricsRepositoryService(clock),
    close: async () => undefined,
  };
};

/**
 * Commands that read back what another process stored need a shared database.
 */
export const requireSharedStorage = (appEnv: AppEnv, command: string): void => {
  if (appEnv.STORAGE_DRIVER === "memory") {
    throw new Error(
      `${command} needs STORAGE_DRIVER=postgres; the memory driver keeps records inside a single process.`,
    );
  }
};

export type TickerSelection = {
  tickers?: string[];
  files?: string[];
};

/**
 * Explicit tickers win, then CSV files, then the configured list.
 */
export const createTickerSource = (
  selection: TickerSelection = {},
): TickerSourcePort => {
  if (selection.tickers && selection.tickers.length > 0) {
    return new StaticTickerSource(selection.tickers);
  }

  const files =
    selection.files && selection.files.length > 0
      ? selection.files
      : tickerFiles();
  if (files.length > 0) {
    return new CsvTickerSource(files);
  }

  return new StaticTickerSource(appTickers());
};

/**
 * Single composition root shared by the CLI and the queue worker.
 */
export const createRuntime = (appEnv: AppEnv = env) => {
  const settings = loadSettings(appEnv);
  const clock = new SystemClock();
  const provider = createQuoteProvider(appEnv, clock);
  const { repository, close } = createRepository(appEnv, clock);

  const caller = new ResilientCaller(
    settings.retryPolicy,
    new TimerSleeper(),
    new MathRandomSource(),
  );
  const tickerMetricsService = new TickerMetricsService(
    {
      historyFetcher: new HistoricalDataFetcher(provider, caller),
      valuationFetcher: new ValuationDataFetcher(provider, caller),
      momentumCalculator: new MomentumCalculator(),
      valuationCalculator: new ValuationCalculator(),
      clock,
    },
    settings.lookbackDays,
  );

  return {
    settings,
    clock,
    provider,
    repository,
    tickerMetricsService,
    batchOrchestrator: new BatchOrchestratorService(
      tickerMetricsService,
      repository,
      settings.batch,
    ),
    refreshJobService: new RefreshJobService(tickerMetricsService, repository),
    close,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;

/**
 * Queue-backed scheduling needs Redis, so it is only built for commands that enqueue.
 */
export const createScheduler = (runtime: Runtime, appEnv: AppEnv = env) => {
  requireSharedStorage(appEnv, "enqueue");
  const queue = new BullMqQueue(redisConfigFromUrl(appEnv.REDIS_URL));
  const scheduler = new RefreshSchedulerService(
    queue,
    new TaskFactory(runtime.clock, new UuidIdGenerator()),
    runtime.repository,
    runtime.settings.batch.freshnessWindowMs,
  );
  return { queue, scheduler };
};
