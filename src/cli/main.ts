import { Command, InvalidArgumentError } from "commander";
import {
  createRuntime,
  createScheduler,
  createTickerSource,
  requireSharedStorage,
  type TickerSelection,
} from "../application/bootstrap/runtimeFactory";
import {
  formatMetricsReport,
  summarizeStoredMetrics,
} from "../application/services/metricsSummary";
import { BullMqQueue, redisConfigFromUrl } from "../infra/queue/bullMqQueue";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

type SelectionOptions = {
  tickers?: string;
  file?: string[];
};

const parsePositiveInt = (raw: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return value;
};

const collect = (value: string, previous: string[] = []): string[] => [
  ...previous,
  value,
];

const toSelection = (opts: SelectionOptions): TickerSelection => ({
  tickers: opts.tickers
    ?.split(",")
    .map((ticker) => ticker.trim())
    .filter(Boolean),
  files: opts.file,
});

const withTickerOptions = (command: Command): Command =>
  command
    .option("--tickers <list>", "Comma-separated tickers (overrides config)")
    .option(
      "--file <path>",
      "CSV file with a Symbol or Ticker column (repeatable)",
      collect,
    );

export const buildCli = () => {
  const cli = new Command();
  cli
    .name("equity-metrics")
    .description("Refresh momentum and valuation metrics per ticker");

  withTickerOptions(
    cli
      .command("run")
      .description("Refresh stale tickers in-process and persist the results"),
  )
    .option("--concurrency <n>", "Parallel ticker workers", parsePositiveInt)
    .option("--force", "Ignore the freshness window")
    .action(
      async (opts: SelectionOptions & { concurrency?: number; force?: boolean }) => {
        const runtime = createRuntime();
        try {
          const tickers = await createTickerSource(toSelection(opts)).loadTickers();
          logger.info(
            { tickers: tickers.length, force: Boolean(opts.force) },
            "Batch refresh started",
          );
          const tally = await runtime.batchOrchestrator.refreshAndPersist(
            tickers,
            { concurrency: opts.concurrency, force: Boolean(opts.force) },
          );
          logger.info(tally, "Batch refresh finished");
          logger.info(
            summarizeStoredMetrics(await runtime.repository.listAll()),
            "Stored metrics summary",
          );
        } finally {
          await runtime.close();
        }
      },
    );

  withTickerOptions(
    cli.command("enqueue").description("Queue one refresh job per stale ticker"),
  )
    .option("--force", "Bypass freshness and hourly job dedupe")
    .action(async (opts: SelectionOptions & { force?: boolean }) => {
      const runtime = createRuntime();
      const { queue, scheduler } = createScheduler(runtime);
      try {
        const tickers = await createTickerSource(toSelection(opts)).loadTickers();
        const summary = await scheduler.enqueueTickers(
          tickers,
          Boolean(opts.force),
        );
        logger.info(
          {
            enqueued: summary.enqueued.length,
            skippedFresh: summary.skippedFresh.length,
          },
          "Enqueue finished",
        );
      } finally {
        await queue.close();
        await runtime.close();
      }
    });

  cli
    .command("show")
    .description("Print the stored record for one ticker")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .option("--prettify", "Render a human-friendly report")
    .action(async (opts: { ticker: string; prettify?: boolean }) => {
      requireSharedStorage(env, "show");
      const runtime = createRuntime();
      try {
        const record = await runtime.repository.latestByTicker(opts.ticker);
        if (!record) {
          logger.info({ ticker: opts.ticker }, "No stored metrics");
          return;
        }

        if (opts.prettify) {
          console.log(formatMetricsReport(record));
        } else {
          logger.info({ record }, "Latest metrics");
        }
      } finally {
        await runtime.close();
      }
    });

  cli
    .command("summary")
    .description("Aggregate statistics over stored records")
    .action(async () => {
      requireSharedStorage(env, "summary");
      const runtime = createRuntime();
      try {
        const records = await runtime.repository.listAll();
        logger.info(summarizeStoredMetrics(records), "Stored metrics summary");
      } finally {
        await runtime.close();
      }
    });

  cli
    .command("status")
    .description("Report configuration and queue backlog")
    .action(async () => {
      const queue = new BullMqQueue(redisConfigFromUrl(env.REDIS_URL));
      try {
        const queueCounts = await queue.getQueueCounts();
        logger.info(
          {
            quoteProvider: env.QUOTE_PROVIDER,
            storageDriver: env.STORAGE_DRIVER,
            tickerFiles: env.TICKER_FILES || null,
            freshnessWindowHours: env.FRESHNESS_WINDOW_HOURS,
            batchConcurrency: env.BATCH_CONCURRENCY,
            batchSize: env.BATCH_SIZE,
            redis: env.REDIS_URL,
            postgres: env.POSTGRES_URL,
            queueCounts,
            startupWorkflow: [
              "npm run db:push",
              "npm run worker",
              "npm start -- enqueue --tickers AAPL",
            ],
          },
          "Runtime status",
        );
      } finally {
        await queue.close();
      }
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
