import {
  createRuntime,
  requireSharedStorage,
} from "../application/bootstrap/runtimeFactory";
import {
  createRefreshWorker,
  redisConfigFromUrl,
} from "../infra/queue/bullMqQueue";
import { env } from "../shared/config/env";
import { logger, toErrorDetails } from "../shared/logger/logger";

const run = async (): Promise<void> => {
  requireSharedStorage(env, "worker");
  const runtime = createRuntime();
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      quoteProvider: env.QUOTE_PROVIDER,
      storageDriver: env.STORAGE_DRIVER,
      lookbackDays: runtime.settings.lookbackDays,
      concurrency: runtime.settings.queueConcurrency,
      redisUrl: env.REDIS_URL,
    },
    "Worker runtime configuration",
  );

  const worker = createRefreshWorker(
    redisConfigFromUrl(env.REDIS_URL),
    runtime.settings.queueConcurrency,
    (payload) => runtime.refreshJobService.run(payload),
  );

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());

    logger.info(
      {
        jobId: job.id,
        taskId: job.data.taskId,
        ticker: job.data.ticker,
        idempotencyKey: job.data.idempotencyKey,
      },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        taskId: job?.data.taskId,
        ticker: job?.data.ticker,
        idempotencyKey: job?.data.idempotencyKey,
        durationMs,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job, outcome) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.info(
      {
        jobId: job.id,
        taskId: job.data.taskId,
        ticker: job.data.ticker,
        idempotencyKey: job.data.idempotencyKey,
        durationMs,
        outcome,
      },
      "Worker job completed",
    );
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Worker shutting down");
    await worker.close();
    await runtime.close();
    process.exit(0);
  };

  process.once("SIGINT", (signal) => {
    void shutdown(signal);
  });
  process.once("SIGTERM", (signal) => {
    void shutdown(signal);
  });

  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
