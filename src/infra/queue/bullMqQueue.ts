import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type { JobPayload, QueuePort } from "../../core/ports/outboundPorts";
import { queueNames } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

/**
 * Retries belong to the fetch layer, so each job runs once.
 */
export const defaultJobOptions = {
  attempts: 1,
  removeOnComplete: 250,
} as const;

export class BullMqQueue implements QueuePort {
  private readonly queue: Queue<JobPayload>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<JobPayload>(queueNames.refresh, {
      connection,
      defaultJobOptions,
    });
  }

  /**
   * The idempotency key doubles as job id, so a ticker is queued at most once per hour bucket.
   */
  async enqueue(payload: JobPayload): Promise<void> {
    await this.queue.add(payload.idempotencyKey, payload, {
      jobId: payload.idempotencyKey,
    });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }
}

export const createRefreshWorker = <TResult>(
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: JobPayload) => Promise<TResult>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<JobPayload, TResult>(
    queueNames.refresh,
    (job) => processor(job.data),
    options,
  );
};

/**
 * Splits a redis:// URL into the option object BullMQ hands to ioredis.
 */
export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    maxRetriesPerRequest: null,
  };
};
