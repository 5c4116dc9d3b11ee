import type {
  MetricsRecord,
  StoredMetricsRecord,
} from "../entities/metricsRecord";
import type { RefreshTaskEntity } from "../entities/refreshTask";

export type JobPayload = {
  taskId: string;
  ticker: string;
  idempotencyKey: string;
  requestedAt: string;
};

export interface QueuePort {
  enqueue(payload: JobPayload): Promise<void>;
}

export interface MetricsRepositoryPort {
  isRecentlyUpdated(ticker: string, maxAgeMs: number): Promise<boolean>;
  upsertMany(records: MetricsRecord[]): Promise<void>;
  latestByTicker(ticker: string): Promise<StoredMetricsRecord | null>;
  listAll(): Promise<StoredMetricsRecord[]>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}

export interface SleeperPort {
  sleep(ms: number): Promise<void>;
}

/**
 * Uniform source in [0, 1).
 */
export interface RandomSourcePort {
  next(): number;
}

export interface TaskFactoryPort {
  create(ticker: string): RefreshTaskEntity;
}
