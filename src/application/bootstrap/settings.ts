import type { AppEnv } from "../../shared/config/env";
import type { BatchSettings } from "../services/batchOrchestratorService";
import type { RetryPolicySettings } from "../services/resilientCaller";

const HOUR_MS = 60 * 60 * 1000;

export type AppSettings = {
  retryPolicy: RetryPolicySettings;
  batch: BatchSettings;
  lookbackDays: number;
  queueConcurrency: number;
};

/**
 * Turns validated environment values into the settings structs services take at construction.
 */
export const loadSettings = (appEnv: AppEnv): AppSettings => ({
  retryPolicy: {
    maxAttempts: appEnv.FETCH_MAX_ATTEMPTS,
    baseDelayMs: appEnv.FETCH_BASE_DELAY_MS,
    backoffMultiplier: appEnv.FETCH_BACKOFF_MULTIPLIER,
    maxDelayMs: appEnv.FETCH_MAX_DELAY_MS,
    throttleMinMs: appEnv.FETCH_THROTTLE_MIN_MS,
    throttleMaxMs: appEnv.FETCH_THROTTLE_MAX_MS,
    rateLimitCooldownMinMs: appEnv.RATE_LIMIT_COOLDOWN_MIN_MS,
    rateLimitCooldownMaxMs: appEnv.RATE_LIMIT_COOLDOWN_MAX_MS,
  },
  batch: {
    concurrency: appEnv.BATCH_CONCURRENCY,
    batchSize: appEnv.BATCH_SIZE,
    freshnessWindowMs: appEnv.FRESHNESS_WINDOW_HOURS * HOUR_MS,
  },
  lookbackDays: appEnv.HISTORICAL_LOOKBACK_DAYS,
  queueConcurrency: appEnv.QUEUE_CONCURRENCY_REFRESH,
});
