import { err, ok, type Result } from "neverthrow";
import {
  isAppBoundaryError,
  type AppBoundaryError,
  type FetchErrorCategory,
  type FetchFailure,
} from "../../core/entities/appError";
import type {
  RandomSourcePort,
  SleeperPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

export type RetryPolicySettings = {
  maxAttempts: number;
  baseDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  throttleMinMs: number;
  throttleMaxMs: number;
  rateLimitCooldownMinMs: number;
  rateLimitCooldownMaxMs: number;
};

export const defaultRetryPolicy: RetryPolicySettings = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
  backoffMultiplier: 2,
  maxDelayMs: 30_000,
  throttleMinMs: 1_000,
  throttleMaxMs: 3_000,
  rateLimitCooldownMinMs: 5_000,
  rateLimitCooldownMaxMs: 15_000,
};

const RATE_LIMIT_MARKER = /too many requests|rate[\s_-]?limit|throttl/i;
const TRANSIENT_NETWORK_MARKER =
  /ECONNRESET|ECONNREFUSED|ECONNABORTED|ETIMEDOUT|EAI_AGAIN|ENOTFOUND|EPIPE|socket hang up|network|fetch failed|timed? ?out/i;

const describeError = (error: unknown): string => {
  if (isAppBoundaryError(error)) return error.message;
  if (error instanceof Error) return error.message;
  return String(error);
};

/**
 * Maps any failure to the category that drives the retry loop.
 */
export const classifyFetchError = (error: unknown): FetchErrorCategory => {
  if (isAppBoundaryError(error)) {
    if (
      error.code === "rate_limited" ||
      error.httpStatus === 429 ||
      RATE_LIMIT_MARKER.test(error.message)
    ) {
      return "rate_limited";
    }

    switch (error.code) {
      case "timeout":
      case "transport_error":
      case "malformed_response":
      case "invalid_json":
        return "transient";
      case "provider_error":
        return error.retryable ? "transient" : "permanent";
      case "auth_invalid":
      case "config_invalid":
      case "not_found":
      default:
        return "permanent";
    }
  }

  const message = describeError(error);
  if (RATE_LIMIT_MARKER.test(message)) {
    return "rate_limited";
  }

  const name = error instanceof Error ? error.name : "";
  if (
    name === "AbortError" ||
    name === "TimeoutError" ||
    TRANSIENT_NETWORK_MARKER.test(message)
  ) {
    return "transient";
  }

  return "permanent";
};

/**
 * Delay before the retry that follows `attempt` (1-based): base * multiplier^(attempt-1), capped.
 */
export const computeBackoffDelayMs = (
  policy: RetryPolicySettings,
  attempt: number,
): number =>
  Math.min(
    policy.baseDelayMs * policy.backoffMultiplier ** (attempt - 1),
    policy.maxDelayMs,
  );

export type CallContext = {
  ticker: string;
  operation: string;
};

export type ResilientCallSuccess<T> = {
  value: T;
  attempts: number;
};

/**
 * Wraps one provider operation with throttle, category-driven retry and exponential backoff.
 * Stateless apart from its policy, so one instance is shared by every worker.
 */
export class ResilientCaller {
  constructor(
    private readonly policy: RetryPolicySettings,
    private readonly sleeper: SleeperPort,
    private readonly random: RandomSourcePort,
  ) {}

  async call<T>(
    context: CallContext,
    operation: () => Promise<Result<T, AppBoundaryError>>,
  ): Promise<Result<ResilientCallSuccess<T>, FetchFailure>> {
    const maxAttempts = Math.max(1, this.policy.maxAttempts);

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      await this.pause(
        this.jitter(this.policy.throttleMinMs, this.policy.throttleMaxMs),
      );

      const outcome = await this.attempt(operation);
      if (outcome.isOk()) {
        return ok({ value: outcome.value, attempts: attempt });
      }

      const failure = outcome.error;
      const category = classifyFetchError(failure);
      const hasAttemptsLeft = attempt < maxAttempts;

      if (category === "permanent" || !hasAttemptsLeft) {
        logger.warn(
          {
            ...context,
            attempt,
            category,
            reason: describeError(failure),
          },
          category === "permanent"
            ? "Upstream call failed permanently"
            : "Upstream call exhausted retry attempts",
        );
        return err(this.toFetchFailure(context, failure, category, attempt));
      }

      if (category === "rate_limited") {
        const cooldownMs = this.jitter(
          this.policy.rateLimitCooldownMinMs,
          this.policy.rateLimitCooldownMaxMs,
        );
        logger.warn(
          { ...context, attempt, cooldownMs },
          "Rate limited by upstream; cooling down",
        );
        await this.pause(cooldownMs);
      }

      const delayMs = computeBackoffDelayMs(this.policy, attempt);
      logger.debug(
        {
          ...context,
          attempt,
          category,
          delayMs,
          reason: describeError(failure),
        },
        "Retrying upstream call",
      );
      await this.pause(delayMs);
    }

    return err({
      ...context,
      category: "permanent",
      attempts: maxAttempts,
      message: "Upstream call exhausted retry attempts.",
    });
  }

  /**
   * Folds a thrown rejection into the error channel so adapters that throw are retried like ones that return errors.
   */
  private async attempt<T>(
    operation: () => Promise<Result<T, AppBoundaryError>>,
  ): Promise<Result<T, unknown>> {
    try {
      const result = await operation();
      return result.mapErr((error): unknown => error);
    } catch (error) {
      return err(error);
    }
  }

  private toFetchFailure(
    context: CallContext,
    error: unknown,
    category: FetchErrorCategory,
    attempts: number,
  ): FetchFailure {
    return {
      ...context,
      category,
      attempts,
      message: describeError(error),
      httpStatus: isAppBoundaryError(error) ? error.httpStatus : undefined,
      cause: error,
    };
  }

  private jitter(minMs: number, maxMs: number): number {
    return Math.round(minMs + this.random.next() * Math.max(0, maxMs - minMs));
  }

  private async pause(ms: number): Promise<void> {
    if (ms <= 0) return;
    await this.sleeper.sleep(ms);
  }
}
