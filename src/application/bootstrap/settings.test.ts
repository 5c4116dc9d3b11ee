import { describe, expect, it } from "vitest";
import { parseEnv } from "../../shared/config/env";
import { defaultRetryPolicy } from "../services/resilientCaller";
import { loadSettings } from "./settings";

describe("loadSettings", () => {
  it("uses the documented defaults", () => {
    const settings = loadSettings(parseEnv({}));

    expect(settings.retryPolicy).toEqual(defaultRetryPolicy);
    expect(settings.batch).toEqual({
      concurrency: 10,
      batchSize: 50,
      freshnessWindowMs: 86_400_000,
    });
    expect(settings.lookbackDays).toBe(200);
    expect(settings.queueConcurrency).toBe(4);
  });

  it("reads overrides from the environment", () => {
    const settings = loadSettings(
      parseEnv({
        BATCH_CONCURRENCY: "3",
        FRESHNESS_WINDOW_HOURS: "0.5",
        FETCH_MAX_ATTEMPTS: "2",
      }),
    );

    expect(settings.batch.concurrency).toBe(3);
    expect(settings.batch.freshnessWindowMs).toBe(1_800_000);
    expect(settings.retryPolicy.maxAttempts).toBe(2);
  });

  it("rejects an inverted throttle range", () => {
    expect(() =>
      parseEnv({ FETCH_THROTTLE_MIN_MS: "5000", FETCH_THROTTLE_MAX_MS: "100" }),
    ).toThrow("FETCH_THROTTLE_MIN_MS must not exceed FETCH_THROTTLE_MAX_MS");
  });
});
