/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "not_found"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: "history" | "fundamentals";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

export const isAppBoundaryError = (value: unknown): value is AppBoundaryError =>
  typeof value === "object" &&
  value !== null &&
  "code" in value &&
  typeof value.code === "string" &&
  "provider" in value &&
  typeof value.provider === "string" &&
  "message" in value &&
  typeof value.message === "string" &&
  "retryable" in value &&
  typeof value.retryable === "boolean";

/**
 * Closed set of categories the fetch layer retries on.
 */
export type FetchErrorCategory = "rate_limited" | "transient" | "permanent";

/**
 * A provider call that stayed failed after the retry policy gave up.
 */
export type FetchFailure = {
  ticker: string;
  operation: string;
  category: FetchErrorCategory;
  attempts: number;
  message: string;
  httpStatus?: number;
  cause?: unknown;
};
