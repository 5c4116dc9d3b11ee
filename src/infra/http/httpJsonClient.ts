import { err, ok, type Result } from "neverthrow";

export type HttpJsonRequest = {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

const BODY_EXCERPT_LENGTH = 200;

/**
 * Single GET-with-timeout primitive for provider adapters. No retries here; callers wrap it in the retry policy.
 */
export class HttpJsonClient {
  async requestJson(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        const excerpt = (await response.text()).slice(0, BODY_EXCERPT_LENGTH);
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}${
            excerpt ? `: ${excerpt}` : "."
          }`,
          httpStatus: response.status,
          retryable: response.status === 429 || response.status >= 500,
        });
      }

      try {
        const body: unknown = await response.json();
        return ok(body);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: true,
          cause: jsonError,
        });
      }
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
