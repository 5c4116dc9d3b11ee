import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpJsonClient } from "./httpJsonClient";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpJsonClient", () => {
  it("returns the parsed body and forwards headers", async () => {
    const fetchMock = vi.fn(
      async () => new Response(JSON.stringify({ ok: true }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await new HttpJsonClient().requestJson({
      url: "https://example.test/ok",
      headers: { "User-Agent": "test-agent" },
      timeoutMs: 500,
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ ok: true });
    }
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("maps aborted requests to timeout errors", async () => {
    vi.stubGlobal(
      "fetch",
      async (_input: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            reject(new DOMException("Aborted", "AbortError"));
          });
        }),
    );

    const result = await new HttpJsonClient().requestJson({
      url: "https://example.test/timeout",
      timeoutMs: 5,
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe("timeout");
      expect(result.error.retryable).toBe(true);
    }
  });

  it("keeps the status and a body excerpt for non-success responses", async () => {
    vi.stubGlobal(
      "fetch",
      async () => new Response("Too Many Requests", { status: 429 }),
    );

    const result = await new HttpJsonClient().requestJson({
      url: "https://example.test/limited",
      timeoutMs: 500,
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        code: "non_success_status",
        httpStatus: 429,
        retryable: true,
        message: "HTTP request failed with status 429: Too Many Requests",
      });
    }
  });

  it("flags unparseable bodies", async () => {
    vi.stubGlobal(
      "fetch",
      async () => new Response("<html>", { status: 200 }),
    );

    const result = await new HttpJsonClient().requestJson({
      url: "https://example.test/html",
      timeoutMs: 500,
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe("invalid_json");
    }
  });

  it("maps network failures to transport errors", async () => {
    vi.stubGlobal("fetch", async () => {
      throw new TypeError("fetch failed");
    });

    const result = await new HttpJsonClient().requestJson({
      url: "https://example.test/down",
      timeoutMs: 500,
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        code: "transport_error",
        message: "fetch failed",
      });
    }
  });
});
