import { afterEach, describe, expect, it, vi } from "vitest";
import { toBoundaryError, YahooQuoteProvider } from "./yahooQuoteProvider";

const BASE_URL = "https://quotes.example.test";
const NOW = new Date("2026-03-02T00:00:00.000Z");

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status });

const stubFetch = (response: () => Response) => {
  const requestedUrls: string[] = [];
  vi.stubGlobal("fetch", async (input: string) => {
    requestedUrls.push(input);
    return response();
  });
  return requestedUrls;
};

const createProvider = () =>
  new YahooQuoteProvider(BASE_URL, "test-agent", 500, undefined, () => NOW);

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("YahooQuoteProvider.getHistory", () => {
  it("requests the chart range and maps rows", async () => {
    const urls = stubFetch(() =>
      jsonResponse({
        chart: {
          result: [
            {
              timestamp: [1767225600, 1767312000],
              indicators: {
                quote: [
                  {
                    open: [10, 11],
                    high: [12, 13],
                    low: [9, null],
                    close: [11.5, null],
                    volume: [1000, 2000],
                  },
                ],
              },
            },
          ],
          error: null,
        },
      }),
    );

    const result = await createProvider().getHistory({
      ticker: "BRK.B",
      range: "1y",
    });

    expect(urls).toEqual([
      `${BASE_URL}/v8/finance/chart/BRK.B?range=1y&interval=1d`,
    ]);
    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual([
      {
        timestamp: new Date("2026-01-01T00:00:00.000Z"),
        open: 10,
        high: 12,
        low: 9,
        close: 11.5,
        volume: 1000,
      },
      {
        timestamp: new Date("2026-01-02T00:00:00.000Z"),
        open: 11,
        high: 13,
        low: null,
        close: null,
        volume: 2000,
      },
    ]);
  });

  it("maps HTTP 429 to a rate-limited boundary error", async () => {
    stubFetch(() => new Response("Too Many Requests", { status: 429 }));

    const result = await createProvider().getHistory({
      ticker: "AAPL",
      range: "1y",
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        source: "history",
        code: "rate_limited",
        provider: "yahoo",
        retryable: true,
        httpStatus: 429,
      });
    }
  });

  it("maps an upstream not-found payload", async () => {
    stubFetch(() =>
      jsonResponse({
        chart: {
          result: null,
          error: { code: "Not Found", description: "No data found" },
        },
      }),
    );

    const result = await createProvider().getHistory({
      ticker: "ZZZZ",
      range: "1y",
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe("not_found");
      expect(result.error.message).toBe("Not Found: No data found");
    }
  });

  it("flags payloads of the wrong shape as malformed", async () => {
    stubFetch(() => jsonResponse({ unexpected: true }));

    const result = await createProvider().getHistory({
      ticker: "AAPL",
      range: "1y",
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe("malformed_response");
      expect(result.error.retryable).toBe(true);
    }
  });
});

describe("YahooQuoteProvider.getFundamentals", () => {
  it("flattens quoteSummary modules into one summary mapping", async () => {
    const urls = stubFetch(() =>
      jsonResponse({
        quoteSummary: {
          result: [
            {
              price: {
                marketCap: { raw: 2_500_000_000, fmt: "2.5B" },
                quoteType: "EQUITY",
              },
              summaryDetail: { forwardPE: { raw: 18.4, fmt: "18.40" } },
              defaultKeyStatistics: { pegRatio: { raw: 1.3, fmt: "1.30" } },
            },
          ],
          error: null,
        },
      }),
    );

    const result = await createProvider().getFundamentals({
      ticker: "AAPL",
      section: "summary",
    });

    expect(urls).toEqual([
      `${BASE_URL}/v10/finance/quoteSummary/AAPL?modules=price%2CsummaryDetail%2CdefaultKeyStatistics`,
    ]);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        marketCap: { raw: 2_500_000_000, fmt: "2.5B" },
        quoteType: "EQUITY",
        forwardPE: { raw: 18.4, fmt: "18.40" },
        pegRatio: { raw: 1.3, fmt: "1.30" },
      });
    }
  });

  it("pivots time series into rows by reporting date, newest first", async () => {
    const urls = stubFetch(() =>
      jsonResponse({
        timeseries: {
          result: [
            {
              meta: { type: ["annualTotalRevenue"] },
              annualTotalRevenue: [
                {
                  asOfDate: "2024-09-30",
                  reportedValue: { raw: 900, fmt: "900" },
                },
                {
                  asOfDate: "2025-09-30",
                  reportedValue: { raw: 1000, fmt: "1k" },
                },
              ],
            },
            {
              meta: { type: ["annualDilutedEPS"] },
              annualDilutedEPS: [
                null,
                { asOfDate: "2025-09-30", reportedValue: { raw: 6.1 } },
              ],
            },
            { meta: { type: ["annualEBIT"] } },
          ],
          error: null,
        },
      }),
    );

    const result = await createProvider().getFundamentals({
      ticker: "AAPL",
      section: "financials",
    });

    const requested = new URL(urls[0] ?? "");
    expect(requested.pathname).toBe(
      "/ws/fundamentals-timeseries/v1/finance/timeseries/AAPL",
    );
    expect(requested.searchParams.get("type")).toBe(
      "annualTotalRevenue,annualEBIT,annualReconciledDepreciation,annualDilutedEPS",
    );
    expect(requested.searchParams.get("period2")).toBe(
      String(NOW.getTime() / 1000),
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual([
        {
          asOfDate: "2025-09-30",
          annualTotalRevenue: { raw: 1000, fmt: "1k" },
          annualDilutedEPS: { raw: 6.1 },
        },
        {
          asOfDate: "2024-09-30",
          annualTotalRevenue: { raw: 900, fmt: "900" },
        },
      ]);
    }
  });
});

describe("toBoundaryError", () => {
  it("maps statuses onto boundary codes", () => {
    const status = (httpStatus: number) =>
      toBoundaryError("history", {
        code: "non_success_status",
        message: `status ${httpStatus}`,
        httpStatus,
        retryable: false,
      });

    expect(status(401).code).toBe("auth_invalid");
    expect(status(403).code).toBe("auth_invalid");
    expect(status(404).code).toBe("not_found");
    expect(status(503)).toMatchObject({
      code: "provider_error",
      retryable: true,
    });
    expect(status(400)).toMatchObject({
      code: "provider_error",
      retryable: false,
    });
    expect(
      toBoundaryError("fundamentals", {
        code: "timeout",
        message: "HTTP request timed out.",
        retryable: true,
      }),
    ).toMatchObject({ source: "fundamentals", code: "timeout", retryable: true });
  });
});
