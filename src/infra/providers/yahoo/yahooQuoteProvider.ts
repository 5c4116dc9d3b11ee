import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type {
  AppBoundaryError,
  AppBoundaryErrorCode,
} from "../../../core/entities/appError";
import {
  fundamentalsSourceKeys,
  type FundamentalsRequest,
  type HistoryRequest,
  type QuoteProviderPort,
  type RawFundamentalRows,
  type RawKeyValueRow,
  type RawPriceRow,
} from "../../../core/ports/inboundPorts";
import {
  type HttpClientError,
  HttpJsonClient,
} from "../../http/httpJsonClient";

const PROVIDER = "yahoo";

// Earliest period Yahoo's fundamentals series accepts.
const TIMESERIES_PERIOD_START = 493_590_046;

const upstreamErrorSchema = z
  .object({ code: z.string(), description: z.string().nullish() })
  .nullish();

const nullableNumbers = z.array(z.number().nullable()).optional();

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: nullableNumbers,
                high: nullableNumbers,
                low: nullableNumbers,
                close: nullableNumbers,
                volume: nullableNumbers,
              }),
            ),
          }),
        }),
      )
      .nullish(),
    error: upstreamErrorSchema,
  }),
});

const valueCellSchema = z
  .union([
    z.number(),
    z.string(),
    z.object({
      raw: z.union([z.number(), z.string()]).optional(),
      fmt: z.string().optional(),
    }),
  ])
  .nullish();

const quoteSummaryResponseSchema = z.object({
  quoteSummary: z.object({
    result: z
      .array(
        z.object({
          price: z
            .object({
              marketCap: valueCellSchema,
              quoteType: z.string().nullish(),
            })
            .optional(),
          summaryDetail: z
            .object({ marketCap: valueCellSchema, forwardPE: valueCellSchema })
            .optional(),
          defaultKeyStatistics: z
            .object({ forwardPE: valueCellSchema, pegRatio: valueCellSchema })
            .optional(),
        }),
      )
      .nullish(),
    error: upstreamErrorSchema,
  }),
});

const timeseriesPointSchema = z
  .object({
    asOfDate: z.string(),
    reportedValue: valueCellSchema,
  })
  .nullable();

const timeseriesResponseSchema = z.object({
  timeseries: z.object({
    result: z
      .array(
        z
          .object({ meta: z.object({ type: z.array(z.string()) }) })
          .passthrough(),
      )
      .nullish(),
    error: upstreamErrorSchema,
  }),
});

type ChartResult = NonNullable<
  z.infer<typeof chartResponseSchema>["chart"]["result"]
>[number];

const boundaryError = (
  source: AppBoundaryError["source"],
  code: AppBoundaryErrorCode,
  message: string,
  extra: Partial<
    Pick<AppBoundaryError, "httpStatus" | "cause" | "retryable">
  > = {},
): AppBoundaryError => ({
  source,
  code,
  provider: PROVIDER,
  message,
  retryable: extra.retryable ?? false,
  httpStatus: extra.httpStatus,
  cause: extra.cause,
});

/**
 * Maps transport results onto boundary codes; 429 becomes rate_limited, 5xx stays retryable.
 */
export const toBoundaryError = (
  source: AppBoundaryError["source"],
  error: HttpClientError,
): AppBoundaryError => {
  const status = error.httpStatus;
  const extra = { httpStatus: status, cause: error.cause };

  switch (error.code) {
    case "timeout":
      return boundaryError(source, "timeout", error.message, {
        ...extra,
        retryable: true,
      });
    case "transport_error":
      return boundaryError(source, "transport_error", error.message, {
        ...extra,
        retryable: true,
      });
    case "invalid_json":
      return boundaryError(source, "invalid_json", error.message, {
        ...extra,
        retryable: true,
      });
    case "non_success_status":
      break;
  }

  if (status === 401 || status === 403) {
    return boundaryError(source, "auth_invalid", error.message, extra);
  }
  if (status === 404) {
    return boundaryError(source, "not_found", error.message, extra);
  }
  if (status === 429) {
    return boundaryError(source, "rate_limited", error.message, {
      ...extra,
      retryable: true,
    });
  }
  return boundaryError(source, "provider_error", error.message, {
    ...extra,
    retryable: status !== undefined && status >= 500,
  });
};

const upstreamFailure = (
  source: AppBoundaryError["source"],
  upstream: { code: string; description?: string | null },
): AppBoundaryError => {
  const message = upstream.description
    ? `${upstream.code}: ${upstream.description}`
    : upstream.code;
  return boundaryError(
    source,
    /not ?found/i.test(upstream.code) ? "not_found" : "provider_error",
    message,
  );
};

const toPriceRows = (result: ChartResult): RawPriceRow[] => {
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote[0];
  const at = (series: Array<number | null> | undefined, index: number) =>
    series?.[index] ?? null;

  return timestamps.map((seconds, index) => ({
    timestamp: new Date(seconds * 1000),
    open: at(quote?.open, index),
    high: at(quote?.high, index),
    low: at(quote?.low, index),
    close: at(quote?.close, index),
    volume: at(quote?.volume, index),
  }));
};

/**
 * Quote provider over Yahoo Finance's public JSON endpoints (chart, quoteSummary, fundamentals time series).
 */
export class YahooQuoteProvider implements QuoteProviderPort {
  readonly name = PROVIDER;

  constructor(
    private readonly baseUrl: string,
    private readonly userAgent: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
    private readonly now: () => Date = () => new Date(),
  ) {}

  async getHistory(
    request: HistoryRequest,
  ): Promise<Result<RawPriceRow[], AppBoundaryError>> {
    const url = new URL(
      `/v8/finance/chart/${encodeURIComponent(request.ticker)}`,
      this.baseUrl,
    );
    url.searchParams.set("range", request.range);
    url.searchParams.set("interval", "1d");

    const body = await this.get("history", url);
    if (body.isErr()) return err(body.error);

    const parsed = chartResponseSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(
        boundaryError(
          "history",
          "malformed_response",
          "Unexpected chart payload.",
          { retryable: true, cause: parsed.error },
        ),
      );
    }

    const { result, error } = parsed.data.chart;
    if (error) return err(upstreamFailure("history", error));

    const first = result?.[0];
    return ok(first ? toPriceRows(first) : []);
  }

  async getFundamentals(
    request: FundamentalsRequest,
  ): Promise<Result<RawFundamentalRows, AppBoundaryError>> {
    return request.section === "summary"
      ? this.getSummary(request.ticker)
      : this.getTimeseries(request);
  }

  private async getSummary(
    ticker: string,
  ): Promise<Result<RawFundamentalRows, AppBoundaryError>> {
    const url = new URL(
      `/v10/finance/quoteSummary/${encodeURIComponent(ticker)}`,
      this.baseUrl,
    );
    url.searchParams.set("modules", "price,summaryDetail,defaultKeyStatistics");

    const body = await this.get("fundamentals", url);
    if (body.isErr()) return err(body.error);

    const parsed = quoteSummaryResponseSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(
        boundaryError(
          "fundamentals",
          "malformed_response",
          "Unexpected quoteSummary payload.",
          { retryable: true, cause: parsed.error },
        ),
      );
    }

    const { result, error } = parsed.data.quoteSummary;
    if (error) return err(upstreamFailure("fundamentals", error));

    const modules = result?.[0];
    if (!modules) return ok({});

    return ok({
      marketCap: modules.price?.marketCap ?? modules.summaryDetail?.marketCap,
      quoteType: modules.price?.quoteType,
      forwardPE:
        modules.summaryDetail?.forwardPE ??
        modules.defaultKeyStatistics?.forwardPE,
      pegRatio: modules.defaultKeyStatistics?.pegRatio,
    });
  }

  /**
   * Pivots per-type series into one row per reporting date, most recent first.
   */
  private async getTimeseries(
    request: FundamentalsRequest,
  ): Promise<Result<RawFundamentalRows, AppBoundaryError>> {
    const types = Object.values(fundamentalsSourceKeys[request.section]);
    const url = new URL(
      `/ws/fundamentals-timeseries/v1/finance/timeseries/${encodeURIComponent(request.ticker)}`,
      this.baseUrl,
    );
    url.searchParams.set("symbol", request.ticker);
    url.searchParams.set("type", types.join(","));
    url.searchParams.set("period1", String(TIMESERIES_PERIOD_START));
    url.searchParams.set(
      "period2",
      String(Math.floor(this.now().getTime() / 1000)),
    );

    const body = await this.get("fundamentals", url);
    if (body.isErr()) return err(body.error);

    const parsed = timeseriesResponseSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(
        boundaryError(
          "fundamentals",
          "malformed_response",
          "Unexpected fundamentals time-series payload.",
          { retryable: true, cause: parsed.error },
        ),
      );
    }

    const { result, error } = parsed.data.timeseries;
    if (error) return err(upstreamFailure("fundamentals", error));

    const rowsByDate = new Map<string, RawKeyValueRow>();
    for (const series of result ?? []) {
      const type = series.meta.type[0];
      if (!type) continue;

      const points = z.array(timeseriesPointSchema).safeParse(series[type]);
      if (!points.success) continue;

      for (const point of points.data) {
        if (!point) continue;
        const row: RawKeyValueRow = rowsByDate.get(point.asOfDate) ?? {
          asOfDate: point.asOfDate,
        };
        row[type] = point.reportedValue ?? null;
        rowsByDate.set(point.asOfDate, row);
      }
    }

    return ok(
      [...rowsByDate.entries()]
        .sort(([left], [right]) => right.localeCompare(left))
        .map(([, row]) => row),
    );
  }

  private async get(
    source: AppBoundaryError["source"],
    url: URL,
  ): Promise<Result<unknown, AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: url.toString(),
      headers: {
        "User-Agent": this.userAgent,
        Accept: "application/json",
      },
      timeoutMs: this.timeoutMs,
    });

    return response.mapErr((error) => toBoundaryError(source, error));
  }
}
