import type { StoredMetricsRecord } from "../../core/entities/metricsRecord";

export type NumericRange = { min: number; max: number };

export type MetricsSummary = {
  recordCount: number;
  peRatio: (NumericRange & { avg: number }) | null;
  lastPrice: NumericRange | null;
  sampleTickers: string[];
};

const rangeOf = (values: number[]): NumericRange | null =>
  values.length === 0
    ? null
    : { min: Math.min(...values), max: Math.max(...values) };

/**
 * Aggregates stored records for the `summary` command. P/E statistics ignore records without a P/E.
 */
export const summarizeStoredMetrics = (
  records: StoredMetricsRecord[],
  sampleSize = 10,
): MetricsSummary => {
  const peValues = records.flatMap((record) =>
    record.peRatio === null ? [] : [record.peRatio],
  );
  const peRange = rangeOf(peValues);

  return {
    recordCount: records.length,
    peRatio: peRange
      ? {
          ...peRange,
          avg: peValues.reduce((sum, value) => sum + value, 0) / peValues.length,
        }
      : null,
    lastPrice: rangeOf(records.map((record) => record.lastPrice)),
    sampleTickers: records.slice(0, sampleSize).map((record) => record.ticker),
  };
};

const formatNumber = (value: number | null): string =>
  value === null ? "n/a" : value.toFixed(2);

/**
 * Human-readable report for `show --prettify`.
 */
export const formatMetricsReport = (record: StoredMetricsRecord): string =>
  [
    `${record.ticker} (updated ${record.updatedAt.toISOString()})`,
    `  last price        ${formatNumber(record.lastPrice)}`,
    `  MA 100            ${formatNumber(record.ma100)} (${formatNumber(record.pctAboveMa100)}%)`,
    `  EMA 100           ${formatNumber(record.ema100)} (${formatNumber(record.pctAboveEma100)}%)`,
    `  P/E               ${formatNumber(record.peRatio)}`,
    `  forward P/E       ${formatNumber(record.forwardPe)}`,
    `  PEG               ${formatNumber(record.pegRatio)}`,
    `  P/B               ${formatNumber(record.pbRatio)}`,
    `  P/S               ${formatNumber(record.psRatio)}`,
    `  market cap        ${formatNumber(record.marketCap)}`,
    `  enterprise value  ${formatNumber(record.enterpriseValue)}`,
    `  EBITDA            ${formatNumber(record.ebitda)}`,
    `  EBITDA / EV       ${formatNumber(record.ebitdaToEv)}`,
  ].join("\n");
