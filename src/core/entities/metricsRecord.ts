import { z } from "zod";

const requiredMetric = z.number().finite();
const optionalMetric = z.number().finite().nullable();

/**
 * Gatekeeper for persistence: a record failing this schema is dropped, never stored.
 */
export const metricsRecordSchema = z.object({
  ticker: z.string().min(1),
  lastPrice: requiredMetric,
  ma100: requiredMetric,
  ema100: requiredMetric,
  pctAboveMa100: requiredMetric,
  pctAboveEma100: requiredMetric,
  peRatio: optionalMetric,
  pbRatio: optionalMetric,
  psRatio: optionalMetric,
  pegRatio: optionalMetric,
  forwardPe: optionalMetric,
  marketCap: optionalMetric,
  enterpriseValue: optionalMetric,
  ebitda: optionalMetric,
  ebitdaToEv: optionalMetric,
});

export type MetricsRecord = z.infer<typeof metricsRecordSchema>;

export type MomentumMetrics = Pick<
  MetricsRecord,
  "lastPrice" | "ma100" | "ema100" | "pctAboveMa100" | "pctAboveEma100"
>;

export type ValuationMetrics = Omit<
  MetricsRecord,
  "ticker" | keyof MomentumMetrics
>;

export type StoredMetricsRecord = MetricsRecord & {
  updatedAt: Date;
};

export const emptyValuationMetrics = (): ValuationMetrics => ({
  peRatio: null,
  pbRatio: null,
  psRatio: null,
  pegRatio: null,
  forwardPe: null,
  marketCap: null,
  enterpriseValue: null,
  ebitda: null,
  ebitdaToEv: null,
});
