import { err, ok, type Result } from "neverthrow";
import type { HistoricalSeries } from "../../core/entities/bar";
import type { MomentumMetrics } from "../../core/entities/metricsRecord";

export const MOMENTUM_WINDOW = 100;

export type InsufficientHistoryError = {
  code: "insufficient_data";
  required: number;
  available: number;
};

const mean = (values: number[]): number =>
  values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Recursive EMA seeded with the first value, no bias adjustment.
 */
export const exponentialMovingAverage = (
  values: number[],
  span: number,
): number => {
  const alpha = 2 / (span + 1);
  let ema = values[0] ?? Number.NaN;
  for (const value of values.slice(1)) {
    ema = alpha * value + (1 - alpha) * ema;
  }
  return ema;
};

/**
 * Percent distance of `price` from `base`; 0 when the base is 0.
 */
export const percentAbove = (price: number, base: number): number =>
  base === 0 ? 0 : ((price - base) / base) * 100;

export class MomentumCalculator {
  constructor(private readonly window = MOMENTUM_WINDOW) {}

  compute(
    series: HistoricalSeries,
  ): Result<MomentumMetrics, InsufficientHistoryError> {
    const closes = series.bars.map((bar) => bar.close);
    const lastPrice = closes.at(-1);

    if (closes.length < this.window || lastPrice === undefined) {
      return err({
        code: "insufficient_data",
        required: this.window,
        available: closes.length,
      });
    }

    const ma100 = mean(closes.slice(-this.window));
    const ema100 = exponentialMovingAverage(closes, this.window);

    return ok({
      lastPrice,
      ma100,
      ema100,
      pctAboveMa100: percentAbove(lastPrice, ma100),
      pctAboveEma100: percentAbove(lastPrice, ema100),
    });
  }
}
