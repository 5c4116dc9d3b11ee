import type { FundamentalSnapshot } from "../../core/entities/fundamentals";
import {
  emptyValuationMetrics,
  type ValuationMetrics,
} from "../../core/entities/metricsRecord";
import { logger } from "../../shared/logger/logger";
import { coerceNumber } from "./numericCoercer";

const finiteOrNull = (value: number | null): number | null =>
  value !== null && Number.isFinite(value) ? value : null;

/**
 * Division that only resolves for a strictly positive denominator.
 */
const ratio = (
  numerator: number | null,
  denominator: number | null,
): number | null =>
  numerator === null || denominator === null || denominator <= 0
    ? null
    : numerator / denominator;

const sum = (...terms: Array<number | null>): number | null => {
  let total = 0;
  for (const term of terms) {
    if (term === null) return null;
    total += term;
  }
  return total;
};

/**
 * Derives ratio and size metrics from raw fundamentals. Fields resolve independently and
 * a failure in one leaves it null without touching the rest.
 */
export class ValuationCalculator {
  compute(
    snapshot: FundamentalSnapshot | null,
    lastPrice: number | null,
  ): ValuationMetrics {
    if (!snapshot) {
      return emptyValuationMetrics();
    }

    const { fields } = snapshot;
    const resolve = (
      field: keyof ValuationMetrics,
      compute: () => number | null,
    ): number | null => {
      try {
        return finiteOrNull(compute());
      } catch (error) {
        logger.warn(
          { ticker: snapshot.ticker, field, err: error },
          "Valuation field could not be computed",
        );
        return null;
      }
    };

    const price = finiteOrNull(lastPrice);
    const marketCap = resolve("marketCap", () =>
      coerceNumber(fields.marketCap),
    );
    const ebitda = resolve("ebitda", () =>
      sum(coerceNumber(fields.ebit), coerceNumber(fields.depreciation)),
    );
    const enterpriseValue = resolve("enterpriseValue", () => {
      const totalDebt = sum(
        coerceNumber(fields.longTermDebt),
        coerceNumber(fields.currentDebt),
      );
      const cash = coerceNumber(fields.cash);
      return cash === null ? null : sum(marketCap, totalDebt, -cash);
    });

    return {
      peRatio: resolve("peRatio", () =>
        ratio(price, coerceNumber(fields.dilutedEps)),
      ),
      pbRatio: resolve("pbRatio", () =>
        ratio(marketCap, coerceNumber(fields.bookValue)),
      ),
      psRatio: resolve("psRatio", () =>
        ratio(marketCap, coerceNumber(fields.revenue)),
      ),
      pegRatio: resolve("pegRatio", () => coerceNumber(fields.pegRatio)),
      forwardPe: resolve("forwardPe", () => coerceNumber(fields.forwardPe)),
      marketCap,
      enterpriseValue,
      ebitda,
      ebitdaToEv: resolve("ebitdaToEv", () => ratio(ebitda, enterpriseValue)),
    };
  }
}
