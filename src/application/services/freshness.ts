import type { MetricsRepositoryPort } from "../../core/ports/outboundPorts";

export type FreshnessPartition = {
  fresh: string[];
  stale: string[];
};

/**
 * Splits tickers by whether storage already holds a record younger than `windowMs`.
 * A non-positive window treats everything as stale without touching storage.
 */
export const partitionByFreshness = async (
  repository: MetricsRepositoryPort,
  tickers: string[],
  windowMs: number,
): Promise<FreshnessPartition> => {
  if (windowMs <= 0) {
    return { fresh: [], stale: [...tickers] };
  }

  const fresh: string[] = [];
  const stale: string[] = [];
  for (const ticker of tickers) {
    if (await repository.isRecentlyUpdated(ticker, windowMs)) {
      fresh.push(ticker);
    } else {
      stale.push(ticker);
    }
  }

  return { fresh, stale };
};
