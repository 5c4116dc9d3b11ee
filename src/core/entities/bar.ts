export type HistoryRange = "1mo" | "3mo" | "6mo" | "1y" | "2y" | "5y";

/**
 * One trading day. Only the close is required downstream.
 */
export type Bar = {
  timestamp: Date;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number;
  volume: number | null;
};

/**
 * Bars strictly ascending by timestamp with no duplicates.
 */
export type HistoricalSeries = {
  ticker: string;
  bars: Bar[];
};
