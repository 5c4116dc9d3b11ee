import { doublePrecision, pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const tickerMetricsTable = pgTable("ticker_metrics", {
  ticker: text("ticker").primaryKey(),
  lastPrice: doublePrecision("last_price").notNull(),
  ma100: doublePrecision("ma_100").notNull(),
  ema100: doublePrecision("ema_100").notNull(),
  pctAboveMa100: doublePrecision("pct_above_ma_100").notNull(),
  pctAboveEma100: doublePrecision("pct_above_ema_100").notNull(),
  peRatio: doublePrecision("pe_ratio"),
  pbRatio: doublePrecision("pb_ratio"),
  psRatio: doublePrecision("ps_ratio"),
  pegRatio: doublePrecision("peg_ratio"),
  forwardPe: doublePrecision("forward_pe"),
  marketCap: doublePrecision("market_cap"),
  enterpriseValue: doublePrecision("enterprise_value"),
  ebitda: doublePrecision("ebitda"),
  ebitdaToEv: doublePrecision("ebitda_to_ev"),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});
