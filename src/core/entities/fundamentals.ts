export const fundamentalFields = [
  "revenue",
  "ebit",
  "depreciation",
  "dilutedEps",
  "cash",
  "longTermDebt",
  "currentDebt",
  "bookValue",
  "marketCap",
  "forwardPe",
  "pegRatio",
] as const;

export type FundamentalField = (typeof fundamentalFields)[number];

export const fundamentalsSections = [
  "summary",
  "financials",
  "balance_sheet",
] as const;

export type FundamentalsSection = (typeof fundamentalsSections)[number];

/**
 * Field value as the provider reported it, before numeric coercion.
 */
export type RawFundamentalValue = number | string | null;

/**
 * Fixed-shape view of provider fundamentals. Every field is present; absent data is null.
 */
export type FundamentalSnapshot = {
  ticker: string;
  quoteType: string | null;
  fields: Record<FundamentalField, RawFundamentalValue>;
  missingSections: FundamentalsSection[];
};

export const emptyFundamentalFields = (): Record<
  FundamentalField,
  RawFundamentalValue
> => ({
  revenue: null,
  ebit: null,
  depreciation: null,
  dilutedEps: null,
  cash: null,
  longTermDebt: null,
  currentDebt: null,
  bookValue: null,
  marketCap: null,
  forwardPe: null,
  pegRatio: null,
});
