import { describe, expect, it } from "vitest";
import {
  normalizeFundamentalRows,
  toRawFundamentalValue,
} from "./fundamentalsNormalizer";

describe("toRawFundamentalValue", () => {
  it("passes numbers and strings through", () => {
    expect(toRawFundamentalValue(12.5)).toBe(12.5);
    expect(toRawFundamentalValue("8.71B")).toBe("8.71B");
  });

  it("prefers the raw cell over the formatted one", () => {
    expect(toRawFundamentalValue({ raw: 3_000_000, fmt: "3M" })).toBe(
      3_000_000,
    );
    expect(toRawFundamentalValue({ fmt: "3M" })).toBe("3M");
  });

  it("returns null for anything else", () => {
    expect(toRawFundamentalValue(undefined)).toBeNull();
    expect(toRawFundamentalValue(true)).toBeNull();
    expect(toRawFundamentalValue({})).toBeNull();
    expect(toRawFundamentalValue([1])).toBeNull();
  });
});

describe("normalizeFundamentalRows", () => {
  it("reads the summary mapping including the quote type", () => {
    expect(
      normalizeFundamentalRows("summary", {
        marketCap: { raw: 2_500_000_000, fmt: "2.5B" },
        forwardPE: "18.4",
        pegRatio: null,
        quoteType: "EQUITY",
        unrelated: 7,
      }),
    ).toEqual({
      fields: { marketCap: 2_500_000_000, forwardPe: "18.4" },
      quoteType: "EQUITY",
    });
  });

  it("reads only the most recent row of a statement table", () => {
    expect(
      normalizeFundamentalRows("financials", [
        {
          annualTotalRevenue: "439.26M",
          annualEBIT: 50_000_000,
          annualDilutedEPS: 2.1,
        },
        { annualTotalRevenue: "400M", annualReconciledDepreciation: 9 },
      ]),
    ).toEqual({
      fields: { revenue: "439.26M", ebit: 50_000_000, dilutedEps: 2.1 },
      quoteType: null,
    });
  });

  it("yields no fields for an empty table", () => {
    expect(normalizeFundamentalRows("balance_sheet", [])).toEqual({
      fields: {},
      quoteType: null,
    });
  });
});
