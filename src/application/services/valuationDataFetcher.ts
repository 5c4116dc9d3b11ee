import { err, ok, type Result } from "neverthrow";
import type { FetchFailure } from "../../core/entities/appError";
import {
  emptyFundamentalFields,
  fundamentalFields,
  type FundamentalSnapshot,
  type FundamentalsSection,
} from "../../core/entities/fundamentals";
import type { QuoteProviderPort } from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";
import {
  normalizeFundamentalRows,
  type NormalizedSection,
} from "./fundamentalsNormalizer";
import type { ResilientCaller } from "./resilientCaller";

const NON_EQUITY_QUOTE_TYPES = new Set([
  "ETF",
  "MUTUALFUND",
  "INDEX",
  "CURRENCY",
  "CRYPTOCURRENCY",
  "FUTURE",
  "OPTION",
  "MONEYMARKET",
]);

export const isNonEquityQuoteType = (quoteType: string | null): boolean =>
  quoteType !== null && NON_EQUITY_QUOTE_TYPES.has(quoteType.toUpperCase());

const STATEMENT_SECTIONS: FundamentalsSection[] = [
  "financials",
  "balance_sheet",
];

type SectionOutcome = {
  section: FundamentalsSection;
  result: Result<NormalizedSection, FetchFailure>;
};

export class ValuationDataFetcher {
  constructor(
    private readonly provider: QuoteProviderPort,
    private readonly caller: ResilientCaller,
  ) {}

  /**
   * Gathers summary, statement and balance-sheet fields into one snapshot.
   * Fails only when the price is unusable or every section request failed.
   */
  async fetch(
    ticker: string,
    lastPrice: number | null,
  ): Promise<Result<FundamentalSnapshot | null, FetchFailure>> {
    if (lastPrice === null || !Number.isFinite(lastPrice)) {
      return err({
        ticker,
        operation: "fundamentals",
        category: "permanent",
        attempts: 0,
        message: "A finite last price is required before fetching fundamentals.",
      });
    }

    const summary = await this.fetchSection(ticker, "summary");
    const quoteType = summary.result.isOk()
      ? summary.result.value.quoteType
      : null;

    if (isNonEquityQuoteType(quoteType)) {
      logger.debug(
        { ticker, quoteType },
        "Non-equity instrument; skipping statement fundamentals",
      );
      const fields = emptyFundamentalFields();
      fields.marketCap = summary.result.isOk()
        ? (summary.result.value.fields.marketCap ?? null)
        : null;
      return ok({ ticker, quoteType, fields, missingSections: [] });
    }

    const outcomes: SectionOutcome[] = [summary];
    for (const section of STATEMENT_SECTIONS) {
      outcomes.push(await this.fetchSection(ticker, section));
    }

    return this.merge(ticker, quoteType, outcomes);
  }

  private async fetchSection(
    ticker: string,
    section: FundamentalsSection,
  ): Promise<SectionOutcome> {
    const response = await this.caller.call(
      { ticker, operation: `fundamentals:${section}` },
      () => this.provider.getFundamentals({ ticker, section }),
    );

    return {
      section,
      result: response.map(({ value }) =>
        normalizeFundamentalRows(section, value),
      ),
    };
  }

  private merge(
    ticker: string,
    quoteType: string | null,
    outcomes: SectionOutcome[],
  ): Result<FundamentalSnapshot | null, FetchFailure> {
    const failures: FetchFailure[] = [];
    const missingSections: FundamentalsSection[] = [];
    const fields = emptyFundamentalFields();
    let populated = 0;

    for (const { section, result } of outcomes) {
      if (result.isErr()) {
        failures.push(result.error);
        missingSections.push(section);
        continue;
      }

      for (const field of fundamentalFields) {
        const value = result.value.fields[field];
        if (value === undefined) continue;
        fields[field] = value;
        populated += 1;
      }
    }

    if (failures.length === outcomes.length) {
      return err({
        ticker,
        operation: "fundamentals",
        category: failures.some((failure) => failure.category !== "permanent")
          ? "transient"
          : "permanent",
        attempts: failures.reduce((sum, failure) => sum + failure.attempts, 0),
        message: failures
          .map((failure) => `${failure.operation}: ${failure.message}`)
          .join("; "),
        cause: failures,
      });
    }

    if (missingSections.length > 0) {
      logger.warn(
        { ticker, missingSections },
        "Fundamentals partially unavailable; affected fields stay null",
      );
    }

    if (populated === 0 && missingSections.length === 0) {
      logger.warn({ ticker }, "Provider returned no fundamental fields");
      return ok(null);
    }

    return ok({ ticker, quoteType, fields, missingSections });
  }
}
