import {
  fundamentalFields,
  type FundamentalField,
  type FundamentalsSection,
  type RawFundamentalValue,
} from "../../core/entities/fundamentals";
import {
  fundamentalsSourceKeys,
  QUOTE_TYPE_KEY,
  type RawFundamentalRows,
  type RawKeyValueRow,
} from "../../core/ports/inboundPorts";

export type NormalizedSection = {
  fields: Partial<Record<FundamentalField, RawFundamentalValue>>;
  quoteType: string | null;
};

const knownFields: ReadonlySet<string> = new Set<string>(fundamentalFields);

const isFundamentalField = (value: string): value is FundamentalField =>
  knownFields.has(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Tables are ordered most recent first, so only the head row is read.
 */
const firstRow = (rows: RawFundamentalRows): RawKeyValueRow | null =>
  Array.isArray(rows) ? (rows[0] ?? null) : rows;

/**
 * Unwraps `{ raw, fmt }` cells, preferring the raw number over the formatted text.
 */
export const toRawFundamentalValue = (value: unknown): RawFundamentalValue => {
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }

  if (isRecord(value)) {
    if (typeof value.raw === "number" || typeof value.raw === "string") {
      return value.raw;
    }
    if (typeof value.fmt === "string") {
      return value.fmt;
    }
  }

  return null;
};

export const normalizeFundamentalRows = (
  section: FundamentalsSection,
  rows: RawFundamentalRows,
): NormalizedSection => {
  const head = firstRow(rows);
  if (!head) {
    return { fields: {}, quoteType: null };
  }

  const fields: Partial<Record<FundamentalField, RawFundamentalValue>> = {};
  for (const [field, key] of Object.entries(fundamentalsSourceKeys[section])) {
    const value = toRawFundamentalValue(head[key]);
    if (value !== null && isFundamentalField(field)) {
      fields[field] = value;
    }
  }

  const rawQuoteType = toRawFundamentalValue(head[QUOTE_TYPE_KEY]);
  return {
    fields,
    quoteType: typeof rawQuoteType === "string" ? rawQuoteType : null,
  };
};
