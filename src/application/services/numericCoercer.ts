const SUFFIX_EXPONENTS: Record<string, number> = {
  K: 3,
  M: 6,
  B: 9,
  T: 12,
};

const MISSING_MARKERS = new Set(["", "N/A"]);

// Plain decimal only; Number() would also take 0x, 0b, 0o and Infinity.
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const parseStrictFloat = (raw: string): number | null => {
  const trimmed = raw.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
};

/**
 * Scales through the decimal exponent ("8.71" + "e9") so "8.71B" lands exactly on 8.71e9.
 */
const applySuffix = (prefix: string, exponent: number): number | null => {
  const mantissa = parseStrictFloat(prefix);
  if (mantissa === null) {
    return null;
  }

  const scaled = Number(`${prefix.trim()}e${exponent}`);
  return Number.isNaN(scaled) ? mantissa * 10 ** exponent : scaled;
};

/**
 * Converts provider numbers ("8.71B", "1,234.5", 42, "N/A") into a float or null. Never throws.
 */
export const coerceNumber = (value: unknown): number | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }

  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  if (MISSING_MARKERS.has(trimmed)) {
    return null;
  }

  const exponent = SUFFIX_EXPONENTS[trimmed.slice(-1).toUpperCase()];
  if (exponent !== undefined) {
    return applySuffix(trimmed.slice(0, -1), exponent);
  }

  return parseStrictFloat(trimmed.replaceAll(",", ""));
};
