import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import type { TickerSourcePort } from "../../core/ports/inboundPorts";

const TICKER_PATTERN = /^[A-Z0-9.-]+$/;
const SYMBOL_COLUMNS = ["symbol", "ticker"];

/**
 * Trims, upper-cases, validates and dedupes while keeping first-seen order.
 */
export const normalizeTickers = (raw: string[]): string[] => {
  const seen = new Set<string>();
  for (const value of raw) {
    const ticker = value.trim().toUpperCase();
    if (ticker && TICKER_PATTERN.test(ticker)) {
      seen.add(ticker);
    }
  }
  return [...seen];
};

const splitCsvLine = (line: string): string[] =>
  line.split(",").map((cell) => cell.trim().replace(/^"(.*)"$/, "$1"));

export const parseTickerCsv = (content: string, path: string): string[] => {
  const [header, ...rows] = content
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);
  if (!header) {
    return [];
  }

  const columns = splitCsvLine(header).map((cell) => cell.toLowerCase());
  const columnIndex = SYMBOL_COLUMNS.map((name) => columns.indexOf(name)).find(
    (index) => index >= 0,
  );
  if (columnIndex === undefined) {
    throw new Error(
      `Ticker file ${path} has no Symbol or Ticker column (found: ${columns.join(", ")}).`,
    );
  }

  return rows.map((row) => splitCsvLine(row)[columnIndex] ?? "");
};

export class StaticTickerSource implements TickerSourcePort {
  constructor(private readonly tickers: string[]) {}

  async loadTickers(): Promise<string[]> {
    return normalizeTickers(this.tickers);
  }
}

/**
 * Reads tickers from one or more CSV files. A missing file or an empty result is a configuration error.
 */
export class CsvTickerSource implements TickerSourcePort {
  constructor(private readonly paths: string[]) {}

  async loadTickers(): Promise<string[]> {
    const missing = this.paths.filter((path) => !existsSync(path));
    if (missing.length > 0) {
      throw new Error(`Ticker file(s) not found: ${missing.join(", ")}`);
    }

    const raw: string[] = [];
    for (const path of this.paths) {
      raw.push(...parseTickerCsv(await readFile(path, "utf8"), path));
    }

    const tickers = normalizeTickers(raw);
    if (tickers.length === 0) {
      throw new Error(`No valid tickers in ${this.paths.join(", ")}`);
    }
    return tickers;
  }
}
