import fs from "node:fs";
import path from "node:path";
import type { AnalysisConfig } from "../config/types.analysis.js";
import { ConfigurationError } from "../errors.js";
import { normalizeTicker } from "../infra/utils.js";

/** First CSV column of every non-blank, non-comment line. */
export function parseUniverseCsv(raw: string): string[] {
  const tickers: string[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const first = trimmed.split(",")[0]?.trim().replace(/^"(.*)"$/, "$1") ?? "";
    if (first) {
      tickers.push(first);
    }
  }
  return tickers;
}

/**
 * Merges the inline universe with the CSV file, normalizes suffixes and drops duplicates.
 * A relative `universeFile` is resolved against `baseDir`.
 */
export async function loadUniverse(
  cfg: AnalysisConfig | undefined,
  baseDir: string,
): Promise<string[]> {
  const raw = [...(cfg?.universe ?? [])];
  if (cfg?.universeFile) {
    const filePath = path.resolve(baseDir, cfg.universeFile);
    let contents: string;
    try {
      contents = await fs.promises.readFile(filePath, "utf8");
    } catch (err) {
      throw new ConfigurationError(`unable to read universe file ${filePath}`, { cause: err });
    }
    raw.push(...parseUniverseCsv(contents));
  }
  const seen = new Set<string>();
  const tickers: string[] = [];
  for (const entry of raw) {
    const ticker = normalizeTicker(entry, cfg?.tickerSuffix);
    if (ticker && !seen.has(ticker)) {
      seen.add(ticker);
      tickers.push(ticker);
    }
  }
  return tickers;
}
