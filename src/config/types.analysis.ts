export type AnalysisConfig = {
  /** Disable the scheduled scoring run without removing the cron entry. */
  enabled?: boolean;
  /** Tickers to score on every run. */
  universe?: string[];
  /** CSV file with one ticker in the first column; merged with `universe`. */
  universeFile?: string;
  /** Suffix appended to bare tickers, e.g. ".T" for Tokyo listings. */
  tickerSuffix?: string;
  /** Minimum number of daily bars requested from the price provider. */
  lookbackBars?: number;
  /** Tickers processed in parallel (history fetch, news, AI). */
  concurrency?: number;
};
