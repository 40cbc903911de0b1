import type { AnalysisRepository, AnalysisResult, AnalysisRun } from "./types.js";

export type ResultSortKey = "buyScore" | "shortScore";
export type SortOrder = "asc" | "desc";

export type ResultFilter = {
  minBuyScore?: number;
  minShortScore?: number;
  sortBy?: ResultSortKey;
  sortOrder?: SortOrder;
  limit?: number;
};

export type TopSummary = {
  run: AnalysisRun;
  topBuys: AnalysisResult[];
  topShorts: AnalysisResult[];
};

function sortResults(
  results: readonly AnalysisResult[],
  key: ResultSortKey,
  order: SortOrder,
): AnalysisResult[] {
  const sign = order === "asc" ? 1 : -1;
  return [...results].sort(
    (a, b) => sign * (a[key] - b[key]) || a.ticker.localeCompare(b.ticker),
  );
}

/** Highest buy and short scores of the latest run; null before the first run. */
export async function getTopSummary(
  repo: AnalysisRepository,
  topN = 5,
): Promise<TopSummary | null> {
  const latest = await repo.getLatestRun();
  if (!latest) {
    return null;
  }
  const n = Math.max(0, Math.floor(topN));
  return {
    run: latest.run,
    topBuys: sortResults(latest.results, "buyScore", "desc").slice(0, n),
    topShorts: sortResults(latest.results, "shortScore", "desc").slice(0, n),
  };
}

export async function searchResults(
  repo: AnalysisRepository,
  filter: ResultFilter = {},
): Promise<AnalysisResult[]> {
  const latest = await repo.getLatestRun();
  if (!latest) {
    return [];
  }
  const minBuy = filter.minBuyScore ?? 0;
  const minShort = filter.minShortScore ?? 0;
  const matching = latest.results.filter(
    (result) => result.buyScore >= minBuy && result.shortScore >= minShort,
  );
  const limit = Math.max(0, Math.floor(filter.limit ?? 100));
  return sortResults(matching, filter.sortBy ?? "buyScore", filter.sortOrder ?? "desc").slice(
    0,
    limit,
  );
}
