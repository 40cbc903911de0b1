import { Command, Option } from "commander";
import type { AnalysisRepository, AnalysisResult } from "../analysis/types.js";
import { getTopSummary, searchResults, type ResultSortKey, type SortOrder } from "../analysis/queries.js";
import { parseCountArg, parseNumberArg } from "./args.js";

export type ResultsProgramDeps = {
  repository: AnalysisRepository;
  print?: (line: string) => void;
};

export function formatResultLine(result: AnalysisResult): string {
  const flags = [result.gated ? "gated" : null, result.risk ? `risk ${result.risk}` : null]
    .filter((entry): entry is string => entry !== null)
    .join(", ");
  const base = `${result.ticker.padEnd(10)} buy ${String(result.buyScore).padStart(3)}  short ${String(result.shortScore).padStart(3)}  price ${result.price}`;
  return flags ? `${base}  (${flags})` : base;
}

export function createResultsProgram(deps: ResultsProgramDeps): Command {
  const print = deps.print ?? ((line: string) => console.log(line));
  const program = new Command("results").description("Read the latest analysis run");

  program
    .command("summary")
    .description("Top buy and short candidates of the latest run")
    .option("--top <count>", "entries per list", parseCountArg, 5)
    .action(async (opts: { top: number }) => {
      const summary = await getTopSummary(deps.repository, opts.top);
      if (!summary) {
        print("No analysis runs yet.");
        return;
      }
      print(`Run ${summary.run.runId} at ${summary.run.timestamp}`);
      print("Top buys:");
      for (const result of summary.topBuys) {
        print(`  ${formatResultLine(result)}`);
      }
      print("Top shorts:");
      for (const result of summary.topShorts) {
        print(`  ${formatResultLine(result)}`);
      }
    });

  program
    .command("search")
    .description("Filter and sort results of the latest run")
    .option("--min-buy-score <score>", "minimum buy score", parseNumberArg)
    .option("--min-short-score <score>", "minimum short score", parseNumberArg)
    .addOption(
      new Option("--sort-by <key>", "sort key").choices(["buyScore", "shortScore"]).default("buyScore"),
    )
    .addOption(new Option("--order <order>", "sort order").choices(["asc", "desc"]).default("desc"))
    .option("--limit <count>", "maximum rows", parseCountArg, 100)
    .action(
      async (opts: {
        minBuyScore?: number;
        minShortScore?: number;
        sortBy: ResultSortKey;
        order: SortOrder;
        limit: number;
      }) => {
        const results = await searchResults(deps.repository, {
          minBuyScore: opts.minBuyScore,
          minShortScore: opts.minShortScore,
          sortBy: opts.sortBy,
          sortOrder: opts.order,
          limit: opts.limit,
        });
        if (results.length === 0) {
          print("No matching results.");
          return;
        }
        for (const result of results) {
          print(formatResultLine(result));
        }
      },
    );

  return program;
}
