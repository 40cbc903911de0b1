import { Command } from "commander";
import type { ParameterStore } from "../tuning/types.js";
import { toDateKey } from "../infra/utils.js";
import { PARAMETER_NAMES, validateTuningChange } from "../tuning/registry.js";
import { seedDefaultParameters } from "../tuning/seed.js";
import { parseDateArg, parseNumberArg } from "./args.js";

export type ParametersProgramDeps = {
  store: ParameterStore;
  now?: () => Date;
  print?: (line: string) => void;
};

function orderNames(names: readonly string[]): string[] {
  const known = PARAMETER_NAMES.filter((name) => names.includes(name));
  const unknown = names.filter((name) => !PARAMETER_NAMES.includes(name)).sort();
  return [...known, ...unknown];
}

export function createParametersProgram(deps: ParametersProgramDeps): Command {
  const now = deps.now ?? (() => new Date());
  const print = deps.print ?? ((line: string) => console.log(line));
  const program = new Command("parameters").description("Inspect and edit tuning parameters");

  program
    .command("list")
    .description("Show the value of every parameter in effect on a date")
    .option("--as-of <date>", "YYYY-MM-DD (defaults to today)", parseDateArg)
    .action(async (opts: { asOf?: string }) => {
      const asOf = opts.asOf ?? toDateKey(now());
      const snapshot = await deps.store.getCurrent(asOf);
      const names = orderNames(Object.keys(snapshot));
      if (names.length === 0) {
        print(`No parameters in effect on ${asOf}. Run "seed" first.`);
        return;
      }
      for (const name of names) {
        print(`${name} = ${snapshot[name]}`);
      }
    });

  program
    .command("history")
    .description("Show every version of one parameter")
    .argument("<name>", "parameter name")
    .action(async (name: string) => {
      const history = await deps.store.listHistory(name);
      if (history.length === 0) {
        print(`No versions of ${name}.`);
        return;
      }
      for (const entry of history) {
        print(`${entry.effectiveDate}  ${entry.value}${entry.description ? `  ${entry.description}` : ""}`);
      }
    });

  program
    .command("set")
    .description("Write a new version of a parameter")
    .argument("<name>", "parameter name")
    .argument("<value>", "new value", parseNumberArg)
    .option("--date <date>", "effective date, YYYY-MM-DD (defaults to today)", parseDateArg)
    .option("--description <text>", "why the value changed")
    .action(async (name: string, value: number, opts: { date?: string; description?: string }) => {
      const date = opts.date ?? toDateKey(now());
      const current = await deps.store.getCurrent(date);
      validateTuningChange(name, value, current);
      const written = await deps.store.writeNewVersion({
        date,
        name,
        value,
        description: opts.description ?? "manual",
      });
      print(`${written.name} = ${written.value} effective ${written.effectiveDate}`);
    });

  program
    .command("seed")
    .description("Write registry defaults for parameters that have no version yet")
    .option("--date <date>", "effective date, YYYY-MM-DD (defaults to today)", parseDateArg)
    .action(async (opts: { date?: string }) => {
      const date = opts.date ?? toDateKey(now());
      const written = await seedDefaultParameters({ store: deps.store, date });
      print(`Seeded ${written.length} parameter(s) effective ${date}.`);
    });

  return program;
}
