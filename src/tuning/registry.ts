import type { ParameterSnapshot } from "./types.js";
import { ConfigurationError, InvalidTuningValueError, MissingParameterError } from "../errors.js";

export type ParameterDefinition = {
  name: string;
  description: string;
  defaultValue: number;
  min: number;
  max: number;
  integer: boolean;
};

const period = (name: string, description: string, defaultValue: number, max = 250) => ({
  name,
  description,
  defaultValue,
  min: 1,
  max,
  integer: true,
});

const weight = (name: string, description: string, defaultValue: number) => ({
  name,
  description,
  defaultValue,
  min: 0,
  max: 20,
  integer: true,
});

const level = (name: string, description: string, defaultValue: number) => ({
  name,
  description,
  defaultValue,
  min: 0,
  max: 100,
  integer: false,
});

export const PARAMETER_DEFINITIONS: readonly ParameterDefinition[] = [
  period("rsi_period", "RSI lookback (Wilder smoothing)", 14, 100),
  level("rsi_oversold_threshold", "RSI below this is a buy signal", 25),
  level("rsi_buy_ready_threshold", "RSI below this (and above oversold) is buy-ready", 40),
  level("rsi_sell_ready_threshold", "RSI at or above this (up to overbought) is sell-ready", 60),
  level("rsi_overbought_threshold", "RSI above this is a short signal", 75),
  weight("rsi_buy_weight", "Buy score added when RSI is oversold", 2),
  weight("rsi_buy_ready_weight", "Buy score added when RSI is buy-ready", 1),
  weight("rsi_short_weight", "Short score added when RSI is overbought", 2),
  weight("rsi_sell_ready_weight", "Short score added when RSI is sell-ready", 1),
  period("deviation_period", "Moving-average length for the deviation rate", 25),
  {
    name: "deviation_buy_threshold",
    description: "Deviation rate (%) at or below this is a buy signal",
    defaultValue: -5,
    min: -100,
    max: 0,
    integer: false,
  },
  {
    name: "deviation_short_threshold",
    description: "Deviation rate (%) at or above this is a short signal",
    defaultValue: 5,
    min: 0,
    max: 100,
    integer: false,
  },
  weight("deviation_buy_weight", "Buy score added for a deep negative deviation", 2),
  weight("deviation_short_weight", "Short score added for a high positive deviation", 2),
  period("trend_sma_period", "Moving-average length whose slope defines the trend", 75, 300),
  weight("trend_weight", "Score added to the side the moving-average slope favours", 1),
  period("macd_fast_period", "MACD fast EMA length", 12, 100),
  period("macd_slow_period", "MACD slow EMA length", 26, 200),
  period("macd_signal_period", "MACD signal EMA length", 9, 100),
  weight("macd_weight", "Score added to the side of the MACD crossover", 2),
  period("dmi_period", "Directional movement / ADX length", 14, 100),
  weight("dmi_weight", "Score added to the side of the dominant directional indicator", 2),
  level("adx_trend_threshold", "ADX above this confirms a trend", 25),
  weight("adx_trend_weight", "Score added to the trending side when ADX confirms", 1),
  {
    name: "score_threshold",
    description: "Minimum buy or short score that triggers news and AI rationale",
    defaultValue: 7,
    min: 0,
    max: 200,
    integer: true,
  },
];

const DEFINITIONS_BY_NAME = new Map(PARAMETER_DEFINITIONS.map((entry) => [entry.name, entry]));

export const PARAMETER_NAMES: readonly string[] = PARAMETER_DEFINITIONS.map((entry) => entry.name);

export function getParameterDefinition(name: string): ParameterDefinition | null {
  return DEFINITIONS_BY_NAME.get(name) ?? null;
}

export function defaultParameterSnapshot(): Record<string, number> {
  return Object.fromEntries(PARAMETER_DEFINITIONS.map((entry) => [entry.name, entry.defaultValue]));
}

/** Reads one value from a resolved snapshot; absence is a configuration fault. */
export function requireParameter(snapshot: ParameterSnapshot, name: string): number {
  const value = snapshot[name];
  if (value === undefined) {
    throw new MissingParameterError({ names: [name], asOf: "snapshot" });
  }
  return value;
}

/** Throws InvalidTuningValueError if `value` is not acceptable for `name` on its own. */
export function validateTuningValue(name: string, value: number): void {
  const definition = getParameterDefinition(name);
  if (!definition) {
    throw new InvalidTuningValueError({ name, value, reason: "unknown parameter" });
  }
  if (!Number.isFinite(value)) {
    throw new InvalidTuningValueError({ name, value, reason: "not a finite number" });
  }
  if (definition.integer && !Number.isInteger(value)) {
    throw new InvalidTuningValueError({ name, value, reason: "must be an integer" });
  }
  if (value < definition.min || value > definition.max) {
    throw new InvalidTuningValueError({
      name,
      value,
      reason: `outside [${definition.min}, ${definition.max}]`,
    });
  }
}

export type SnapshotInconsistency = {
  names: [string, string];
  message: string;
};

/** Cross-parameter ordering rules; one entry per violated pair. */
export function findSnapshotInconsistencies(snapshot: ParameterSnapshot): SnapshotInconsistency[] {
  const problems: SnapshotInconsistency[] = [];
  const ordered = (names: string[]) => {
    for (let i = 1; i < names.length; i += 1) {
      const lower = snapshot[names[i - 1]];
      const upper = snapshot[names[i]];
      if (lower === undefined || upper === undefined) {
        continue;
      }
      if (lower > upper) {
        problems.push({
          names: [names[i - 1], names[i]],
          message: `${names[i - 1]} (${lower}) must not exceed ${names[i]} (${upper})`,
        });
      }
    }
  };
  ordered([
    "rsi_oversold_threshold",
    "rsi_buy_ready_threshold",
    "rsi_sell_ready_threshold",
    "rsi_overbought_threshold",
  ]);
  ordered(["deviation_buy_threshold", "deviation_short_threshold"]);
  const fast = snapshot.macd_fast_period;
  const slow = snapshot.macd_slow_period;
  if (fast !== undefined && slow !== undefined && fast >= slow) {
    problems.push({
      names: ["macd_fast_period", "macd_slow_period"],
      message: `macd_fast_period (${fast}) must be below macd_slow_period (${slow})`,
    });
  }
  return problems;
}

export function validateParameterSnapshot(snapshot: ParameterSnapshot): void {
  const problems = findSnapshotInconsistencies(snapshot);
  if (problems.length > 0) {
    throw new ConfigurationError(
      `inconsistent tuning parameters: ${problems.map((problem) => problem.message).join("; ")}`,
    );
  }
}

/**
 * Validates a proposed value in the context of the snapshot it would join.
 */
export function validateTuningChange(
  name: string,
  value: number,
  current: ParameterSnapshot,
): void {
  validateTuningValue(name, value);
  const problems = findSnapshotInconsistencies({ ...current, [name]: value }).filter((problem) =>
    problem.names.includes(name),
  );
  if (problems.length > 0) {
    const reason = problems.map((problem) => problem.message).join("; ");
    throw new InvalidTuningValueError({ name, value, reason });
  }
}
