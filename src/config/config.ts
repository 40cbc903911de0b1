import fs from "node:fs";
import type { LogLevel } from "../logging/logger.js";
import type { AnalysisConfig } from "./types.analysis.js";
import type { NotificationsConfig, ProvidersConfig } from "./types.providers.js";
import type { TuningConfig } from "./types.tuning.js";
import { ConfigurationError } from "../errors.js";
import { resolveConfigPath } from "./paths.js";
import { ScoreloopSchema } from "./zod-schema.js";

export type ScoreloopConfig = {
  logging?: { level?: LogLevel };
  analysis?: AnalysisConfig;
  tuning?: TuningConfig;
  providers?: ProvidersConfig;
  notifications?: NotificationsConfig;
};

export function parseConfig(raw: unknown, source = "config"): ScoreloopConfig {
  const parsed = ScoreloopSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`invalid ${source}: ${issues}`);
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScoreloopConfig {
  const filePath = resolveConfigPath(env);
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    const code = (err as { code?: string }).code;
    if (code === "ENOENT") {
      return {};
    }
    throw new ConfigurationError(`unable to read ${filePath}`, { cause: err });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`${filePath} is not valid JSON`, { cause: err });
  }
  return parseConfig(json, filePath);
}
