import os from "node:os";
import path from "node:path";

export const CONFIG_FILENAME = "scoreloop.json";

function expandHome(value: string, homedir: () => string): string {
  if (value === "~") {
    return homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(homedir(), value.slice(2));
  }
  return value;
}

export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.SCORELOOP_STATE_DIR?.trim();
  if (override) {
    return path.resolve(expandHome(override, homedir));
  }
  return path.join(homedir(), ".scoreloop");
}

export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.SCORELOOP_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(expandHome(override, homedir));
  }
  return path.join(resolveStateDir(env, homedir), CONFIG_FILENAME);
}
