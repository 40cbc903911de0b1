import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { loadConfig, parseConfig } from "./config.js";
import { resolveConfigPath, resolveStateDir } from "./paths.js";

describe("config", () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it("resolves the state dir and config path from env", () => {
    const env = { SCORELOOP_STATE_DIR: "/srv/scoreloop" };
    expect(resolveStateDir(env)).toBe("/srv/scoreloop");
    expect(resolveConfigPath(env)).toBe(path.join("/srv/scoreloop", "scoreloop.json"));
    expect(resolveStateDir({}, () => "/home/ops")).toBe(path.join("/home/ops", ".scoreloop"));
  });

  it("returns an empty config when the file is missing", async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "scoreloop-config-"));
    expect(loadConfig({ SCORELOOP_STATE_DIR: tempDir })).toEqual({});
  });

  it("loads and validates a config file", async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "scoreloop-config-"));
    await fs.writeFile(
      path.join(tempDir, "scoreloop.json"),
      JSON.stringify({ analysis: { universe: ["7203"], tickerSuffix: ".T" }, tuning: { maturityDays: 10 } }),
    );
    const cfg = loadConfig({ SCORELOOP_STATE_DIR: tempDir });
    expect(cfg.analysis?.universe).toEqual(["7203"]);
    expect(cfg.tuning?.maturityDays).toBe(10);
  });

  it("rejects unknown keys and bad values", () => {
    expect(() => parseConfig({ analysis: { concurrency: 0 } })).toThrow(ConfigurationError);
    expect(() => parseConfig({ scheduler: {} })).toThrow(/invalid config/);
  });
});
