import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DuplicateVersionError,
  InvalidTuningValueError,
  MissingParameterError,
} from "../errors.js";
import { createFileParameterStore, resolveParameterStorePath } from "./store.js";

describe("file parameter store", () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "scoreloop-tuning-"));
    filePath = path.join(tempDir, "tuning", "parameters.json");
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it("resolves its path under the state dir", () => {
    expect(resolveParameterStorePath({ SCORELOOP_STATE_DIR: tempDir })).toBe(filePath);
  });

  it("returns a written value and keeps the original on a duplicate write", async () => {
    const store = createFileParameterStore({
      filePath,
      now: () => new Date("2026-03-01T08:00:00Z"),
    });
    const row = await store.writeNewVersion({
      date: "2026-03-01",
      name: "rsi_oversold_threshold",
      value: 30,
      description: "initial",
    });
    expect(row).toEqual({
      effectiveDate: "2026-03-01",
      name: "rsi_oversold_threshold",
      value: 30,
      description: "initial",
      createdAt: "2026-03-01T08:00:00.000Z",
    });

    await expect(
      store.writeNewVersion({ date: "2026-03-01", name: "rsi_oversold_threshold", value: 20 }),
    ).rejects.toBeInstanceOf(DuplicateVersionError);

    const snapshot = await store.getCurrent("2026-03-01");
    expect(snapshot).toEqual({ rsi_oversold_threshold: 30 });
  });

  it("picks the latest version on or before the date", async () => {
    const store = createFileParameterStore({ filePath });
    await store.writeNewVersion({ date: "2026-03-10", name: "score_threshold", value: 6 });
    await store.writeNewVersion({ date: "2026-03-01", name: "score_threshold", value: 7 });
    await store.writeNewVersion({ date: "2026-03-20", name: "score_threshold", value: 5 });

    expect((await store.getCurrent("2026-03-01")).score_threshold).toBe(7);
    expect((await store.getCurrent("2026-03-15")).score_threshold).toBe(6);
    expect((await store.getCurrent(new Date("2026-04-01T23:59:00Z"))).score_threshold).toBe(5);
    expect(await store.getCurrent("2026-02-28")).toEqual({});

    const history = await store.listHistory("score_threshold");
    expect(history.map((row) => row.effectiveDate)).toEqual([
      "2026-03-01",
      "2026-03-10",
      "2026-03-20",
    ]);
  });

  it("returns identical snapshots across dates with no write between them", async () => {
    const store = createFileParameterStore({ filePath });
    await store.writeNewVersion({ date: "2026-03-01", name: "rsi_period", value: 14 });
    await store.writeNewVersion({ date: "2026-03-05", name: "dmi_period", value: 10 });

    const dates = ["2026-03-05", "2026-03-06", "2026-03-17", "2026-05-01"];
    const snapshots = await Promise.all(dates.map((date) => store.getCurrent(date)));
    for (const snapshot of snapshots) {
      expect(snapshot).toEqual({ rsi_period: 14, dmi_period: 10 });
    }
  });

  it("names every missing required parameter", async () => {
    const store = createFileParameterStore({ filePath });
    await store.writeNewVersion({ date: "2026-03-01", name: "rsi_period", value: 14 });

    const err = await store
      .getCurrent("2026-03-02", { required: ["rsi_period", "dmi_period", "score_threshold"] })
      .catch((error: unknown) => error);
    expect(err).toBeInstanceOf(MissingParameterError);
    if (err instanceof MissingParameterError) {
      expect(err.names).toEqual(["dmi_period", "score_threshold"]);
      expect(err.asOf).toBe("2026-03-02");
    }
  });

  it("rejects invalid values without writing", async () => {
    const store = createFileParameterStore({ filePath });
    await expect(
      store.writeNewVersion({ date: "2026-03-01", name: "rsi_period", value: -1 }),
    ).rejects.toBeInstanceOf(InvalidTuningValueError);
    expect(await store.listParameters()).toEqual([]);
  });

  it("serializes concurrent writers on the same file", async () => {
    const store = createFileParameterStore({ filePath });
    const names = ["rsi_period", "dmi_period", "macd_signal_period", "deviation_period"];
    await Promise.all(
      names.map((name) => store.writeNewVersion({ date: "2026-03-01", name, value: 9 })),
    );
    const rows = await store.listParameters();
    expect(rows.map((row) => row.name)).toEqual([
      "deviation_period",
      "dmi_period",
      "macd_signal_period",
      "rsi_period",
    ]);
  });
});
