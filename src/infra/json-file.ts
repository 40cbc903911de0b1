import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import lockfile from "proper-lockfile";

const LOCK_OPTIONS = {
  retries: {
    retries: 8,
    factor: 2,
    minTimeout: 50,
    maxTimeout: 5000,
    randomize: true,
  },
  stale: 30_000,
} as const;

export async function ensureDir(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
}

/** Returns the parsed JSON, or null when the file does not exist. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (err) {
    const code = (err as { code?: string }).code;
    if (code === "ENOENT") {
      return null;
    }
    throw err;
  }
  return JSON.parse(raw) as unknown;
}

export async function writeJsonFileAtomic(filePath: string, value: unknown): Promise<void> {
  await ensureDir(filePath);
  const dir = path.dirname(filePath);
  const tmp = path.join(dir, `${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  await fs.promises.writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, {
    encoding: "utf-8",
  });
  try {
    await fs.promises.chmod(tmp, 0o600);
    await fs.promises.rename(tmp, filePath);
  } catch (err) {
    await fs.promises.rm(tmp, { force: true });
    throw err;
  }
}

async function ensureLockTarget(filePath: string, initial: unknown): Promise<void> {
  await ensureDir(filePath);
  try {
    await fs.promises.writeFile(filePath, `${JSON.stringify(initial, null, 2)}\n`, {
      encoding: "utf-8",
      flag: "wx",
      mode: 0o600,
    });
  } catch (err) {
    if ((err as { code?: string }).code !== "EEXIST") {
      throw err;
    }
  }
}

/**
 * Serializes read-modify-write cycles on one JSON document across processes.
 * `initial` seeds the file so there is something to lock.
 */
export async function withFileLock<T>(
  filePath: string,
  initial: unknown,
  fn: () => Promise<T>,
): Promise<T> {
  await ensureLockTarget(filePath, initial);
  const release = await lockfile.lock(filePath, LOCK_OPTIONS);
  try {
    return await fn();
  } finally {
    await release();
  }
}

export async function appendNdjsonLines(filePath: string, values: unknown[]): Promise<void> {
  if (values.length === 0) {
    return;
  }
  await ensureDir(filePath);
  const handle = await fs.promises.open(filePath, "a", 0o600);
  try {
    const payload = values.map((value) => JSON.stringify(value)).join("\n");
    await handle.writeFile(`${payload}\n`, { encoding: "utf-8" });
  } finally {
    await handle.close();
  }
}

/**
 * Writes `value` to `filePath` only if nothing exists there yet. The document becomes
 * visible complete or not at all; returns false when the target already exists.
 */
export async function writeJsonFileExclusive(filePath: string, value: unknown): Promise<boolean> {
  await ensureDir(filePath);
  const dir = path.dirname(filePath);
  const tmp = path.join(dir, `${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  await fs.promises.writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, {
    encoding: "utf-8",
    mode: 0o600,
  });
  try {
    await fs.promises.link(tmp, filePath);
    return true;
  } catch (err) {
    if ((err as { code?: string }).code === "EEXIST") {
      return false;
    }
    throw err;
  } finally {
    await fs.promises.rm(tmp, { force: true });
  }
}
