import path from "node:path";
import { z } from "zod";
import type { ParameterSnapshot, ParameterStore, TuningParameter } from "./types.js";
import { resolveStateDir } from "../config/paths.js";
import { ConfigurationError, DuplicateVersionError, MissingParameterError } from "../errors.js";
import { readJsonFile, withFileLock, writeJsonFileAtomic } from "../infra/json-file.js";
import { isDateKey, toDateKey } from "../infra/utils.js";
import { validateTuningValue } from "./registry.js";

const TuningParameterSchema = z.object({
  effectiveDate: z.string().refine(isDateKey, "effectiveDate must be YYYY-MM-DD"),
  name: z.string().min(1),
  value: z.number(),
  description: z.string().optional(),
  createdAt: z.string(),
});

const ParameterFileSchema = z.object({
  version: z.literal(1),
  parameters: z.array(TuningParameterSchema),
});

type ParameterFile = z.infer<typeof ParameterFileSchema>;

const EMPTY_FILE: ParameterFile = { version: 1, parameters: [] };

export type ParameterIndex = Map<string, TuningParameter[]>;

export function resolveParameterStorePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), "tuning", "parameters.json");
}

export function resolveDateKey(value: Date | string): string {
  if (value instanceof Date) {
    if (!Number.isFinite(value.getTime())) {
      throw new RangeError("invalid date");
    }
    return toDateKey(value);
  }
  if (!isDateKey(value)) {
    throw new RangeError(`invalid date key: ${value}`);
  }
  return value;
}

export function buildParameterIndex(rows: readonly TuningParameter[]): ParameterIndex {
  const index: ParameterIndex = new Map();
  for (const row of rows) {
    const existing = index.get(row.name);
    if (existing) {
      existing.push(row);
    } else {
      index.set(row.name, [row]);
    }
  }
  for (const entries of index.values()) {
    entries.sort((a, b) => a.effectiveDate.localeCompare(b.effectiveDate));
  }
  return index;
}

function findFirstAfter(entries: TuningParameter[], dateKey: string): number {
  let low = 0;
  let high = entries.length;
  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    if (entries[mid].effectiveDate <= dateKey) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

export function findVersionAsOf(
  index: ParameterIndex,
  name: string,
  dateKey: string,
): TuningParameter | null {
  const entries = index.get(name);
  if (!entries || entries.length === 0) {
    return null;
  }
  const idx = findFirstAfter(entries, dateKey);
  return idx > 0 ? entries[idx - 1] : null;
}

export function resolveSnapshot(params: {
  index: ParameterIndex;
  asOf: string;
  required?: readonly string[];
}): ParameterSnapshot {
  const snapshot: Record<string, number> = {};
  for (const name of params.index.keys()) {
    const version = findVersionAsOf(params.index, name, params.asOf);
    if (version) {
      snapshot[name] = version.value;
    }
  }
  const missing = (params.required ?? []).filter(
    (name) => !Object.prototype.hasOwnProperty.call(snapshot, name),
  );
  if (missing.length > 0) {
    throw new MissingParameterError({ names: missing, asOf: params.asOf });
  }
  return Object.freeze(snapshot);
}

async function readParameterFile(filePath: string): Promise<ParameterFile> {
  const raw = await readJsonFile(filePath);
  if (raw === null) {
    return EMPTY_FILE;
  }
  const parsed = ParameterFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`parameter store ${filePath} is corrupt`, { cause: parsed.error });
  }
  return parsed.data;
}

export function createFileParameterStore(
  params: { filePath?: string; now?: () => Date } = {},
): ParameterStore {
  const filePath = params.filePath ?? resolveParameterStorePath();
  const now = params.now ?? (() => new Date());

  return {
    async getCurrent(asOf, options) {
      const dateKey = resolveDateKey(asOf);
      const file = await readParameterFile(filePath);
      return resolveSnapshot({
        index: buildParameterIndex(file.parameters),
        asOf: dateKey,
        required: options?.required,
      });
    },

    async writeNewVersion({ date, name, value, description }) {
      const effectiveDate = resolveDateKey(date);
      validateTuningValue(name, value);
      return await withFileLock(filePath, EMPTY_FILE, async () => {
        const file = await readParameterFile(filePath);
        const exists = file.parameters.some(
          (entry) => entry.name === name && entry.effectiveDate === effectiveDate,
        );
        if (exists) {
          throw new DuplicateVersionError({ date: effectiveDate, name });
        }
        const row: TuningParameter = {
          effectiveDate,
          name,
          value,
          ...(description ? { description } : {}),
          createdAt: now().toISOString(),
        };
        await writeJsonFileAtomic(filePath, {
          version: 1,
          parameters: [...file.parameters, row],
        } satisfies ParameterFile);
        return row;
      });
    },

    async listHistory(name) {
      const file = await readParameterFile(filePath);
      return buildParameterIndex(file.parameters).get(name) ?? [];
    },

    async listParameters() {
      const file = await readParameterFile(filePath);
      return [...file.parameters].sort(
        (a, b) => a.effectiveDate.localeCompare(b.effectiveDate) || a.name.localeCompare(b.name),
      );
    },
  };
}
