import fs from "node:fs";
import readline from "node:readline";
import type { ZodType, ZodTypeDef } from "zod";

export type NdjsonReadResult<T> = {
  entries: T[];
  /** Lines that were not JSON or did not match the schema. */
  rejected: number;
};

export async function readNdjsonFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<NdjsonReadResult<T>> {
  if (!fs.existsSync(filePath)) {
    return { entries: [], rejected: 0 };
  }
  const stream = fs.createReadStream(filePath, "utf8");
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  const entries: T[] = [];
  let rejected = 0;
  for await (const line of rl) {
    if (!line.trim()) {
      continue;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      rejected += 1;
      continue;
    }
    const result = schema.safeParse(parsed);
    if (result.success) {
      entries.push(result.data);
    } else {
      rejected += 1;
    }
  }
  return { entries, rejected };
}
