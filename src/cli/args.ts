import { InvalidArgumentError } from "commander";
import { isDateKey } from "../infra/utils.js";

export function parseNumberArg(value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number`);
  }
  return parsed;
}

export function parseCountArg(value: string): number {
  const parsed = parseNumberArg(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`"${value}" must be a positive integer`);
  }
  return parsed;
}

export function parseDateArg(value: string): string {
  if (!isDateKey(value)) {
    throw new InvalidArgumentError(`"${value}" is not a YYYY-MM-DD date`);
  }
  return value;
}
