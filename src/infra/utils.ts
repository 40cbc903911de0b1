export function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function parseIsoDate(value: string | undefined | null): number | null {
  if (!value) {
    return null;
  }
  const ts = new Date(value).getTime();
  if (!Number.isFinite(ts)) {
    return null;
  }
  return ts;
}

const DATE_KEY_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isDateKey(value: string): boolean {
  if (!DATE_KEY_RE.test(value)) {
    return false;
  }
  return toDateKey(new Date(`${value}T00:00:00.000Z`)) === value;
}

/** UTC calendar day, `YYYY-MM-DD`. */
export function toDateKey(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}

export function normalizeTicker(raw: string, suffix?: string): string {
  const trimmed = raw.trim().toUpperCase();
  if (!trimmed || !suffix) {
    return trimmed;
  }
  // Indices (^N225) and already-qualified symbols keep their form.
  if (trimmed.startsWith("^") || trimmed.includes(".")) {
    return trimmed;
  }
  return `${trimmed}${suffix.toUpperCase()}`;
}
