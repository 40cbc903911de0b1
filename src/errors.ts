export type ScoreloopErrorCode =
  | "configuration"
  | "missing-parameter"
  | "insufficient-history"
  | "not-found"
  | "rate-limit"
  | "duplicate-version"
  | "invalid-tuning-value"
  | "ai-service";

export class ScoreloopError extends Error {
  readonly code: ScoreloopErrorCode;

  constructor(code: ScoreloopErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Fatal for a run: raised before any ticker is processed. */
export class ConfigurationError extends ScoreloopError {
  constructor(message: string, options?: { cause?: unknown; code?: ScoreloopErrorCode }) {
    super(options?.code ?? "configuration", message, options);
  }
}

export class MissingParameterError extends ConfigurationError {
  readonly names: string[];
  readonly asOf: string;

  constructor(params: { names: string[]; asOf: string }) {
    super(
      `missing tuning parameters on or before ${params.asOf}: ${params.names.join(", ")}`,
      { code: "missing-parameter" },
    );
    this.names = params.names;
    this.asOf = params.asOf;
  }
}

export class InsufficientHistoryError extends ScoreloopError {
  readonly indicator: string;
  readonly required: number;
  readonly available: number;

  constructor(params: { indicator: string; required: number; available: number }) {
    super(
      "insufficient-history",
      `${params.indicator} needs ${params.required} bars, got ${params.available}`,
    );
    this.indicator = params.indicator;
    this.required = params.required;
    this.available = params.available;
  }
}

export class NotFoundError extends ScoreloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("not-found", message, options);
  }
}

export class RateLimitError extends ScoreloopError {
  readonly retryAfterMs: number | null;

  constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number | null }) {
    super("rate-limit", message, options);
    this.retryAfterMs = options?.retryAfterMs ?? null;
  }
}

export class DuplicateVersionError extends ScoreloopError {
  readonly date: string;
  readonly parameter: string;

  constructor(params: { date: string; name: string }) {
    super("duplicate-version", `tuning parameter ${params.name} already has a version on ${params.date}`);
    this.date = params.date;
    this.parameter = params.name;
  }
}

export class InvalidTuningValueError extends ScoreloopError {
  readonly parameter: string;
  readonly value: number;

  constructor(params: { name: string; value: number; reason: string }) {
    super("invalid-tuning-value", `invalid value ${params.value} for ${params.name}: ${params.reason}`);
    this.parameter = params.name;
    this.value = params.value;
  }
}

export class AIServiceError extends ScoreloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ai-service", message, options);
  }
}

export function isRetryableProviderError(err: unknown): boolean {
  return err instanceof NotFoundError || err instanceof RateLimitError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
