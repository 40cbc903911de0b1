export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (name: string) => SubsystemLogger;
};

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let configuredLevel: LogLevel | null = null;

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export function setLogLevel(level: LogLevel | null): void {
  configuredLevel = level;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (configuredLevel) {
    return configuredLevel;
  }
  const fromEnv = env.SCORELOOP_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

function serializeContext(context: LogContext | undefined): string {
  if (!context || Object.keys(context).length === 0) {
    return "";
  }
  try {
    return ` ${JSON.stringify(context)}`;
  } catch {
    return " [unserializable context]";
  }
}

export function formatLogLine(params: {
  level: LogLevel;
  subsystem: string;
  message: string;
  context?: LogContext;
  now?: Date;
}): string {
  const ts = (params.now ?? new Date()).toISOString();
  return `${ts} ${params.level.toUpperCase()} [${params.subsystem}] ${params.message}${serializeContext(params.context)}`;
}

export function createSubsystemLogger(
  subsystem: string,
  options: { sink?: LogSink; level?: LogLevel } = {},
): SubsystemLogger {
  const sink = options.sink ?? consoleSink;
  const emit = (level: LogLevel, message: string, context?: LogContext) => {
    const threshold = options.level ?? resolveLogLevel();
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
      return;
    }
    sink(level, formatLogLine({ level, subsystem, message, context }));
  };
  return {
    subsystem,
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`, options),
  };
}
