// Levelled logger with a replaceable sink.

export const LOG_LEVEL = {
  error: 0,
  warning: 1,
  info: 2,
  debug: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVEL;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const DEFAULT_LOG_LEVEL: LogLevel = "info";

const LEVEL_METHOD_MAP: Record<LogLevel, "debug" | "info" | "warn" | "error"> = {
  error: "error",
  warning: "warn",
  info: "info",
  debug: "debug",
};

const safeStringify = (value: unknown): string => {
  try {
    return JSON.stringify(value);
  } catch {
    return "[Unserializable]";
  }
};

const consoleSink: LogSink = (entry) => {
  const contextText = entry.context ? ` ${safeStringify(entry.context)}` : "";
  console[LEVEL_METHOD_MAP[entry.level]](
    `[${entry.timestamp.toISOString()}] ${entry.level}: ${entry.message}${contextText}`,
  );
};

/** Entries above the configured level are dropped before reaching the sink. */
export class Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? DEFAULT_LOG_LEVEL;
    this.sink = options.sink ?? consoleSink;
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL[level] > LOG_LEVEL[this.level]) {
      return;
    }
    this.sink({ level, message, timestamp: new Date(), context });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }
}
