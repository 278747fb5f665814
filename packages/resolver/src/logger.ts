import chalk, { type ChalkInstance } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogData = Record<string, unknown>;

/**
 * The logging surface handed to the resolver and the host. Everything is
 * printed as `[Scope] message`.
 */
export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

/**
 * Receives every line that passes the level filter. Defaults to the console.
 */
export type LogSink = (
  level: Exclude<LogLevel, "silent">,
  prefix: string,
  message: string,
  data?: LogData
) => void;

export type LoggerOptions = {
  /** @default "info" */
  level?: LogLevel;
  sink?: LogSink;
};

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const COLORS: Record<Exclude<LogLevel, "silent">, ChalkInstance> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const consoleSink: LogSink = (level, prefix, message, data) => {
  const line = COLORS[level](`${prefix} ${message}`);
  if (data) console[level](line, data);
  else console[level](line);
};

/**
 * Creates a logger whose lines are prefixed with the given scope.
 * @param scope Component name, e.g. "DescriptorResolver".
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  const threshold = SEVERITY[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;

  const emit = (
    level: Exclude<LogLevel, "silent">,
    message: string,
    data?: LogData
  ): void => {
    if (SEVERITY[level] < threshold) return;
    sink(level, prefix, message, data);
  };

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
  };
}
