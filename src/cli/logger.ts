/**
 * Timestamped line logger
 *
 * Lines look like `[2024-01-02T03:04:05.000Z] [INFO] message`. Info and debug
 * go to stdout, warnings and errors to stderr. A background daemon has both
 * streams redirected into its log file.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Record<LogLevel, (message: string) => void>;

export type LoggerOptions = {
  /** Minimum level that is written (default: info) */
  level?: LogLevel;
  /** Line sink; defaults to stdout/stderr */
  write?: (line: string, level: LogLevel) => void;
  now?: () => Date;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

/**
 * --verbose wins, then GITSYNC_LOG_LEVEL, then info
 */
export function resolveLogLevel(verbose: boolean | undefined, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (verbose) return "debug";
  return parseLogLevel(env.GITSYNC_LOG_LEVEL) ?? "info";
}

export function formatLogLine(level: LogLevel, message: string, date: Date): string {
  return `[${date.toISOString()}] [${level.toUpperCase()}] ${message}`;
}

function writeToConsole(line: string, level: LogLevel): void {
  const stream = level === "warn" || level === "error" ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const write = options.write ?? writeToConsole;
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel) => (message: string) => {
    if (LEVEL_ORDER[level] < threshold) return;
    write(formatLogLine(level, message, now()), level);
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
