import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  child(context: LogContext): Logger;
};

export type LoggerOptions = {
  level?: LogLevel;
  plain?: boolean;
  context?: LogContext;
  write?: (line: string) => void;
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEY = /api[_-]?key|secret|token|password|authorization/i;

function formatContext(context: LogContext): string {
  const pairs = Object.entries(context).map(([key, value]) => {
    const shown = SENSITIVE_KEY.test(key) ? "[REDACTED]" : value;
    return `${key}=${typeof shown === "string" ? shown : JSON.stringify(shown)}`;
  });
  return pairs.join(" ");
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/** Levelled logger writing to stderr, so stdout stays free for CLI output. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const plain = options.plain ?? false;
  const baseContext = options.context ?? {};
  const write = options.write ?? ((line: string) => process.stderr.write(line + "\n"));

  const paint: Record<LogLevel, (text: string) => string> = plain
    ? { debug: String, info: String, warn: String, error: String }
    : { debug: chalk.dim, info: chalk.cyan, warn: chalk.yellow, error: chalk.red };

  function log(at: LogLevel, message: string, context: LogContext): void {
    if (LOG_LEVELS[at] < LOG_LEVELS[level]) return;

    const merged = { ...baseContext, ...context };
    const tag = paint[at](at.toUpperCase().padEnd(5));
    const details = Object.keys(merged).length > 0 ? ` ${formatContext(merged)}` : "";
    const line = `${new Date().toISOString()} ${tag} ${message}`;
    write(line + (plain ? details : chalk.dim(details)));
  }

  return {
    debug(message, context = {}) {
      log("debug", message, context);
    },
    info(message, context = {}) {
      log("info", message, context);
    },
    warn(message, context = {}) {
      log("warn", message, context);
    },
    error(message, error, context = {}) {
      const withError = error === undefined ? context : { ...context, error: describeError(error) };
      log("error", message, withError);
    },
    child(context) {
      return createLogger({ ...options, context: { ...baseContext, ...context } });
    },
  };
}
