export type LogLevel = "silent" | "errors" | "warnings" | "info" | "debug";

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

function formatMessage(prefix: string, message: string, context?: LogContext): string {
  const line = `[pgf] ${prefix} ${message}`;
  if (!context || Object.keys(context).length === 0) {
    return line;
  }
  return `${line} ${JSON.stringify(context)}`;
}

/** Writes to the console; calls below the configured level are dropped. */
export class ConsoleLogger implements Logger {
  readonly level: LogLevel;
  private readonly priority: number;

  constructor(level: LogLevel = "info") {
    this.level = level;
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  error(message: string, context?: LogContext): void {
    if (this.priority >= LOG_LEVEL_PRIORITY.errors) {
      console.error(formatMessage("ERROR", message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.priority >= LOG_LEVEL_PRIORITY.warnings) {
      console.warn(formatMessage("WARN", message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.priority >= LOG_LEVEL_PRIORITY.info) {
      console.info(formatMessage("INFO", message, context));
    }
  }

  debug(message: string, context?: LogContext): void {
    if (this.priority >= LOG_LEVEL_PRIORITY.debug) {
      console.debug(formatMessage("DEBUG", message, context));
    }
  }
}

export const silentLogger: Logger = new ConsoleLogger("silent");

export function createLogger(level: LogLevel): Logger {
  return new ConsoleLogger(level);
}
