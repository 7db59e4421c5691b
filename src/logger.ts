export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

// stdout belongs to the MCP stdio transport and CLI output, so every line goes to stderr.
export class Logger {
  private level: LogLevel;
  private readonly context: LogContext;

  constructor(context: LogContext = {}, level: LogLevel = "info") {
    this.context = context;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private write(level: LogLevel, message: string, meta?: LogContext): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...meta,
    };
    console.error(JSON.stringify(entry));
  }

  debug(message: string, meta?: LogContext): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: LogContext): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: LogContext): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: LogContext): void {
    this.write("error", message, meta);
  }

  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context }, this.level);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export function createLogger(context?: LogContext, level?: LogLevel): Logger {
  return new Logger(context, level);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const match = LEVEL_ORDER.find((level) => level === value?.toLowerCase());
  return match ?? fallback;
}

export const logger = createLogger({ service: "memprobe" }, parseLogLevel(process.env.FORENSICS_LOG_LEVEL));
