import { isArgumentaError } from "../errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  error?: {
    name: string;
    code?: number;
    operation?: string;
    message: string;
    stack?: string;
  };
}

/**
 * Where formatted log lines end up. Defaults to the console.
 */
export interface LogSink {
  write(level: LogLevel, line: string, error?: unknown): void;
}

export interface LoggerConfig {
  prefix: string;
  minLevel: LogLevel;
  includeTimestamp: boolean;
  structuredOutput: boolean;
  sink: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const consoleSink: LogSink = {
  write(level, line, error) {
    switch (level) {
      case "error":
        console.error(line);
        if (error) console.error(error);
        break;
      case "warn":
        console.warn(line);
        break;
      case "debug":
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  },
};

const DEFAULT_CONFIG: LoggerConfig = {
  prefix: "[argumenta]",
  minLevel: "info",
  includeTimestamp: false,
  structuredOutput: false,
  sink: consoleSink,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Structured logger for the Argumenta plugin.
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.minLevel];
  }

  private formatLine(level: LogLevel, message: string, context?: LogContext): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(this.config.prefix, `[${level.toUpperCase()}]`, message);

    if (context && Object.keys(context).length > 0) {
      const pairs = Object.entries(context)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(" ");
      parts.push(`| ${pairs}`);
    }

    return parts.join(" ");
  }

  private createEntry(level: LogLevel, message: string, context?: LogContext, error?: unknown): LogEntry {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    if (context) entry.context = context;

    if (isArgumentaError(error)) {
      entry.error = {
        name: error.name,
        code: error.code,
        operation: error.context.operation,
        message: error.message,
        stack: error.stack,
      };
    } else if (error instanceof Error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  log(level: LogLevel, message: string, context?: LogContext, error?: unknown): void {
    if (!this.shouldLog(level)) return;

    if (this.config.structuredOutput) {
      this.config.sink.write(level, JSON.stringify(this.createEntry(level, message, context, error)));
      return;
    }

    const withCode = isArgumentaError(error) ? { ...context, errorCode: error.code } : context;
    this.config.sink.write(level, this.formatLine(level, message, withCode), error);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext, error?: unknown): void {
    this.log("warn", message, context, error);
  }

  error(message: string, context?: LogContext, error?: unknown): void {
    this.log("error", message, context, error);
  }

  child(context: LogContext): ContextualLogger {
    return new ContextualLogger(this, context);
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }
}

/**
 * Logger with persistent context (service name, operation, request id).
 */
export class ContextualLogger {
  constructor(
    private readonly parent: Logger,
    private readonly context: LogContext
  ) {}

  debug(message: string, extra?: LogContext): void {
    this.parent.debug(message, { ...this.context, ...extra });
  }

  info(message: string, extra?: LogContext): void {
    this.parent.info(message, { ...this.context, ...extra });
  }

  warn(message: string, extra?: LogContext, error?: unknown): void {
    this.parent.warn(message, { ...this.context, ...extra }, error);
  }

  error(message: string, extra?: LogContext, error?: unknown): void {
    this.parent.error(message, { ...this.context, ...extra }, error);
  }

  child(extra: LogContext): ContextualLogger {
    return new ContextualLogger(this.parent, { ...this.context, ...extra });
  }
}

export const logger = new Logger();

export function createLogger(context: LogContext): ContextualLogger {
  return logger.child(context);
}

if (typeof process !== "undefined" && process.env) {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(envLevel)) {
    logger.configure({ minLevel: envLevel });
  }
  if (process.env.ARGUMENTA_STRUCTURED_LOGS === "true") {
    logger.configure({ structuredOutput: true });
  }
}
