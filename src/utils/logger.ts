/**
 * Structured logging for the report launcher.
 * One JSON line per entry on stdout/stderr, which cron appends to logs/cron.log.
 */

export interface LogContext {
  correlationId?: string;
  operation?: string;
  filePath?: string;
  interpreter?: string;
  [key: string]: unknown;
}

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

/**
 * Reads a level name such as "warn" or "DEBUG", falling back when unknown
 */
export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = LogLevel.INFO,
): LogLevel {
  const normalized = value?.trim().toUpperCase();
  switch (normalized) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
    case "WARNING":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    default:
      return fallback;
  }
}

/**
 * Structured logger with correlation ID support and a minimum level
 */
export class Logger {
  private readonly serviceName: string;
  private readonly defaultContext: LogContext;
  private readonly minLevel: LogLevel;

  constructor(
    serviceName: string = "ReportLauncher",
    defaultContext: LogContext = {},
    minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL),
  ) {
    this.serviceName = serviceName;
    this.defaultContext = defaultContext;
    this.minLevel = minLevel;
  }

  /**
   * Creates a child logger with additional default context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(
      this.serviceName,
      { ...this.defaultContext, ...additionalContext },
      this.minLevel,
    );
  }

  /**
   * Same service and context, different minimum level
   */
  withLevel(minLevel: LogLevel): Logger {
    return new Logger(this.serviceName, this.defaultContext, minLevel);
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  debug(message: string, context: LogContext = {}): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context: LogContext = {}): void {
    const errorContext = error
      ? {
          error: {
            name: error.name,
            message: error.message,
            stack: error.stack,
          },
        }
      : {};

    this.log(LogLevel.ERROR, message, { ...context, ...errorContext });
  }

  private log(level: LogLevel, message: string, context: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const logOutput = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      service: this.serviceName,
      message,
      ...this.defaultContext,
      ...context,
    });

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(logOutput);
        break;
      case LogLevel.INFO:
        console.info(logOutput);
        break;
      case LogLevel.WARN:
        console.warn(logOutput);
        break;
      case LogLevel.ERROR:
        console.error(logOutput);
        break;
    }
  }
}

export const logger = new Logger("ReportLauncher");

/**
 * Creates a logger with correlation ID context
 */
export function createCorrelatedLogger(
  correlationId: string,
  additionalContext: LogContext = {},
): Logger {
  return logger.child({ correlationId, ...additionalContext });
}

/**
 * Applies a LOG_LEVEL found in `env` (for example one loaded from .env)
 */
export function applyLogLevel(logger: Logger, env: NodeJS.ProcessEnv): Logger {
  const configured = env.LOG_LEVEL?.trim();
  if (!configured) {
    return logger;
  }
  const level = parseLogLevel(configured, logger.level);
  return level === logger.level ? logger : logger.withLevel(level);
}
