/**
 * Error types for structured error handling in the report launcher
 */

/**
 * Base error class for all launcher errors
 * Provides common properties for error tracking and debugging
 */
export abstract class LauncherError extends Error {
  public readonly correlationId: string;
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    correlationId: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.correlationId = correlationId;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Returns a structured representation of the error for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      correlationId: this.correlationId,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when launcher configuration is invalid
 */
export class ConfigurationError extends LauncherError {
  public readonly configKey: string;

  constructor(
    message: string,
    correlationId: string,
    configKey: string,
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, configKey });
    this.configKey = configKey;
  }
}

/**
 * Error raised when an existing .env file cannot be read or parsed.
 * Never fatal: the launcher logs it and carries on.
 */
export class EnvFileError extends LauncherError {
  public readonly filePath: string;

  constructor(
    message: string,
    correlationId: string,
    filePath: string,
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, filePath });
    this.filePath = filePath;
  }
}

/**
 * Error thrown when no Python interpreter exists anywhere in the fallback chain
 */
export class InterpreterNotFoundError extends LauncherError {
  public readonly candidates: string[];

  constructor(
    message: string,
    correlationId: string,
    candidates: string[],
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, candidates });
    this.candidates = candidates;
  }
}

/**
 * Error thrown when the report process cannot be spawned.
 * `exitCode` follows the shell convention: 127 not found, 126 not executable.
 */
export class ProcessLaunchError extends LauncherError {
  public readonly command: string;
  public readonly exitCode: number;

  constructor(
    message: string,
    correlationId: string,
    command: string,
    exitCode: number,
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, command, exitCode });
    this.command = command;
    this.exitCode = exitCode;
  }
}

/**
 * Utility function to generate correlation IDs for run tracking
 */
export function generateCorrelationId(): string {
  return `launch-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Type guard for Node.js system errors (ENOENT, EACCES, ...)
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}
