/**
 * Error types raised by logger setup and teardown.
 * Emission never throws; only init/close misuse and bad config files do.
 */

export type LoggerErrorCode = "NOT_INITIALIZED" | "ALREADY_INITIALIZED" | "INVALID_CONFIG";

export class LoggerError extends Error {
  readonly code: LoggerErrorCode;

  constructor(code: LoggerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LoggerError";
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class NotInitializedError extends LoggerError {
  constructor() {
    super("NOT_INITIALIZED", "Logz is not initialized");
    this.name = "NotInitializedError";
  }
}

export class AlreadyInitializedError extends LoggerError {
  constructor() {
    super("ALREADY_INITIALIZED", "Logz is already initialized");
    this.name = "AlreadyInitializedError";
  }
}
