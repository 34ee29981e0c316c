/**
 * Leveled logger with a process-wide default instance.
 *
 * `init` resolves, once, which destinations each severity writes to. Every
 * emit call after that only reads the resolved handlers: no buffering, no
 * background work. Before `init` (and after `close`) emit calls print a notice
 * to the internal logger and return.
 *
 * `critical` and `criticalf` terminate the process after writing. Keep them
 * off request-handling paths where a single failure is recoverable.
 */

import { inspect } from "node:util";
import { sprintf } from "sprintf-js";
import { AlreadyInitializedError, NotInitializedError } from "./errors.ts";
import { captureStack, type EntryPoint, LineHandler } from "./handler.ts";
import { describeError, internalError, internalWarn } from "./internal-logger.ts";
import { SEVERITIES, Severity } from "./levels.ts";
import { watchErrors, writeQuietly } from "./multi-writer.ts";
import { resolveRoutes } from "./router.ts";
import type { ClosableDestination, Destination, TimestampFormat } from "./types.ts";

/** Emit surface handed to code that logs but does not own the logger lifecycle. */
export interface Logger {
  log(level: Severity, ...values: unknown[]): void;
  logf(level: Severity, format: string, ...values: unknown[]): void;
  trace(...values: unknown[]): void;
  tracef(format: string, ...values: unknown[]): void;
  info(...values: unknown[]): void;
  infof(format: string, ...values: unknown[]): void;
  warning(...values: unknown[]): void;
  warningf(format: string, ...values: unknown[]): void;
  error(...values: unknown[]): void;
  errorf(format: string, ...values: unknown[]): void;
  /** Writes, then exits the process with status 1. */
  critical(...values: unknown[]): void;
  /** Writes, then exits the process with status 1. */
  criticalf(format: string, ...values: unknown[]): void;
}

export interface InitOptions {
  /** Configured output. Also receives stack dumps and is closed by `close()`. */
  output: Destination;
  /** Severities at or above this go to stdout. */
  stdoutLevel: Severity;
  /** Severities at or above this go to `output`. */
  outputLevel: Severity;
  /** Severities at or above this append a stack trace to `output`. */
  stackLevel: Severity;
  /** Prefix messages with the caller's `file:line`. */
  includeLocation?: boolean;
  includeTimestamp?: boolean;
  timestampFormat?: TimestampFormat;
}

export interface LevelLoggerOptions {
  stdout?: Destination;
  exit?: (code: number) => never;
}

interface LoggerState {
  handlers: Partial<Record<Severity, LineHandler>>;
  stackLevel: Severity;
  output: Destination;
}

type Lazy = () => unknown;

function isLazy(value: unknown): value is Lazy {
  return typeof value === "function" && value.length === 0;
}

function isClosable(destination: Destination): destination is ClosableDestination {
  return "close" in destination && typeof destination.close === "function";
}

function formatValue(value: unknown): string {
  if (isLazy(value)) return formatValue(value());
  if (typeof value === "string") return value;
  if (value instanceof Error) return String(value);
  return inspect(value, { breakLength: Infinity });
}

/** Print-style rendering: values joined by a space. */
export function formatValues(values: readonly unknown[]): string {
  return values.map(formatValue).join(" ");
}

/** Printf-style rendering. A bad format falls back to the raw format and values. */
export function formatMessage(format: string, values: readonly unknown[]): string {
  const resolved = values.map((value) => (isLazy(value) ? value() : value));
  try {
    return sprintf(format, ...resolved);
  }
  catch (error) {
    internalWarn(`sprintf failed: ${describeError(error)}; falling back to raw output`);
    return formatValues([format, ...resolved]);
  }
}

function renderSafely(render: () => string): string {
  try {
    return render();
  }
  catch (error) {
    internalError(`rendering message failed: ${describeError(error)}`);
    return `[unrenderable message: ${describeError(error)}]`;
  }
}

/** Format an error for logging */
function formatError(error: Error | unknown): string {
  if (error instanceof Error) return error.stack || `${error.name}: ${error.message}`;
  return `Non-Error exception: ${String(error)}`;
}

export class LevelLogger implements Logger {
  private state: LoggerState | undefined;
  private readonly stdout: Destination;
  private readonly exit: (code: number) => never;

  constructor(options: LevelLoggerOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.exit = options.exit ?? ((code: number) => process.exit(code));
  }

  get initialized(): boolean {
    return this.state !== undefined;
  }

  /** The stdout sink routes are resolved against. Passing it as `output` disables the separate output. */
  get stdoutDestination(): Destination {
    return this.stdout;
  }

  init(options: InitOptions): void {
    if (this.state) {
      throw new AlreadyInitializedError();
    }

    const routes = resolveRoutes({
      output: options.output,
      stdout: this.stdout,
      stdoutLevel: options.stdoutLevel,
      outputLevel: options.outputLevel,
      includeLocation: options.includeLocation ?? false,
    });

    const handlers: Partial<Record<Severity, LineHandler>> = {};
    for (const level of SEVERITIES) {
      const route = routes[level];
      if (!route) continue;
      handlers[level] = new LineHandler(route.destination, {
        prefix: route.prefix,
        includeLocation: route.includeLocation,
        includeTimestamp: options.includeTimestamp,
        timestampFormat: options.timestampFormat,
      });
    }

    watchErrors(options.output);
    this.state = { handlers, stackLevel: options.stackLevel, output: options.output };
  }

  /**
   * Tear down and close the output if it can be closed.
   * A `fatal` value is logged at Critical first, and re-thrown once teardown is done.
   */
  close(fatal?: unknown): void {
    const state = this.state;
    if (!state) {
      throw new NotInitializedError();
    }

    if (fatal !== undefined) {
      this.emit(Severity.Critical, () => formatValue(fatal), this.close);
    }

    this.state = undefined;
    // stdout outlives the logger
    if (state.output !== this.stdout && isClosable(state.output)) {
      try {
        state.output.close();
      }
      catch (error) {
        internalError(`closing output failed: ${describeError(error)}`);
      }
    }

    if (fatal !== undefined) {
      throw fatal;
    }
  }

  /**
   * Run `fn`, then close. If `fn` throws, the error is logged and re-thrown after closing.
   */
  guard<T>(fn: () => T): T {
    let result: T;
    try {
      result = fn();
    }
    catch (error) {
      // without a logger there is nothing to log to; the error passes through untouched
      if (this.initialized) this.close(error);
      throw error;
    }
    this.close();
    return result;
  }

  async guardAsync<T>(fn: () => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await fn();
    }
    catch (error) {
      // without a logger there is nothing to log to; the error passes through untouched
      if (this.initialized) this.close(error);
      throw error;
    }
    this.close();
    return result;
  }

  log(level: Severity, ...values: unknown[]): void {
    this.emit(level, () => formatValues(values), this.log);
  }

  logf(level: Severity, format: string, ...values: unknown[]): void {
    this.emit(level, () => formatMessage(format, values), this.logf);
  }

  trace(...values: unknown[]): void {
    this.emit(Severity.Trace, () => formatValues(values), this.trace);
  }

  tracef(format: string, ...values: unknown[]): void {
    this.emit(Severity.Trace, () => formatMessage(format, values), this.tracef);
  }

  info(...values: unknown[]): void {
    this.emit(Severity.Info, () => formatValues(values), this.info);
  }

  infof(format: string, ...values: unknown[]): void {
    this.emit(Severity.Info, () => formatMessage(format, values), this.infof);
  }

  warning(...values: unknown[]): void {
    this.emit(Severity.Warning, () => formatValues(values), this.warning);
  }

  warningf(format: string, ...values: unknown[]): void {
    this.emit(Severity.Warning, () => formatMessage(format, values), this.warningf);
  }

  error(...values: unknown[]): void {
    this.emit(Severity.Error, () => formatValues(values), this.error);
  }

  errorf(format: string, ...values: unknown[]): void {
    this.emit(Severity.Error, () => formatMessage(format, values), this.errorf);
  }

  critical(...values: unknown[]): void {
    if (this.emit(Severity.Critical, () => formatValues(values), this.critical)) {
      this.exit(1);
    }
  }

  criticalf(format: string, ...values: unknown[]): void {
    if (this.emit(Severity.Critical, () => formatMessage(format, values), this.criticalf)) {
      this.exit(1);
    }
  }

  /**
   * Returns false when the logger is not initialized and nothing was attempted.
   */
  private emit(level: Severity, render: () => string, entryPoint: EntryPoint): boolean {
    const state = this.state;
    if (!state) {
      internalWarn(new NotInitializedError().message);
      return false;
    }

    const handler = state.handlers[level];
    if (handler) {
      handler.handle(renderSafely(render), entryPoint);
    }
    if (level >= state.stackLevel) {
      writeQuietly(state.output, `${captureStack(entryPoint)}\n`);
    }
    return true;
  }
}

/** The process-wide logger behind the free functions below. */
export const defaultLogger = new LevelLogger();

// Bound, not wrapped: the caller location must skip exactly the public entry frame.
export const init = defaultLogger.init.bind(defaultLogger);
export const close = defaultLogger.close.bind(defaultLogger);
export const guard = defaultLogger.guard.bind(defaultLogger);
export const guardAsync = defaultLogger.guardAsync.bind(defaultLogger);
export const log = defaultLogger.log.bind(defaultLogger);
export const logf = defaultLogger.logf.bind(defaultLogger);
export const trace = defaultLogger.trace.bind(defaultLogger);
export const tracef = defaultLogger.tracef.bind(defaultLogger);
export const info = defaultLogger.info.bind(defaultLogger);
export const infof = defaultLogger.infof.bind(defaultLogger);
export const warning = defaultLogger.warning.bind(defaultLogger);
export const warningf = defaultLogger.warningf.bind(defaultLogger);
export const error = defaultLogger.error.bind(defaultLogger);
export const errorf = defaultLogger.errorf.bind(defaultLogger);
export const critical = defaultLogger.critical.bind(defaultLogger);
export const criticalf = defaultLogger.criticalf.bind(defaultLogger);

export function isInitialized(): boolean {
  return defaultLogger.initialized;
}

/**
 * Create a lazy error formatter. Returns a function that formats the error only when called.
 * The error is only rendered if the message is actually written.
 *
 * @example
 * ```typescript
 * import { errorf, lazyError } from "logz";
 *
 * errorf("request failed: %s", lazyError(err));
 * ```
 */
export function lazyError(error: Error | unknown): () => string {
  return () => formatError(error);
}
