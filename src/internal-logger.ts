/**
 * Internal logging for logz itself: the bootstrap destination used when the
 * logger is not initialized, a level name is unknown, or a sink fails.
 * Output goes to stderr through consola so it never mixes with routed stdout lines.
 */

import { createConsola } from "consola";

type LogFn = (message: string) => void;

const bootstrap = createConsola({
  stdout: process.stderr,
  stderr: process.stderr,
}).withTag("logz");

let errorFn: LogFn = (message: string) => {
  bootstrap.error(message);
};

let warnFn: LogFn = (message: string) => {
  bootstrap.warn(message);
};

/**
 * Replace the internal error function. Tests use this to capture diagnostics.
 */
export function setInternalErrorFn(fn: LogFn): void {
  errorFn = fn;
}

/**
 * Replace the internal warning function.
 */
export function setInternalWarnFn(fn: LogFn): void {
  warnFn = fn;
}

/**
 * Report a failure inside the logging pipeline (a sink that threw, a close that failed).
 */
export function internalError(message: string): void {
  errorFn(message);
}

/**
 * Report caller misuse that was recovered from (unknown level name, logging before init).
 */
export function internalWarn(message: string): void {
  warnFn(message);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
