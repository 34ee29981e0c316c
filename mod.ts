/**
 * Process-wide leveled logging.
 *
 * - Five severities: trace, info, warning, error, critical
 * - Independent stdout and configured-output thresholds
 * - Optional caller file:line and stack dumps above a severity
 * - Fan-out writer that tolerates failing sinks
 *
 * `critical` / `criticalf` terminate the process after writing.
 *
 * @module
 */

export {
  close,
  critical,
  criticalf,
  defaultLogger,
  error,
  errorf,
  formatMessage,
  formatValues,
  guard,
  guardAsync,
  info,
  infof,
  type InitOptions,
  init,
  isInitialized,
  lazyError,
  LevelLogger,
  type LevelLoggerOptions,
  log,
  logf,
  type Logger,
  trace,
  tracef,
  warning,
  warningf,
} from "./src/logger.ts";

export { getLevelPrefix, getLogLevel, Severity } from "./src/levels.ts";
export { FanOutWriter, multiWriter, writeQuietly } from "./src/multi-writer.ts";
export { resolveDestination, resolveRoutes, type Route, type RoutingOptions, type RoutingTable } from "./src/router.ts";
export { formatTimestamp, LineHandler, type LineHandlerOptions } from "./src/handler.ts";
export { FileDestination, type FileMode } from "./src/destinations.ts";
export { DEFAULT_CONFIG_PATH, initFromConfig, loadLoggingConfigSync } from "./src/config.ts";
export { AlreadyInitializedError, LoggerError, type LoggerErrorCode, NotInitializedError } from "./src/errors.ts";
export { setInternalErrorFn, setInternalWarnFn } from "./src/internal-logger.ts";

export type {
  Chunk,
  ClosableDestination,
  Destination,
  FileConfig,
  FormatConfig,
  LoggingConfig,
  TimestampFormat,
} from "./src/types.ts";
