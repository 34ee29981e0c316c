/**
 * Destination and configuration types for logz
 */

export type Chunk = string | Uint8Array;

/**
 * Anything that accepts bytes. Failures should be thrown from write(); Node
 * writables (process.stdout, fs streams) also qualify, and their asynchronous
 * 'error' events are reported to the internal logger instead.
 */
export interface Destination {
  write(chunk: Chunk): unknown;
}

export interface ClosableDestination extends Destination {
  close(): unknown;
}

export type TimestampFormat = "STD" | "ISO" | "UTC" | "LOCAL" | "UNIX" | "SHORT";

export interface FormatConfig {
  includeTimestamp?: boolean; // Defaults to true
  timestampFormat?: TimestampFormat; // Defaults to STD (2006/01/02 15:04:05)
}

export interface FileConfig {
  enabled?: boolean; // Defaults to true if file config is present
  dir?: string; // Defaults to ./logs
  filename?: string; // Defaults to app.log
  mode?: "a" | "w" | "x"; // Defaults to "a" (append)
}

/**
 * Shape of ./configs/logging.jsonc. Level names go through getLogLevel.
 */
export interface LoggingConfig {
  stdoutLevel?: string; // Defaults to info
  outputLevel?: string; // Defaults to trace
  stackLevel?: string; // Defaults to fatal
  includeLocation?: boolean;
  format?: FormatConfig;
  file?: FileConfig;
}
