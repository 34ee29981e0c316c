/**
 * Config-file driven setup. Reads ./configs/logging.jsonc by default.
 */

import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { type ParseError, parse, printParseErrorCode } from "jsonc-parser";
import { FileDestination, type FileMode } from "./destinations.ts";
import { AlreadyInitializedError, LoggerError } from "./errors.ts";
import { getLogLevel } from "./levels.ts";
import { defaultLogger, type LevelLogger } from "./logger.ts";
import type { Destination, LoggingConfig, TimestampFormat } from "./types.ts";

export const DEFAULT_CONFIG_PATH = "./configs/logging.jsonc";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

function invalid(message: string): LoggerError {
  return new LoggerError("INVALID_CONFIG", message);
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw invalid(`"${key}" must be a string`);
  return value;
}

function readBoolean(raw: Record<string, unknown>, key: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw invalid(`"${key}" must be a boolean`);
  return value;
}

function readSection(raw: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw invalid(`"${key}" must be an object`);
  return value;
}

function readChoice<T extends string>(raw: Record<string, unknown>, key: string, choices: readonly T[]): T | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  const choice = choices.find((candidate) => candidate === value);
  if (choice === undefined) throw invalid(`"${key}" must be one of ${choices.join(", ")}`);
  return choice;
}

const TIMESTAMP_FORMATS: readonly TimestampFormat[] = ["STD", "ISO", "UTC", "LOCAL", "UNIX", "SHORT"];
const FILE_MODES: readonly FileMode[] = ["a", "w", "x"];

function toLoggingConfig(raw: Record<string, unknown>): LoggingConfig {
  const config: LoggingConfig = {
    stdoutLevel: readString(raw, "stdoutLevel"),
    outputLevel: readString(raw, "outputLevel"),
    stackLevel: readString(raw, "stackLevel"),
    includeLocation: readBoolean(raw, "includeLocation"),
  };

  const format = readSection(raw, "format");
  if (format) {
    config.format = {
      includeTimestamp: readBoolean(format, "includeTimestamp"),
      timestampFormat: readChoice(format, "timestampFormat", TIMESTAMP_FORMATS),
    };
  }

  const file = readSection(raw, "file");
  if (file) {
    config.file = {
      enabled: readBoolean(file, "enabled"),
      dir: readString(file, "dir"),
      filename: readString(file, "filename"),
      mode: readChoice(file, "mode", FILE_MODES),
    };
  }

  return config;
}

/**
 * Load logging config from file synchronously.
 * A missing file is not an error: the caller falls back to defaults.
 */
export function loadLoggingConfigSync(path: string = DEFAULT_CONFIG_PATH): LoggingConfig | undefined {
  const fullPath = resolve(path);
  let text: string;
  try {
    text = readFileSync(fullPath, "utf8");
  }
  catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new LoggerError("INVALID_CONFIG", `cannot read ${fullPath}`, { cause: error });
  }

  const errors: ParseError[] = [];
  const config: unknown = parse(text, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new LoggerError(
      "INVALID_CONFIG",
      `invalid JSONC in ${fullPath}: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
    );
  }
  if (!isRecord(config)) {
    throw new LoggerError("INVALID_CONFIG", `${fullPath} must contain an object`);
  }
  return toLoggingConfig(config);
}

/**
 * Initialize `logger` from a config file. Without a file section, output is
 * stdout itself, so only the stdout level applies.
 */
export function initFromConfig(path: string = DEFAULT_CONFIG_PATH, logger: LevelLogger = defaultLogger): void {
  // checked before opening the file: mode "w" would truncate the live log
  if (logger.initialized) {
    throw new AlreadyInitializedError();
  }
  const config = loadLoggingConfigSync(path) ?? {};

  let output: Destination = logger.stdoutDestination;
  const file = config.file;
  if (file && file.enabled !== false) {
    const dir = file.dir || "./logs";
    const filename = file.filename || "app.log";
    output = new FileDestination(join(dir, filename), file.mode || "a");
  }

  logger.init({
    output,
    stdoutLevel: getLogLevel(config.stdoutLevel ?? "info"),
    outputLevel: getLogLevel(config.outputLevel ?? "trace"),
    stackLevel: getLogLevel(config.stackLevel ?? "fatal"),
    includeLocation: config.includeLocation ?? false,
    includeTimestamp: config.format?.includeTimestamp,
    timestampFormat: config.format?.timestampFormat,
  });
}
