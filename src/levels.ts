import { internalWarn } from "./internal-logger.ts";

/**
 * Severities in ascending order. Every threshold check is `level >= cutoff`.
 */
export enum Severity {
  Trace = 0,
  Info = 1,
  Warning = 2,
  Error = 3,
  Critical = 4,
}

export const SEVERITIES: readonly Severity[] = [
  Severity.Trace,
  Severity.Info,
  Severity.Warning,
  Severity.Error,
  Severity.Critical,
];

// Fixed width so messages line up
const LEVEL_PREFIXES: Record<Severity, string> = {
  [Severity.Trace]: "TRACE|",
  [Severity.Info]: " INFO|",
  [Severity.Warning]: " WARN|",
  [Severity.Error]: "ERROR|",
  [Severity.Critical]: "FATAL|",
};

export function getLevelPrefix(level: Severity): string {
  return LEVEL_PREFIXES[level];
}

/**
 * Map a configured level name to a Severity. Names are case-sensitive.
 * Unknown names are reported and fall back to Trace so nothing is hidden.
 */
export function getLogLevel(name: string): Severity {
  switch (name) {
    case "trace":
      return Severity.Trace;
    case "info":
    case "information":
      return Severity.Info;
    case "warning":
    case "warn":
      return Severity.Warning;
    case "error":
      return Severity.Error;
    case "fatal":
      return Severity.Critical;
    default:
      internalWarn(`Invalid LogLevel ${name}`);
      return Severity.Trace;
  }
}
