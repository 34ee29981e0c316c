import { getLevelPrefix, SEVERITIES, Severity } from "./levels.ts";
import { multiWriter } from "./multi-writer.ts";
import type { Destination } from "./types.ts";

export interface Route {
  level: Severity;
  destination: Destination;
  prefix: string;
  includeLocation: boolean;
}

/** Resolved destination per severity; undefined means the severity is suppressed. */
export type RoutingTable = Readonly<Record<Severity, Route | undefined>>;

export interface RoutingOptions {
  output: Destination;
  stdout: Destination;
  stdoutLevel: Severity;
  outputLevel: Severity;
  includeLocation: boolean;
}

/**
 * Pick the destination for a single severity.
 * The configured output is skipped when it is the stdout object itself, so
 * nothing is written twice. The check is by reference.
 */
export function resolveDestination(level: Severity, options: RoutingOptions): Destination | undefined {
  const toStdout = level >= options.stdoutLevel;
  const toOutput = level >= options.outputLevel && options.output !== options.stdout;

  if (toStdout && toOutput) return multiWriter(options.stdout, options.output);
  if (toStdout) return options.stdout;
  if (toOutput) return options.output;
  return undefined;
}

export function resolveRoutes(options: RoutingOptions): RoutingTable {
  const table: Record<Severity, Route | undefined> = {
    [Severity.Trace]: undefined,
    [Severity.Info]: undefined,
    [Severity.Warning]: undefined,
    [Severity.Error]: undefined,
    [Severity.Critical]: undefined,
  };

  for (const level of SEVERITIES) {
    const destination = resolveDestination(level, options);
    if (!destination) continue;
    table[level] = {
      level,
      destination,
      prefix: getLevelPrefix(level),
      includeLocation: options.includeLocation,
    };
  }

  return Object.freeze(table);
}
