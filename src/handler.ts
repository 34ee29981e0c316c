/**
 * Line-oriented text handler: turns one message into one line on a destination.
 *
 * Line layout: `[timestamp ]<prefix>[file:line:] <message>\n`
 */

import { basename } from "node:path";
import { writeQuietly } from "./multi-writer.ts";
import type { Destination, TimestampFormat } from "./types.ts";

/** The public function a caller invoked; frames above it are the caller's. */
export type EntryPoint = (...args: never[]) => unknown;

export interface LineHandlerOptions {
  prefix: string;
  includeLocation?: boolean;
  includeTimestamp?: boolean;
  timestampFormat?: TimestampFormat;
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

export function formatTimestamp(format: TimestampFormat, now: Date): string {
  switch (format) {
    case "ISO":
      return now.toISOString();
    case "UTC":
      return now.toUTCString();
    case "LOCAL":
      return now.toLocaleString();
    case "UNIX":
      return String(Math.floor(now.getTime() / 1000));
    case "SHORT":
      return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
    case "STD":
    default: {
      const date = `${now.getFullYear()}/${pad(now.getMonth() + 1)}/${pad(now.getDate())}`;
      return `${date} ${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
    }
  }
}

const FRAME_LOCATION = /\(?([^\s()]+):(\d+):\d+\)?\s*$/;

/**
 * Reduce a V8 stack frame line to `file:line`.
 */
export function parseFrameLocation(frame: string): string | undefined {
  const match = FRAME_LOCATION.exec(frame);
  if (!match) return undefined;
  return `${basename(match[1])}:${match[2]}`;
}

/**
 * Location of the code that called `entryPoint`.
 */
export function callerLocation(entryPoint: EntryPoint): string | undefined {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, entryPoint);
  const frame = holder.stack?.split("\n").find((line) => /^\s+at /.test(line));
  return frame ? parseFrameLocation(frame) : undefined;
}

/**
 * Current call stack as text, without the header line.
 */
export function captureStack(entryPoint: EntryPoint): string {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, entryPoint);
  const frames = (holder.stack ?? "").split("\n").filter((line) => /^\s+at /.test(line));
  return ["stack trace:", ...frames].join("\n");
}

export class LineHandler {
  readonly destination: Destination;
  readonly prefix: string;
  readonly includeLocation: boolean;
  readonly includeTimestamp: boolean;
  readonly timestampFormat: TimestampFormat;

  constructor(destination: Destination, options: LineHandlerOptions) {
    this.destination = destination;
    this.prefix = options.prefix;
    this.includeLocation = options.includeLocation ?? false;
    this.includeTimestamp = options.includeTimestamp ?? true;
    this.timestampFormat = options.timestampFormat ?? "STD";
  }

  format(message: string, location?: string): string {
    const parts: string[] = [];
    if (this.includeTimestamp) {
      parts.push(formatTimestamp(this.timestampFormat, new Date()));
    }
    parts.push(location ? `${this.prefix}${location}:` : this.prefix);
    parts.push(message);

    const line = parts.join(" ");
    return line.endsWith("\n") ? line : `${line}\n`;
  }

  handle(message: string, entryPoint: EntryPoint): void {
    const location = this.includeLocation ? callerLocation(entryPoint) : undefined;
    writeQuietly(this.destination, this.format(message, location));
  }
}
