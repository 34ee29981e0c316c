/**
 * Fan-out writer that lets individual sinks fail.
 */

import { EventEmitter } from "node:events";
import { describeError, internalError } from "./internal-logger.ts";
import type { Chunk, Destination } from "./types.ts";

function byteLength(chunk: Chunk): number {
  return typeof chunk === "string" ? Buffer.byteLength(chunk) : chunk.byteLength;
}

/**
 * Write to one destination, reporting instead of throwing if it fails.
 */
export function writeQuietly(destination: Destination, chunk: Chunk): void {
  try {
    destination.write(chunk);
  }
  catch (error) {
    internalError(`destination write failed: ${describeError(error)}`);
  }
}

const watched = new WeakSet<EventEmitter>();

/**
 * Node writables report failed writes later as an 'error' event, which would
 * crash the process without a listener. Route those to the internal logger.
 */
export function watchErrors(destination: Destination): void {
  if (!(destination instanceof EventEmitter) || watched.has(destination)) return;
  watched.add(destination);
  destination.on("error", (error: unknown) => {
    internalError(`destination write failed: ${describeError(error)}`);
  });
}

export class FanOutWriter implements Destination {
  readonly writers: readonly Destination[];

  /** Nested fan-outs are spliced in, never chained. */
  constructor(writers: readonly Destination[]) {
    const all: Destination[] = [];
    for (const writer of writers) {
      if (writer instanceof FanOutWriter) {
        all.push(...writer.writers);
      }
      else {
        watchErrors(writer);
        all.push(writer);
      }
    }
    this.writers = all;
  }

  /**
   * Broadcast to every writer in order. Always reports the full chunk as written.
   */
  write(chunk: Chunk): number {
    for (const writer of this.writers) {
      writeQuietly(writer, chunk);
    }
    return byteLength(chunk);
  }
}

/**
 * Compose writers into one FanOutWriter.
 */
export function multiWriter(...writers: Destination[]): FanOutWriter {
  return new FanOutWriter(writers);
}
