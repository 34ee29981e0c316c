/**
 * In-memory stand-ins for stdout, files and process exit
 */

import type { Chunk, ClosableDestination, Destination } from "../mod.ts";

export class MemoryDestination implements Destination {
  chunks: string[] = [];

  write(chunk: Chunk): number {
    const text = typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8");
    this.chunks.push(text);
    return Buffer.byteLength(text);
  }

  get text(): string {
    return this.chunks.join("");
  }

  clear(): void {
    this.chunks = [];
  }
}

export class ClosableMemoryDestination extends MemoryDestination implements ClosableDestination {
  closeCount = 0;

  close(): void {
    this.closeCount++;
  }
}

export class FailingDestination implements Destination {
  attempts = 0;

  write(_chunk: Chunk): never {
    this.attempts++;
    throw new Error("sink down");
  }
}

export class ExitCalled extends Error {
  constructor(readonly code: number) {
    super(`exit(${code})`);
    this.name = "ExitCalled";
  }
}

/** Replaces process.exit: throws so the calling test regains control. */
export function exitStub(code: number): never {
  throw new ExitCalled(code);
}
