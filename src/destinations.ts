import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import { dirname } from "node:path";
import type { Chunk, ClosableDestination } from "./types.ts";

export type FileMode = "a" | "w" | "x";

// "x" is exclusive create; node spells it "wx"
const OPEN_FLAGS: Record<FileMode, string> = {
  a: "a",
  w: "w",
  x: "wx",
};

/**
 * Ensures the parent directory exists for a given file path
 */
function ensureDirectoryExists(filePath: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
}

/**
 * Unbuffered file sink. Each write reaches the file before write() returns.
 */
export class FileDestination implements ClosableDestination {
  readonly path: string;
  private fd: number | undefined;

  constructor(path: string, mode: FileMode = "a") {
    this.path = path;
    ensureDirectoryExists(path);
    this.fd = openSync(path, OPEN_FLAGS[mode]);
  }

  get closed(): boolean {
    return this.fd === undefined;
  }

  write(chunk: Chunk): number {
    if (this.fd === undefined) {
      throw new Error(`write to closed file ${this.path}`);
    }
    // separate calls: writeSync overloads do not accept the union
    if (typeof chunk === "string") {
      return writeSync(this.fd, chunk);
    }
    return writeSync(this.fd, chunk);
  }

  close(): void {
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    closeSync(fd);
  }
}
