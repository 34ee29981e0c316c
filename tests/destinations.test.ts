import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { FileDestination } from "../mod.ts";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "logz-file-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

test("FileDestination creates missing parent directories", () => {
  const path = join(dir, "nested", "deeper", "app.log");
  const file = new FileDestination(path);

  file.write("line\n");
  file.close();

  expect(readFileSync(path, "utf8")).toBe("line\n");
});

test("append mode keeps existing content", () => {
  const path = join(dir, "app.log");
  writeFileSync(path, "old\n");

  const file = new FileDestination(path, "a");
  file.write("new\n");
  file.write(new TextEncoder().encode("bytes\n"));
  file.close();

  expect(readFileSync(path, "utf8")).toBe("old\nnew\nbytes\n");
});

test("write mode truncates", () => {
  const path = join(dir, "app.log");
  writeFileSync(path, "old\n");

  const file = new FileDestination(path, "w");
  file.write("fresh\n");
  file.close();

  expect(readFileSync(path, "utf8")).toBe("fresh\n");
});

test("exclusive mode creates a new file", () => {
  const path = join(dir, "app.log");

  const file = new FileDestination(path, "x");
  file.write("first\n");
  file.close();

  expect(readFileSync(path, "utf8")).toBe("first\n");
});

test("exclusive mode refuses an existing file", () => {
  const path = join(dir, "app.log");
  writeFileSync(path, "old\n");

  expect(() => new FileDestination(path, "x")).toThrow(/EEXIST/);
  expect(readFileSync(path, "utf8")).toBe("old\n");
});

test("close is idempotent and later writes fail", () => {
  const file = new FileDestination(join(dir, "app.log"));

  file.close();
  file.close();

  expect(file.closed).toBe(true);
  expect(() => file.write("late")).toThrow("write to closed file");
});

test("write returns the number of bytes written", () => {
  const file = new FileDestination(join(dir, "app.log"));

  expect(file.write("héllo")).toBe(6);
  file.close();
});
