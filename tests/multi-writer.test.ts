/**
 * Tests for the fan-out writer
 */

import { EventEmitter } from "node:events";
import { expect, test, vi } from "vitest";
import { FanOutWriter, multiWriter, setInternalErrorFn, writeQuietly } from "../mod.ts";
import { FailingDestination, MemoryDestination } from "./helpers.ts";

test("multiWriter broadcasts to every writer in order", () => {
  const order: string[] = [];
  const a = { write: (chunk: string | Uint8Array) => order.push(`a:${String(chunk)}`) };
  const b = { write: (chunk: string | Uint8Array) => order.push(`b:${String(chunk)}`) };

  multiWriter(a, b).write("x");

  expect(order).toEqual(["a:x", "b:x"]);
});

test("multiWriter flattens nested fan-outs", () => {
  const [a, b, c, d, e] = Array.from({ length: 5 }, () => new MemoryDestination());

  const composed = multiWriter(multiWriter(a, b), c, multiWriter(multiWriter(d), e));

  expect(composed.writers).toEqual([a, b, c, d, e]);
  expect(composed.writers.some((writer) => writer instanceof FanOutWriter)).toBe(false);
});

test("each leaf receives exactly one copy per write regardless of nesting", () => {
  const a = new MemoryDestination();
  const b = new MemoryDestination();
  const c = new MemoryDestination();

  const composed = multiWriter(multiWriter(multiWriter(a), b), c);
  composed.write("one");
  composed.write("two");

  for (const sink of [a, b, c]) {
    expect(sink.chunks).toEqual(["one", "two"]);
  }
});

test("write reports the byte length of the chunk", () => {
  const writer = multiWriter(new MemoryDestination());

  expect(writer.write("héllo")).toBe(6);
  expect(writer.write(new Uint8Array([1, 2, 3]))).toBe(3);
  expect(multiWriter().write("abc")).toBe(3);
});

test("a failing writer does not stop its siblings or the caller", () => {
  const errors = vi.fn();
  setInternalErrorFn(errors);
  const before = new MemoryDestination();
  const failing = new FailingDestination();
  const after = new MemoryDestination();

  const written = multiWriter(before, failing, after).write("payload");

  expect(written).toBe(7);
  expect(before.chunks).toEqual(["payload"]);
  expect(after.chunks).toEqual(["payload"]);
  expect(failing.attempts).toBe(1);
  expect(errors).toHaveBeenCalledWith("destination write failed: sink down");
});

test("writeQuietly reports instead of throwing", () => {
  const errors = vi.fn();
  setInternalErrorFn(errors);

  expect(() => writeQuietly(new FailingDestination(), "x")).not.toThrow();
  expect(errors).toHaveBeenCalledTimes(1);
});

test("the FanOutWriter constructor flattens and copies its input", () => {
  const a = new MemoryDestination();
  const b = new MemoryDestination();
  const c = new MemoryDestination();
  const input = [multiWriter(a), b];

  const writer = new FanOutWriter(input);
  input.push(c);

  expect(writer.writers).toEqual([a, b]);
});

class EmitterSink extends EventEmitter {
  write(): boolean {
    return true;
  }
}

test("asynchronous error events from composed sinks are reported", () => {
  const errors = vi.fn();
  setInternalErrorFn(errors);
  const sink = new EmitterSink();

  multiWriter(sink);
  multiWriter(sink);

  expect(() => sink.emit("error", new Error("disk full"))).not.toThrow();
  expect(errors).toHaveBeenCalledTimes(1);
  expect(errors).toHaveBeenCalledWith("destination write failed: disk full");
});
