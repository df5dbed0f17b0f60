/**
 * Serial Queue Tests
 */

import { describe, it, expect, jest } from "@jest/globals";
import { SerialQueue } from "./serial-queue.js";

function mockLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
}

describe("SerialQueue", () => {
  it("runs a posted task immediately when idle", () => {
    const queue = new SerialQueue();
    const seen: string[] = [];

    queue.post(() => seen.push("a"));

    expect(seen).toEqual(["a"]);
    expect(queue.pending).toBe(0);
  });

  it("runs tasks posted from inside a task after it", () => {
    const queue = new SerialQueue();
    const seen: string[] = [];

    queue.post(() => {
      queue.post(() => seen.push("inner"));
      seen.push("outer");
    });

    expect(seen).toEqual(["outer", "inner"]);
  });

  it("logs a failing task and keeps going", () => {
    const logger = mockLogger();
    const queue = new SerialQueue({ logger });
    const seen: string[] = [];

    queue.post(() => {
      queue.post(() => seen.push("after"));
      throw new Error("boom");
    });

    expect(seen).toEqual(["after"]);
    expect(logger.error).toHaveBeenCalledWith("[Queue] Task failed: boom");
  });

  it("returns the value of run()", () => {
    const queue = new SerialQueue();
    expect(queue.run(() => 42)).toBe(42);
    expect(queue.busy).toBe(false);
  });

  it("propagates errors from run() and stays usable", () => {
    const queue = new SerialQueue();

    expect(() => queue.run(() => {
      throw new Error("bad input");
    })).toThrow("bad input");
    expect(queue.run(() => "ok")).toBe("ok");
  });

  it("refuses run() from inside a queued task", () => {
    const logger = mockLogger();
    const queue = new SerialQueue({ logger });

    queue.post(() => {
      queue.run(() => 1);
    });

    expect(logger.error).toHaveBeenCalledWith(
      "[Queue] Task failed: SerialQueue.run() called from inside a queued task",
    );
  });

  it("calls onIdle after each drain", () => {
    const onIdle = jest.fn();
    const queue = new SerialQueue({ onIdle });

    queue.post(() => {});
    queue.run(() => {});

    expect(onIdle).toHaveBeenCalledTimes(2);
  });
});
