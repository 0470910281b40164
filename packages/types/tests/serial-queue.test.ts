/**
 * Tests for SerialQueue — per-instance serialization boundary.
 */

import { describe, it, expect } from "vitest";
import { SerialQueue } from "../src/serial-queue.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SerialQueue", () => {
  it("returns the task result", async () => {
    const queue = new SerialQueue();
    await expect(queue.run(() => 42)).resolves.toBe(42);
    await expect(queue.run(async () => "done")).resolves.toBe("done");
  });

  it("never interleaves two tasks", async () => {
    const queue = new SerialQueue();
    const log: string[] = [];
    const gate = deferred();

    const first = queue.run(async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
    });
    const second = queue.run(() => {
      log.push("second");
    });

    // Let microtasks run: the second task must still be waiting.
    await Promise.resolve();
    await Promise.resolve();
    expect(log).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
  });

  it("keeps running after a task fails", async () => {
    const queue = new SerialQueue();

    const failing = queue.run(() => {
      throw new Error("boom");
    });
    const next = queue.run(() => "still running");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("still running");
  });

  it("tracks pending tasks and drains", async () => {
    const queue = new SerialQueue();
    const gate = deferred();

    const task = queue.run(() => gate.promise);
    void queue.run(() => undefined);
    expect(queue.pending).toBe(2);

    gate.resolve();
    await task;
    await queue.drain();
    expect(queue.pending).toBe(0);
  });
});
