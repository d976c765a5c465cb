/**
 * Tests for Mutex, CompletionQueue, TaskGroup and ManualClock.
 */

import { describe, it, expect } from "vitest";
import { Mutex } from "../src/mutex.js";
import { CompletionQueue } from "../src/completion-queue.js";
import { TaskGroup } from "../src/task-group.js";
import { ManualClock, isoTime } from "../src/clock.js";

describe("Mutex", () => {
  it("runs holders one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const trace: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive(async () => {
      trace.push("first:start");
      await gate;
      trace.push("first:end");
      return 1;
    });
    const second = mutex.runExclusive(() => {
      trace.push("second");
      return 2;
    });

    await Promise.resolve();
    expect(mutex.isLocked).toBe(true);
    release();

    expect(await first).toBe(1);
    expect(await second).toBe(2);
    expect(trace).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.isLocked).toBe(false);
  });

  it("keeps working after a holder throws", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await mutex.runExclusive(() => "next")).toBe("next");
  });
});

describe("CompletionQueue", () => {
  it("drains in arrival order and empties", () => {
    const queue = new CompletionQueue<number>();
    queue.push(1);
    queue.push(2);
    expect(queue.size).toBe(2);
    expect(queue.drain()).toEqual([1, 2]);
    expect(queue.size).toBe(0);
    expect(queue.drain()).toEqual([]);
  });

  it("wakes waiters on push", async () => {
    const queue = new CompletionQueue<string>();
    const waiting = queue.whenNonEmpty();
    queue.push("done");
    await waiting;
    expect(queue.drain()).toEqual(["done"]);
  });
});

describe("TaskGroup", () => {
  it("waits for nested tasks and reports failures", async () => {
    const failures: string[] = [];
    const group = new TaskGroup((name) => {
      failures.push(name);
    });
    const done: string[] = [];

    group.spawn("outer", async () => {
      await Promise.resolve();
      group.spawn("inner", async () => {
        await Promise.resolve();
        done.push("inner");
      });
      done.push("outer");
    });
    group.spawn("broken", async () => {
      throw new Error("nope");
    });

    await group.whenIdle();

    expect(done).toEqual(["outer", "inner"]);
    expect(failures).toEqual(["broken"]);
    expect(group.size).toBe(0);
  });
});

describe("ManualClock", () => {
  it("advances only when told", () => {
    const clock = new ManualClock(1_000);
    clock.advance(500);
    expect(clock.now()).toBe(1_500);
    expect(isoTime(clock)).toBe("1970-01-01T00:00:01.500Z");
  });

  it("refuses to go backwards", () => {
    const clock = new ManualClock();
    expect(() => clock.advance(-1)).toThrow(RangeError);
  });
});
