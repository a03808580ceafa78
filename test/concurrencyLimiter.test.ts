import { describe, expect, it } from "vitest";
import { CapacityExceededError, ConcurrencyLimiter } from "../src/itinera/utils/concurrencyLimiter.js";
import { deferred } from "./helpers.js";

describe("ConcurrencyLimiter", () => {
  it("runs tasks up to maxConcurrent", async () => {
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 2 });
    let running = 0;
    let maxRunning = 0;

    const tasks = Array.from({ length: 5 }, () =>
      limiter.run(async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await new Promise((r) => setTimeout(r, 10));
        running--;
        return "done";
      })
    );

    await expect(Promise.all(tasks)).resolves.toEqual(["done", "done", "done", "done", "done"]);
    expect(maxRunning).toBe(2);
  });

  it("queues callers in arrival order", async () => {
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 1 });
    const gate = deferred<void>();
    const order: number[] = [];

    const first = limiter.run(async () => {
      await gate.promise;
      order.push(1);
    });
    const second = limiter.run(async () => {
      order.push(2);
    });
    const third = limiter.run(async () => {
      order.push(3);
    });

    expect(limiter.stats()).toEqual({ running: 1, queued: 2, atCapacity: true, maxConcurrent: 1 });

    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual([1, 2, 3]);
    expect(limiter.stats()).toEqual({ running: 0, queued: 0, atCapacity: false, maxConcurrent: 1 });
  });

  it("releases the slot when a task throws", async () => {
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 1 });

    await expect(limiter.run(async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");

    expect(limiter.running).toBe(0);
    await expect(limiter.run(async () => "next")).resolves.toBe("next");
  });

  it("rejects a caller that waits longer than queueTimeoutMs", async () => {
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 1, queueTimeoutMs: 20 });
    const gate = deferred<void>();
    let started = false;

    const holder = limiter.run(() => gate.promise);
    const waiting = limiter.run(async () => {
      started = true;
    });

    const error = await waiting.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CapacityExceededError);
    expect(error).toMatchObject({ message: "Queue wait exceeded 20ms", retryAfterMs: 20 });
    expect(started).toBe(false);
    expect(limiter.queued).toBe(0);

    gate.resolve();
    await holder;
    expect(limiter.running).toBe(0);
  });

  it("rejects a non-positive limit", () => {
    expect(() => new ConcurrencyLimiter({ maxConcurrent: 0 })).toThrow("maxConcurrent must be a positive integer");
    expect(() => new ConcurrencyLimiter({ maxConcurrent: 1.5 })).toThrow("maxConcurrent must be a positive integer");
  });
});
