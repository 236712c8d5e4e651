import { describe, it, expect } from "vitest";
import { QueueCallScheduler } from "../src/scheduler.js";

describe("QueueCallScheduler", () => {
  it("runs calls in the order they were scheduled", async () => {
    const scheduler = new QueueCallScheduler();
    const order: string[] = [];
    scheduler.schedule({ label: "a", run: () => { order.push("a"); } });
    scheduler.schedule({ label: "b", run: async () => { order.push("b"); } });

    expect(scheduler.labels).toEqual(["a", "b"]);
    expect(await scheduler.drain()).toBe(2);
    expect(order).toEqual(["a", "b"]);
    expect(scheduler.pending).toBe(0);
  });

  it("runs calls scheduled while draining after the ones already queued", async () => {
    const scheduler = new QueueCallScheduler();
    const order: string[] = [];
    scheduler.schedule({
      label: "first",
      run: () => {
        order.push("first");
        scheduler.schedule({ label: "continuation", run: () => { order.push("continuation"); } });
      },
    });
    scheduler.schedule({ label: "second", run: () => { order.push("second"); } });

    await scheduler.drain();

    expect(order).toEqual(["first", "second", "continuation"]);
  });

  it("stops at a failing call and keeps the rest queued", async () => {
    const scheduler = new QueueCallScheduler();
    scheduler.schedule({ label: "bad", run: () => { throw new Error("boom"); } });
    scheduler.schedule({ label: "next", run: () => {} });

    await expect(scheduler.drain()).rejects.toThrow("boom");
    expect(scheduler.labels).toEqual(["next"]);
  });

  it("refuses to drain twice at once", async () => {
    const scheduler = new QueueCallScheduler();
    scheduler.schedule({ label: "slow", run: () => new Promise<void>((resolve) => setTimeout(resolve, 5)) });

    const first = scheduler.drain();
    await expect(scheduler.drain()).rejects.toThrow("already draining");
    expect(await first).toBe(1);
  });
});
