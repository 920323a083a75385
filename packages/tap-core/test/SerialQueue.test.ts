import { describe, expect, it } from "vitest";
import { SerialQueue } from "../src";

describe("SerialQueue", () => {
  it("runs tasks one at a time in enqueue order", async () => {
    const queue = new SerialQueue();
    const log: string[] = [];
    const slow = queue.enqueue(async () => {
      log.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 5));
      log.push("slow:end");
    });
    const fast = queue.enqueue(() => {
      log.push("fast");
      return 42;
    });

    await slow;
    await expect(fast).resolves.toBe(42);
    expect(log).toEqual(["slow:start", "slow:end", "fast"]);
  });

  it("keeps draining after a task throws", async () => {
    const queue = new SerialQueue();
    const failed = queue.enqueue(() => {
      throw new Error("boom");
    });
    const next = queue.enqueue(() => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
    await queue.drain();
    expect(queue.size).toBe(0);
  });
});
