import { describe, it, expect } from "vitest";
import { SerialQueue } from "../src/lib/serial-queue.js";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SerialQueue", () => {
  it("runs tasks one at a time in arrival order", async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const gate = deferred();

    const first = queue.run(async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = queue.run(async () => {
      events.push("second");
      return 2;
    });

    expect(queue.size).toBe(2);
    await Promise.resolve();
    expect(events).toEqual(["first:start"]);

    gate.resolve();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(["first:start", "first:end", "second"]);
    expect(queue.size).toBe(0);
  });

  it("keeps going after a failing task", async () => {
    const queue = new SerialQueue();
    const failing = queue.run(async () => {
      throw new Error("boom");
    });
    const next = queue.run(async () => "still runs");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("still runs");
  });
});
