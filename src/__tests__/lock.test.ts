import { describe, it, expect } from "vitest";
import { KeyedMutex } from "../lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs tasks for one key in order", async () => {
    const mutex = new KeyedMutex<number>();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.run(1, async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.run(1, async () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(order).toEqual([]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
  });

  it("does not hold back other keys", async () => {
    const mutex = new KeyedMutex<number>();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.run(1, async () => {
      await gate.promise;
      order.push("chat 1");
    });
    await mutex.run(2, async () => {
      order.push("chat 2");
    });

    expect(order).toEqual(["chat 2"]);
    gate.resolve();
    await blocked;
    expect(order).toEqual(["chat 2", "chat 1"]);
  });

  it("keeps the queue moving after a failed task", async () => {
    const mutex = new KeyedMutex<string>();
    const failed = mutex.run("a", async () => {
      throw new Error("boom");
    });
    const next = mutex.run("a", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
