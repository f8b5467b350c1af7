import { describe, expect, it } from "vitest";
import { KeyedLock } from "./lock.js";

function deferred() {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("serializes work for the same key", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run("a", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.run("a", async () => {
      order.push("second");
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.activeKeys).toBe(0);
  });

  it("does not block other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const held = lock.run("a", () => gate.promise);

    await expect(lock.run("b", async () => "done")).resolves.toBe("done");

    gate.resolve();
    await held;
  });

  it("releases the key when the work throws", async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run("a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.run("a", async () => 1)).resolves.toBe(1);
    expect(lock.activeKeys).toBe(0);
  });
});
