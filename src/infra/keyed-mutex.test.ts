import { describe, expect, it } from "vitest";
import { KeyedMutex } from "./keyed-mutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs work for one key in call order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.run("dev", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.run("dev", () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(order).toEqual([]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
    expect(mutex.isLocked("dev")).toBe(false);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const slow = mutex.run("a", () => gate.promise);
    await expect(mutex.run("b", () => "done")).resolves.toBe("done");
    expect(mutex.isLocked("a")).toBe(true);
    gate.resolve();
    await slow;
  });

  it("releases the key when work throws", async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.run("dev", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(mutex.run("dev", () => 1)).resolves.toBe(1);
  });
});
