import { describe, it, expect } from "vitest";
import { KeyedLock } from "./session-locks.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs tasks for the same key one at a time in call order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run("a", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = lock.run("a", async () => {
      events.push("second");
    });

    await Promise.resolve();
    expect(events).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const held = lock.run("a", async () => {
      await gate.promise;
      events.push("a");
    });
    await lock.run("b", async () => {
      events.push("b");
    });

    expect(events).toEqual(["b"]);
    gate.resolve();
    await held;
    expect(events).toEqual(["b", "a"]);
  });

  it("releases the key after a rejected task", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run("a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.run("a", async () => "next")).resolves.toBe("next");
    expect(lock.isHeld("a")).toBe(false);
  });

  it("reports a held key while a task runs", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const task = lock.run("a", () => gate.promise);

    expect(lock.isHeld("a")).toBe(true);
    gate.resolve();
    await task;
    expect(lock.isHeld("a")).toBe(false);
  });
});
