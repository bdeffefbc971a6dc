import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../src/lib/mutex.js";

describe("KeyedMutex", () => {
  it("runs tasks for one key in arrival order without overlap", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await Promise.resolve();
      await Promise.resolve();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive("k", task("a")),
      mutex.runExclusive("k", task("b")),
    ]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(mutex.isLocked("k")).toBe(false);
  });

  it("releases the lock when a task throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("k", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(mutex.runExclusive("k", async () => "next")).resolves.toBe("next");
    expect(mutex.isLocked("k")).toBe(false);
  });
});
