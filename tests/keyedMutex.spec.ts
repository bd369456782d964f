/**
 * @file tests/keyedMutex.spec.ts
 */

import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../src/lib/keyedMutex";

function gate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

describe("KeyedMutex", () => {
  it("runs holders of one key one at a time, in arrival order", async () => {
    const mutex = new KeyedMutex();
    const trace: string[] = [];
    const first = gate();

    const task = (name: string, wait?: Promise<void>) =>
      mutex.runExclusive("k", async () => {
        trace.push(`${name}:start`);
        if (wait) await wait;
        trace.push(`${name}:end`);
      });

    const all = Promise.all([task("a", first.opened), task("b"), task("c")]);
    await Promise.resolve();
    first.open();
    await all;

    expect(trace).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
    expect(mutex.size).toBe(0);
  });

  it("never blocks across keys", async () => {
    const mutex = new KeyedMutex();
    const held = gate();

    const slow = mutex.runExclusive("x", () => held.opened.then(() => "x"));
    await expect(mutex.runExclusive("y", async () => "y")).resolves.toBe("y");
    expect(mutex.size).toBe(1);

    held.open();
    await expect(slow).resolves.toBe("x");
  });

  it("releases the key when the holder throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("k", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(mutex.runExclusive("k", async () => 42)).resolves.toBe(42);
    expect(mutex.size).toBe(0);
  });
});
