import { describe, it, expect } from "vitest";
import { KeyedMutex } from "@app/connectors";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("KeyedMutex", () => {
  it("runs callers of the same key one at a time, in arrival order", async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const task = (name: string, delay: number) =>
      mutex.run("alice", async () => {
        log.push(`${name}:start`);
        await sleep(delay);
        log.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task("a", 20), task("b", 0), task("c", 5)]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(log).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("does not make different keys wait on each other", async () => {
    const mutex = new KeyedMutex();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    // alice can only finish after bob ran
    const alice = mutex.run("alice", async () => {
      await gate;
      return "alice";
    });
    const bob = mutex.run("bob", async () => {
      release();
      return "bob";
    });

    await expect(Promise.all([alice, bob])).resolves.toEqual(["alice", "bob"]);
  });

  it("passes errors through and keeps serving the key", async () => {
    const mutex = new KeyedMutex();
    const failing = mutex.run("alice", async () => {
      throw new Error("boom");
    });
    const next = mutex.run("alice", async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("drops keys once idle", async () => {
    const mutex = new KeyedMutex();
    let lockedInside = false;
    await mutex.run("alice", async () => {
      lockedInside = mutex.isLocked("alice");
    });

    expect(lockedInside).toBe(true);
    expect(mutex.isLocked("alice")).toBe(false);
    expect(mutex.size).toBe(0);
  });
});
