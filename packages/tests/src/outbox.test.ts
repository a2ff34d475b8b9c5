import { describe, it, expect } from "vitest";
import { NotificationOutbox } from "@app/server";

describe("NotificationOutbox", () => {
  it("hands out queued messages once, in order", () => {
    const outbox = new NotificationOutbox();
    outbox.push("alice", "first");
    outbox.push("alice", "second");
    outbox.push("bob", "other");

    expect(outbox.drain("alice")).toEqual(["first", "second"]);
    expect(outbox.drain("alice")).toEqual([]);
    expect(outbox.drain("bob")).toEqual(["other"]);
  });

  it("keeps only the newest messages of a user", () => {
    const outbox = new NotificationOutbox({ maxPerUser: 2 });
    outbox.push("alice", "one");
    outbox.push("alice", "two");
    outbox.push("alice", "three");

    expect(outbox.drain("alice")).toEqual(["two", "three"]);
  });

  it("drops the user notified longest ago when full", () => {
    const outbox = new NotificationOutbox({ maxUsers: 2 });
    outbox.push("alice", "a");
    outbox.push("bob", "b");
    outbox.push("alice", "a2");
    outbox.push("carol", "c");

    expect(outbox.drain("bob")).toEqual([]);
    expect(outbox.drain("alice")).toEqual(["a", "a2"]);
    expect(outbox.drain("carol")).toEqual(["c"]);
  });

  it("forgets messages older than the TTL", () => {
    let now = 1_000;
    const outbox = new NotificationOutbox({ ttlMs: 500, now: () => now });
    outbox.push("alice", "stale");
    now = 1_400;
    outbox.push("alice", "fresh");
    now = 1_600;

    expect(outbox.drain("alice")).toEqual(["fresh"]);
  });
});
