import { describe, it, expect } from "vitest";
import { InMemorySessionStore } from "./session-store.js";
import type { SessionRecord } from "./types.js";

const record = (id: string): SessionRecord => ({
  session: {
    id,
    requester: "alice",
    title: "Request Adept role",
    consequence: { role: "Adept", grant: "adepts" },
    createdAt: 0,
    deadline: 1000,
    policy: {
      approveThreshold: 0.5,
      minParticipants: 1,
      countAbstain: false,
      tieBreak: "fail-on-tie",
      retainBallotsAfterFinalize: true,
    },
    state: "open",
    outcome: "unset",
    resolution: null,
    resolvedAt: null,
    consequenceStatus: "not-required",
    consequenceError: null,
    feedback: [],
  },
  ballots: [{ voter: "bob", choice: "approve", updatedAt: 10 }],
});

describe("InMemorySessionStore", () => {
  it("round-trips a record", async () => {
    const store = new InMemorySessionStore();
    await store.upsert(record("o/r#1"));

    expect(await store.get("o/r#1")).toEqual(record("o/r#1"));
    expect(await store.get("o/r#2")).toBeNull();
  });

  it("replaces on upsert and lists everything", async () => {
    const store = new InMemorySessionStore();
    await store.upsert(record("o/r#1"));
    const updated = record("o/r#1");
    updated.session.state = "finalized";
    await store.upsert(updated);
    await store.upsert(record("o/r#2"));

    const all = await store.list();
    expect(all.map((r) => r.session.id)).toEqual(["o/r#1", "o/r#2"]);
    expect(all[0].session.state).toBe("finalized");
  });

  it("deletes", async () => {
    const store = new InMemorySessionStore();
    await store.upsert(record("o/r#1"));
    await store.delete("o/r#1");

    expect(await store.get("o/r#1")).toBeNull();
    expect(await store.list()).toEqual([]);
  });

  it("isolates stored records from caller mutation", async () => {
    const store = new InMemorySessionStore();
    const original = record("o/r#1");
    await store.upsert(original);
    original.ballots.push({ voter: "carol", choice: "deny", updatedAt: 11 });

    const loaded = await store.get("o/r#1");
    expect(loaded?.ballots).toHaveLength(1);
  });
});
