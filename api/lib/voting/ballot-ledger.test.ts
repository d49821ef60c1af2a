import { describe, it, expect } from "vitest";
import { BallotLedger } from "./ballot-ledger.js";

describe("BallotLedger", () => {
  it("returns null for a first cast", () => {
    const ledger = new BallotLedger();
    expect(ledger.upsert("alice", "approve", 1)).toBeNull();
    expect(ledger.get("alice")).toEqual({ voter: "alice", choice: "approve", updatedAt: 1 });
  });

  it("overwrites a repeated cast and returns the previous ballot", () => {
    const ledger = new BallotLedger();
    ledger.upsert("alice", "approve", 1);

    expect(ledger.upsert("alice", "deny", 2)).toEqual({ voter: "alice", choice: "approve", updatedAt: 1 });
    expect(ledger.size).toBe(1);
    expect(ledger.get("alice")?.choice).toBe("deny");
  });

  it("keeps at most one ballot per voter across many casts", () => {
    const ledger = new BallotLedger();
    for (let i = 0; i < 5; i++) {
      ledger.upsert("alice", i % 2 === 0 ? "approve" : "deny", i);
      ledger.upsert("bob", "abstain", i);
    }
    expect(ledger.size).toBe(2);
    expect(ledger.snapshot().map((b) => b.voter)).toEqual(["alice", "bob"]);
  });

  it("removes a ballot", () => {
    const ledger = new BallotLedger();
    ledger.upsert("alice", "approve", 1);

    expect(ledger.remove("alice")).toBe(true);
    expect(ledger.remove("alice")).toBe(false);
    expect(ledger.size).toBe(0);
  });

  it("hands out copies", () => {
    const ledger = new BallotLedger([{ voter: "alice", choice: "approve", updatedAt: 1 }]);
    const snapshot = ledger.snapshot();
    snapshot[0].choice = "deny";

    expect(ledger.get("alice")?.choice).toBe("approve");
  });

  it("clones independently", () => {
    const ledger = new BallotLedger();
    ledger.upsert("alice", "approve", 1);
    const clone = ledger.clone();
    clone.upsert("bob", "deny", 2);

    expect(ledger.size).toBe(1);
    expect(clone.size).toBe(2);
  });
});
