/**
 * Ballot Ledger
 *
 * Per-session map from voter to their current ballot. At most one live
 * ballot per voter: casting again overwrites in place.
 */

import type { Ballot, BallotChoice } from "./types.js";

export class BallotLedger {
  private readonly ballots = new Map<string, Ballot>();

  constructor(initial: Iterable<Ballot> = []) {
    for (const ballot of initial) {
      this.ballots.set(ballot.voter, { ...ballot });
    }
  }

  /**
   * Insert or overwrite the voter's ballot.
   * Returns the ballot it replaced, or null for a first cast.
   */
  upsert(voter: string, choice: BallotChoice, at: number): Ballot | null {
    const previous = this.ballots.get(voter) ?? null;
    this.ballots.set(voter, { voter, choice, updatedAt: at });
    return previous;
  }

  /**
   * Remove the voter's ballot. Returns false when there was none.
   */
  remove(voter: string): boolean {
    return this.ballots.delete(voter);
  }

  get(voter: string): Ballot | undefined {
    const ballot = this.ballots.get(voter);
    return ballot ? { ...ballot } : undefined;
  }

  get size(): number {
    return this.ballots.size;
  }

  /** Copies in first-cast order. */
  snapshot(): Ballot[] {
    return Array.from(this.ballots.values(), (ballot) => ({ ...ballot }));
  }

  clone(): BallotLedger {
    return new BallotLedger(this.ballots.values());
  }
}
