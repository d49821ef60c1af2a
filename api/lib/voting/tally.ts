/**
 * Tally Engine
 *
 * Pure outcome computation from a ballot snapshot and a policy.
 *
 * Order of checks:
 * 1. Nothing counted (no approve/deny) → failed
 * 2. Participants below minParticipants → failed
 * 3. approve / counted vs approveThreshold → passed or failed
 *
 * Abstains never enter the ratio. With "fail-on-tie" the comparison is
 * strict, so a ratio exactly at the threshold fails.
 */

import type { Ballot, DecidedOutcome, TallyCounts, TallyResult, VotingPolicy } from "./types.js";

export function countBallots(ballots: Iterable<Ballot>): TallyCounts {
  const counts: TallyCounts = { approve: 0, deny: 0, abstain: 0 };
  for (const ballot of ballots) {
    counts[ballot.choice] += 1;
  }
  return counts;
}

export function countParticipants(counts: TallyCounts, policy: VotingPolicy): number {
  const counted = counts.approve + counts.deny;
  return policy.countAbstain ? counted + counts.abstain : counted;
}

export function evaluateTally(ballots: Iterable<Ballot>, policy: VotingPolicy): TallyResult {
  return evaluateCounts(countBallots(ballots), policy);
}

/**
 * Same decision from counts alone, e.g. counts frozen at resolution.
 */
export function evaluateCounts(counts: TallyCounts, policy: VotingPolicy): TallyResult {
  const counted = counts.approve + counts.deny;

  if (counted === 0) {
    return { outcome: "failed", reason: "no-counted-votes", counts, ratio: null };
  }

  const ratio = counts.approve / counted;

  if (countParticipants(counts, policy) < policy.minParticipants) {
    return { outcome: "failed", reason: "insufficient-participation", counts, ratio };
  }

  const passes =
    policy.tieBreak === "pass-on-tie"
      ? ratio >= policy.approveThreshold
      : ratio > policy.approveThreshold;

  return passes
    ? { outcome: "passed", reason: "threshold-met", counts, ratio }
    : { outcome: "failed", reason: "threshold-not-met", counts, ratio };
}

export function computeOutcome(ballots: Iterable<Ballot>, policy: VotingPolicy): DecidedOutcome {
  return evaluateTally(ballots, policy).outcome;
}
