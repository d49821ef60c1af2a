/**
 * Voting Core Types
 *
 * Data model for time-bounded approval sessions. These types are
 * platform-agnostic: nothing here knows about GitHub, only opaque
 * identities (session IDs and actor logins).
 */

/**
 * Opaque session identity. Compared by equality only.
 */
export type SessionId = string;

export type BallotChoice = "approve" | "deny" | "abstain";

export const BALLOT_CHOICES: readonly BallotChoice[] = ["approve", "deny", "abstain"];

/**
 * Session lifecycle. Transitions are monotonic: open → resolving → finalized.
 */
export type LifecycleState = "open" | "resolving" | "finalized";

/**
 * "unset" while open; decided once resolution is claimed.
 */
export type Outcome = "unset" | "passed" | "failed";

export type DecidedOutcome = Exclude<Outcome, "unset">;

/**
 * How a ratio exactly equal to the threshold is treated.
 * Default "fail-on-tie" (strict inequality).
 */
export type TieBreakRule = "fail-on-tie" | "pass-on-tie";

export interface VotingPolicy {
  /** Fraction of counted (approve + deny) votes that must be exceeded */
  approveThreshold: number;
  /** Absolute participation floor; below it the outcome is failed */
  minParticipants: number;
  /** Whether abstains count toward minParticipants (never toward the ratio) */
  countAbstain: boolean;
  tieBreak: TieBreakRule;
  /** Keep ballots in the store after finalization for audit */
  retainBallotsAfterFinalize: boolean;
}

/**
 * What a passing vote grants. `grant` is the platform handle for the role
 * (a team slug on GitHub).
 */
export interface Consequence {
  role: string;
  grant: string;
}

export type ResolutionReason =
  | { kind: "timer-expired" }
  | { kind: "privileged-override"; actor: string; chosenOutcome: DecidedOutcome }
  | { kind: "early-close"; actor: string };

export type ConsequenceStatus = "not-required" | "pending" | "applied" | "failed";

export interface Ballot {
  voter: string;
  choice: BallotChoice;
  /** Epoch ms of the last change */
  updatedAt: number;
}

export interface Feedback {
  author: string;
  text: string;
  submittedAt: number;
}

export interface Session {
  id: SessionId;
  requester: string;
  title: string;
  consequence: Consequence;
  createdAt: number;
  deadline: number;
  policy: VotingPolicy;
  state: LifecycleState;
  outcome: Outcome;
  resolution: ResolutionReason | null;
  resolvedAt: number | null;
  consequenceStatus: ConsequenceStatus;
  consequenceError: string | null;
  feedback: Feedback[];
  /** Counts frozen when resolution is claimed; absent while open */
  finalCounts?: TallyCounts;
}

/**
 * Unit of persistence: the session plus its ballot ledger snapshot.
 */
export interface SessionRecord {
  session: Session;
  ballots: Ballot[];
}

export interface TallyCounts {
  approve: number;
  deny: number;
  abstain: number;
}

export type TallyReason =
  | "no-counted-votes"
  | "insufficient-participation"
  | "threshold-met"
  | "threshold-not-met";

export interface TallyResult {
  outcome: DecidedOutcome;
  reason: TallyReason;
  counts: TallyCounts;
  /** approve / (approve + deny), or null when nothing was counted */
  ratio: number | null;
}

export interface BallotAck {
  sessionId: SessionId;
  voter: string;
  choice: BallotChoice;
  /** Choice this ballot replaced, or null for a first cast */
  previousChoice: BallotChoice | null;
  counts: TallyCounts;
}

// ───────────────────────────────────────────────────────────────────────────────
// Outbound collaborators
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Renders session state to the user-facing surface.
 * May be called with stale or repeated snapshots.
 */
export interface NotificationAdapter {
  render(session: Session, ballots: readonly Ballot[]): Promise<void>;
  /** Mark the surface of a force-deleted session as withdrawn */
  retire(session: Session, actor: string): Promise<void>;
}

/**
 * Applies the consequence of a passed session. Must be idempotent per
 * session ID: the coordinator retries after crashes and failed attempts.
 * Resolves false (or rejects) on failure.
 */
export interface ConsequenceHandler {
  applyOutcome(session: Session): Promise<boolean>;
}

/**
 * External privilege lookup. The session is passed so the platform can
 * scope the check (e.g., repository permissions).
 */
export type PrivilegePredicate = (actor: string, session: Session) => Promise<boolean>;
