/**
 * Voting core: sessions, tallying, deadlines and persistence.
 * Nothing exported here depends on GitHub.
 */

export {
  SessionCoordinator,
  MAX_FEEDBACK_LENGTH,
  DEFAULT_STORE_RETRY_DELAY_MS,
  describeResolution,
} from "./coordinator.js";
export type {
  CoordinatorDeps,
  CoordinatorOptions,
  OpenSessionInput,
  ReconcileSummary,
  RecoverySummary,
} from "./coordinator.js";

export {
  VotingError,
  VOTING_ERROR_CODES,
  isVotingError,
} from "./errors.js";
export type { VotingErrorCode } from "./errors.js";

export { countBallots, countParticipants, evaluateTally, computeOutcome } from "./tally.js";
export { BallotLedger } from "./ballot-ledger.js";
export { InMemorySessionStore } from "./session-store.js";
export type { SessionStore } from "./session-store.js";
export { RedisSessionStore, createRedisClient, parseSessionRecord } from "./redis-session-store.js";
export { TimerScheduler, MAX_TIMER_DELAY_MS } from "./timer-scheduler.js";
export { KeyedLock } from "./session-locks.js";

export { BALLOT_CHOICES } from "./types.js";
export type {
  Ballot,
  BallotAck,
  BallotChoice,
  Consequence,
  ConsequenceHandler,
  ConsequenceStatus,
  DecidedOutcome,
  Feedback,
  LifecycleState,
  NotificationAdapter,
  Outcome,
  PrivilegePredicate,
  ResolutionReason,
  Session,
  SessionId,
  SessionRecord,
  TallyCounts,
  TallyReason,
  TallyResult,
  TieBreakRule,
  VotingPolicy,
} from "./types.js";
