/**
 * Session Coordinator
 *
 * State machine for approval sessions:
 *
 *   open ──[timer | override | early close]──► resolving ──[consequence]──► finalized
 *
 * Every mutating operation on a session runs under that session's lock, so
 * exactly one of {timer, override, early close} claims resolution; the
 * others observe SESSION_NOT_OPEN (or a no-op for the timer).
 *
 * Persistence rules:
 * - The store is written before an operation is acknowledged. A failed
 *   write surfaces as STORE_UNAVAILABLE and the in-memory state is left
 *   as it was.
 * - The claim (resolving + outcome + reason) is persisted before the
 *   consequence runs, so a crash in between leaves a resolving record that
 *   recover()/reconcile() finish. Consequences must therefore be idempotent.
 * - A failed consequence is recorded on the session and never reverts the
 *   outcome.
 */

import { logger as defaultLogger, type Logger } from "../logger.js";
import { BallotLedger } from "./ballot-ledger.js";
import {
  VOTING_ERROR_CODES,
  consequenceFailedError,
  duplicateSessionError,
  invalidFeedbackError,
  isVotingError,
  notPrivilegedError,
  selfOverrideError,
  sessionNotFoundError,
  sessionNotOpenError,
  storeUnavailableError,
  type VotingError,
} from "./errors.js";
import { KeyedLock } from "./session-locks.js";
import type { SessionStore } from "./session-store.js";
import { countBallots, evaluateTally } from "./tally.js";
import { TimerScheduler } from "./timer-scheduler.js";
import type {
  Ballot,
  BallotAck,
  BallotChoice,
  Consequence,
  ConsequenceHandler,
  DecidedOutcome,
  NotificationAdapter,
  PrivilegePredicate,
  ResolutionReason,
  Session,
  SessionId,
  SessionRecord,
  VotingPolicy,
} from "./types.js";

export const MAX_FEEDBACK_LENGTH = 1000;
export const DEFAULT_STORE_RETRY_DELAY_MS = 30_000;

/** Pseudo session ID used for errors from whole-store scans */
const ALL_SESSIONS = "*";

export interface OpenSessionInput {
  id: SessionId;
  requester: string;
  title: string;
  consequence: Consequence;
  policy: VotingPolicy;
  durationSeconds: number;
}

export interface CoordinatorDeps {
  store: SessionStore;
  notifier: NotificationAdapter;
  consequence: ConsequenceHandler;
  isPrivileged: PrivilegePredicate;
}

export interface CoordinatorOptions {
  logger?: Logger;
  now?: () => number;
  /** Let requesters override or close their own session */
  allowSelfOverride?: boolean;
  /** Delay before a timer resolution that hit a store failure is retried */
  storeRetryDelayMs?: number;
}

export interface RecoverySummary {
  open: number;
  resumed: number;
  finalized: number;
}

export interface ReconcileSummary {
  /** Resolving sessions carried through to finalized */
  resumed: number;
  /** Finalized sessions whose consequence was retried */
  retried: number;
  /** Sessions still without a confirmed consequence after this pass */
  unconfirmed: number;
}

interface SessionEntry {
  session: Session;
  ledger: BallotLedger;
}

function copySession(session: Session): Session {
  return structuredClone(session);
}

export function describeResolution(reason: ResolutionReason): string {
  switch (reason.kind) {
    case "timer-expired":
      return "voting period ended";
    case "privileged-override":
      return `override by ${reason.actor}`;
    case "early-close":
      return `closed early by ${reason.actor}`;
  }
}

function needsConsequenceRetry(session: Session): boolean {
  return (
    session.state === "finalized" &&
    session.outcome === "passed" &&
    (session.consequenceStatus === "failed" || session.consequenceStatus === "pending")
  );
}

export class SessionCoordinator {
  private readonly index = new Map<SessionId, SessionEntry>();
  private readonly locks = new KeyedLock();
  private readonly scheduler: TimerScheduler;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly allowSelfOverride: boolean;
  private readonly storeRetryDelayMs: number;

  constructor(
    private readonly deps: CoordinatorDeps,
    options: CoordinatorOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => Date.now());
    this.allowSelfOverride = options.allowSelfOverride ?? false;
    this.storeRetryDelayMs = options.storeRetryDelayMs ?? DEFAULT_STORE_RETRY_DELAY_MS;
    this.scheduler = new TimerScheduler((id) => this.resolveByTimer(id), {
      now: this.now,
      logger: this.logger,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Inbound event API
  // ─────────────────────────────────────────────────────────────────────────

  async open(input: OpenSessionInput): Promise<Session> {
    return this.locks.run(input.id, async () => {
      if (this.index.has(input.id) || (await this.readStore(input.id)) !== null) {
        throw duplicateSessionError(input.id);
      }

      const createdAt = this.now();
      const session: Session = {
        id: input.id,
        requester: input.requester,
        title: input.title,
        consequence: { ...input.consequence },
        createdAt,
        deadline: createdAt + input.durationSeconds * 1000,
        policy: { ...input.policy },
        state: "open",
        outcome: "unset",
        resolution: null,
        resolvedAt: null,
        consequenceStatus: "not-required",
        consequenceError: null,
        feedback: [],
      };

      await this.persist(session, []);
      this.index.set(session.id, { session, ledger: new BallotLedger() });
      this.scheduler.schedule(session.id, session.deadline);
      this.logger.info(
        `Opened session ${session.id} for ${session.requester} (${session.consequence.role}), deadline ${new Date(session.deadline).toISOString()}`,
      );

      await this.render(session, []);
      return copySession(session);
    });
  }

  async castBallot(id: SessionId, voter: string, choice: BallotChoice): Promise<BallotAck> {
    return this.locks.run(id, async () => {
      const entry = await this.requireOpen(id);
      const ledger = entry.ledger.clone();
      const previous = ledger.upsert(voter, choice, this.now());
      const ballots = ledger.snapshot();

      await this.persist(entry.session, ballots);
      entry.ledger = ledger;

      await this.render(entry.session, ballots);
      return {
        sessionId: id,
        voter,
        choice,
        previousChoice: previous?.choice ?? null,
        counts: countBallots(ballots),
      };
    });
  }

  /**
   * Remove the voter's ballot. Resolves false (not an error) when the
   * voter had none.
   */
  async retractBallot(id: SessionId, voter: string): Promise<boolean> {
    return this.locks.run(id, async () => {
      const entry = await this.requireOpen(id);
      if (entry.ledger.get(voter) === undefined) {
        return false;
      }

      const ledger = entry.ledger.clone();
      ledger.remove(voter);
      const ballots = ledger.snapshot();

      await this.persist(entry.session, ballots);
      entry.ledger = ledger;

      await this.render(entry.session, ballots);
      return true;
    });
  }

  /**
   * Force an outcome. The chosen outcome is authoritative; the tally is
   * not consulted.
   */
  async overrideResolve(id: SessionId, actor: string, chosenOutcome: DecidedOutcome): Promise<Session> {
    return this.locks.run(id, async () => {
      const entry = await this.requireOpen(id);
      await this.authorizeResolution(entry.session, actor);
      return this.resolve(entry, { kind: "privileged-override", actor, chosenOutcome }, chosenOutcome);
    });
  }

  /**
   * End voting now and let the tally decide.
   */
  async closeEarly(id: SessionId, actor: string): Promise<Session> {
    return this.locks.run(id, async () => {
      const entry = await this.requireOpen(id);
      await this.authorizeResolution(entry.session, actor);
      const { outcome } = evaluateTally(entry.ledger.snapshot(), entry.session.policy);
      return this.resolve(entry, { kind: "early-close", actor }, outcome);
    });
  }

  /**
   * Deadline handler. Resolves null when the session is gone or was
   * already resolved (the override won the race).
   */
  async resolveByTimer(id: SessionId): Promise<Session | null> {
    return this.locks.run(id, async () => {
      const entry = await this.lookup(id);
      if (!entry || entry.session.state !== "open") {
        this.logger.debug(`Timer for ${id} found no open session; nothing to resolve`);
        return null;
      }

      const { outcome } = evaluateTally(entry.ledger.snapshot(), entry.session.policy);
      try {
        return await this.resolve(entry, { kind: "timer-expired" }, outcome);
      } catch (error) {
        if (isVotingError(error, VOTING_ERROR_CODES.STORE_UNAVAILABLE) && entry.session.state === "open") {
          const retryAt = this.now() + this.storeRetryDelayMs;
          this.scheduler.schedule(id, retryAt);
          this.logger.warn(
            `Could not claim resolution for ${id}; retrying at ${new Date(retryAt).toISOString()}`,
          );
        }
        throw error;
      }
    });
  }

  async submitFeedback(id: SessionId, author: string, text: string): Promise<void> {
    return this.locks.run(id, async () => {
      const entry = await this.requireOpen(id);
      const trimmed = text.trim();
      if (trimmed.length === 0) {
        throw invalidFeedbackError(id, "feedback is empty");
      }
      if (trimmed.length > MAX_FEEDBACK_LENGTH) {
        throw invalidFeedbackError(id, `feedback exceeds ${MAX_FEEDBACK_LENGTH} characters`);
      }

      const session: Session = {
        ...entry.session,
        feedback: [
          ...entry.session.feedback.filter((item) => item.author !== author),
          { author, text: trimmed, submittedAt: this.now() },
        ],
      };

      await this.persist(session, entry.ledger.snapshot());
      entry.session = session;
    });
  }

  /**
   * Remove a session without resolving it: no consequence and no outcome.
   * The ballot box is marked as withdrawn.
   */
  async forceDelete(id: SessionId, actor: string): Promise<void> {
    return this.locks.run(id, async () => {
      const entry = await this.lookup(id);
      if (!entry) {
        throw sessionNotFoundError(id);
      }
      if (!(await this.deps.isPrivileged(actor, copySession(entry.session)))) {
        throw notPrivilegedError(id, actor);
      }

      try {
        await this.deps.store.delete(id);
      } catch (error) {
        throw storeUnavailableError(id, error);
      }
      this.scheduler.cancel(id);
      this.index.delete(id);
      this.logger.info(`Session ${id} force-deleted by ${actor} (state was ${entry.session.state})`);

      try {
        await this.deps.notifier.retire(copySession(entry.session), actor);
      } catch (error) {
        this.logger.warn(
          `Failed to mark session ${id} as deleted: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    });
  }

  /**
   * Full record (ballots, feedback, resolution) for audit views.
   */
  async getRecord(id: SessionId): Promise<SessionRecord | null> {
    return this.locks.run(id, async () => {
      const entry = await this.lookup(id);
      if (!entry) {
        return null;
      }
      return { session: copySession(entry.session), ballots: entry.ledger.snapshot() };
    });
  }

  listOpenSessions(): Session[] {
    return Array.from(this.index.values())
      .filter((entry) => entry.session.state === "open")
      .map((entry) => copySession(entry.session));
  }

  isScheduled(id: SessionId): boolean {
    return this.scheduler.has(id);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Rebuild the index from the store, re-register deadlines (past ones
   * fire on the next tick) and finish sessions left in resolving.
   */
  async recover(): Promise<RecoverySummary> {
    const records = await this.listStore();
    const summary: RecoverySummary = { open: 0, resumed: 0, finalized: 0 };
    const resolving: SessionRecord[] = [];

    for (const record of records) {
      const { session } = record;
      if (this.index.has(session.id)) {
        continue;
      }
      if (session.state === "open") {
        this.index.set(session.id, { session, ledger: new BallotLedger(record.ballots) });
        this.scheduler.schedule(session.id, session.deadline);
        summary.open += 1;
      } else if (session.state === "resolving") {
        resolving.push(record);
      } else {
        summary.finalized += 1;
      }
    }

    for (const record of resolving) {
      const id = record.session.id;
      try {
        await this.locks.run(id, () => {
          const entry: SessionEntry = { session: record.session, ledger: new BallotLedger(record.ballots) };
          this.index.set(id, entry);
          return this.finalize(entry);
        });
        summary.resumed += 1;
      } catch (error) {
        this.logger.error(`Failed to resume resolving session ${id}`, error);
      }
    }

    this.logger.info(
      `Recovered sessions: ${summary.open} open, ${summary.resumed} resumed, ${summary.finalized} finalized`,
    );
    return summary;
  }

  /**
   * Finish resolving sessions and retry unconfirmed consequences.
   */
  async reconcile(): Promise<ReconcileSummary> {
    const records = await this.listStore();
    const candidates = new Set<SessionId>();
    for (const { session } of records) {
      if (session.state === "resolving" || needsConsequenceRetry(session)) {
        candidates.add(session.id);
      }
    }
    for (const entry of this.index.values()) {
      if (entry.session.state === "resolving") {
        candidates.add(entry.session.id);
      }
    }

    const summary: ReconcileSummary = { resumed: 0, retried: 0, unconfirmed: 0 };
    for (const id of candidates) {
      try {
        const session = await this.locks.run(id, () => this.reconcileSession(id, summary));
        if (session && session.outcome === "passed" && session.consequenceStatus !== "applied") {
          summary.unconfirmed += 1;
        }
      } catch (error) {
        summary.unconfirmed += 1;
        this.logger.error(`Reconciliation failed for session ${id}`, error);
      }
    }

    if (candidates.size > 0) {
      this.logger.info(
        `Reconciled ${candidates.size} session(s): ${summary.resumed} resumed, ${summary.retried} retried, ${summary.unconfirmed} unconfirmed`,
      );
    }
    return summary;
  }

  /**
   * Cancel every timer and drop the in-memory index.
   */
  shutdown(): void {
    const count = this.scheduler.size;
    this.scheduler.cancelAll();
    this.index.clear();
    this.logger.info(`Coordinator stopped; cancelled ${count} timer(s)`);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Resolution
  // ─────────────────────────────────────────────────────────────────────────

  private async authorizeResolution(session: Session, actor: string): Promise<void> {
    if (!this.allowSelfOverride && actor === session.requester) {
      throw selfOverrideError(session.id, actor);
    }
    if (!(await this.deps.isPrivileged(actor, copySession(session)))) {
      throw notPrivilegedError(session.id, actor);
    }
  }

  /**
   * Claim resolution (persisted), cancel the deadline, then finalize.
   * Must run under the session lock with the session open.
   */
  private async resolve(entry: SessionEntry, reason: ResolutionReason, outcome: DecidedOutcome): Promise<Session> {
    const claimed: Session = {
      ...entry.session,
      state: "resolving",
      outcome,
      resolution: reason,
      resolvedAt: this.now(),
      consequenceStatus: outcome === "passed" ? "pending" : "not-required",
      consequenceError: null,
      finalCounts: countBallots(entry.ledger.snapshot()),
    };

    await this.persist(claimed, entry.ledger.snapshot());
    entry.session = claimed;
    this.scheduler.cancel(claimed.id);
    this.logger.info(`Session ${claimed.id} resolved as ${outcome} (${describeResolution(reason)})`);

    return this.finalize(entry);
  }

  private async finalize(entry: SessionEntry): Promise<Session> {
    const ballots = entry.ledger.snapshot();

    if (entry.session.outcome === "passed" && entry.session.consequenceStatus !== "applied") {
      entry.session = await this.applyConsequence(entry.session);
    }

    const finalized: Session = { ...entry.session, state: "finalized" };
    const retain = finalized.policy.retainBallotsAfterFinalize;
    await this.persist(finalized, retain ? ballots : []);

    entry.session = finalized;
    if (!retain) {
      entry.ledger = new BallotLedger();
    }
    this.index.delete(finalized.id);

    await this.render(finalized, ballots);
    return copySession(finalized);
  }

  private async applyConsequence(session: Session): Promise<Session> {
    let failure: VotingError;
    try {
      if (await this.deps.consequence.applyOutcome(copySession(session))) {
        this.logger.info(`Applied consequence for ${session.id}: ${session.consequence.role} → ${session.requester}`);
        return { ...session, consequenceStatus: "applied", consequenceError: null };
      }
      failure = consequenceFailedError(session.id);
    } catch (error) {
      failure = consequenceFailedError(session.id, error);
    }

    this.logger.error(`Consequence for ${session.id} not applied; outcome stands`, failure);
    return { ...session, consequenceStatus: "failed", consequenceError: failure.message };
  }

  private async reconcileSession(id: SessionId, summary: ReconcileSummary): Promise<Session | null> {
    const entry = await this.lookup(id);
    if (!entry) {
      return null;
    }

    if (entry.session.state === "resolving") {
      const session = await this.finalize(entry);
      summary.resumed += 1;
      return session;
    }

    if (needsConsequenceRetry(entry.session)) {
      const session = await this.applyConsequence(entry.session);
      const ballots = entry.ledger.snapshot();
      await this.persist(session, ballots);
      summary.retried += 1;
      await this.render(session, ballots);
      return copySession(session);
    }

    return null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Index and store access
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Indexed entry, or one loaded from the store. Open sessions found only
   * in the store are indexed and get their deadline registered.
   */
  private async lookup(id: SessionId): Promise<SessionEntry | null> {
    const indexed = this.index.get(id);
    if (indexed) {
      return indexed;
    }

    const record = await this.readStore(id);
    if (!record) {
      return null;
    }

    const entry: SessionEntry = { session: record.session, ledger: new BallotLedger(record.ballots) };
    if (record.session.state === "open") {
      this.index.set(id, entry);
      this.scheduler.schedule(id, record.session.deadline);
    }
    return entry;
  }

  private async requireOpen(id: SessionId): Promise<SessionEntry> {
    const entry = await this.lookup(id);
    if (!entry) {
      throw sessionNotFoundError(id);
    }
    if (entry.session.state !== "open") {
      throw sessionNotOpenError(id, entry.session.state);
    }
    return entry;
  }

  private async readStore(id: SessionId): Promise<SessionRecord | null> {
    try {
      return await this.deps.store.get(id);
    } catch (error) {
      throw storeUnavailableError(id, error);
    }
  }

  private async listStore(): Promise<SessionRecord[]> {
    try {
      return await this.deps.store.list();
    } catch (error) {
      throw storeUnavailableError(ALL_SESSIONS, error);
    }
  }

  private async persist(session: Session, ballots: Ballot[]): Promise<void> {
    try {
      await this.deps.store.upsert({ session, ballots });
    } catch (error) {
      throw storeUnavailableError(session.id, error);
    }
  }

  /**
   * Rendering is best-effort; a failure never undoes a transition.
   */
  private async render(session: Session, ballots: readonly Ballot[]): Promise<void> {
    try {
      await this.deps.notifier.render(copySession(session), ballots.map((ballot) => ({ ...ballot })));
    } catch (error) {
      this.logger.warn(
        `Failed to render session ${session.id}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
