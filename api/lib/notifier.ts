/**
 * GitHub Notifier
 *
 * Renders a session onto its issue: the ballot box comment is created once
 * and edited in place; the outcome comment appears at finalization and is
 * updated (never duplicated) by later renders, e.g. after a consequence
 * retry. Both are located by metadata, so rendering is idempotent.
 */

import {
  buildBallotBoxComment,
  buildOutcomeComment,
  buildWithdrawnBallotBoxComment,
  type CommentType,
} from "./bot-comments.js";
import type { OperationsResolver, RequestOperations } from "./github-client.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { getErrorStatus, withRetry } from "./transient-error.js";
import { parseSessionId, type IssueRef } from "./types.js";
import type { Ballot, NotificationAdapter, Session, SessionId } from "./voting/types.js";

export interface GitHubNotifierOptions {
  logger?: Logger;
  retryBaseDelayMs?: number;
}

export class GitHubNotifier implements NotificationAdapter {
  /** Ballot box comment IDs already located */
  private readonly ballotBoxIds = new Map<SessionId, number>();
  private readonly logger: Logger;
  private readonly retryBaseDelayMs: number | undefined;

  constructor(
    private readonly resolveOperations: OperationsResolver,
    options: GitHubNotifierOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.retryBaseDelayMs = options.retryBaseDelayMs;
  }

  async render(session: Session, ballots: readonly Ballot[]): Promise<void> {
    const ref = this.requireIssue(session);
    const ops = await this.resolveOperations(ref);

    const ballotBoxId = await this.retry(() =>
      this.upsertComment(ops, ref, session.id, "ballot-box", buildBallotBoxComment(session, ballots)),
    );
    this.ballotBoxIds.set(session.id, ballotBoxId);

    if (session.state === "finalized") {
      await this.retry(() =>
        this.upsertComment(ops, ref, session.id, "outcome", buildOutcomeComment(session, ballots)),
      );
      this.ballotBoxIds.delete(session.id);
    }

    this.logger.debug(`Rendered ${session.id} (${session.state}, ${ballots.length} ballot(s))`);
  }

  /**
   * Rewrite the ballot box of a deleted session. Nothing is posted when the
   * session never got one.
   */
  async retire(session: Session, actor: string): Promise<void> {
    const ref = this.requireIssue(session);
    const known = this.ballotBoxIds.get(session.id);
    this.ballotBoxIds.delete(session.id);
    const ops = await this.resolveOperations(ref);

    const commentId = known ?? (await this.retry(() => ops.findBotComment(ref, "ballot-box", session.id)));
    if (commentId === null) {
      this.logger.debug(`No ballot box to retire for ${session.id}`);
      return;
    }
    const body = buildWithdrawnBallotBoxComment(session, actor);
    await this.retry(() => ops.updateComment(ref, commentId, body));
    this.logger.debug(`Retired ballot box of ${session.id}`);
  }

  private requireIssue(session: Session): IssueRef {
    const ref = parseSessionId(session.id);
    if (!ref) {
      throw new Error(`Cannot render session ${session.id}: not an issue session ID`);
    }
    return ref;
  }

  private async upsertComment(
    ops: RequestOperations,
    ref: IssueRef,
    sessionId: SessionId,
    type: CommentType,
    body: string,
  ): Promise<number> {
    const known = type === "ballot-box" ? this.ballotBoxIds.get(sessionId) : undefined;
    if (known !== undefined) {
      try {
        await ops.updateComment(ref, known, body);
        return known;
      } catch (error) {
        // Deleted by someone; look it up again or recreate it.
        if (getErrorStatus(error) !== 404) {
          throw error;
        }
        this.ballotBoxIds.delete(sessionId);
      }
    }

    const existing = await ops.findBotComment(ref, type, sessionId);
    if (existing === null) {
      return ops.createComment(ref, body);
    }
    await ops.updateComment(ref, existing, body);
    return existing;
  }

  private retry<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, { logger: this.logger, baseDelayMs: this.retryBaseDelayMs });
  }
}
