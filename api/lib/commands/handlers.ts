/**
 * Command Handlers
 *
 * Executes parsed `@rolevote` commands against the session coordinator.
 *
 * Voting verbs (approve, deny, abstain, retract, feedback) are open to
 * everyone; the coordinator enforces session state. Resolution and audit
 * verbs (close, override, votes, open, delete) need a privileged
 * permission, checked by the coordinator or here for verbs it doesn't own.
 *
 * Known commands get an 👀 reaction on receipt. A comment already carrying
 * our 👀 is a webhook redelivery and is skipped.
 *
 * Outcomes:
 * - executed: 👍 reaction; the ballot box carries the visible result
 * - rejected: 😕 reaction plus a reply explaining why
 * - failure: 😕 reaction, a reply with a failure code, error rethrown
 */

import { MESSAGES, SIGNATURE } from "../../config.js";
import { buildAuditReport } from "../bot-comments.js";
import type { RequestOperations, ReactionContent } from "../github-client.js";
import type { EffectiveConfig } from "../repo-config.js";
import { matchRequestedRole } from "../role-request.js";
import { getErrorStatus, isTransientError } from "../transient-error.js";
import { buildSessionId, type IssueRef } from "../types.js";
import type { SessionCoordinator } from "../voting/coordinator.js";
import { MAX_FEEDBACK_LENGTH } from "../voting/coordinator.js";
import { VOTING_ERROR_CODES, isVotingError } from "../voting/errors.js";
import type { BallotChoice } from "../voting/types.js";

/**
 * Subset of probot's context.log (pino) the handlers use.
 */
export interface CommandLog {
  info(message: string): void;
  error(details: object, message: string): void;
}

export interface CommandContext {
  coordinator: SessionCoordinator;
  ops: RequestOperations;
  ref: IssueRef;
  issueTitle: string;
  issueAuthor: string;
  commentId: number;
  senderLogin: string;
  verb: string;
  freeText: string | undefined;
  loadConfig: () => Promise<EffectiveConfig>;
  /** Repository-level privilege, for verbs that run before a session exists */
  isPrivileged: (login: string) => Promise<boolean>;
  log: CommandLog;
}

export type CommandResult =
  | { status: "executed"; message: string }
  | { status: "ignored" }
  | { status: "rejected"; reason: string };

type CommandHandler = (ctx: CommandContext) => Promise<CommandResult>;

type CommandFailureClassification = "permission" | "validation" | "transient" | "unexpected";

// ───────────────────────────────────────────────────────────────────────────────
// Handlers
// ───────────────────────────────────────────────────────────────────────────────

const sessionIdOf = (ctx: CommandContext): string => buildSessionId(ctx.ref);

function castHandler(choice: BallotChoice): CommandHandler {
  return async (ctx) => {
    const ack = await ctx.coordinator.castBallot(sessionIdOf(ctx), ctx.senderLogin, choice);
    return { status: "executed", message: MESSAGES.voteRecorded(ctx.senderLogin, ack.choice, ack.previousChoice) };
  };
}

async function handleRetract(ctx: CommandContext): Promise<CommandResult> {
  const removed = await ctx.coordinator.retractBallot(sessionIdOf(ctx), ctx.senderLogin);
  if (!removed) {
    return { status: "rejected", reason: MESSAGES.noVoteToRetract(ctx.senderLogin) };
  }
  return { status: "executed", message: MESSAGES.voteRetracted(ctx.senderLogin) };
}

async function handleFeedback(ctx: CommandContext): Promise<CommandResult> {
  await ctx.coordinator.submitFeedback(sessionIdOf(ctx), ctx.senderLogin, ctx.freeText ?? "");
  return { status: "executed", message: MESSAGES.feedbackRecorded(ctx.senderLogin) };
}

async function handleClose(ctx: CommandContext): Promise<CommandResult> {
  const session = await ctx.coordinator.closeEarly(sessionIdOf(ctx), ctx.senderLogin);
  return { status: "executed", message: `Closed ${session.id} early: ${session.outcome}` };
}

async function handleOverride(ctx: CommandContext): Promise<CommandResult> {
  const argument = ctx.freeText?.split(/\s+/)[0]?.toLowerCase();
  if (argument !== "approve" && argument !== "deny") {
    return { status: "rejected", reason: MESSAGES.overrideUsage(ctx.senderLogin) };
  }

  const chosen = argument === "approve" ? "passed" : "failed";
  const session = await ctx.coordinator.overrideResolve(sessionIdOf(ctx), ctx.senderLogin, chosen);
  return { status: "executed", message: `Override on ${session.id}: ${session.outcome}` };
}

async function handleVotes(ctx: CommandContext): Promise<CommandResult> {
  if (!(await ctx.isPrivileged(ctx.senderLogin))) {
    return { status: "rejected", reason: MESSAGES.notPrivileged(ctx.senderLogin, "votes") };
  }

  const record = await ctx.coordinator.getRecord(sessionIdOf(ctx));
  if (!record) {
    return { status: "rejected", reason: MESSAGES.notFound(ctx.senderLogin) };
  }

  await ctx.ops.createComment(ctx.ref, buildAuditReport(record));
  return { status: "executed", message: `Posted audit for ${record.session.id}` };
}

async function handleOpen(ctx: CommandContext): Promise<CommandResult> {
  if (!(await ctx.isPrivileged(ctx.senderLogin))) {
    return { status: "rejected", reason: MESSAGES.notPrivileged(ctx.senderLogin, "open") };
  }

  const config = await ctx.loadConfig();
  if (!config.requests.enabled) {
    return { status: "rejected", reason: MESSAGES.requestsDisabled(ctx.senderLogin) };
  }

  const role = matchRequestedRole(ctx.issueTitle, config.requests.roles);
  if (!role) {
    return {
      status: "rejected",
      reason: MESSAGES.noRoleInTitle(
        ctx.senderLogin,
        config.requests.roles.map((r) => r.name),
      ),
    };
  }

  const session = await ctx.coordinator.open({
    id: sessionIdOf(ctx),
    requester: ctx.issueAuthor,
    title: ctx.issueTitle,
    consequence: { role: role.name, grant: role.team },
    policy: role.policy,
    durationSeconds: config.requests.durationMs / 1000,
  });
  return { status: "executed", message: `Opened ${session.id} for ${session.requester}` };
}

async function handleDelete(ctx: CommandContext): Promise<CommandResult> {
  await ctx.coordinator.forceDelete(sessionIdOf(ctx), ctx.senderLogin);
  await reply(ctx, MESSAGES.sessionDeleted(ctx.senderLogin));
  return { status: "executed", message: `Deleted ${sessionIdOf(ctx)}` };
}

const COMMAND_HANDLERS: Record<string, CommandHandler> = {
  approve: castHandler("approve"),
  deny: castHandler("deny"),
  abstain: castHandler("abstain"),
  retract: handleRetract,
  feedback: handleFeedback,
  close: handleClose,
  override: handleOverride,
  votes: handleVotes,
  open: handleOpen,
  delete: handleDelete,
};

// ───────────────────────────────────────────────────────────────────────────────
// Replies
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Reaction failures are logged only; the command itself already ran.
 */
async function react(ctx: CommandContext, content: ReactionContent): Promise<void> {
  try {
    await ctx.ops.react(ctx.ref, ctx.commentId, content);
  } catch (error) {
    ctx.log.error({ err: error, commentId: ctx.commentId, content }, `Failed to add ${content} reaction, continuing`);
  }
}

/**
 * SIGNATURE is appended here. Failures are logged and not rethrown: the
 * session change may already be persisted.
 */
async function reply(ctx: CommandContext, body: string): Promise<void> {
  try {
    await ctx.ops.createComment(ctx.ref, `${body}${SIGNATURE}`);
  } catch (error) {
    ctx.log.error({ err: error, issue: ctx.ref.issueNumber }, `Failed to post reply on #${ctx.ref.issueNumber}, continuing`);
  }
}

/**
 * True when our bot already reacted 👀 to this comment. Only this app's
 * bot user counts, so other accounts can't suppress a command. Lookup
 * failures proceed with execution.
 */
async function alreadyProcessed(ctx: CommandContext): Promise<boolean> {
  try {
    const botLogin = await ctx.ops.findAppBotLogin(ctx.ref);
    if (!botLogin) {
      ctx.log.info("Could not resolve app bot login for redelivery check; proceeding");
      return false;
    }
    return await ctx.ops.hasReactionFrom(ctx.ref, ctx.commentId, "eyes", botLogin);
  } catch (error) {
    ctx.log.error({ err: error, commentId: ctx.commentId }, "Redelivery check failed; proceeding");
    return false;
  }
}

/**
 * Map coordinator errors to the reply a user sees. Null for anything that
 * isn't a rejection (unexpected failures).
 */
function rejectionFor(ctx: CommandContext, error: unknown): string | null {
  if (!isVotingError(error)) {
    return null;
  }
  const user = ctx.senderLogin;
  switch (error.code) {
    case VOTING_ERROR_CODES.SESSION_NOT_FOUND:
      return MESSAGES.notFound(user);
    case VOTING_ERROR_CODES.SESSION_NOT_OPEN:
      return MESSAGES.notOpen(user);
    case VOTING_ERROR_CODES.NOT_PRIVILEGED:
      return MESSAGES.notPrivileged(user, ctx.verb);
    case VOTING_ERROR_CODES.SELF_OVERRIDE:
      return MESSAGES.selfOverride(user);
    case VOTING_ERROR_CODES.INVALID_FEEDBACK:
      return MESSAGES.feedbackInvalid(user, MAX_FEEDBACK_LENGTH);
    case VOTING_ERROR_CODES.DUPLICATE_SESSION:
      return MESSAGES.duplicateSession(user);
    case VOTING_ERROR_CODES.STORE_UNAVAILABLE:
      return MESSAGES.storeUnavailable(user);
    default:
      return null;
  }
}

function classifyCommandFailure(error: unknown): CommandFailureClassification {
  if (isTransientError(error)) {
    return "transient";
  }
  const status = getErrorStatus(error);
  if (status === 401 || status === 403) {
    return "permission";
  }
  if (status === 400 || status === 404 || status === 409 || status === 422) {
    return "validation";
  }
  return "unexpected";
}

export function buildFailureCode(verb: string, classification: CommandFailureClassification): string {
  return `CMD_${verb.toUpperCase()}_${classification.toUpperCase()}`;
}

// ───────────────────────────────────────────────────────────────────────────────
// Dispatch
// ───────────────────────────────────────────────────────────────────────────────

export function isKnownCommand(verb: string): boolean {
  return Object.hasOwn(COMMAND_HANDLERS, verb);
}

export async function executeCommand(ctx: CommandContext): Promise<CommandResult> {
  if (!isKnownCommand(ctx.verb)) {
    return { status: "ignored" };
  }
  const handler = COMMAND_HANDLERS[ctx.verb];

  if (await alreadyProcessed(ctx)) {
    ctx.log.info(`Command ${ctx.verb} on comment ${ctx.commentId} already processed; skipping redelivery`);
    return { status: "ignored" };
  }
  await react(ctx, "eyes");

  ctx.log.info(`Executing ${ctx.verb} from ${ctx.senderLogin} on ${buildSessionId(ctx.ref)}`);

  let result: CommandResult;
  try {
    result = await handler(ctx);
  } catch (error) {
    const reason = rejectionFor(ctx, error);
    if (reason === null) {
      const failureCode = buildFailureCode(ctx.verb, classifyCommandFailure(error));
      await react(ctx, "confused");
      await reply(ctx, MESSAGES.commandFailed(ctx.senderLogin, failureCode));
      ctx.log.error({ err: error, failureCode, commentId: ctx.commentId }, `Command ${ctx.verb} failed [${failureCode}]`);
      throw error;
    }

    if (isVotingError(error, VOTING_ERROR_CODES.STORE_UNAVAILABLE)) {
      ctx.log.error({ err: error }, `Command ${ctx.verb} hit an unavailable store`);
    }
    result = { status: "rejected", reason };
  }

  if (result.status === "executed") {
    await react(ctx, "+1");
  } else if (result.status === "rejected") {
    await react(ctx, "confused");
    await reply(ctx, result.reason);
  }
  return result;
}
