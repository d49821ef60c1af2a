/**
 * Voting Error Taxonomy
 *
 * Validation errors (duplicate, not found, not open, privilege) go back to
 * the caller for user feedback. STORE_UNAVAILABLE aborts the operation with
 * no in-memory change. CONSEQUENCE_FAILED is recorded on the session and
 * never reverts the outcome.
 */

import type { SessionId } from "./types.js";

export const VOTING_ERROR_CODES = Object.freeze({
  DUPLICATE_SESSION: "DUPLICATE_SESSION",
  SESSION_NOT_FOUND: "SESSION_NOT_FOUND",
  SESSION_NOT_OPEN: "SESSION_NOT_OPEN",
  NOT_PRIVILEGED: "NOT_PRIVILEGED",
  SELF_OVERRIDE: "SELF_OVERRIDE",
  INVALID_FEEDBACK: "INVALID_FEEDBACK",
  STORE_UNAVAILABLE: "STORE_UNAVAILABLE",
  CONSEQUENCE_FAILED: "CONSEQUENCE_FAILED",
} as const);

export type VotingErrorCode = (typeof VOTING_ERROR_CODES)[keyof typeof VOTING_ERROR_CODES];

export class VotingError extends Error {
  readonly code: VotingErrorCode;
  readonly sessionId: SessionId;

  constructor(
    message: string,
    input: {
      readonly code: VotingErrorCode;
      readonly sessionId: SessionId;
      readonly cause?: unknown;
    },
  ) {
    super(message, "cause" in input ? { cause: input.cause } : undefined);
    this.name = "VotingError";
    this.code = input.code;
    this.sessionId = input.sessionId;
  }
}

export function isVotingError(error: unknown, code?: VotingErrorCode): error is VotingError {
  if (!(error instanceof VotingError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function duplicateSessionError(sessionId: SessionId): VotingError {
  return new VotingError(`Session ${sessionId} already exists`, {
    code: VOTING_ERROR_CODES.DUPLICATE_SESSION,
    sessionId,
  });
}

export function sessionNotFoundError(sessionId: SessionId): VotingError {
  return new VotingError(`Session ${sessionId} not found`, {
    code: VOTING_ERROR_CODES.SESSION_NOT_FOUND,
    sessionId,
  });
}

export function sessionNotOpenError(sessionId: SessionId, state: string): VotingError {
  return new VotingError(`Session ${sessionId} is not open (state=${state})`, {
    code: VOTING_ERROR_CODES.SESSION_NOT_OPEN,
    sessionId,
  });
}

export function notPrivilegedError(sessionId: SessionId, actor: string): VotingError {
  return new VotingError(`${actor} is not privileged to resolve session ${sessionId}`, {
    code: VOTING_ERROR_CODES.NOT_PRIVILEGED,
    sessionId,
  });
}

export function selfOverrideError(sessionId: SessionId, actor: string): VotingError {
  return new VotingError(`${actor} cannot end their own request ${sessionId}`, {
    code: VOTING_ERROR_CODES.SELF_OVERRIDE,
    sessionId,
  });
}

export function invalidFeedbackError(sessionId: SessionId, detail: string): VotingError {
  return new VotingError(`Invalid feedback for session ${sessionId}: ${detail}`, {
    code: VOTING_ERROR_CODES.INVALID_FEEDBACK,
    sessionId,
  });
}

export function storeUnavailableError(sessionId: SessionId, cause: unknown): VotingError {
  return new VotingError(`Session store unavailable for ${sessionId}: ${describeCause(cause)}`, {
    code: VOTING_ERROR_CODES.STORE_UNAVAILABLE,
    sessionId,
    cause,
  });
}

export function consequenceFailedError(sessionId: SessionId, cause?: unknown): VotingError {
  const detail = cause === undefined ? "handler reported failure" : describeCause(cause);
  return new VotingError(`Consequence failed for session ${sessionId}: ${detail}`, {
    code: VOTING_ERROR_CODES.CONSEQUENCE_FAILED,
    sessionId,
    ...(cause === undefined ? {} : { cause }),
  });
}
