/**
 * Role Vote Configuration
 *
 * Environment-derived defaults shared by the webhook server and scheduled
 * scripts, plus the reply templates posted by command handlers.
 * Per-repository overrides live in lib/repo-config.ts and are clamped to the
 * same CONFIG_BOUNDS.
 */

import type { BallotChoice, VotingPolicy } from "./lib/voting/types.js";

// ───────────────────────────────────────────────────────────────────────────────
// Configuration Boundaries
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Configuration boundaries for all tunable settings.
 * Durations are in the unit their name carries.
 */
export const CONFIG_BOUNDS = {
  votingDurationMinutes: {
    min: 1,
    max: 30 * 24 * 60, // 30 days
    default: 7 * 24 * 60, // 7 days
  },
  approveThreshold: { min: 0, max: 1, default: 0.5 },
  minParticipants: { min: 0, max: 100, default: 1 },
  storeRetrySeconds: { min: 1, max: 3600, default: 30 },
  reconcileIntervalMinutes: { min: 1, max: 24 * 60, default: 15 },
  roles: {
    maxEntries: 50,
    maxNameLength: 100,
  },
} as const;

// ───────────────────────────────────────────────────────────────────────────────
// Env Parsing
// ───────────────────────────────────────────────────────────────────────────────

interface Bounds {
  min: number;
  max: number;
  default: number;
}

const clamp = (value: number, bounds: Bounds): number => Math.max(bounds.min, Math.min(bounds.max, value));

/**
 * Parse an integer env var, clamped to bounds. Non-numeric or empty values
 * fall back to the default.
 */
export const parseIntWithBounds = (envVar: string | undefined, bounds: Bounds): number => {
  const value = parseInt(envVar ?? "", 10);
  return Number.isNaN(value) ? bounds.default : clamp(value, bounds);
};

/**
 * Parse a fractional env var such as "0.75", clamped to bounds.
 */
export const parseFractionWithBounds = (envVar: string | undefined, bounds: Bounds): number => {
  const value = Number.parseFloat(envVar ?? "");
  return Number.isFinite(value) ? clamp(value, bounds) : bounds.default;
};

export const VOTING_DURATION_MS =
  parseIntWithBounds(process.env.ROLEVOTE_VOTING_DURATION_MINUTES, CONFIG_BOUNDS.votingDurationMinutes) * 60 * 1000;

export const STORE_RETRY_DELAY_MS =
  parseIntWithBounds(process.env.ROLEVOTE_STORE_RETRY_SECONDS, CONFIG_BOUNDS.storeRetrySeconds) * 1000;

export const RECONCILE_INTERVAL_MS =
  parseIntWithBounds(process.env.ROLEVOTE_RECONCILE_INTERVAL_MINUTES, CONFIG_BOUNDS.reconcileIntervalMinutes) *
  60 *
  1000;

export const ALLOW_SELF_OVERRIDE = process.env.ROLEVOTE_ALLOW_SELF_OVERRIDE === "true";

/**
 * Policy applied to a role that doesn't set its own values.
 */
export const DEFAULT_POLICY: Readonly<VotingPolicy> = Object.freeze({
  approveThreshold: parseFractionWithBounds(process.env.ROLEVOTE_APPROVE_THRESHOLD, CONFIG_BOUNDS.approveThreshold),
  minParticipants: parseIntWithBounds(process.env.ROLEVOTE_MIN_PARTICIPANTS, CONFIG_BOUNDS.minParticipants),
  countAbstain: false,
  tieBreak: "fail-on-tie",
  retainBallotsAfterFinalize: true,
});

// ───────────────────────────────────────────────────────────────────────────────
// Bot Signature & Identifiers
// ───────────────────────────────────────────────────────────────────────────────

export const BOT_HANDLE = "rolevote";

export const SIGNATURE = "\n\n---\n🗳️ Role Vote";

// ───────────────────────────────────────────────────────────────────────────────
// Message Templates
// ───────────────────────────────────────────────────────────────────────────────

const CHOICE_LABELS: Record<BallotChoice, string> = {
  approve: "✅ approve",
  deny: "❌ deny",
  abstain: "➖ abstain",
};

export const formatChoice = (choice: BallotChoice): string => CHOICE_LABELS[choice];

export const MESSAGES = {
  voteRecorded: (user: string, choice: BallotChoice, previous: BallotChoice | null) =>
    previous && previous !== choice
      ? `@${user} your vote changed from ${formatChoice(previous)} to ${formatChoice(choice)}.`
      : `@${user} your vote is recorded: ${formatChoice(choice)}.`,

  voteRetracted: (user: string) => `@${user} your vote was withdrawn.`,

  noVoteToRetract: (user: string) => `@${user} you have no vote on this request.`,

  feedbackRecorded: (user: string) =>
    `@${user} thanks, your feedback is saved for the maintainers reviewing this request.`,

  feedbackInvalid: (user: string, maxLength: number) =>
    `@${user} feedback not saved: write 1-${maxLength} characters after \`@rolevote feedback\`.`,

  notFound: (user: string) => `@${user} there is no role request open on this issue.`,

  notOpen: (user: string) => `@${user} voting on this request has ended; your command was not applied.`,

  notPrivileged: (user: string, command: string) =>
    `@${user} \`${command}\` needs maintainer access on this repository.`,

  selfOverride: (user: string) => `@${user} you can't end voting on your own request.`,

  duplicateSession: (user: string) => `@${user} a role request already exists for this issue.`,

  noRoleInTitle: (user: string, roles: readonly string[]) =>
    roles.length > 0
      ? `@${user} the issue title doesn't name a role. Configured roles: ${roles.map((r) => `\`${r}\``).join(", ")}.`
      : `@${user} no roles are configured for this repository.`,

  requestsDisabled: (user: string) => `@${user} role requests are disabled for this repository.`,

  storeUnavailable: (user: string) =>
    `@${user} the vote store is unavailable right now; nothing was changed. Please try again shortly.`,

  sessionDeleted: (user: string) => `@${user} this role request was deleted. No outcome was applied.`,

  overrideUsage: (user: string) => `@${user} usage: \`@rolevote override approve\` or \`@rolevote override deny\`.`,

  commandFailed: (user: string, code: string) =>
    `@${user} something went wrong handling your command (error: \`${code}\`).`,
} as const;
