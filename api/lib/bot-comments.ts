/**
 * Bot Comments Module
 *
 * Every comment the bot keeps track of carries hidden metadata naming its
 * type and session:
 * - ballot box: one per session, edited in place on every render
 * - outcome: posted once at finalization
 * - audit: posted on request for maintainers
 *
 * Detection relies on the metadata plus the authoring app ID; the visible
 * text is free to change.
 */

import { SIGNATURE, formatChoice } from "../config.js";
import { describeResolution } from "./voting/coordinator.js";
import { countBallots, evaluateCounts } from "./voting/tally.js";
import {
  BALLOT_CHOICES,
  type Ballot,
  type Session,
  type SessionRecord,
  type TallyCounts,
  type VotingPolicy,
} from "./voting/types.js";

// ─────────────────────────────────────────────────────────────────────────────
// Comment Type Definitions
// ─────────────────────────────────────────────────────────────────────────────

const COMMENT_TYPES = ["ballot-box", "outcome", "audit"] as const;
export type CommentType = (typeof COMMENT_TYPES)[number];

function isCommentType(value: unknown): value is CommentType {
  return typeof value === "string" && COMMENT_TYPES.some((type) => type === value);
}

export interface CommentMetadata {
  version: 1;
  type: CommentType;
  sessionId: string;
  createdAt: string;
}

/**
 * Hidden metadata marker prefix.
 */
const METADATA_PREFIX = "rolevote-metadata:";

const METADATA_PATTERN = /<!--\s*rolevote-metadata:\s*(\{[\s\S]*?\})\s*-->/;

export function createMetadata(type: CommentType, sessionId: string, now: Date = new Date()): CommentMetadata {
  return { version: 1, type, sessionId, createdAt: now.toISOString() };
}

export function generateMetadataTag(metadata: CommentMetadata): string {
  return `<!-- ${METADATA_PREFIX} ${JSON.stringify(metadata)} -->`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Parsers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse metadata from a comment body. Returns null if absent or malformed.
 * Metadata values are flat primitives; nested objects are not supported.
 */
export function parseMetadata(body: string | undefined | null): CommentMetadata | null {
  if (!body) return null;

  const match = METADATA_PATTERN.exec(body);
  if (!match) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(match[1]);
  } catch {
    return null;
  }

  if (typeof parsed !== "object" || parsed === null) {
    return null;
  }
  const version: unknown = Reflect.get(parsed, "version");
  const type: unknown = Reflect.get(parsed, "type");
  const sessionId: unknown = Reflect.get(parsed, "sessionId");
  const createdAt: unknown = Reflect.get(parsed, "createdAt");

  if (version !== 1 || !isCommentType(type) || typeof sessionId !== "string") {
    return null;
  }
  return {
    version,
    type,
    sessionId,
    createdAt: typeof createdAt === "string" ? createdAt : "",
  };
}

/**
 * True when the comment was posted by our app and carries metadata of the
 * given type for the given session. Comments from other authors that copy
 * the marker are ignored.
 */
export function isBotComment(
  body: string | undefined | null,
  appId: number,
  performedViaAppId: number | undefined | null,
  type: CommentType,
  sessionId: string,
): boolean {
  if (performedViaAppId !== appId) {
    return false;
  }
  const metadata = parseMetadata(body);
  return metadata?.type === type && metadata.sessionId === sessionId;
}

// ─────────────────────────────────────────────────────────────────────────────
// Content Helpers
// ─────────────────────────────────────────────────────────────────────────────

const formatPercent = (fraction: number): string => `${Math.round(fraction * 1000) / 10}%`;

const formatTime = (ms: number): string => new Date(ms).toISOString().replace(/\.\d{3}Z$/, "Z");

/**
 * Human-readable passing rule, e.g. "more than 50% approve among approve/deny
 * votes, at least 3 participants".
 */
export function describePolicy(policy: VotingPolicy): string {
  const comparison = policy.tieBreak === "pass-on-tie" ? "at least" : "more than";
  const parts = [`${comparison} ${formatPercent(policy.approveThreshold)} approve among approve/deny votes`];
  if (policy.minParticipants > 0) {
    const who = policy.countAbstain ? "voters (abstains count)" : "approve/deny voters";
    parts.push(`at least ${policy.minParticipants} ${who}`);
  }
  return parts.join(", ");
}

/**
 * Frozen counts once resolved (ballots may have been purged), live counts
 * while open.
 */
function displayCounts(session: Session, ballots: readonly Ballot[]): TallyCounts {
  if (session.state !== "open" && session.finalCounts) {
    return session.finalCounts;
  }
  return countBallots(ballots);
}

function renderCounts(counts: TallyCounts): string {
  const rows = BALLOT_CHOICES.map(
    (choice) => `| ${formatChoice(choice)} | ${counts[choice]} |`,
  );
  return ["| Vote | Count |", "|---|---|", ...rows].join("\n");
}

function renderStatus(session: Session): string {
  if (session.state === "open") {
    return `**Status:** 🟢 Open, voting closes ${formatTime(session.deadline)}`;
  }
  if (session.state === "resolving") {
    return "**Status:** ⏳ Resolving";
  }
  const verdict = session.outcome === "passed" ? "✅ Passed" : "❌ Failed";
  const reason = session.resolution ? ` (${describeResolution(session.resolution)})` : "";
  return `**Status:** ${verdict}${reason}`;
}

function renderConsequence(session: Session): string | null {
  const { role, grant } = session.consequence;
  switch (session.consequenceStatus) {
    case "applied":
      return `@${session.requester} was added to \`${grant}\` as **${role}**.`;
    case "failed":
      return `⚠️ Adding @${session.requester} to \`${grant}\` failed; a maintainer will retry. (${session.consequenceError ?? "unknown error"})`;
    case "pending":
      return `Adding @${session.requester} to \`${grant}\`…`;
    case "not-required":
      return null;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Comment Builders
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ballot box: running counts while open, final counts once resolved.
 * Shows counts only; who voted what is in the audit report.
 */
export function buildBallotBoxComment(session: Session, ballots: readonly Ballot[]): string {
  const lines = [
    generateMetadataTag(createMetadata("ballot-box", session.id, new Date(session.createdAt))),
    `# 🗳️ Role Request: ${session.consequence.role}`,
    "",
    `@${session.requester} asks to join **${session.consequence.role}**.`,
    "",
    renderStatus(session),
    "",
    renderCounts(displayCounts(session, ballots)),
    "",
  ];

  if (session.state === "open") {
    lines.push(
      "**How to vote:** comment `@rolevote approve`, `@rolevote deny` or `@rolevote abstain`. " +
        "Vote again to change it, or `@rolevote retract` to withdraw.",
      "",
      `Passes with ${describePolicy(session.policy)}.`,
    );
  } else {
    lines.push("Voting is closed.");
  }

  return `${lines.join("\n")}${SIGNATURE}`;
}

/**
 * Ballot box after a force delete. Counts are dropped with the session.
 */
export function buildWithdrawnBallotBoxComment(session: Session, actor: string): string {
  const lines = [
    generateMetadataTag(createMetadata("ballot-box", session.id, new Date(session.createdAt))),
    `# 🗳️ Role Request: ${session.consequence.role}`,
    "",
    `@${session.requester} asked to join **${session.consequence.role}**.`,
    "",
    `**Status:** 🗑️ Deleted by @${actor}`,
    "",
    "Voting is closed. No outcome was applied.",
  ];
  return `${lines.join("\n")}${SIGNATURE}`;
}

export function buildOutcomeComment(session: Session, ballots: readonly Ballot[]): string {
  const passed = session.outcome === "passed";
  const counts = displayCounts(session, ballots);
  const tally = evaluateCounts(counts, session.policy);
  const lines = [
    generateMetadataTag(createMetadata("outcome", session.id, new Date(session.resolvedAt ?? session.createdAt))),
    `# 🗳️ ${session.consequence.role}: ${passed ? "Approved ✅" : "Not approved ❌"}`,
    "",
    renderStatus(session),
    "",
    renderCounts(counts),
  ];

  if (session.resolution?.kind !== "privileged-override" && tally.ratio !== null) {
    lines.push("", `Approval: ${formatPercent(tally.ratio)} (needed ${describePolicy(session.policy)}).`);
  }

  const consequence = renderConsequence(session);
  if (consequence) {
    lines.push("", consequence);
  }

  return `${lines.join("\n")}${SIGNATURE}`;
}

/**
 * Audit report: every ballot with its voter, plus feedback. Only
 * privileged users can request it, but it is posted as a regular comment
 * and is public from then on.
 */
export function buildAuditReport(record: SessionRecord): string {
  const { session, ballots } = record;
  const lines = [
    generateMetadataTag(createMetadata("audit", session.id)),
    `# 🔍 Audit: ${session.consequence.role} request by @${session.requester}`,
    "",
    renderStatus(session),
    `Opened ${formatTime(session.createdAt)}, deadline ${formatTime(session.deadline)}`,
    "",
  ];

  if (ballots.length === 0) {
    lines.push("No votes recorded.");
  } else {
    lines.push("| Voter | Vote | Updated |", "|---|---|---|");
    for (const ballot of ballots) {
      lines.push(`| @${ballot.voter} | ${formatChoice(ballot.choice)} | ${formatTime(ballot.updatedAt)} |`);
    }
  }

  if (session.feedback.length > 0) {
    lines.push("", "## Feedback", "");
    for (const item of session.feedback) {
      lines.push(`- @${item.author}: ${item.text.replace(/\s+/g, " ")}`);
    }
  }

  const consequence = renderConsequence(session);
  if (consequence) {
    lines.push("", consequence);
  }

  return `${lines.join("\n")}${SIGNATURE}`;
}
