/**
 * Command Parser
 *
 * Parses `@rolevote <verb> [text]` commands from issue comment bodies.
 * The leading slash is optional for known verbs.
 *
 * Examples:
 *   "@rolevote approve"              → { verb: "approve", freeText: undefined }
 *   "@rolevote /deny"                → { verb: "deny", freeText: undefined }
 *   "@rolevote override approve"     → { verb: "override", freeText: "approve" }
 *   "@rolevote feedback needs docs"  → { verb: "feedback", freeText: "needs docs" }
 *
 * Feedback text runs to the end of the comment; other verbs stop at the
 * end of their line.
 */

import { BOT_HANDLE } from "../../config.js";

export interface ParsedCommand {
  verb: string;
  /** Text after the verb, trimmed */
  freeText: string | undefined;
}

/**
 * Verbs accepted without a leading slash. With the slash any verb is
 * forwarded (and ignored by the dispatcher if unknown), which keeps prose
 * like "@rolevote thanks!" from being read as a command.
 */
export const KNOWN_VERBS = new Set([
  "approve",
  "deny",
  "abstain",
  "retract",
  "feedback",
  "close",
  "override",
  "votes",
  "open",
  "delete",
]);

/**
 * Verbs whose text continues past the command line.
 */
const MULTILINE_VERBS = new Set(["feedback"]);

/**
 * Only matches when the mention is the first token on a line.
 *
 * Capture groups:
 *   1: the slash, if present
 *   2: the verb
 *   3: optional free text
 */
const COMMAND_PATTERN = new RegExp(`^\\s*@${BOT_HANDLE}\\s+(/)?([a-zA-Z]\\w*)(?:[ \\t]+(.+))?`, "im");

const INLINE_MENTION_PATTERN = new RegExp(`\`[^\`]*@${BOT_HANDLE}[^\`]*\``, "gi");

/**
 * Drop fenced code blocks, inline code mentioning the bot, and quoted lines.
 */
function stripNonCommandContent(body: string): string {
  const cleaned = body.replace(/```[\s\S]*?```/g, "").replace(INLINE_MENTION_PATTERN, "");

  return cleaned
    .split("\n")
    .filter((line) => !line.trimStart().startsWith(">"))
    .join("\n");
}

/**
 * First command in the comment, or null.
 */
export function parseCommand(body: string): ParsedCommand | null {
  const cleaned = stripNonCommandContent(body);
  const match = COMMAND_PATTERN.exec(cleaned);
  if (!match) {
    return null;
  }

  const hasSlash = match[1] === "/";
  const verb = match[2].toLowerCase();
  const text = MULTILINE_VERBS.has(verb)
    ? `${match[3] ?? ""}${cleaned.slice(match.index + match[0].length)}`
    : match[3];
  const freeText = text?.trim() || undefined;

  if (!hasSlash && !KNOWN_VERBS.has(verb)) {
    return null;
  }

  return { verb, freeText };
}
