/**
 * Shared Type Definitions
 *
 * GitHub-side shapes used by webhooks and scripts, and the mapping between
 * an issue and the session it hosts.
 */

import type { SessionId } from "./voting/types.js";

/**
 * Issue reference for API calls
 */
export interface IssueRef {
  owner: string;
  repo: string;
  issueNumber: number;
}

/**
 * Minimal issue comment shape returned by the GitHub API
 */
export interface IssueComment {
  id: number;
  body?: string | null;
  user?: { login: string; type?: string } | null;
  created_at?: string;
  performed_via_github_app?: { id: number } | null;
}

/**
 * Collaborator permission levels reported by
 * repos.getCollaboratorPermissionLevel (role_name).
 */
export const PERMISSION_LEVELS = ["admin", "maintain", "write", "triage", "read", "none"] as const;
export type PermissionLevel = (typeof PERMISSION_LEVELS)[number];

export function isPermissionLevel(value: unknown): value is PermissionLevel {
  return typeof value === "string" && PERMISSION_LEVELS.some((level) => level === value);
}

const SESSION_ID_PATTERN = /^([^/\s#]+)\/([^/\s#]+)#([1-9]\d*)$/;

/**
 * One session per issue: `owner/repo#number`.
 */
export function buildSessionId(ref: IssueRef): SessionId {
  return `${ref.owner}/${ref.repo}#${ref.issueNumber}`;
}

export function parseSessionId(id: SessionId): IssueRef | null {
  const match = SESSION_ID_PATTERN.exec(id);
  if (!match) {
    return null;
  }
  return { owner: match[1], repo: match[2], issueNumber: Number(match[3]) };
}
