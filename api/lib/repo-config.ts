/**
 * Repository Configuration
 *
 * Loads `.github/rolevote.yml` from a repository and merges it over the
 * environment defaults. Every numeric value is clamped to CONFIG_BOUNDS;
 * invalid entries fall back to defaults (or are skipped) with a log line.
 * A load failure never blocks event processing.
 */

import * as yaml from "js-yaml";

import { CONFIG_BOUNDS, DEFAULT_POLICY, VOTING_DURATION_MS } from "../config.js";
import { logger } from "./logger.js";
import { getErrorStatus } from "./transient-error.js";
import { isPermissionLevel, type PermissionLevel } from "./types.js";
import type { TieBreakRule, VotingPolicy } from "./voting/types.js";

// ───────────────────────────────────────────────────────────────────────────────
// Types
// ───────────────────────────────────────────────────────────────────────────────

export interface RoleDefinition {
  /** Display name, matched against issue titles */
  name: string;
  /** Team slug in the repository owner organisation */
  team: string;
  policy: VotingPolicy;
}

export interface RequestsConfig {
  enabled: boolean;
  durationMs: number;
  privilegedPermissions: PermissionLevel[];
  roles: RoleDefinition[];
}

export interface EffectiveConfig {
  requests: RequestsConfig;
}

/**
 * getContent returns a file object, a directory listing (array) or other
 * shapes; `data` is checked at runtime.
 */
export interface RepoConfigClient {
  rest: {
    repos: {
      getContent: (params: { owner: string; repo: string; path: string }) => Promise<{ data: unknown }>;
    };
  };
}

// ───────────────────────────────────────────────────────────────────────────────
// Field Parsing
// ───────────────────────────────────────────────────────────────────────────────

export const CONFIG_PATH = ".github/rolevote.yml";
const MS_PER_MINUTE = 60 * 1000;
const DEFAULT_PRIVILEGED_PERMISSIONS: PermissionLevel[] = ["admin", "maintain"];
const TEAM_SLUG_PATTERN = /^[a-z0-9][a-z0-9._-]*$/i;

interface Bounds {
  min: number;
  max: number;
  default: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseNumber(
  value: unknown,
  bounds: Bounds,
  fieldName: string,
  repoFullName: string,
  integer: boolean,
): number {
  if (value === undefined || value === null) {
    return bounds.default;
  }

  if (typeof value !== "number" || !Number.isFinite(value)) {
    logger.warn(`[${repoFullName}] Invalid ${fieldName}: expected number, got ${typeof value}. Using default.`);
    return bounds.default;
  }

  const rounded = integer ? Math.round(value) : value;
  const clamped = clamp(rounded, bounds.min, bounds.max);
  if (clamped !== value) {
    logger.info(
      `[${repoFullName}] ${fieldName} clamped from ${value} to ${clamped} (bounds: ${bounds.min}-${bounds.max})`,
    );
  }
  return clamped;
}

function parseBoolean(value: unknown, fallback: boolean, fieldName: string, repoFullName: string): boolean {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    logger.warn(`[${repoFullName}] Invalid ${fieldName}: expected boolean, got ${typeof value}. Using default.`);
    return fallback;
  }
  return value;
}

function parseTieBreak(value: unknown, fieldName: string, repoFullName: string): TieBreakRule {
  if (value === undefined || value === null) {
    return DEFAULT_POLICY.tieBreak;
  }
  if (value === "fail-on-tie" || value === "pass-on-tie") {
    return value;
  }
  logger.warn(
    `[${repoFullName}] Invalid ${fieldName}: expected "fail-on-tie" or "pass-on-tie". Using ${DEFAULT_POLICY.tieBreak}.`,
  );
  return DEFAULT_POLICY.tieBreak;
}

function parsePermissions(value: unknown, repoFullName: string): PermissionLevel[] {
  if (value === undefined || value === null) {
    return [...DEFAULT_PRIVILEGED_PERMISSIONS];
  }
  if (!Array.isArray(value)) {
    logger.warn(`[${repoFullName}] Invalid requests.privilegedPermissions: expected array. Using default.`);
    return [...DEFAULT_PRIVILEGED_PERMISSIONS];
  }

  const levels: PermissionLevel[] = [];
  for (const entry of value) {
    if (!isPermissionLevel(entry) || entry === "none") {
      logger.warn(`[${repoFullName}] Unknown permission level ${JSON.stringify(entry)}. Skipping.`);
      continue;
    }
    if (!levels.includes(entry)) {
      levels.push(entry);
    }
  }

  if (levels.length === 0) {
    logger.warn(`[${repoFullName}] requests.privilegedPermissions is empty. Using default.`);
    return [...DEFAULT_PRIVILEGED_PERMISSIONS];
  }
  return levels;
}

function parseRole(
  value: unknown,
  index: number,
  retainBallots: boolean,
  repoFullName: string,
): RoleDefinition | null {
  const field = `requests.roles[${index}]`;
  if (!isRecord(value)) {
    logger.warn(`[${repoFullName}] Invalid ${field}: expected object. Skipping.`);
    return null;
  }

  const name = typeof value.name === "string" ? value.name.trim() : "";
  if (name.length === 0 || name.length > CONFIG_BOUNDS.roles.maxNameLength) {
    logger.warn(`[${repoFullName}] Invalid ${field}.name: expected 1-${CONFIG_BOUNDS.roles.maxNameLength} characters. Skipping.`);
    return null;
  }

  const team = typeof value.team === "string" ? value.team.trim() : "";
  if (!TEAM_SLUG_PATTERN.test(team)) {
    logger.warn(`[${repoFullName}] Invalid ${field}.team for role "${name}": expected a team slug. Skipping.`);
    return null;
  }

  return {
    name,
    team,
    policy: {
      approveThreshold: parseNumber(
        value.approveThreshold,
        { ...CONFIG_BOUNDS.approveThreshold, default: DEFAULT_POLICY.approveThreshold },
        `${field}.approveThreshold`,
        repoFullName,
        false,
      ),
      minParticipants: parseNumber(
        value.minParticipants,
        { ...CONFIG_BOUNDS.minParticipants, default: DEFAULT_POLICY.minParticipants },
        `${field}.minParticipants`,
        repoFullName,
        true,
      ),
      countAbstain: parseBoolean(value.countAbstain, DEFAULT_POLICY.countAbstain, `${field}.countAbstain`, repoFullName),
      tieBreak: parseTieBreak(value.tieBreak, `${field}.tieBreak`, repoFullName),
      retainBallotsAfterFinalize: retainBallots,
    },
  };
}

function parseRoles(value: unknown, retainBallots: boolean, repoFullName: string): RoleDefinition[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    logger.warn(`[${repoFullName}] Invalid requests.roles: expected array. No roles configured.`);
    return [];
  }

  const roles: RoleDefinition[] = [];
  const seen = new Set<string>();
  for (const [index, entry] of value.entries()) {
    if (roles.length >= CONFIG_BOUNDS.roles.maxEntries) {
      logger.info(`[${repoFullName}] requests.roles truncated to ${CONFIG_BOUNDS.roles.maxEntries} entries`);
      break;
    }
    const role = parseRole(entry, index, retainBallots, repoFullName);
    if (!role) {
      continue;
    }
    const key = role.name.toLowerCase();
    if (seen.has(key)) {
      logger.warn(`[${repoFullName}] Duplicate role "${role.name}". Keeping the first definition.`);
      continue;
    }
    seen.add(key);
    roles.push(role);
  }
  return roles;
}

// ───────────────────────────────────────────────────────────────────────────────
// Config Loading
// ───────────────────────────────────────────────────────────────────────────────

export function getDefaultConfig(): EffectiveConfig {
  return {
    requests: {
      enabled: true,
      durationMs: VOTING_DURATION_MS,
      privilegedPermissions: [...DEFAULT_PRIVILEGED_PERMISSIONS],
      roles: [],
    },
  };
}

/**
 * Build the effective config from a parsed YAML object.
 */
export function parseRepoConfig(raw: Record<string, unknown>, repoFullName: string): EffectiveConfig {
  const defaults = getDefaultConfig();
  const requests = raw.requests;
  if (requests === undefined || requests === null) {
    return defaults;
  }
  if (!isRecord(requests)) {
    logger.warn(`[${repoFullName}] Invalid requests: expected object. Using defaults.`);
    return defaults;
  }

  const durationMinutes = parseNumber(
    requests.durationMinutes,
    { ...CONFIG_BOUNDS.votingDurationMinutes, default: Math.round(VOTING_DURATION_MS / MS_PER_MINUTE) },
    "requests.durationMinutes",
    repoFullName,
    true,
  );
  const retainBallots = parseBoolean(
    requests.retainBallotsAfterFinalize,
    DEFAULT_POLICY.retainBallotsAfterFinalize,
    "requests.retainBallotsAfterFinalize",
    repoFullName,
  );

  return {
    requests: {
      enabled: parseBoolean(requests.enabled, defaults.requests.enabled, "requests.enabled", repoFullName),
      durationMs: durationMinutes * MS_PER_MINUTE,
      privilegedPermissions: parsePermissions(requests.privilegedPermissions, repoFullName),
      roles: parseRoles(requests.roles, retainBallots, repoFullName),
    },
  };
}

export async function loadRepositoryConfig(
  octokit: RepoConfigClient,
  owner: string,
  repo: string,
): Promise<EffectiveConfig> {
  const repoFullName = `${owner}/${repo}`;

  try {
    const { data } = await octokit.rest.repos.getContent({ owner, repo, path: CONFIG_PATH });

    if (!isRecord(data) || data.type !== "file" || typeof data.content !== "string" || !data.content) {
      logger.warn(`[${repoFullName}] ${CONFIG_PATH} is not a file. Using defaults.`);
      return getDefaultConfig();
    }

    const content = Buffer.from(data.content, "base64").toString("utf-8");

    let parsed: unknown;
    try {
      parsed = yaml.load(content);
    } catch (yamlError) {
      const message = yamlError instanceof Error ? yamlError.message : String(yamlError);
      logger.warn(`[${repoFullName}] Invalid YAML in ${CONFIG_PATH}: ${message}. Using defaults.`);
      return getDefaultConfig();
    }

    if (parsed === undefined || parsed === null) {
      logger.debug(`[${repoFullName}] Empty ${CONFIG_PATH}. Using defaults.`);
      return getDefaultConfig();
    }

    if (!isRecord(parsed)) {
      logger.warn(`[${repoFullName}] ${CONFIG_PATH} must be a YAML object. Using defaults.`);
      return getDefaultConfig();
    }

    logger.info(`[${repoFullName}] Loaded config from ${CONFIG_PATH}`);
    return parseRepoConfig(parsed, repoFullName);
  } catch (error) {
    const status = getErrorStatus(error);

    if (status === 404) {
      logger.debug(`[${repoFullName}] No ${CONFIG_PATH} found. Using defaults.`);
      return getDefaultConfig();
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    const statusSuffix = status ? ` (status ${status})` : "";
    logger.warn(`[${repoFullName}] Failed to load ${CONFIG_PATH}${statusSuffix}: ${errorMessage}. Using defaults.`);
    return getDefaultConfig();
  }
}
