/**
 * Library exports
 *
 * Central export point for the GitHub-facing library code.
 */

// Types
export type { IssueRef, IssueComment, PermissionLevel } from "./types.js";
export { buildSessionId, parseSessionId, isPermissionLevel } from "./types.js";

// GitHub client abstraction
export { RequestOperations, createRequestOperations } from "./github-client.js";
export type { GitHubClient, OperationsResolver, RequestOperationsConfig } from "./github-client.js";

// Session adapters
export { GitHubNotifier } from "./notifier.js";
export { GitHubTeamConsequence } from "./consequence.js";
export { createPermissionPrivilegeCheck, createRepositoryPrivilegeCheck } from "./privilege.js";
export type { PermissionPolicyResolver, RepositoryPrivilegeCheck } from "./privilege.js";

// Role requests
export { matchRequestedRole } from "./role-request.js";

// Logging
export { logger, createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Repository configuration
export { loadRepositoryConfig, getDefaultConfig, CONFIG_PATH } from "./repo-config.js";
export type { EffectiveConfig, RequestsConfig, RoleDefinition, RepoConfigClient } from "./repo-config.js";

// Errors and retries
export { isTransientError, withRetry } from "./transient-error.js";
