/**
 * Privilege Check
 *
 * An actor may override, close, delete or audit a session when their
 * collaborator permission on the session's repository is one of the
 * repository's `privilegedPermissions`.
 */

import type { OperationsResolver } from "./github-client.js";
import { withRetry } from "./transient-error.js";
import { parseSessionId, type IssueRef, type PermissionLevel } from "./types.js";
import type { PrivilegePredicate, Session } from "./voting/types.js";

type Repository = Pick<IssueRef, "owner" | "repo">;

export type PermissionPolicyResolver = (repository: Repository) => Promise<readonly PermissionLevel[]>;

export type RepositoryPrivilegeCheck = (repository: Repository, login: string) => Promise<boolean>;

export function createRepositoryPrivilegeCheck(
  resolveOperations: OperationsResolver,
  resolveAllowed: PermissionPolicyResolver,
): RepositoryPrivilegeCheck {
  return async (repository, login) => {
    const [ops, allowed] = await Promise.all([resolveOperations(repository), resolveAllowed(repository)]);
    const level = await withRetry(() => ops.getPermissionLevel(repository, login));
    return allowed.includes(level);
  };
}

/**
 * Session-scoped predicate for the coordinator. Sessions whose ID doesn't
 * name a repository have no privileged actors.
 */
export function createPermissionPrivilegeCheck(checkRepository: RepositoryPrivilegeCheck): PrivilegePredicate {
  return async (actor: string, session: Session): Promise<boolean> => {
    const ref = parseSessionId(session.id);
    if (!ref) {
      return false;
    }
    return checkRepository(ref, actor);
  };
}
