/**
 * Client Validation Utilities
 *
 * Runtime shape checks for Octokit-like clients, so probot's context.octokit
 * and a test double can be handed to the same factory as `unknown`.
 */

/**
 * One path on the client and the methods expected there.
 */
export interface ValidationCheck {
  /** Dot-notation path to check (e.g., "rest.issues") */
  path: string;
  /** Required method names at this path (if any) */
  requiredMethods?: string[];
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

/**
 * Navigate to a nested property by dot-notation path.
 * Returns null if any part of the path is missing.
 */
function getNestedProperty(obj: object, path: string): object | null {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isObjectLike(current)) {
      return null;
    }
    current = Reflect.get(current, part);
  }

  return isObjectLike(current) ? current : null;
}

/**
 * True when every check's path exists and carries its required methods.
 *
 * @example
 * ```typescript
 * const isValid = validateClient(octokit, [
 *   { path: "rest.issues", requiredMethods: ["createComment", "updateComment"] },
 *   { path: "paginate", requiredMethods: ["iterator"] }
 * ]);
 * ```
 */
export function validateClient(obj: unknown, checks: ValidationCheck[]): boolean {
  if (typeof obj !== "object" || obj === null) {
    return false;
  }

  return checks.every((check) => {
    const target = getNestedProperty(obj, check.path);
    if (!target) {
      return false;
    }
    return (check.requiredMethods ?? []).every((method) => typeof Reflect.get(target, method) === "function");
  });
}

/**
 * In Octokit v5+ `paginate` is a function carrying an `iterator` property;
 * older clients expose a plain object. Both are accepted.
 */
export function hasPaginateIterator(obj: unknown): boolean {
  if (typeof obj !== "object" || obj === null) {
    return false;
  }
  const paginate: unknown = Reflect.get(obj, "paginate");
  return isObjectLike(paginate) && typeof Reflect.get(paginate, "iterator") === "function";
}

/**
 * Everything RequestOperations calls.
 */
export const REQUEST_CLIENT_CHECKS: ValidationCheck[] = [
  {
    path: "rest.issues",
    requiredMethods: ["createComment", "updateComment", "listComments"],
  },
  {
    path: "rest.repos",
    requiredMethods: ["getCollaboratorPermissionLevel"],
  },
  {
    path: "rest.teams",
    requiredMethods: ["addOrUpdateMembershipForUserInOrg"],
  },
  {
    path: "rest.reactions",
    requiredMethods: ["createForIssueComment", "listForIssueComment"],
  },
];
