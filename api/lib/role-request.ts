/**
 * Role Requests
 *
 * An issue is a role request when its title names a configured role as a
 * whole word, e.g. "Request: Adept" or "adept role for me please".
 */

import type { RoleDefinition } from "./repo-config.js";

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

function namePattern(name: string): RegExp {
  // \b fails next to non-word characters at the edges of names like "C++",
  // so the boundaries are explicit.
  return new RegExp(`(?:^|[^\\p{L}\\p{N}_])${escapeRegExp(name)}(?=$|[^\\p{L}\\p{N}_])`, "iu");
}

/**
 * First configured role (in config order) named in the title, or null.
 */
export function matchRequestedRole(title: string, roles: readonly RoleDefinition[]): RoleDefinition | null {
  for (const role of roles) {
    if (namePattern(role.name).test(title)) {
      return role;
    }
  }
  return null;
}
