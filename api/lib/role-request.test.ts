import { describe, it, expect } from "vitest";
import { matchRequestedRole } from "./role-request.js";
import type { RoleDefinition } from "./repo-config.js";

const role = (name: string, team = name.toLowerCase()): RoleDefinition => ({
  name,
  team,
  policy: {
    approveThreshold: 0.5,
    minParticipants: 1,
    countAbstain: false,
    tieBreak: "fail-on-tie",
    retainBallotsAfterFinalize: true,
  },
});

describe("matchRequestedRole", () => {
  const roles = [role("Adept"), role("Core Maintainer", "core"), role("C++", "cpp")];

  it("matches a role name case-insensitively", () => {
    expect(matchRequestedRole("request: adept role", roles)?.team).toBe("adept");
    expect(matchRequestedRole("ADEPT please", roles)?.team).toBe("adept");
  });

  it("requires a whole-word match", () => {
    expect(matchRequestedRole("Adeptness review", roles)).toBeNull();
    expect(matchRequestedRole("Inadept", roles)).toBeNull();
  });

  it("matches multi-word names and names with symbols", () => {
    expect(matchRequestedRole("Join Core Maintainer team", roles)?.team).toBe("core");
    expect(matchRequestedRole("Request C++ reviewer", roles)?.team).toBe("cpp");
    expect(matchRequestedRole("Request C+ reviewer", roles)).toBeNull();
  });

  it("returns the first configured role when several appear", () => {
    expect(matchRequestedRole("Core Maintainer or Adept", roles)?.name).toBe("Adept");
  });

  it("returns null with no roles", () => {
    expect(matchRequestedRole("Adept", [])).toBeNull();
  });
});
