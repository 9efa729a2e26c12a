import { describe, expect, it } from "vitest";

import type { RoleLookup } from "../src/access/authorization-guard.js";
import type { Role } from "../src/access/role-permissions.js";
import type { LinkRepository } from "../src/db/repositories.js";

import { AuthorizationGuard, decide } from "../src/access/authorization-guard.js";
import { createIdentityContext } from "../src/platform/request-context.js";
import { ForbiddenError, NotFoundError } from "../src/shared/errors.js";
import { ALICE, BOB } from "./support.js";

function fixedRoles(roles: Record<string, Role>): RoleLookup {
  return {
    roleOf: async (clusterId, identityId) => roles[`${clusterId}:${identityId}`] ?? null,
  };
}

// domain d1 sits under clusters c1 and c2; resource r1 under d1
const links: LinkRepository = {
  insert: async () => true,
  remove: async () => true,
  parentsOf: async (kind, childId) => {
    if (kind === "cluster_domain" && childId === "d1") {
      return ["c1", "c2"];
    }
    if (kind === "domain_resource" && childId === "r1") {
      return ["d1"];
    }
    return [];
  },
};

describe("decide", () => {
  it("separates missing membership from an insufficient role", () => {
    expect(decide(null, "view")).toEqual({ allowed: false, reason: "not_a_member", role: null });
    expect(decide("member", "edit")).toEqual({ allowed: false, reason: "insufficient_role", role: "member" });
    expect(decide("admin", "manage_members")).toEqual({ allowed: true, role: "admin" });
  });
});

describe("AuthorizationGuard", () => {
  const guard = new AuthorizationGuard(fixedRoles({ [`c1:${ALICE}`]: "member", [`c2:${ALICE}`]: "admin" }), links);
  const alice = createIdentityContext(ALICE);
  const bob = createIdentityContext(BOB);

  it("uses the highest role held on any cluster above a resource", async () => {
    const decision = await guard.authorizeEntity(alice, "resource", "r1", "edit");

    expect(decision).toEqual({ allowed: true, role: "admin" });
  });

  it("raises forbidden for a role without the action", async () => {
    await expect(guard.requireEntity(alice, "domain", "d1", "delete")).rejects.toBeInstanceOf(ForbiddenError);
    await expect(guard.requireCluster(alice, "c1", "edit")).rejects.toThrow("Role member may not edit this cluster");
  });

  it("raises not found for an identity without any membership", async () => {
    await expect(guard.requireEntity(bob, "resource", "r1", "view")).rejects.toBeInstanceOf(NotFoundError);
    await expect(guard.requireEntity(bob, "resource", "r1", "view")).rejects.toThrow("Resource not found");
  });
});
