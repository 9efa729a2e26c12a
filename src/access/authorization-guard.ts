import type { LinkRepository } from "../db/repositories.js";
import type { EntityKind } from "../hierarchy/types.js";
import type { IdentityContext } from "../platform/request-context.js";
import type { Action, Role } from "./role-permissions.js";

import { ENTITY_LABELS } from "../hierarchy/types.js";
import { ForbiddenError, NotFoundError } from "../shared/errors.js";
import { highestRole, roleAllows } from "./role-permissions.js";

export interface RoleLookup {
  roleOf(clusterId: string, identityId: string): Promise<Role | null>;
}

export type DenyReason = "not_a_member" | "insufficient_role";

export type AuthorizationDecision =
  | { allowed: true; role: Role }
  | { allowed: false; reason: DenyReason; role: Role | null };

export function decide(role: Role | null, action: Action): AuthorizationDecision {
  if (role === null) {
    return { allowed: false, reason: "not_a_member", role: null };
  }
  if (!roleAllows(role, action)) {
    return { allowed: false, reason: "insufficient_role", role };
  }
  return { allowed: true, role };
}

/**
 * Application-level gate. Callers without any membership get NotFound so
 * existence is never revealed; members lacking the action get Forbidden.
 */
export class AuthorizationGuard {
  constructor(
    private readonly roles: RoleLookup,
    private readonly links: LinkRepository,
  ) {}

  async authorize(identity: IdentityContext, clusterId: string, action: Action): Promise<AuthorizationDecision> {
    return decide(await this.roles.roleOf(clusterId, identity.identityId), action);
  }

  async authorizeEntity(
    identity: IdentityContext,
    kind: EntityKind,
    id: string,
    action: Action,
  ): Promise<AuthorizationDecision> {
    if (kind === "cluster") {
      return this.authorize(identity, id, action);
    }
    return decide(await this.effectiveRole(identity, kind, id), action);
  }

  async requireCluster(identity: IdentityContext, clusterId: string, action: Action): Promise<Role> {
    return this.requireEntity(identity, "cluster", clusterId, action);
  }

  async requireEntity(identity: IdentityContext, kind: EntityKind, id: string, action: Action): Promise<Role> {
    const decision = await this.authorizeEntity(identity, kind, id, action);
    if (decision.allowed) {
      return decision.role;
    }
    if (decision.reason === "not_a_member") {
      throw new NotFoundError(`${ENTITY_LABELS[kind]} not found`);
    }
    throw new ForbiddenError(`Role ${decision.role ?? "none"} may not ${action} this ${kind}`);
  }

  private async effectiveRole(identity: IdentityContext, kind: "domain" | "resource", id: string): Promise<Role | null> {
    const domainIds = kind === "domain" ? [id] : await this.links.parentsOf("domain_resource", id);
    const clusterIds = new Set<string>();
    for (const domainId of domainIds) {
      for (const clusterId of await this.links.parentsOf("cluster_domain", domainId)) {
        clusterIds.add(clusterId);
      }
    }

    const roles: Role[] = [];
    for (const clusterId of clusterIds) {
      const role = await this.roles.roleOf(clusterId, identity.identityId);
      if (role) {
        roles.push(role);
      }
    }
    return highestRole(roles);
  }
}
