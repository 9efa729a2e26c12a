import type { AuthorizationGuard, RoleLookup } from "../access/authorization-guard.js";
import type { Action, Role } from "../access/role-permissions.js";
import type { EntityRepository, MembershipRepository } from "../db/repositories.js";
import type { MemberListFilter, Membership, Page } from "../hierarchy/types.js";
import type { IdentityContext } from "../platform/request-context.js";
import type { LoggerLike } from "../shared/logger.js";

import { permissionsFor, roleAllows } from "../access/role-permissions.js";
import { UniqueViolationError } from "../db/errors.js";
import { ConflictError, ForbiddenError, NotFoundError } from "../shared/errors.js";

export class MembershipRoles implements RoleLookup {
  constructor(private readonly memberships: MembershipRepository) {}

  async roleOf(clusterId: string, identityId: string): Promise<Role | null> {
    const membership = await this.memberships.find(clusterId, identityId);
    return membership?.role ?? null;
  }
}

const LAST_OWNER_MESSAGE = "A cluster must keep at least one owner";

export type MembershipWithPermissions = Membership & { permissions: Action[] };

/**
 * Per-cluster role assignments. Every mutation holds the cluster lock for the
 * rest of the transaction, so owner counts taken inside it cannot go stale; a
 * violation raises and the surrounding session rolls back.
 */
export class MembershipRegistry {
  constructor(
    private readonly memberships: MembershipRepository,
    private readonly entities: EntityRepository,
    private readonly roles: RoleLookup,
    private readonly guard: AuthorizationGuard,
    private readonly logger: LoggerLike,
  ) {}

  async roleOf(clusterId: string, identityId: string): Promise<Role | null> {
    return this.roles.roleOf(clusterId, identityId);
  }

  async claimOwnership(clusterId: string, identity: IdentityContext): Promise<Membership> {
    const membership = await this.memberships.insert({
      cluster_id: clusterId,
      identity_id: identity.identityId,
      role: "owner",
      comment: null,
    });
    this.logger.info({ clusterId, identityId: identity.identityId }, "cluster owner assigned");
    return membership;
  }

  async addMember(
    actor: IdentityContext,
    clusterId: string,
    identityId: string,
    role: Role,
    comment?: string | null,
  ): Promise<Membership> {
    const actorRole = await this.beginMutation(actor, clusterId);
    if (role === "owner") {
      this.requireChangeOwner(actorRole);
    }
    if (await this.memberships.find(clusterId, identityId)) {
      throw new ConflictError("Identity is already a member of this cluster");
    }

    let membership: Membership;
    try {
      membership = await this.memberships.insert({
        cluster_id: clusterId,
        identity_id: identityId,
        role,
        comment: comment ?? null,
      });
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new ConflictError("Identity is already a member of this cluster");
      }
      throw error;
    }

    this.logger.info({ clusterId, identityId, role, actorId: actor.identityId }, "member added");
    return membership;
  }

  async updateRole(
    actor: IdentityContext,
    clusterId: string,
    identityId: string,
    newRole: Role,
    comment?: string | null,
  ): Promise<Membership> {
    const actorRole = await this.beginMutation(actor, clusterId);
    const existing = await this.requireMembership(clusterId, identityId);
    if (existing.role === "owner" || newRole === "owner") {
      this.requireChangeOwner(actorRole);
    }

    const updated = await this.memberships.update(clusterId, identityId, { role: newRole, comment });
    if (!updated) {
      throw new NotFoundError("Membership not found");
    }
    await this.assertOwnerRemains(clusterId);

    this.logger.info(
      { clusterId, identityId, from: existing.role, to: newRole, actorId: actor.identityId },
      "member role updated",
    );
    return updated;
  }

  async removeMember(actor: IdentityContext, clusterId: string, identityId: string) {
    const actorRole = await this.beginMutation(actor, clusterId);
    const existing = await this.requireMembership(clusterId, identityId);
    if (existing.role === "owner") {
      this.requireChangeOwner(actorRole);
      // counted before the delete: removing one's own row hides the cluster's memberships
      if ((await this.memberships.countOwners(clusterId)) <= 1) {
        throw new ConflictError(LAST_OWNER_MESSAGE);
      }
    }

    if (!(await this.memberships.remove(clusterId, identityId))) {
      throw new NotFoundError("Membership not found");
    }

    this.logger.info({ clusterId, identityId, actorId: actor.identityId }, "member removed");
  }

  async listMembers(actor: IdentityContext, clusterId: string, filter: MemberListFilter): Promise<Page<Membership>> {
    await this.guard.requireCluster(actor, clusterId, "view");
    await this.requireLiveCluster(clusterId);
    return this.memberships.list(clusterId, filter);
  }

  async membershipsOf(identity: IdentityContext): Promise<MembershipWithPermissions[]> {
    const memberships = await this.memberships.listForIdentity(identity.identityId);
    return memberships.map((membership) => ({ ...membership, permissions: permissionsFor(membership.role) }));
  }

  private async beginMutation(actor: IdentityContext, clusterId: string): Promise<Role> {
    await this.memberships.lockCluster(clusterId);
    const actorRole = await this.guard.requireCluster(actor, clusterId, "manage_members");
    await this.requireLiveCluster(clusterId);
    return actorRole;
  }

  private requireChangeOwner(actorRole: Role) {
    if (!roleAllows(actorRole, "change_owner")) {
      throw new ForbiddenError(`Role ${actorRole} may not grant or revoke ownership`);
    }
  }

  private async requireLiveCluster(clusterId: string) {
    if (!(await this.entities.findById("cluster", clusterId, false))) {
      throw new NotFoundError("Cluster not found");
    }
  }

  private async requireMembership(clusterId: string, identityId: string): Promise<Membership> {
    const membership = await this.memberships.find(clusterId, identityId);
    if (!membership) {
      throw new NotFoundError("Membership not found");
    }
    return membership;
  }

  private async assertOwnerRemains(clusterId: string) {
    if ((await this.memberships.countOwners(clusterId)) < 1) {
      throw new ConflictError(LAST_OWNER_MESSAGE);
    }
  }
}
