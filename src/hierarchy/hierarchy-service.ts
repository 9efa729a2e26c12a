import type { AuthorizationGuard } from "../access/authorization-guard.js";
import type { MembershipRegistry, MembershipWithPermissions } from "../membership/membership-registry.js";
import type { IdentityContext } from "../platform/request-context.js";
import type { LinkOutcome, RelationshipManager, UnlinkOutcome } from "../relationships/relationship-manager.js";
import type { GetOptions, HierarchyStore } from "./hierarchy-store.js";
import type {
  Cluster,
  ClusterAttrs,
  EntityAttrs,
  EntityChanges,
  EntityKind,
  EntityListFilter,
  EntityRows,
  Page,
  ParentKind,
} from "./types.js";

import { resolveLinkKind } from "../relationships/relationship-manager.js";
import { ForbiddenError, NotFoundError } from "../shared/errors.js";
import { CHILD_KIND } from "./types.js";

export type ListFilter = Omit<EntityListFilter, "parent">;

export type CallerContext = {
  identity_id: string;
  claims: IdentityContext["claims"];
  memberships: MembershipWithPermissions[];
};

export class HierarchyService {
  constructor(
    private readonly identity: IdentityContext,
    private readonly store: HierarchyStore,
    private readonly relationships: RelationshipManager,
    private readonly registry: MembershipRegistry,
    private readonly guard: AuthorizationGuard,
  ) {}

  async context(): Promise<CallerContext> {
    return {
      identity_id: this.identity.identityId,
      claims: this.identity.claims,
      memberships: await this.registry.membershipsOf(this.identity),
    };
  }

  async createCluster(attrs: ClusterAttrs): Promise<Cluster> {
    const id = await this.store.create("cluster", attrs);
    await this.registry.claimOwnership(id, this.identity);
    return this.store.get("cluster", id);
  }

  async createDomain(clusterId: string, attrs: EntityAttrs["domain"]) {
    return this.createLinked("cluster", clusterId, "domain", attrs);
  }

  async createResource(domainId: string, attrs: EntityAttrs["resource"]) {
    return this.createLinked("domain", domainId, "resource", attrs);
  }

  async getEntity<K extends EntityKind>(kind: K, id: string, options: GetOptions = {}): Promise<EntityRows[K]> {
    await this.guard.requireEntity(this.identity, kind, id, "view");
    return this.store.get(kind, id, options);
  }

  async listEntities<K extends EntityKind>(kind: K, filter: ListFilter): Promise<Page<EntityRows[K]>> {
    return this.store.list(kind, filter);
  }

  async listChildren(parentKind: ParentKind, parentId: string, filter: ListFilter) {
    await this.guard.requireEntity(this.identity, parentKind, parentId, "view");
    await this.store.get(parentKind, parentId);
    return this.store.list(CHILD_KIND[parentKind], { ...filter, parent: { kind: parentKind, id: parentId } });
  }

  async updateEntity<K extends EntityKind>(kind: K, id: string, changes: EntityChanges<K>): Promise<EntityRows[K]> {
    await this.guard.requireEntity(this.identity, kind, id, "edit");
    return this.store.update(kind, id, changes);
  }

  async deleteEntity(kind: EntityKind, id: string, options: { hard?: boolean } = {}) {
    await this.guard.requireEntity(this.identity, kind, id, "delete");
    if (options.hard) {
      await this.store.hardDelete(kind, id);
    } else {
      await this.store.softDelete(kind, id);
    }
  }

  async linkChild(parentKind: ParentKind, parentId: string, childKind: EntityKind, childId: string): Promise<LinkOutcome> {
    resolveLinkKind(parentKind, childKind);
    await this.guard.requireEntity(this.identity, parentKind, parentId, "edit");
    await this.store.get(parentKind, parentId);

    const decision = await this.guard.authorizeEntity(this.identity, childKind, childId, "edit");
    if (!decision.allowed) {
      if (decision.reason === "not_a_member") {
        throw new NotFoundError(`${childKind} not found`);
      }
      throw new ForbiddenError(`Cannot link a ${childKind} the caller may not edit`, "cross_cluster_link");
    }
    await this.store.get(childKind, childId);

    return this.relationships.link(parentKind, parentId, childKind, childId);
  }

  async unlinkChild(
    parentKind: ParentKind,
    parentId: string,
    childKind: EntityKind,
    childId: string,
  ): Promise<UnlinkOutcome> {
    resolveLinkKind(parentKind, childKind);
    await this.guard.requireEntity(this.identity, parentKind, parentId, "edit");
    await this.store.get(parentKind, parentId);
    return this.relationships.unlink(parentKind, parentId, childKind, childId);
  }

  private async createLinked<K extends EntityKind>(
    parentKind: ParentKind,
    parentId: string,
    childKind: K,
    attrs: EntityAttrs[K],
  ): Promise<EntityRows[K]> {
    resolveLinkKind(parentKind, childKind);
    await this.guard.requireEntity(this.identity, parentKind, parentId, "edit");
    await this.store.get(parentKind, parentId);

    const id = await this.store.create(childKind, attrs);
    await this.relationships.link(parentKind, parentId, childKind, id);
    return this.store.get(childKind, id);
  }
}
