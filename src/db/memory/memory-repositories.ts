import type { PolicyTable, VisibilityClosure } from "../../access/row-policy.js";
import type { Role } from "../../access/role-permissions.js";
import type {
  EntityAttrs,
  EntityChanges,
  EntityKind,
  EntityListFilter,
  EntityRows,
  EntitySortField,
  LinkKind,
  MemberListFilter,
  Membership,
  Page,
  ParentKind,
  SortOrder,
} from "../../hierarchy/types.js";
import type { EntityRepository, LinkRepository, MembershipRepository, NewEntity } from "../repositories.js";
import type { MemoryConnection } from "./memory-database.js";

import { canInsertRow, isRowVisible } from "../../access/row-policy.js";
import { CHILD_KIND, LINK_KIND } from "../../hierarchy/types.js";
import { ForeignKeyViolationError, RowPolicyViolationError, UniqueViolationError } from "../errors.js";
import { linkKey, membershipKey } from "./memory-database.js";

const ENTITY_TABLE: Readonly<Record<EntityKind, PolicyTable>> = Object.freeze({
  cluster: "clusters",
  domain: "domains",
  resource: "resources",
});

type RowBase = {
  id: string;
  name: string;
  created_by: string;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
};

const ROW_BUILDERS: { [K in EntityKind]: (base: RowBase, attrs: EntityAttrs[K]) => EntityRows[K] } = {
  cluster: (base, attrs) => ({ ...base, name: attrs.name, description: attrs.description ?? null }),
  domain: (base, attrs) => ({ ...base, name: attrs.name, description: attrs.description ?? null }),
  resource: (base, attrs) => ({
    ...base,
    name: attrs.name,
    resource_type: attrs.resource_type ?? null,
    config: structuredClone(attrs.config ?? {}),
  }),
};

function compareValues(left: string, right: string, order: SortOrder): number {
  const result = left < right ? -1 : left > right ? 1 : 0;
  return order === "desc" ? -result : result;
}

function sortKey(row: RowBase, field: EntitySortField): string {
  return row[field];
}

function paginate<T>(rows: T[], page: number, perPage: number): Page<T> {
  const start = (page - 1) * perPage;
  return { items: rows.slice(start, start + perPage), total: rows.length };
}

function withoutUndefined<T extends object>(changes: T): Partial<T> {
  const defined: Partial<T> = {};
  for (const key of Object.keys(changes)) {
    if (Object.prototype.hasOwnProperty.call(changes, key)) {
      const value: unknown = Reflect.get(changes, key);
      if (value !== undefined) {
        Reflect.set(defined, key, structuredClone(value));
      }
    }
  }
  return defined;
}

abstract class MemoryRepository {
  constructor(protected readonly connection: MemoryConnection) {}

  protected get db() {
    return this.connection.db;
  }

  protected visibility(): VisibilityClosure {
    return this.db.visibility(this.connection.identityId);
  }
}

export class MemoryEntityRepository extends MemoryRepository implements EntityRepository {
  async insert<K extends EntityKind>(kind: K, entity: NewEntity<K>): Promise<void> {
    const table: Map<string, EntityRows[K]> = this.db.entities[kind];
    const now = this.db.now();
    const build: (base: RowBase, attrs: EntityAttrs[K]) => EntityRows[K] = ROW_BUILDERS[kind];
    const row = build(
      {
        id: entity.id,
        name: entity.attrs.name,
        created_by: entity.created_by,
        created_at: now,
        updated_at: now,
        deleted_at: null,
      },
      entity.attrs,
    );

    if (!canInsertRow<PolicyTable>(ENTITY_TABLE[kind], row, this.visibility())) {
      throw new RowPolicyViolationError(`new row violates row-level security policy for ${ENTITY_TABLE[kind]}`);
    }
    if (table.has(row.id)) {
      throw new UniqueViolationError("duplicate primary key", `${ENTITY_TABLE[kind]}_pkey`);
    }
    if (kind === "cluster" && this.nameInUse(row.created_by, row.name)) {
      throw new UniqueViolationError("duplicate cluster name", "clusters_created_by_name_key");
    }

    table.set(row.id, row);
    this.connection.record(() => table.delete(row.id));
  }

  async findById<K extends EntityKind>(kind: K, id: string, includeDeleted: boolean): Promise<EntityRows[K] | null> {
    const row = this.visibleRow(kind, id);
    if (!row || (row.deleted_at !== null && !includeDeleted)) {
      return null;
    }
    return structuredClone(row);
  }

  async list<K extends EntityKind>(kind: K, filter: EntityListFilter): Promise<Page<EntityRows[K]>> {
    const closure = this.visibility();
    const table: Map<string, EntityRows[K]> = this.db.entities[kind];
    const parent = filter.parent;
    const linkedIds = parent ? this.childIds(parent.kind, parent.id) : null;
    const search = filter.search?.toLowerCase();

    const rows = [...table.values()]
      .filter((row) => isRowVisible<PolicyTable>(ENTITY_TABLE[kind], row, closure))
      .filter((row) => filter.includeDeleted || row.deleted_at === null)
      .filter((row) => !linkedIds || linkedIds.has(row.id))
      .filter((row) => !search || row.name.toLowerCase().includes(search))
      .sort(
        (left, right) =>
          compareValues(sortKey(left, filter.sortBy), sortKey(right, filter.sortBy), filter.sortOrder) ||
          compareValues(left.id, right.id, "asc"),
      );

    const page = paginate(rows, filter.page, filter.perPage);
    return { items: page.items.map((row) => structuredClone(row)), total: page.total };
  }

  async update<K extends EntityKind>(kind: K, id: string, changes: EntityChanges<K>): Promise<EntityRows[K] | null> {
    const table: Map<string, EntityRows[K]> = this.db.entities[kind];
    const previous = this.visibleRow(kind, id);
    if (!previous || previous.deleted_at !== null) {
      return null;
    }
    const next: EntityRows[K] = { ...previous, ...withoutUndefined(changes), updated_at: this.db.now() };
    if (kind === "cluster" && this.nameInUse(next.created_by, next.name, id)) {
      throw new UniqueViolationError("duplicate cluster name", "clusters_created_by_name_key");
    }

    table.set(id, next);
    this.connection.record(() => table.set(id, previous));
    return structuredClone(next);
  }

  async markDeleted(kind: EntityKind, id: string): Promise<boolean> {
    const table: Map<string, EntityRows[EntityKind]> = this.db.entities[kind];
    const previous = this.visibleRow(kind, id);
    if (!previous || previous.deleted_at !== null) {
      return false;
    }
    const now = this.db.now();
    table.set(id, { ...previous, deleted_at: now, updated_at: now });
    this.connection.record(() => table.set(id, previous));
    return true;
  }

  async remove(kind: EntityKind, id: string): Promise<boolean> {
    const table: Map<string, EntityRows[EntityKind]> = this.db.entities[kind];
    const previous = this.visibleRow(kind, id);
    if (!previous) {
      return false;
    }
    table.delete(id);
    this.connection.record(() => table.set(id, previous));

    // on delete cascade: junction rows on either side, and a cluster's memberships
    for (const linkKind of ["cluster_domain", "domain_resource"] as const) {
      const links = this.db.links[linkKind];
      for (const [key, link] of links) {
        if (link.parent_id === id || link.child_id === id) {
          links.delete(key);
          this.connection.record(() => links.set(key, link));
        }
      }
    }
    if (kind === "cluster") {
      for (const [key, membership] of this.db.memberships) {
        if (membership.cluster_id === id) {
          this.db.memberships.delete(key);
          this.connection.record(() => this.db.memberships.set(key, membership));
        }
      }
    }
    return true;
  }

  async countLiveChildren(kind: ParentKind, id: string): Promise<number> {
    const childKind = CHILD_KIND[kind];
    let total = 0;
    for (const childId of this.childIds(kind, id)) {
      const child = this.visibleRow(childKind, childId);
      if (child && child.deleted_at === null) {
        total += 1;
      }
    }
    return total;
  }

  // unfiltered, like the security definer helper behind the pg repository
  async clusterNameTaken(createdBy: string, name: string, excludeId?: string): Promise<boolean> {
    return this.nameInUse(createdBy, name, excludeId);
  }

  private visibleRow<K extends EntityKind>(kind: K, id: string): EntityRows[K] | undefined {
    const table: Map<string, EntityRows[K]> = this.db.entities[kind];
    const row = table.get(id);
    if (!row || !isRowVisible<PolicyTable>(ENTITY_TABLE[kind], row, this.visibility())) {
      return undefined;
    }
    return row;
  }

  private childIds(kind: ParentKind, parentId: string): Set<string> {
    const ids = new Set<string>();
    for (const link of this.db.links[LINK_KIND[kind]].values()) {
      if (link.parent_id === parentId) {
        ids.add(link.child_id);
      }
    }
    return ids;
  }

  private nameInUse(createdBy: string, name: string, excludeId?: string): boolean {
    return [...this.db.entities.cluster.values()].some(
      (row) =>
        row.created_by === createdBy &&
        row.deleted_at === null &&
        row.id !== excludeId &&
        row.name.toLowerCase() === name.toLowerCase(),
    );
  }
}

export class MemoryMembershipRepository extends MemoryRepository implements MembershipRepository {
  async lockCluster(clusterId: string) {
    await this.connection.lock(`clusters:${clusterId}`);
  }

  async find(clusterId: string, identityId: string): Promise<Membership | null> {
    const row = this.visibleRow(clusterId, identityId);
    return row ? { ...row } : null;
  }

  async insert(membership: { cluster_id: string; identity_id: string; role: Role; comment: string | null }) {
    if (!canInsertRow("cluster_memberships", membership, this.visibility())) {
      throw new RowPolicyViolationError("new row violates row-level security policy for cluster_memberships");
    }
    if (!this.db.entities.cluster.has(membership.cluster_id)) {
      throw new ForeignKeyViolationError("cluster does not exist", "cluster_memberships_cluster_id_fkey");
    }
    const key = membershipKey(membership.cluster_id, membership.identity_id);
    if (this.db.memberships.has(key)) {
      throw new UniqueViolationError("duplicate membership", "cluster_memberships_cluster_id_identity_id_key");
    }

    const now = this.db.now();
    const row: Membership = { ...membership, created_at: now, updated_at: now };
    this.db.memberships.set(key, row);
    this.connection.record(() => this.db.memberships.delete(key));
    return { ...row };
  }

  async update(
    clusterId: string,
    identityId: string,
    changes: { role: Role; comment?: string | null },
  ): Promise<Membership | null> {
    const previous = this.visibleRow(clusterId, identityId);
    if (!previous) {
      return null;
    }
    const key = membershipKey(clusterId, identityId);
    const next: Membership = {
      ...previous,
      role: changes.role,
      comment: changes.comment === undefined ? previous.comment : changes.comment,
      updated_at: this.db.now(),
    };
    this.db.memberships.set(key, next);
    this.connection.record(() => this.db.memberships.set(key, previous));
    return { ...next };
  }

  async remove(clusterId: string, identityId: string): Promise<boolean> {
    const previous = this.visibleRow(clusterId, identityId);
    if (!previous) {
      return false;
    }
    const key = membershipKey(clusterId, identityId);
    this.db.memberships.delete(key);
    this.connection.record(() => this.db.memberships.set(key, previous));
    return true;
  }

  async countOwners(clusterId: string): Promise<number> {
    return this.visibleRows().filter((row) => row.cluster_id === clusterId && row.role === "owner").length;
  }

  async list(clusterId: string, filter: MemberListFilter): Promise<Page<Membership>> {
    const search = filter.search?.toLowerCase();
    const rows = this.visibleRows()
      .filter((row) => row.cluster_id === clusterId)
      .filter(
        (row) =>
          !search ||
          row.identity_id.toLowerCase().includes(search) ||
          (row.comment ?? "").toLowerCase().includes(search),
      )
      .sort(
        (left, right) =>
          compareValues(left[filter.sortBy], right[filter.sortBy], filter.sortOrder) ||
          compareValues(left.identity_id, right.identity_id, "asc"),
      );
    const page = paginate(rows, filter.page, filter.perPage);
    return { items: page.items.map((row) => ({ ...row })), total: page.total };
  }

  async listForIdentity(identityId: string): Promise<Membership[]> {
    return this.visibleRows()
      .filter((row) => row.identity_id === identityId)
      .sort((left, right) => compareValues(left.created_at, right.created_at, "asc"))
      .map((row) => ({ ...row }));
  }

  private visibleRows(): Membership[] {
    const closure = this.visibility();
    return [...this.db.memberships.values()].filter((row) => isRowVisible("cluster_memberships", row, closure));
  }

  private visibleRow(clusterId: string, identityId: string): Membership | undefined {
    const row = this.db.memberships.get(membershipKey(clusterId, identityId));
    if (!row || !isRowVisible("cluster_memberships", row, this.visibility())) {
      return undefined;
    }
    return row;
  }
}

const LINK_ENDS: Readonly<Record<LinkKind, { parent: EntityKind; child: EntityKind }>> = Object.freeze({
  cluster_domain: { parent: "cluster", child: "domain" },
  domain_resource: { parent: "domain", child: "resource" },
});

export class MemoryLinkRepository extends MemoryRepository implements LinkRepository {
  async insert(kind: LinkKind, parentId: string, childId: string): Promise<boolean> {
    const ends = LINK_ENDS[kind];
    if (!this.db.entities[ends.parent].has(parentId) || !this.db.entities[ends.child].has(childId)) {
      throw new ForeignKeyViolationError(`${kind} link references a missing row`);
    }
    const links = this.db.links[kind];
    const key = linkKey(parentId, childId);
    if (links.has(key)) {
      return false;
    }
    links.set(key, { parent_id: parentId, child_id: childId, created_at: this.db.now() });
    this.connection.record(() => links.delete(key));
    return true;
  }

  async remove(kind: LinkKind, parentId: string, childId: string): Promise<boolean> {
    const links = this.db.links[kind];
    const key = linkKey(parentId, childId);
    const previous = links.get(key);
    if (!previous) {
      return false;
    }
    links.delete(key);
    this.connection.record(() => links.set(key, previous));
    return true;
  }

  async parentsOf(kind: LinkKind, childId: string): Promise<string[]> {
    return [...this.db.links[kind].values()]
      .filter((link) => link.child_id === childId)
      .sort((left, right) => compareValues(left.created_at, right.created_at, "asc"))
      .map((link) => link.parent_id);
  }
}
