import type pg from "pg";

import type { Role } from "../access/role-permissions.js";
import type {
  EntityAttrs,
  EntityChanges,
  EntityKind,
  EntityListFilter,
  EntityRows,
  EntitySortField,
  LinkKind,
  MemberListFilter,
  MemberSortField,
  Membership,
  Page,
  ParentKind,
  ResourceConfig,
} from "../hierarchy/types.js";
import type { EntityRepository, LinkRepository, MembershipRepository, NewEntity } from "./repositories.js";

import { LINK_KIND } from "../hierarchy/types.js";
import { translateStoreError } from "./errors.js";

export interface Queryable {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, values?: unknown[]): Promise<pg.QueryResult<R>>;
}

type EntityRecord = {
  id: string;
  name: string;
  created_by: string;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
  description?: string | null;
  resource_type?: string | null;
  config?: ResourceConfig | null;
};

type MembershipRecord = {
  cluster_id: string;
  identity_id: string;
  role: Role;
  comment: string | null;
  created_at: Date;
  updated_at: Date;
};

type EntityTable<K extends EntityKind> = {
  table: string;
  attrColumns: readonly (keyof EntityAttrs[K] & string)[];
  fromRow: (row: EntityRecord) => EntityRows[K];
};

const BASE_COLUMNS = ["id", "name", "created_by", "created_at", "updated_at", "deleted_at"];

function toIso(value: Date): string {
  return value.toISOString();
}

function baseFromRow(row: EntityRecord) {
  return {
    id: row.id,
    name: row.name,
    created_by: row.created_by,
    created_at: toIso(row.created_at),
    updated_at: toIso(row.updated_at),
    deleted_at: row.deleted_at ? toIso(row.deleted_at) : null,
  };
}

const ENTITY_TABLES: { [K in EntityKind]: EntityTable<K> } = {
  cluster: {
    table: "clusters",
    attrColumns: ["name", "description"],
    fromRow: (row) => ({ ...baseFromRow(row), description: row.description ?? null }),
  },
  domain: {
    table: "domains",
    attrColumns: ["name", "description"],
    fromRow: (row) => ({ ...baseFromRow(row), description: row.description ?? null }),
  },
  resource: {
    table: "resources",
    attrColumns: ["name", "resource_type", "config"],
    fromRow: (row) => ({
      ...baseFromRow(row),
      resource_type: row.resource_type ?? null,
      config: row.config ?? {},
    }),
  },
};

const LINK_TABLES: Readonly<Record<LinkKind, { table: string; parent: string; child: string }>> = Object.freeze({
  cluster_domain: { table: "cluster_domain_links", parent: "cluster_id", child: "domain_id" },
  domain_resource: { table: "domain_resource_links", parent: "domain_id", child: "resource_id" },
});

const ENTITY_SORT_COLUMNS: Readonly<Record<EntitySortField, string>> = Object.freeze({
  name: "e.name",
  created_at: "e.created_at",
  updated_at: "e.updated_at",
});

const MEMBER_SORT_COLUMNS: Readonly<Record<MemberSortField, string>> = Object.freeze({
  identity_id: "m.identity_id",
  role: "m.role",
  created_at: "m.created_at",
});

const MEMBERSHIP_COLUMNS = "m.cluster_id, m.identity_id, m.role, m.comment, m.created_at, m.updated_at";

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function membershipFromRow(row: MembershipRecord): Membership {
  return {
    cluster_id: row.cluster_id,
    identity_id: row.identity_id,
    role: row.role,
    comment: row.comment,
    created_at: toIso(row.created_at),
    updated_at: toIso(row.updated_at),
  };
}

abstract class PgRepository {
  constructor(private readonly client: Queryable) {}

  protected async query<R extends pg.QueryResultRow>(text: string, values: unknown[] = []): Promise<pg.QueryResult<R>> {
    try {
      return await this.client.query<R>(text, values);
    } catch (error) {
      throw translateStoreError(error);
    }
  }
}

export class PgEntityRepository extends PgRepository implements EntityRepository {
  async insert<K extends EntityKind>(kind: K, entity: NewEntity<K>): Promise<void> {
    const shape: EntityTable<K> = ENTITY_TABLES[kind];
    const columns = ["id", "created_by"];
    const values: unknown[] = [entity.id, entity.created_by];
    for (const column of shape.attrColumns) {
      const value: unknown = entity.attrs[column];
      if (value !== undefined) {
        columns.push(column);
        values.push(value);
      }
    }
    const placeholders = values.map((_value, index) => `$${index + 1}`);

    // No RETURNING: the new row is not visible to the caller until it is linked or claimed.
    await this.query(
      `insert into ${shape.table} (${columns.join(", ")}, created_at, updated_at)
       values (${placeholders.join(", ")}, now(), now())`,
      values,
    );
  }

  async findById<K extends EntityKind>(kind: K, id: string, includeDeleted: boolean): Promise<EntityRows[K] | null> {
    const shape: EntityTable<K> = ENTITY_TABLES[kind];
    const result = await this.query<EntityRecord>(
      `select ${this.selectColumns(shape)}
       from ${shape.table} e
       where e.id = $1 and ($2::boolean or e.deleted_at is null)`,
      [id, includeDeleted],
    );
    const row = result.rows[0];
    return row ? shape.fromRow(row) : null;
  }

  async list<K extends EntityKind>(kind: K, filter: EntityListFilter): Promise<Page<EntityRows[K]>> {
    const shape: EntityTable<K> = ENTITY_TABLES[kind];
    const values: unknown[] = [filter.includeDeleted];
    const conditions = ["($1::boolean or e.deleted_at is null)"];
    let join = "";

    if (filter.parent) {
      const link = LINK_TABLES[LINK_KIND[filter.parent.kind]];
      values.push(filter.parent.id);
      join = `join ${link.table} l on l.${link.child} = e.id and l.${link.parent} = $${values.length}`;
    }
    if (filter.search) {
      values.push(`%${escapeLike(filter.search)}%`);
      conditions.push(`e.name ilike $${values.length}`);
    }

    const where = conditions.join(" and ");
    const countResult = await this.query<{ total: number }>(
      `select count(*)::int as total from ${shape.table} e ${join} where ${where}`,
      values,
    );

    const direction = filter.sortOrder === "desc" ? "desc" : "asc";
    values.push(filter.perPage, (filter.page - 1) * filter.perPage);
    const result = await this.query<EntityRecord>(
      `select ${this.selectColumns(shape)}
       from ${shape.table} e ${join}
       where ${where}
       order by ${ENTITY_SORT_COLUMNS[filter.sortBy]} ${direction}, e.id asc
       limit $${values.length - 1} offset $${values.length}`,
      values,
    );

    return {
      items: result.rows.map((row) => shape.fromRow(row)),
      total: countResult.rows[0]?.total ?? 0,
    };
  }

  async update<K extends EntityKind>(kind: K, id: string, changes: EntityChanges<K>): Promise<EntityRows[K] | null> {
    const shape: EntityTable<K> = ENTITY_TABLES[kind];
    const assignments = ["updated_at = now()"];
    const values: unknown[] = [id];
    for (const column of shape.attrColumns) {
      const value: unknown = changes[column];
      if (value !== undefined) {
        values.push(value);
        assignments.push(`${column} = $${values.length}`);
      }
    }

    const result = await this.query<EntityRecord>(
      `update ${shape.table} e
       set ${assignments.join(", ")}
       where e.id = $1 and e.deleted_at is null
       returning ${this.selectColumns(shape)}`,
      values,
    );
    const row = result.rows[0];
    return row ? shape.fromRow(row) : null;
  }

  async markDeleted(kind: EntityKind, id: string): Promise<boolean> {
    const result = await this.query(
      `update ${ENTITY_TABLES[kind].table}
       set deleted_at = now(), updated_at = now()
       where id = $1 and deleted_at is null`,
      [id],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async remove(kind: EntityKind, id: string): Promise<boolean> {
    const result = await this.query(`delete from ${ENTITY_TABLES[kind].table} where id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async countLiveChildren(kind: ParentKind, id: string): Promise<number> {
    const link = LINK_TABLES[LINK_KIND[kind]];
    const childTable = kind === "cluster" ? ENTITY_TABLES.domain.table : ENTITY_TABLES.resource.table;
    const result = await this.query<{ total: number }>(
      `select count(*)::int as total
       from ${link.table} l
       join ${childTable} c on c.id = l.${link.child}
       where l.${link.parent} = $1 and c.deleted_at is null`,
      [id],
    );
    return result.rows[0]?.total ?? 0;
  }

  async clusterNameTaken(createdBy: string, name: string, excludeId?: string): Promise<boolean> {
    const result = await this.query<{ taken: boolean }>(
      "select app_cluster_name_taken($1, $2, $3::uuid) as taken",
      [createdBy, name, excludeId ?? null],
    );
    return result.rows[0]?.taken ?? false;
  }

  private selectColumns<K extends EntityKind>(shape: EntityTable<K>): string {
    const columns = new Set([...BASE_COLUMNS, ...shape.attrColumns]);
    return [...columns].map((column) => `e.${column}`).join(", ");
  }
}

export class PgMembershipRepository extends PgRepository implements MembershipRepository {
  async lockCluster(clusterId: string) {
    await this.query("select id from clusters where id = $1 for update", [clusterId]);
  }

  async find(clusterId: string, identityId: string): Promise<Membership | null> {
    const result = await this.query<MembershipRecord>(
      `select ${MEMBERSHIP_COLUMNS}
       from cluster_memberships m
       where m.cluster_id = $1 and m.identity_id = $2`,
      [clusterId, identityId],
    );
    const row = result.rows[0];
    return row ? membershipFromRow(row) : null;
  }

  async insert(membership: { cluster_id: string; identity_id: string; role: Role; comment: string | null }) {
    await this.query(
      `insert into cluster_memberships (cluster_id, identity_id, role, comment, created_at, updated_at)
       values ($1, $2, $3, $4, now(), now())`,
      [membership.cluster_id, membership.identity_id, membership.role, membership.comment],
    );
    const created = await this.find(membership.cluster_id, membership.identity_id);
    if (!created) {
      throw new Error("membership not visible after insert");
    }
    return created;
  }

  async update(
    clusterId: string,
    identityId: string,
    changes: { role: Role; comment?: string | null },
  ): Promise<Membership | null> {
    const values: unknown[] = [clusterId, identityId, changes.role];
    const assignments = ["role = $3", "updated_at = now()"];
    if (changes.comment !== undefined) {
      values.push(changes.comment);
      assignments.push(`comment = $${values.length}`);
    }
    const result = await this.query<MembershipRecord>(
      `update cluster_memberships m
       set ${assignments.join(", ")}
       where m.cluster_id = $1 and m.identity_id = $2
       returning ${MEMBERSHIP_COLUMNS}`,
      values,
    );
    const row = result.rows[0];
    return row ? membershipFromRow(row) : null;
  }

  async remove(clusterId: string, identityId: string): Promise<boolean> {
    const result = await this.query("delete from cluster_memberships where cluster_id = $1 and identity_id = $2", [
      clusterId,
      identityId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async countOwners(clusterId: string): Promise<number> {
    const result = await this.query<{ total: number }>(
      "select count(*)::int as total from cluster_memberships where cluster_id = $1 and role = 'owner'",
      [clusterId],
    );
    return result.rows[0]?.total ?? 0;
  }

  async list(clusterId: string, filter: MemberListFilter): Promise<Page<Membership>> {
    const values: unknown[] = [clusterId];
    const conditions = ["m.cluster_id = $1"];
    if (filter.search) {
      values.push(`%${escapeLike(filter.search)}%`);
      conditions.push(`(m.identity_id::text ilike $${values.length} or m.comment ilike $${values.length})`);
    }
    const where = conditions.join(" and ");

    const countResult = await this.query<{ total: number }>(
      `select count(*)::int as total from cluster_memberships m where ${where}`,
      values,
    );

    const direction = filter.sortOrder === "desc" ? "desc" : "asc";
    values.push(filter.perPage, (filter.page - 1) * filter.perPage);
    const result = await this.query<MembershipRecord>(
      `select ${MEMBERSHIP_COLUMNS}
       from cluster_memberships m
       where ${where}
       order by ${MEMBER_SORT_COLUMNS[filter.sortBy]} ${direction}, m.identity_id asc
       limit $${values.length - 1} offset $${values.length}`,
      values,
    );

    return {
      items: result.rows.map(membershipFromRow),
      total: countResult.rows[0]?.total ?? 0,
    };
  }

  async listForIdentity(identityId: string): Promise<Membership[]> {
    const result = await this.query<MembershipRecord>(
      `select ${MEMBERSHIP_COLUMNS}
       from cluster_memberships m
       where m.identity_id = $1
       order by m.created_at asc, m.cluster_id asc`,
      [identityId],
    );
    return result.rows.map(membershipFromRow);
  }
}

export class PgLinkRepository extends PgRepository implements LinkRepository {
  async insert(kind: LinkKind, parentId: string, childId: string): Promise<boolean> {
    const link = LINK_TABLES[kind];
    const result = await this.query(
      `insert into ${link.table} (${link.parent}, ${link.child}, created_at)
       values ($1, $2, now())
       on conflict (${link.parent}, ${link.child}) do nothing`,
      [parentId, childId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async remove(kind: LinkKind, parentId: string, childId: string): Promise<boolean> {
    const link = LINK_TABLES[kind];
    const result = await this.query(`delete from ${link.table} where ${link.parent} = $1 and ${link.child} = $2`, [
      parentId,
      childId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async parentsOf(kind: LinkKind, childId: string): Promise<string[]> {
    const link = LINK_TABLES[kind];
    const result = await this.query<{ parent_id: string }>(
      `select ${link.parent} as parent_id from ${link.table} where ${link.child} = $1 order by created_at asc`,
      [childId],
    );
    return result.rows.map((row) => row.parent_id);
  }
}
