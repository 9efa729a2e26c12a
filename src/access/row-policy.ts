import type { Role } from "./role-permissions.js";

import { rolesGranting } from "./role-permissions.js";

export const POLICY_TABLES = ["clusters", "domains", "resources", "cluster_memberships"] as const;
export type PolicyTable = (typeof POLICY_TABLES)[number];

export const IDENTITY_SETTING = "app.current_identity_id";

export const APP_ROLE = "strata_app";

const LINK_TABLES = ["cluster_domain_links", "domain_resource_links"] as const;

export interface PolicyRows {
  clusters: { id: string; created_by: string };
  domains: { id: string; created_by: string };
  resources: { id: string; created_by: string };
  cluster_memberships: { cluster_id: string };
}

type LinkFact = { parent_id: string; child_id: string };

export interface PolicyFacts {
  clusters: Iterable<{ id: string; created_by: string }>;
  memberships: Iterable<{ cluster_id: string; identity_id: string; role: Role }>;
  clusterDomainLinks: Iterable<LinkFact>;
  domainResourceLinks: Iterable<LinkFact>;
}

export interface VisibilityClosure {
  identityId: string | null;
  clusterIds: ReadonlySet<string>;
  domainIds: ReadonlySet<string>;
  resourceIds: ReadonlySet<string>;
  /** Clusters the identity created that have no members yet (bootstrap owner insert). */
  unclaimedClusterIds: ReadonlySet<string>;
}

const EMPTY_CLOSURE: VisibilityClosure = Object.freeze({
  identityId: null,
  clusterIds: new Set<string>(),
  domainIds: new Set<string>(),
  resourceIds: new Set<string>(),
  unclaimedClusterIds: new Set<string>(),
});

function childrenOf(links: Iterable<LinkFact>, parents: ReadonlySet<string>): Set<string> {
  const children = new Set<string>();
  for (const link of links) {
    if (parents.has(link.parent_id)) {
      children.add(link.child_id);
    }
  }
  return children;
}

export function computeVisibility(identityId: string | null, facts: PolicyFacts): VisibilityClosure {
  if (!identityId) {
    return EMPTY_CLOSURE;
  }

  const viewingRoles = new Set<Role>(rolesGranting("view"));
  const clusterIds = new Set<string>();
  const claimed = new Set<string>();
  for (const membership of facts.memberships) {
    claimed.add(membership.cluster_id);
    if (membership.identity_id === identityId && viewingRoles.has(membership.role)) {
      clusterIds.add(membership.cluster_id);
    }
  }

  const unclaimedClusterIds = new Set<string>();
  for (const cluster of facts.clusters) {
    if (cluster.created_by === identityId && !claimed.has(cluster.id)) {
      unclaimedClusterIds.add(cluster.id);
    }
  }

  const domainIds = childrenOf(facts.clusterDomainLinks, clusterIds);
  const resourceIds = childrenOf(facts.domainResourceLinks, domainIds);

  return { identityId, clusterIds, domainIds, resourceIds, unclaimedClusterIds };
}

export function isRowVisible<T extends PolicyTable>(table: T, row: PolicyRows[T], closure: VisibilityClosure): boolean {
  const checks: { [P in PolicyTable]: (candidate: PolicyRows[P]) => boolean } = {
    clusters: (candidate) => closure.clusterIds.has(candidate.id),
    domains: (candidate) => closure.domainIds.has(candidate.id),
    resources: (candidate) => closure.resourceIds.has(candidate.id),
    cluster_memberships: (candidate) => closure.clusterIds.has(candidate.cluster_id),
  };
  return checks[table](row);
}

export function canInsertRow<T extends PolicyTable>(table: T, row: PolicyRows[T], closure: VisibilityClosure): boolean {
  if (!closure.identityId) {
    return false;
  }
  const identityId = closure.identityId;
  const checks: { [P in PolicyTable]: (candidate: PolicyRows[P]) => boolean } = {
    clusters: (candidate) => candidate.created_by === identityId,
    domains: (candidate) => candidate.created_by === identityId,
    resources: (candidate) => candidate.created_by === identityId,
    cluster_memberships: (candidate) =>
      closure.clusterIds.has(candidate.cluster_id) || closure.unclaimedClusterIds.has(candidate.cluster_id),
  };
  return checks[table](row);
}

type SqlPolicy = {
  visible: string;
  insertCheck: string;
};

const SQL_POLICIES: Readonly<Record<PolicyTable, SqlPolicy>> = Object.freeze({
  clusters: {
    visible: "id in (select app_visible_cluster_ids())",
    insertCheck: "created_by = app_current_identity()",
  },
  domains: {
    visible: "id in (select app_visible_domain_ids())",
    insertCheck: "created_by = app_current_identity()",
  },
  resources: {
    visible: "id in (select app_visible_resource_ids())",
    insertCheck: "created_by = app_current_identity()",
  },
  cluster_memberships: {
    visible: "cluster_id in (select app_visible_cluster_ids())",
    insertCheck:
      "cluster_id in (select app_visible_cluster_ids()) or cluster_id in (select app_unclaimed_cluster_ids())",
  },
});

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function renderHelperFunctions(): string {
  const viewingRoles = rolesGranting("view").map(quoteLiteral).join(", ");
  return `create or replace function app_current_identity() returns uuid
  language sql stable
as $$ select nullif(current_setting(${quoteLiteral(IDENTITY_SETTING)}, true), '')::uuid $$;

create or replace function app_visible_cluster_ids() returns setof uuid
  language sql stable security definer set search_path = public
as $$
  select m.cluster_id from cluster_memberships m
   where m.identity_id = app_current_identity() and m.role in (${viewingRoles})
$$;

create or replace function app_visible_domain_ids() returns setof uuid
  language sql stable security definer set search_path = public
as $$
  select l.domain_id from cluster_domain_links l
   where l.cluster_id in (select app_visible_cluster_ids())
$$;

create or replace function app_visible_resource_ids() returns setof uuid
  language sql stable security definer set search_path = public
as $$
  select l.resource_id from domain_resource_links l
   where l.domain_id in (select app_visible_domain_ids())
$$;

create or replace function app_unclaimed_cluster_ids() returns setof uuid
  language sql stable security definer set search_path = public
as $$
  select c.id from clusters c
   where c.created_by = app_current_identity()
     and not exists (select 1 from cluster_memberships m where m.cluster_id = c.id)
$$;

create or replace function app_cluster_name_taken(p_created_by uuid, p_name text, p_exclude_id uuid)
  returns boolean
  language sql stable security definer set search_path = public
as $$
  select exists (
    select 1 from clusters c
     where c.created_by = p_created_by
       and lower(c.name) = lower(p_name)
       and c.deleted_at is null
       and (p_exclude_id is null or c.id <> p_exclude_id)
  )
$$;`;
}

function renderRoleGrants(): string {
  const tables = [...POLICY_TABLES, ...LINK_TABLES].join(", ");
  return `do $$
begin
  if not exists (select 1 from pg_roles where rolname = ${quoteLiteral(APP_ROLE)}) then
    create role ${APP_ROLE} nologin;
  end if;
end
$$;

grant ${APP_ROLE} to current_user;
grant usage on schema public to ${APP_ROLE};
grant select, insert, update, delete on ${tables} to ${APP_ROLE};`;
}

function renderTablePolicies(table: PolicyTable): string {
  const policy = SQL_POLICIES[table];
  return [
    `alter table ${table} enable row level security;`,
    `drop policy if exists ${table}_select on ${table};`,
    `drop policy if exists ${table}_insert on ${table};`,
    `drop policy if exists ${table}_update on ${table};`,
    `drop policy if exists ${table}_delete on ${table};`,
    `create policy ${table}_select on ${table} for select using (${policy.visible});`,
    `create policy ${table}_insert on ${table} for insert with check (${policy.insertCheck});`,
    `create policy ${table}_update on ${table} for update using (${policy.visible}) with check (${policy.visible});`,
    `create policy ${table}_delete on ${table} for delete using (${policy.visible});`,
  ].join("\n");
}

export function renderRowPolicySql(): string {
  return [renderRoleGrants(), renderHelperFunctions(), ...POLICY_TABLES.map(renderTablePolicies)].join("\n\n");
}
