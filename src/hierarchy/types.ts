import type { Role } from "../access/role-permissions.js";

export type EntityKind = "cluster" | "domain" | "resource";
export type ParentKind = "cluster" | "domain";

export const ENTITY_LABELS: Readonly<Record<EntityKind, string>> = Object.freeze({
  cluster: "Cluster",
  domain: "Domain",
  resource: "Resource",
});

type EntityBase = {
  id: string;
  name: string;
  created_by: string;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
};

export type Cluster = EntityBase & {
  description: string | null;
};

export type Domain = EntityBase & {
  description: string | null;
};

export type ResourceConfig = Record<string, unknown>;

export type Resource = EntityBase & {
  resource_type: string | null;
  config: ResourceConfig;
};

export interface EntityRows {
  cluster: Cluster;
  domain: Domain;
  resource: Resource;
}

export type ClusterAttrs = {
  name: string;
  description?: string | null;
};

export type DomainAttrs = {
  name: string;
  description?: string | null;
};

export type ResourceAttrs = {
  name: string;
  resource_type?: string | null;
  config?: ResourceConfig;
};

export interface EntityAttrs {
  cluster: ClusterAttrs;
  domain: DomainAttrs;
  resource: ResourceAttrs;
}

export type EntityChanges<K extends EntityKind> = Partial<EntityAttrs[K]>;

export type SortOrder = "asc" | "desc";
export type EntitySortField = "name" | "created_at" | "updated_at";

export type EntityListFilter = {
  page: number;
  perPage: number;
  sortBy: EntitySortField;
  sortOrder: SortOrder;
  search?: string;
  includeDeleted: boolean;
  parent?: { kind: ParentKind; id: string };
};

export type Page<T> = {
  items: T[];
  total: number;
};

export type Membership = {
  cluster_id: string;
  identity_id: string;
  role: Role;
  comment: string | null;
  created_at: string;
  updated_at: string;
};

export type MemberSortField = "identity_id" | "role" | "created_at";

export type MemberListFilter = {
  page: number;
  perPage: number;
  sortBy: MemberSortField;
  sortOrder: SortOrder;
  search?: string;
};

export type LinkKind = "cluster_domain" | "domain_resource";

export const CHILD_KIND: Readonly<Record<ParentKind, EntityKind>> = Object.freeze({
  cluster: "domain",
  domain: "resource",
});

export const LINK_KIND: Readonly<Record<ParentKind, LinkKind>> = Object.freeze({
  cluster: "cluster_domain",
  domain: "domain_resource",
});
