import type { Role } from "../access/role-permissions.js";
import type {
  EntityAttrs,
  EntityChanges,
  EntityKind,
  EntityListFilter,
  EntityRows,
  LinkKind,
  MemberListFilter,
  Membership,
  Page,
  ParentKind,
} from "../hierarchy/types.js";

export type NewEntity<K extends EntityKind> = {
  id: string;
  created_by: string;
  attrs: EntityAttrs[K];
};

export interface EntityRepository {
  insert<K extends EntityKind>(kind: K, entity: NewEntity<K>): Promise<void>;
  findById<K extends EntityKind>(kind: K, id: string, includeDeleted: boolean): Promise<EntityRows[K] | null>;
  list<K extends EntityKind>(kind: K, filter: EntityListFilter): Promise<Page<EntityRows[K]>>;
  update<K extends EntityKind>(kind: K, id: string, changes: EntityChanges<K>): Promise<EntityRows[K] | null>;
  markDeleted(kind: EntityKind, id: string): Promise<boolean>;
  remove(kind: EntityKind, id: string): Promise<boolean>;
  countLiveChildren(kind: ParentKind, id: string): Promise<number>;
  clusterNameTaken(createdBy: string, name: string, excludeId?: string): Promise<boolean>;
}

export interface MembershipRepository {
  /** Serializes membership mutations of one cluster until the transaction ends. */
  lockCluster(clusterId: string): Promise<void>;
  find(clusterId: string, identityId: string): Promise<Membership | null>;
  insert(membership: { cluster_id: string; identity_id: string; role: Role; comment: string | null }): Promise<Membership>;
  update(
    clusterId: string,
    identityId: string,
    changes: { role: Role; comment?: string | null },
  ): Promise<Membership | null>;
  remove(clusterId: string, identityId: string): Promise<boolean>;
  countOwners(clusterId: string): Promise<number>;
  list(clusterId: string, filter: MemberListFilter): Promise<Page<Membership>>;
  listForIdentity(identityId: string): Promise<Membership[]>;
}

export interface LinkRepository {
  insert(kind: LinkKind, parentId: string, childId: string): Promise<boolean>;
  remove(kind: LinkKind, parentId: string, childId: string): Promise<boolean>;
  parentsOf(kind: LinkKind, childId: string): Promise<string[]>;
}

export interface Repositories {
  entities: EntityRepository;
  memberships: MembershipRepository;
  links: LinkRepository;
}
