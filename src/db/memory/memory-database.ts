import type { VisibilityClosure } from "../../access/row-policy.js";
import type { EntityKind, EntityRows, LinkKind, Membership } from "../../hierarchy/types.js";

import { computeVisibility } from "../../access/row-policy.js";
import { KeyedLock } from "./keyed-lock.js";

export type LinkRow = {
  parent_id: string;
  child_id: string;
  created_at: string;
};

export function membershipKey(clusterId: string, identityId: string): string {
  return `${clusterId}:${identityId}`;
}

export function linkKey(parentId: string, childId: string): string {
  return `${parentId}:${childId}`;
}

/**
 * Process-local tables for tests and `STORAGE_DRIVER=memory`. Reads are
 * read-uncommitted across sessions; transactions are undo logs kept on each
 * connection.
 */
export class MemoryDatabase {
  readonly entities: { [K in EntityKind]: Map<string, EntityRows[K]> } = {
    cluster: new Map(),
    domain: new Map(),
    resource: new Map(),
  };

  readonly memberships = new Map<string, Membership>();

  readonly links: Record<LinkKind, Map<string, LinkRow>> = {
    cluster_domain: new Map(),
    domain_resource: new Map(),
  };

  readonly locks = new KeyedLock();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  now(): string {
    return this.clock().toISOString();
  }

  visibility(identityId: string | null): VisibilityClosure {
    return computeVisibility(identityId, {
      clusters: this.entities.cluster.values(),
      memberships: this.memberships.values(),
      clusterDomainLinks: this.links.cluster_domain.values(),
      domainResourceLinks: this.links.domain_resource.values(),
    });
  }
}

export class MemoryConnection {
  private boundIdentity: string | null = null;
  private undoLog: Array<() => void> = [];
  private readonly heldLocks = new Map<string, () => void>();

  constructor(readonly db: MemoryDatabase) {}

  get identityId(): string | null {
    return this.boundIdentity;
  }

  begin(identityId: string) {
    this.undoLog = [];
    this.boundIdentity = identityId;
  }

  record(undo: () => void) {
    this.undoLog.push(undo);
  }

  async lock(key: string) {
    if (this.heldLocks.has(key)) {
      return;
    }
    const release = await this.db.locks.acquire(key);
    this.heldLocks.set(key, release);
  }

  commit() {
    this.undoLog = [];
    this.releaseLocks();
  }

  rollback() {
    const undo = this.undoLog.reverse();
    this.undoLog = [];
    for (const step of undo) {
      step();
    }
    this.releaseLocks();
  }

  reset() {
    this.boundIdentity = null;
    this.releaseLocks();
  }

  private releaseLocks() {
    for (const release of this.heldLocks.values()) {
      release();
    }
    this.heldLocks.clear();
  }
}
