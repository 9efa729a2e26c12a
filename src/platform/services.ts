import type { BoundSession } from "../db/session-context.js";
import type { IdentityContext } from "./request-context.js";
import type { LoggerLike } from "../shared/logger.js";

import { AuthorizationGuard } from "../access/authorization-guard.js";
import { HierarchyService } from "../hierarchy/hierarchy-service.js";
import { HierarchyStore } from "../hierarchy/hierarchy-store.js";
import { MembershipRegistry, MembershipRoles } from "../membership/membership-registry.js";
import { RelationshipManager } from "../relationships/relationship-manager.js";

export type Services = {
  identity: IdentityContext;
  hierarchy: HierarchyService;
  memberships: MembershipRegistry;
};

export function createServices(session: BoundSession, logger: LoggerLike): Services {
  const { entities, memberships, links } = session.repositories;
  const roles = new MembershipRoles(memberships);
  const guard = new AuthorizationGuard(roles, links);
  const registry = new MembershipRegistry(memberships, entities, roles, guard, logger);
  const relationships = new RelationshipManager(links, logger);
  const store = new HierarchyStore(entities, session.identity);

  return {
    identity: session.identity,
    hierarchy: new HierarchyService(session.identity, store, relationships, registry, guard),
    memberships: registry,
  };
}
