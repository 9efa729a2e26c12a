import type { LinkRepository } from "../db/repositories.js";
import type { EntityKind, LinkKind } from "../hierarchy/types.js";
import type { LoggerLike } from "../shared/logger.js";

import { ForeignKeyViolationError, UniqueViolationError } from "../db/errors.js";
import { CHILD_KIND, LINK_KIND } from "../hierarchy/types.js";
import { NotFoundError, ValidationFailedError } from "../shared/errors.js";

export type LinkOutcome = "created" | "already_linked";
export type UnlinkOutcome = "removed" | "already_unlinked";

export function resolveLinkKind(parentKind: EntityKind, childKind: EntityKind): LinkKind {
  if (parentKind !== "resource" && CHILD_KIND[parentKind] === childKind) {
    return LINK_KIND[parentKind];
  }
  throw new ValidationFailedError({
    link: [`${parentKind} cannot be linked to ${childKind}`],
  });
}

export class RelationshipManager {
  constructor(
    private readonly links: LinkRepository,
    private readonly logger: LoggerLike,
  ) {}

  async link(parentKind: EntityKind, parentId: string, childKind: EntityKind, childId: string): Promise<LinkOutcome> {
    const kind = resolveLinkKind(parentKind, childKind);
    try {
      const created = await this.links.insert(kind, parentId, childId);
      if (created) {
        this.logger.debug({ kind, parentId, childId }, "link created");
      }
      return created ? "created" : "already_linked";
    } catch (error) {
      // a concurrent insert of the same pair won the race
      if (error instanceof UniqueViolationError) {
        return "already_linked";
      }
      if (error instanceof ForeignKeyViolationError) {
        throw new NotFoundError(`${parentKind} or ${childKind} not found`);
      }
      throw error;
    }
  }

  async unlink(parentKind: EntityKind, parentId: string, childKind: EntityKind, childId: string): Promise<UnlinkOutcome> {
    const kind = resolveLinkKind(parentKind, childKind);
    const removed = await this.links.remove(kind, parentId, childId);
    if (removed) {
      this.logger.debug({ kind, parentId, childId }, "link removed");
    }
    return removed ? "removed" : "already_unlinked";
  }
}
