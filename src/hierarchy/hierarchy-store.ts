import { randomUUID } from "node:crypto";

import type { EntityRepository } from "../db/repositories.js";
import type { IdentityContext } from "../platform/request-context.js";
import type { FieldErrors } from "../shared/errors.js";
import type {
  EntityAttrs,
  EntityChanges,
  EntityKind,
  EntityListFilter,
  EntityRows,
  Page,
  ParentKind,
} from "./types.js";

import { UniqueViolationError } from "../db/errors.js";
import { ConflictError, NotFoundError, ValidationFailedError } from "../shared/errors.js";
import { charLength } from "../shared/text.js";
import { ENTITY_LABELS } from "./types.js";

export const NAME_MAX_LENGTH = 255;
export const DESCRIPTION_MAX_LENGTH = 10000;
export const RESOURCE_TYPE_MAX_LENGTH = 100;

const CHILD_LABELS: Readonly<Record<ParentKind, string>> = Object.freeze({
  cluster: "domains",
  domain: "resources",
});

function tooLong(max: number): string {
  return `is too long (maximum is ${max} characters)`;
}

function addError(errors: FieldErrors, field: string, message: string) {
  (errors[field] ??= []).push(message);
}

type ValidatableAttrs = {
  name?: string;
  description?: string | null;
  resource_type?: string | null;
};

export function validateEntityAttrs(
  attrs: ValidatableAttrs,
  mode: "create" | "update",
): { name: string | undefined; errors: FieldErrors } {
  const errors: FieldErrors = {};
  let name: string | undefined;

  if (attrs.name !== undefined || mode === "create") {
    name = (attrs.name ?? "").trim();
    if (name.length === 0) {
      addError(errors, "name", "can't be blank");
    } else if (charLength(name) > NAME_MAX_LENGTH) {
      addError(errors, "name", tooLong(NAME_MAX_LENGTH));
    }
  }

  if (attrs.description && charLength(attrs.description) > DESCRIPTION_MAX_LENGTH) {
    addError(errors, "description", tooLong(DESCRIPTION_MAX_LENGTH));
  }

  if (attrs.resource_type && charLength(attrs.resource_type) > RESOURCE_TYPE_MAX_LENGTH) {
    addError(errors, "resource_type", tooLong(RESOURCE_TYPE_MAX_LENGTH));
  }

  return { name, errors };
}

function hasErrors(errors: FieldErrors): boolean {
  return Object.keys(errors).length > 0;
}

export type GetOptions = { includeDeleted?: boolean };

export class HierarchyStore {
  constructor(
    private readonly entities: EntityRepository,
    private readonly identity: IdentityContext,
    private readonly generateId: () => string = randomUUID,
  ) {}

  async create<K extends EntityKind>(kind: K, attrs: EntityAttrs[K]): Promise<string> {
    const validated = validateEntityAttrs(attrs, "create");
    const name = validated.name ?? "";
    if (kind === "cluster" && !validated.errors["name"]) {
      if (await this.entities.clusterNameTaken(this.identity.identityId, name)) {
        addError(validated.errors, "name", "has already been taken");
      }
    }
    if (hasErrors(validated.errors)) {
      throw new ValidationFailedError(validated.errors);
    }

    const id = this.generateId();
    try {
      await this.entities.insert(kind, {
        id,
        created_by: this.identity.identityId,
        attrs: { ...attrs, name },
      });
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new ConflictError(`${ENTITY_LABELS[kind]} already exists`);
      }
      throw error;
    }
    return id;
  }

  async get<K extends EntityKind>(kind: K, id: string, options: GetOptions = {}): Promise<EntityRows[K]> {
    const row = await this.entities.findById(kind, id, options.includeDeleted ?? false);
    if (!row) {
      throw new NotFoundError(`${ENTITY_LABELS[kind]} not found`);
    }
    return row;
  }

  async list<K extends EntityKind>(kind: K, filter: EntityListFilter): Promise<Page<EntityRows[K]>> {
    return this.entities.list(kind, filter);
  }

  async update<K extends EntityKind>(kind: K, id: string, attrs: EntityChanges<K>): Promise<EntityRows[K]> {
    const existing = await this.get(kind, id);
    const validated = validateEntityAttrs(attrs, "update");
    const name = validated.name;
    if (kind === "cluster" && name !== undefined && !validated.errors["name"]) {
      if (await this.entities.clusterNameTaken(existing.created_by, name, id)) {
        addError(validated.errors, "name", "has already been taken");
      }
    }
    if (hasErrors(validated.errors)) {
      throw new ValidationFailedError(validated.errors);
    }

    let updated: EntityRows[K] | null;
    try {
      const changes: EntityChanges<K> = name === undefined ? attrs : { ...attrs, name };
      updated = await this.entities.update(kind, id, changes);
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new ConflictError(`${ENTITY_LABELS[kind]} already exists`);
      }
      throw error;
    }
    if (!updated) {
      throw new NotFoundError(`${ENTITY_LABELS[kind]} not found`);
    }
    return updated;
  }

  async softDelete(kind: EntityKind, id: string) {
    await this.get(kind, id);
    await this.assertNoLiveChildren(kind, id);
    if (!(await this.entities.markDeleted(kind, id))) {
      throw new NotFoundError(`${ENTITY_LABELS[kind]} not found`);
    }
  }

  async hardDelete(kind: EntityKind, id: string) {
    await this.get(kind, id, { includeDeleted: true });
    await this.assertNoLiveChildren(kind, id);
    if (!(await this.entities.remove(kind, id))) {
      throw new NotFoundError(`${ENTITY_LABELS[kind]} not found`);
    }
  }

  private async assertNoLiveChildren(kind: EntityKind, id: string) {
    if (kind === "resource") {
      return;
    }
    const children = await this.entities.countLiveChildren(kind, id);
    if (children > 0) {
      throw new ConflictError(`${ENTITY_LABELS[kind]} still has ${children} linked ${CHILD_LABELS[kind]}`);
    }
  }
}
