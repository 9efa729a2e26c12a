import type { FastifyInstance } from "fastify";
import type { z } from "zod";

import type { EntityChanges, EntityKind, ParentKind } from "../../hierarchy/types.js";
import type { Services } from "../../platform/services.js";

import { CHILD_KIND, ENTITY_LABELS } from "../../hierarchy/types.js";
import { ok, pageMeta } from "../envelope.js";
import { withServices } from "../session.js";
import {
  deleteQuerySchema,
  entityListQuerySchema,
  parseBody,
  parseId,
  parseQuery,
  showQuerySchema,
  toEntityFilter,
} from "../validation.js";

type IdParams = { id: string };
type LinkParams = { id: string; childId: string };

export function registerEntityCrud<K extends EntityKind>(
  app: FastifyInstance,
  kind: K,
  basePath: string,
  patchSchema: z.ZodType<EntityChanges<K>, z.ZodTypeDef, unknown>,
) {
  const label = ENTITY_LABELS[kind];

  app.get(basePath, async (request, reply) => {
    const query = parseQuery(entityListQuerySchema, request.query);
    const filter = toEntityFilter(query);
    const page = await withServices(app, request, (services) => services.hierarchy.listEntities(kind, filter));
    return reply.send(ok(page.items, pageMeta(query.page, query.per_page, page.total)));
  });

  app.get<{ Params: IdParams }>(`${basePath}/:id`, async (request, reply) => {
    const id = parseId(request.params.id, label);
    const query = parseQuery(showQuerySchema, request.query);
    const entity = await withServices(app, request, (services) =>
      services.hierarchy.getEntity(kind, id, { includeDeleted: query.include_deleted }),
    );
    return reply.send(ok(entity));
  });

  app.patch<{ Params: IdParams }>(`${basePath}/:id`, async (request, reply) => {
    const id = parseId(request.params.id, label);
    const changes = parseBody(patchSchema, request.body);
    const entity = await withServices(app, request, (services) => services.hierarchy.updateEntity(kind, id, changes));
    return reply.send(ok(entity));
  });

  app.delete<{ Params: IdParams }>(`${basePath}/:id`, async (request, reply) => {
    const id = parseId(request.params.id, label);
    const query = parseQuery(deleteQuerySchema, request.query);
    await withServices(app, request, (services) => services.hierarchy.deleteEntity(kind, id, { hard: query.hard }));
    return reply.code(204).send();
  });
}

export function registerChildRoutes<A>(
  app: FastifyInstance,
  parentKind: ParentKind,
  basePath: string,
  childSegment: string,
  createSchema: z.ZodType<A, z.ZodTypeDef, unknown>,
  create: (services: Services, parentId: string, attrs: A) => Promise<unknown>,
) {
  const childKind = CHILD_KIND[parentKind];
  const parentLabel = ENTITY_LABELS[parentKind];
  const childLabel = ENTITY_LABELS[childKind];
  const parentField = `${parentKind}_id`;
  const childField = `${childKind}_id`;

  app.get<{ Params: IdParams }>(`${basePath}/:id/${childSegment}`, async (request, reply) => {
    const parentId = parseId(request.params.id, parentLabel);
    const query = parseQuery(entityListQuerySchema, request.query);
    const page = await withServices(app, request, (services) =>
      services.hierarchy.listChildren(parentKind, parentId, toEntityFilter(query)),
    );
    return reply.send(ok(page.items, pageMeta(query.page, query.per_page, page.total)));
  });

  app.post<{ Params: IdParams }>(`${basePath}/:id/${childSegment}`, async (request, reply) => {
    const parentId = parseId(request.params.id, parentLabel);
    const attrs = parseBody(createSchema, request.body);
    const created = await withServices(app, request, (services) => create(services, parentId, attrs));
    return reply.code(201).send(ok(created));
  });

  app.post<{ Params: LinkParams }>(`${basePath}/:id/${childSegment}/:childId`, async (request, reply) => {
    const parentId = parseId(request.params.id, parentLabel);
    const childId = parseId(request.params.childId, childLabel);
    const outcome = await withServices(app, request, (services) =>
      services.hierarchy.linkChild(parentKind, parentId, childKind, childId),
    );
    return reply.send(ok({ [parentField]: parentId, [childField]: childId, status: outcome }));
  });

  app.delete<{ Params: LinkParams }>(`${basePath}/:id/${childSegment}/:childId`, async (request, reply) => {
    const parentId = parseId(request.params.id, parentLabel);
    const childId = parseId(request.params.childId, childLabel);
    const outcome = await withServices(app, request, (services) =>
      services.hierarchy.unlinkChild(parentKind, parentId, childKind, childId),
    );
    request.log.debug({ parentId, childId, outcome }, "unlink handled");
    return reply.code(204).send();
  });
}
