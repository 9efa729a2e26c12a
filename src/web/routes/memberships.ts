import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { ROLES } from "../../access/role-permissions.js";
import { UUID_RE } from "../../platform/request-context.js";
import { charLength } from "../../shared/text.js";
import { ok, pageMeta } from "../envelope.js";
import { withServices } from "../session.js";
import { memberListQuerySchema, parseBody, parseId, parseQuery, toMemberFilter } from "../validation.js";

export const COMMENT_MAX_LENGTH = 500;

const comment = z
  .string()
  .trim()
  .refine((value) => charLength(value) <= COMMENT_MAX_LENGTH, {
    message: `is too long (maximum is ${COMMENT_MAX_LENGTH} characters)`,
  })
  .nullable()
  .optional();

const role = z.enum(ROLES, { errorMap: () => ({ message: `must be one of ${ROLES.join(", ")}` }) });

const addMemberSchema = z.object({
  identity_id: z
    .string()
    .regex(UUID_RE, "must be a valid UUID")
    .transform((value) => value.toLowerCase()),
  role,
  comment,
});

const updateMemberSchema = z.object({
  role,
  comment,
});

// `:id` matches the cluster routes registered at the same path depth
type ClusterParams = { id: string };
type MemberParams = { id: string; identityId: string };

export async function registerMembershipRoutes(app: FastifyInstance) {
  app.get<{ Params: ClusterParams }>("/clusters/:id/members", async (request, reply) => {
    const clusterId = parseId(request.params.id, "Cluster");
    const query = parseQuery(memberListQuerySchema, request.query);
    const page = await withServices(app, request, (services) =>
      services.memberships.listMembers(services.identity, clusterId, toMemberFilter(query)),
    );
    return reply.send(ok(page.items, pageMeta(query.page, query.per_page, page.total)));
  });

  app.post<{ Params: ClusterParams }>("/clusters/:id/members", async (request, reply) => {
    const clusterId = parseId(request.params.id, "Cluster");
    const body = parseBody(addMemberSchema, request.body);
    const membership = await withServices(app, request, (services) =>
      services.memberships.addMember(services.identity, clusterId, body.identity_id, body.role, body.comment),
    );
    return reply.code(201).send(ok(membership));
  });

  app.patch<{ Params: MemberParams }>("/clusters/:id/members/:identityId", async (request, reply) => {
    const clusterId = parseId(request.params.id, "Cluster");
    const identityId = parseId(request.params.identityId, "Membership");
    const body = parseBody(updateMemberSchema, request.body);
    const membership = await withServices(app, request, (services) =>
      services.memberships.updateRole(services.identity, clusterId, identityId, body.role, body.comment),
    );
    return reply.send(ok(membership));
  });

  app.delete<{ Params: MemberParams }>("/clusters/:id/members/:identityId", async (request, reply) => {
    const clusterId = parseId(request.params.id, "Cluster");
    const identityId = parseId(request.params.identityId, "Membership");
    await withServices(app, request, (services) =>
      services.memberships.removeMember(services.identity, clusterId, identityId),
    );
    return reply.code(204).send();
  });
}
