import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { ok } from "../envelope.js";
import { withServices } from "../session.js";
import { parseBody } from "../validation.js";
import { registerChildRoutes, registerEntityCrud } from "./entity-routes.js";

const description = z.string().nullable().optional();

const clusterCreateSchema = z.object({
  name: z.string(),
  description,
});

const clusterPatchSchema = z
  .object({
    name: z.string().optional(),
    description,
  })
  .refine((value) => value.name !== undefined || value.description !== undefined, {
    message: "At least one field must be provided",
  });

const domainCreateSchema = z.object({
  name: z.string(),
  description,
});

export async function registerClusterRoutes(app: FastifyInstance) {
  app.post("/clusters", async (request, reply) => {
    const attrs = parseBody(clusterCreateSchema, request.body);
    const cluster = await withServices(app, request, (services) => services.hierarchy.createCluster(attrs));
    return reply.code(201).send(ok(cluster));
  });

  registerEntityCrud(app, "cluster", "/clusters", clusterPatchSchema);

  registerChildRoutes(app, "cluster", "/clusters", "domains", domainCreateSchema, (services, clusterId, attrs) =>
    services.hierarchy.createDomain(clusterId, attrs),
  );
}
