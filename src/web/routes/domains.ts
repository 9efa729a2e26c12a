import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { registerChildRoutes, registerEntityCrud } from "./entity-routes.js";

const domainPatchSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().nullable().optional(),
  })
  .refine((value) => value.name !== undefined || value.description !== undefined, {
    message: "At least one field must be provided",
  });

const resourceCreateSchema = z.object({
  name: z.string(),
  resource_type: z.string().nullable().optional(),
  config: z.record(z.unknown()).optional(),
});

export async function registerDomainRoutes(app: FastifyInstance) {
  registerEntityCrud(app, "domain", "/domains", domainPatchSchema);

  registerChildRoutes(app, "domain", "/domains", "resources", resourceCreateSchema, (services, domainId, attrs) =>
    services.hierarchy.createResource(domainId, attrs),
  );
}
