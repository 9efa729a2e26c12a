import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { registerEntityCrud } from "./entity-routes.js";

const resourcePatchSchema = z
  .object({
    name: z.string().optional(),
    resource_type: z.string().nullable().optional(),
    config: z.record(z.unknown()).optional(),
  })
  .refine((value) => Object.values(value).some((field) => field !== undefined), {
    message: "At least one field must be provided",
  });

export async function registerResourceRoutes(app: FastifyInstance) {
  registerEntityCrud(app, "resource", "/resources", resourcePatchSchema);
}
