import type { FastifyInstance } from "fastify";

import { ok } from "../envelope.js";
import { withServices } from "../session.js";

export async function registerContextRoutes(app: FastifyInstance) {
  app.get("/context", async (request, reply) => {
    const context = await withServices(app, request, (services) => services.hierarchy.context());
    return reply.send(ok(context));
  });
}
