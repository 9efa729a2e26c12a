import type { FastifyInstance, FastifyRequest } from "fastify";

import type { Services } from "../platform/services.js";

import { createServices } from "../platform/services.js";
import { requireUserAuth } from "./plugins/auth-user.js";

export async function withServices<T>(
  app: FastifyInstance,
  request: FastifyRequest,
  fn: (services: Services) => Promise<T>,
): Promise<T> {
  const identity = await requireUserAuth(request, app.config);
  return app.database.withContext(identity, (session) => fn(createServices(session, request.log)), {
    signal: request.requestContext.signal,
  });
}
