import type { FastifyInstance } from "fastify";

import { requireUserAuth } from "../plugins/auth-user.js";
import { registerClusterRoutes } from "./clusters.js";
import { registerContextRoutes } from "./context.js";
import { registerDomainRoutes } from "./domains.js";
import { registerHealthRoutes } from "./health.js";
import { registerMembershipRoutes } from "./memberships.js";
import { registerResourceRoutes } from "./resources.js";

export async function registerRoutes(app: FastifyInstance) {
  await registerHealthRoutes(app);

  // everything below needs a verified identity before the body is parsed
  await app.register(async (authenticated) => {
    authenticated.addHook("onRequest", async (request) => {
      await requireUserAuth(request, authenticated.config);
    });

    await registerContextRoutes(authenticated);
    await registerClusterRoutes(authenticated);
    await registerMembershipRoutes(authenticated);
    await registerDomainRoutes(authenticated);
    await registerResourceRoutes(authenticated);
  });
}
