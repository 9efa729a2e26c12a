import type { FastifyInstance } from "fastify";

import type { RequestContext } from "./request-context.js";

declare module "fastify" {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function registerPipeline(app: FastifyInstance) {
  app.decorateRequest("requestContext", null as unknown as RequestContext);

  app.addHook("onRequest", async (request, reply) => {
    const controller = new AbortController();
    // client went away before the response was written
    reply.raw.on("close", () => {
      if (!reply.raw.writableEnded) {
        controller.abort();
      }
    });

    request.requestContext = {
      requestId: request.id,
      identity: null,
      signal: controller.signal,
    };
  });
}
