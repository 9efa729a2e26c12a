import fastify from "fastify";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";

import type { FastifyBaseLogger } from "fastify";

import { loadConfig, type EnvConfig } from "./config/index.js";
import { MemorySessionDriver } from "./db/memory/memory-session-driver.js";
import { PgSessionDriver } from "./db/pg-session-driver.js";
import { getPool } from "./db/pool.js";
import { SessionContextPropagator, type SessionProvider } from "./db/session-context.js";
import { registerPipeline } from "./platform/pipeline.js";
import { registerErrorHandlers } from "./web/error-handler.js";
import { registerRoutes } from "./web/routes/index.js";

declare module "fastify" {
  interface FastifyInstance {
    config: EnvConfig;
    database: SessionProvider;
  }
}

export type BuildAppOptions = {
  database?: SessionProvider;
};

function createDatabase(config: EnvConfig, logger: FastifyBaseLogger): SessionProvider {
  if (config.STORAGE_DRIVER === "memory") {
    return new SessionContextPropagator(new MemorySessionDriver(), logger);
  }
  return new SessionContextPropagator(new PgSessionDriver(getPool(), logger), logger);
}

export async function buildApp(options: BuildAppOptions = {}) {
  const config = loadConfig();
  const app = fastify({ logger: { level: config.LOG_LEVEL } });
  app.decorate("config", config);
  app.decorate("database", options.database ?? createDatabase(config, app.log));
  app.addHook("onClose", async () => {
    await app.database.close();
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: "Strata Core API",
        version: "0.1.0",
      },
    },
  });

  await app.register(swaggerUi, {
    routePrefix: "/docs",
  });

  registerPipeline(app);
  registerErrorHandlers(app);
  await app.register(registerRoutes, { prefix: "/api/v1" });

  return app;
}
