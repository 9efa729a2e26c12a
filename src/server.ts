import { buildApp } from "./app.js";
import { loadConfig } from "./config/index.js";
import { migrateDatabase } from "./db/migrate.js";

async function start() {
  const config = loadConfig();
  if (config.STORAGE_DRIVER === "postgres") {
    await migrateDatabase({ closePool: false });
  }

  const app = await buildApp();
  const port = app.config.PORT;
  const host = app.config.HOST;

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "shutting down");
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, "shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port, host });
  app.log.info(`Server listening on ${host}:${port}`);
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
