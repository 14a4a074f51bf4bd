import express from "express";
import { createPool, initDb } from "./db";
import { PgDailyStore } from "./fitness-store";
import { registerRoutes } from "./routes";
import { loadServiceConfig } from "./shealth-config";

async function main() {
  const config = loadServiceConfig();
  console.log(`[server] shealth root -> ${config.shealth.rootDir}`);
  console.log(`[server] clusters -> ${config.shealth.clusters.length}`);

  const pool = createPool(config.databaseUrl);
  await initDb(pool);

  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  const server = registerRoutes(app, { config, store: new PgDailyStore(pool) });
  server.listen(config.port, () => {
    console.log(`[server] listening on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] received ${signal}, shutting down...`);
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("[server] failed to close pool:", err);
          process.exit(1);
        },
      );
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("[server] fatal:", err);
  process.exit(1);
});
