import express from "express";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { prepareDatabase } from "./bootstrap";
import { TimetableEngine } from "./engine";
import { registerRoutes } from "./routes";
import { createLogger, setLogLevel } from "./logger";

const log = createLogger("server");

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL must be set");
  }

  const { pool, db } = createDatabase(config.databaseUrl);
  await prepareDatabase(db);

  const app = express();
  const engine = new TimetableEngine(db, config.engine);
  const server = registerRoutes(app, engine);

  server.listen(config.port, () => {
    log.info(`serving on port ${config.port} (${config.env})`);
  });

  const shutdown = () => {
    log.info("shutting down");
    server.close(() => {
      pool.end().catch((error: unknown) => log.error("Failed to close database pool:", error));
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  log.error("Server failed to start:", error);
  process.exit(1);
});
