// ---------------------------------------------------------------------------
// Compilatio read API -- application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type { Logger } from "pino";

import type { AppConfig } from "./core/types.js";
import { loadConfig } from "./config/config.js";
import { createLogger } from "./logging/logger.js";
import { createPool, type SqlPool } from "./store/pg.js";
import { PgManuscriptStore } from "./store/pg-manuscript-store.js";
import { createApp } from "./api/server.js";
import type { AppEnv } from "./api/types.js";

export interface BuiltApp {
  app: Hono<AppEnv>;
  config: AppConfig;
  logger: Logger;
  pool: SqlPool;
}

export function buildApp(config: AppConfig = loadConfig()): BuiltApp {
  const logger = createLogger({
    level: config.logLevel,
    prettyPrint: config.env === "development",
    redactSecrets: true,
  });

  const pool = createPool(config.database, logger.child({ module: "pg" }));
  const store = new PgManuscriptStore(pool, logger);

  const app = createApp({
    reader: store,
    logger,
    production: config.env === "production",
  });

  logger.info({ port: config.port, env: config.env, database: config.database }, "compilatio api ready");

  return { app, config, logger, pool };
}
