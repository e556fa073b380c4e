// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import type { AppConfig } from "../core/types.js";

const EnvSchema = z.object({
  COMPILATIO_ENV: z
    .enum(["development", "staging", "production"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.string().min(1).default("info"),

  DATABASE_URL: z.string().min(1).optional(),
  PGHOST: z.string().min(1).default("localhost"),
  PGPORT: z.coerce.number().int().positive().default(5432),
  PGDATABASE: z.string().min(1).default("compilatio"),
  PGUSER: z.string().min(1).optional(),
  PGPASSWORD: z.string().optional(),
  PG_MAX_CONNECTIONS: z.coerce.number().int().positive().default(8),

  IMPORT_DELAY_MS: z.coerce.number().int().nonnegative().default(300),
  IMPORT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  // Total attempts per fetch, including the first.
  IMPORT_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  IMPORT_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  CHECKPOINT_DIR: z.string().min(1).default("data/checkpoints"),
  SOURCES_DIR: z.string().min(1).default("config/sources"),
});

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a hard-coded default so the importer and the API can
 * start with zero configuration for local development.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;

  return {
    env: e.COMPILATIO_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,

    database: {
      connectionString: e.DATABASE_URL,
      host: e.PGHOST,
      port: e.PGPORT,
      database: e.PGDATABASE,
      user: e.PGUSER,
      password: e.PGPASSWORD,
      maxConnections: e.PG_MAX_CONNECTIONS,
    },

    import: {
      delayMs: e.IMPORT_DELAY_MS,
      timeoutMs: e.IMPORT_TIMEOUT_MS,
      maxRetries: e.IMPORT_MAX_RETRIES - 1,
      retryDelayMs: e.IMPORT_RETRY_DELAY_MS,
      testModeCap: 5,
      checkpointDir: e.CHECKPOINT_DIR,
      sourcesDir: e.SOURCES_DIR,
    },
  };
}
