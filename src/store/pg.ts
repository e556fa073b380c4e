// ---------------------------------------------------------------------------
// Postgres pool construction, schema bootstrap and the narrow client
// interfaces the store is written against.
// ---------------------------------------------------------------------------

import { readFileSync } from "node:fs";
import pg from "pg";
import type { Logger } from "pino";
import type { DatabaseConfig } from "../core/types.js";

export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlClient extends SqlExecutor {
  release(): void;
}

/** The subset of `pg.Pool` the store uses. */
export interface SqlPool extends SqlExecutor {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

const SCHEMA_URL = new URL("../../database/schema.sql", import.meta.url);

export function createPool(config: DatabaseConfig, logger: Logger): pg.Pool {
  const poolOpts: pg.PoolConfig = config.connectionString
    ? { connectionString: config.connectionString, max: config.maxConnections }
    : {
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        max: config.maxConnections,
      };
  const pool = new pg.Pool(poolOpts);
  // Dead idle connections are replaced by the pool; log instead of crashing.
  pool.on("error", (err) => {
    logger.error({ err }, "Postgres pool background error");
  });
  return pool;
}

export async function initSchema(pool: SqlExecutor): Promise<void> {
  const sql = readFileSync(SCHEMA_URL, "utf-8");
  await pool.query(sql);
}

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
]);

/** Whether `err` means the database cannot be reached at all. */
export function isConnectionFailure(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = "code" in err && typeof err.code === "string" ? err.code : "";
  // Class 08: connection exception.
  return CONNECTION_ERROR_CODES.has(code) || code.startsWith("08");
}

/** Integrity-constraint violations (class 23) never succeed on retry. */
export function isConstraintViolation(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return "code" in err && typeof err.code === "string" && err.code.startsWith("23");
}
