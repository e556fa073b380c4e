// ---------------------------------------------------------------------------
// Root pino logger for the API server and the import tools.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

export type Logger = pino.Logger;

// Database credentials reach the logger through config objects and pg
// connection errors.
const REDACT_PATHS = [
  "password",
  "connectionString",
  "*.password",
  "*.connectionString",
  "database.password",
  "database.connectionString",
];

/**
 * JSON lines by default; `prettyPrint` switches to `pino-pretty`.  The
 * import tools log to stderr so that stdout carries only the run summary.
 */
export function createLogger(config: LoggingConfig): Logger {
  const fd = config.stream === "stderr" ? 2 : 1;
  const options: pino.LoggerOptions = {
    level: config.level,
    base: { app: "compilatio", pid: process.pid },
  };
  if (config.redactSecrets) {
    options.redact = { paths: REDACT_PATHS, censor: "[REDACTED]" };
  }

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          destination: fd,
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,app",
          messageFormat: "{if sourceId}[{sourceId}] {end}{msg}",
        },
      },
    });
  }

  return pino(options, pino.destination(fd));
}

