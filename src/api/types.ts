import type { Logger } from "pino";

/** Variables every request context carries. */
export interface AppEnv {
  Variables: {
    requestId: string;
    logger: Logger;
  };
}
