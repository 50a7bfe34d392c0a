// ---------------------------------------------------------------------------
// Hono environment shared by middleware and routes.
// ---------------------------------------------------------------------------

import type { Logger } from "../logging/logger.js";

/** Per-request variables set by the middleware stack. */
export interface AppEnv {
  Variables: {
    requestId: string;
    logger: Logger;
  };
}
