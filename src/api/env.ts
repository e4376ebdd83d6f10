// ---------------------------------------------------------------------------
// Hono environment shared by the app, its middleware and its routes.
// ---------------------------------------------------------------------------

import type pino from "pino";

export interface AppEnv {
  Variables: {
    requestId: string;
    logger: pino.Logger;
  };
}
