// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  modelId: string;
  labelCount: number;
}

const startedAt = Date.now();

/**
 * - `GET /health` -- Liveness check with the loaded model's identity.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => {
    return c.json({
      status: "ok",
      uptime: Date.now() - startedAt,
      timestamp: new Date().toISOString(),
      model: {
        id: deps.modelId,
        classes: deps.labelCount,
      },
    });
  });

  return app;
}
