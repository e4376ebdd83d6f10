// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint.
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";
import { buildApp } from "./app.js";

const { app, runtime } = await buildApp();

serve({
  fetch: app.fetch,
  port: runtime.config.port,
});
