// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { AppEnv } from "../env.js";

/** Client-supplied ids must be short and alphanumeric to be echoed into logs. */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Returns a Hono middleware that assigns every request an id, stores it on
 * the context as `"requestId"` and echoes it in the `X-Request-ID` response
 * header. A well-formed incoming `X-Request-ID` is reused.
 */
export function requestIdMiddleware(): (c: Context<AppEnv>, next: Next) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing) ? existing : crypto.randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
