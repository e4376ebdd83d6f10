// ---------------------------------------------------------------------------
// Per-client upload quota for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { RateLimitConfig } from "../../core/types.js";
import type { AppEnv } from "../env.js";

const WINDOW_MS = 60_000;
const SWEEP_INTERVAL_MS = 300_000;

interface Window {
  startedAt: number;
  uploads: number;
}

export type QuotaDecision = { allowed: true } | { allowed: false; retryAfterSeconds: number };

/**
 * Fixed one-minute windows of `limit` uploads per client key.
 */
export class UploadQuota {
  private readonly windows = new Map<string, Window>();

  constructor(
    private readonly limit: number,
    private readonly now: () => number = Date.now,
  ) {}

  take(client: string): QuotaDecision {
    const now = this.now();
    let window = this.windows.get(client);

    if (!window || now - window.startedAt >= WINDOW_MS) {
      window = { startedAt: now, uploads: 0 };
      this.windows.set(client, window);
    }

    window.uploads++;
    if (window.uploads <= this.limit) return { allowed: true };

    return {
      allowed: false,
      retryAfterSeconds: Math.ceil((window.startedAt + WINDOW_MS - now) / 1000),
    };
  }

  /** Forget clients idle for two windows. */
  sweep(): void {
    const now = this.now();
    for (const [client, window] of this.windows) {
      if (now - window.startedAt > WINDOW_MS * 2) this.windows.delete(client);
    }
  }

  get size(): number {
    return this.windows.size;
  }
}

/**
 * Limit `/classify` and `/report` to `config.uploadsRpm` requests per client
 * per minute; the excess gets 429 with `Retry-After`.
 *
 * Clients are told apart by `X-Forwarded-For` / `X-Real-IP` only when
 * `config.trustProxy` is set; otherwise they share one quota.
 */
export function rateLimitMiddleware(
  config: RateLimitConfig,
): (c: Context<AppEnv>, next: Next) => Promise<Response | void> {
  const quota = new UploadQuota(config.uploadsRpm);

  if (config.enabled) {
    setInterval(() => quota.sweep(), SWEEP_INTERVAL_MS).unref();
  }

  return async (c, next) => {
    if (!config.enabled) {
      await next();
      return;
    }

    const decision = quota.take(clientKey(c, config.trustProxy));
    if (!decision.allowed) {
      c.header("Retry-After", String(decision.retryAfterSeconds));
      return c.json(
        {
          error: "Too many requests",
          type: "rate_limit_exceeded",
          retryAfterSeconds: decision.retryAfterSeconds,
        },
        429,
      );
    }

    await next();
  };
}

function clientKey(c: Context<AppEnv>, trustProxy: boolean): string {
  if (trustProxy) {
    const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
    if (forwarded) return forwarded;

    const realIp = c.req.header("x-real-ip");
    if (realIp) return realIp;
  }
  return "shared";
}
