// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import type pino from "pino";
import type { AppEnv } from "./env.js";
import type { RateLimitConfig } from "../core/types.js";
import type { ClassificationPipeline } from "../pipeline/classification-pipeline.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { rateLimitMiddleware } from "./middleware/rate-limit.js";
import { createErrorHandler } from "./middleware/error-handler.js";

import { classifyRoutes, reportRoutes } from "./routes/classify.js";
import { knowledgeRoutes } from "./routes/knowledge.js";
import { healthRoutes } from "./routes/health.js";
import { renderHomePage } from "./page.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  pipeline: ClassificationPipeline;
  logger: pino.Logger;
  rateLimitConfig: RateLimitConfig;
  maxUploadBytes: number;
  /** Parent directory for report scratch files. */
  tmpDir?: string;
  /** Source of randomness for the sidebar trivia line. */
  random?: () => number;
  /** Hide server-side error details from responses. */
  isProduction?: boolean;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Per-IP rate limiting and body-size limit on the upload routes.
 * 4. Route handlers.
 * 5. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { pipeline } = deps;

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  const uploadLimit = bodyLimit({
    maxSize: deps.maxUploadBytes,
    onError: (c) =>
      c.json(
        {
          error: `Upload exceeds ${deps.maxUploadBytes} bytes`,
          type: "upload_too_large",
        },
        413,
      ),
  });
  const rateLimit = rateLimitMiddleware(deps.rateLimitConfig);

  for (const path of ["/classify", "/report"]) {
    app.use(path, rateLimit);
    app.use(path, uploadLimit);
  }

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) => {
    const accept = c.req.header("accept") ?? "";
    const wantsHtml = accept.includes("text/html") || accept.includes("*/*");

    if (!wantsHtml) {
      return c.json({
        name: "ecosort",
        model: pipeline.modelId,
        routes: ["/health", "/knowledge", "/classify", "/report"],
      });
    }

    return c.html(
      renderHomePage({
        modelId: pipeline.modelId,
        labels: pipeline.classifier.labels,
        didYouKnow: pipeline.knowledge.randomFact(deps.random),
      }),
    );
  });

  app.route("/classify", classifyRoutes({ pipeline, tmpDir: deps.tmpDir }));
  app.route("/report", reportRoutes({ pipeline, tmpDir: deps.tmpDir }));
  app.route("/knowledge", knowledgeRoutes({ knowledge: pipeline.knowledge }));
  app.route(
    "/health",
    healthRoutes({ modelId: pipeline.modelId, labelCount: pipeline.classifier.labels.length }),
  );

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(createErrorHandler(deps.isProduction ?? false));

  return app;
}
