// ---------------------------------------------------------------------------
// EcoSort -- Application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type pino from "pino";

import type { AppConfig } from "./core/types.js";
import { WASTE_LABELS } from "./core/types.js";
import { loadConfig } from "./config/config.js";
import { createLogger } from "./logging/logger.js";
import { loadKnowledgeBase } from "./knowledge/knowledge-base.js";
import { TfjsWasteClassifier } from "./classifier/tfjs-classifier.js";
import { ClassificationPipeline } from "./pipeline/classification-pipeline.js";
import type { AppEnv } from "./api/env.js";
import { createApp } from "./api/server.js";

export interface BootstrapOptions {
  /** Send log lines to stderr, keeping stdout for command output. */
  logToStderr?: boolean;
}

export interface Runtime {
  config: AppConfig;
  logger: pino.Logger;
  pipeline: ClassificationPipeline;
}

/**
 * Load configuration, the knowledge base and the model.
 *
 * Any failure here is fatal: a missing or invalid model raises
 * `ModelLoadError`, a bad facts file raises `ConfigurationError`.
 */
export async function bootstrap(
  config: AppConfig = loadConfig(),
  options: BootstrapOptions = {},
): Promise<Runtime> {
  // 1. Create logger
  const logger = createLogger({
    level: config.logLevel,
    prettyPrint: config.env === "development",
    destination: options.logToStderr ? 2 : 1,
  });

  // 2. Load the knowledge base
  const knowledge = loadKnowledgeBase(config.factsPath, WASTE_LABELS);
  logger.info({ categories: knowledge.labels.length }, "knowledge base loaded");

  // 3. Load the classifier once for the whole process
  const classifier = await TfjsWasteClassifier.load(
    config.modelPath,
    WASTE_LABELS,
    logger.child({ module: "classifier" }),
  );

  // 4. Wire the pipeline
  const pipeline = new ClassificationPipeline(
    classifier,
    knowledge,
    logger.child({ module: "pipeline" }),
  );

  return { config, logger, pipeline };
}

export async function buildApp(config?: AppConfig): Promise<{ app: Hono<AppEnv>; runtime: Runtime }> {
  const runtime = await bootstrap(config);

  const app = createApp({
    pipeline: runtime.pipeline,
    logger: runtime.logger,
    rateLimitConfig: runtime.config.rateLimit,
    maxUploadBytes: runtime.config.maxUploadBytes,
    isProduction: runtime.config.env === "production",
  });

  runtime.logger.info(
    {
      port: runtime.config.port,
      env: runtime.config.env,
      model: runtime.pipeline.modelId,
    },
    "ecosort ready",
  );

  return { app, runtime };
}
