// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

const ENVIRONMENTS: readonly AppConfig["env"][] = ["development", "production", "test"];

function readEnv(env: NodeJS.ProcessEnv): AppConfig["env"] {
  const raw = env.ECOSORT_ENV ?? "development";
  const match = ENVIRONMENTS.find((candidate) => candidate === raw);
  if (!match) {
    throw new ConfigurationError(
      `ECOSORT_ENV must be one of ${ENVIRONMENTS.join(", ")}; got "${raw}"`,
    );
  }
  return match;
}

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(
      `${name} must be an integer between ${min} and ${max}; got "${raw}"`,
    );
  }
  return value;
}

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a hard-coded default so the service can start with zero
 * configuration for local development, given a model at the default path.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    env: readEnv(env),
    port: readInt(env, "ECOSORT_PORT", 3000, 1, 65_535),
    logLevel: env.ECOSORT_LOG_LEVEL ?? "info",
    modelPath: env.ECOSORT_MODEL_PATH ?? "models/ecosort/model.json",
    factsPath: env.ECOSORT_FACTS_PATH ?? "config/waste-facts.yaml",
    maxUploadBytes: readInt(env, "ECOSORT_MAX_UPLOAD_BYTES", 10 * 1024 * 1024, 1),

    rateLimit: {
      enabled: env.ECOSORT_RATE_LIMIT_ENABLED !== "false",
      uploadsRpm: readInt(env, "ECOSORT_RATE_LIMIT_UPLOADS_RPM", 30, 1),
      trustProxy: env.ECOSORT_TRUST_PROXY === "true",
    },
  };
}
