import { describe, it, expect } from "vitest";

import { loadConfig } from "../../../src/config/config.js";
import { ConfigurationError } from "../../../src/core/errors.js";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      env: "development",
      port: 3000,
      logLevel: "info",
      modelPath: "models/ecosort/model.json",
      factsPath: "config/waste-facts.yaml",
      maxUploadBytes: 10 * 1024 * 1024,
      rateLimit: { enabled: true, uploadsRpm: 30, trustProxy: false },
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      ECOSORT_ENV: "production",
      ECOSORT_PORT: "8080",
      ECOSORT_LOG_LEVEL: "debug",
      ECOSORT_MODEL_PATH: "/srv/model/model.json",
      ECOSORT_MAX_UPLOAD_BYTES: "2048",
      ECOSORT_RATE_LIMIT_ENABLED: "false",
      ECOSORT_RATE_LIMIT_UPLOADS_RPM: "5",
      ECOSORT_TRUST_PROXY: "true",
    });

    expect(config.env).toBe("production");
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("debug");
    expect(config.modelPath).toBe("/srv/model/model.json");
    expect(config.maxUploadBytes).toBe(2048);
    expect(config.rateLimit).toEqual({ enabled: false, uploadsRpm: 5, trustProxy: true });
  });

  it("rejects an unknown environment name", () => {
    expect(() => loadConfig({ ECOSORT_ENV: "staging" })).toThrow(
      'ECOSORT_ENV must be one of development, production, test; got "staging"',
    );
  });

  it("rejects a port outside 1..65535", () => {
    expect(() => loadConfig({ ECOSORT_PORT: "70000" })).toThrow(
      'ECOSORT_PORT must be an integer between 1 and 65535; got "70000"',
    );
  });

  it("rejects non-integer sizes", () => {
    expect(() => loadConfig({ ECOSORT_MAX_UPLOAD_BYTES: "1.5mb" })).toThrow(ConfigurationError);
  });
});
