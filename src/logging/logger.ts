// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/**
 * Create a configured pino logger instance.
 *
 * - JSON output (pino default)
 * - Base fields: `service` and `version`
 * - Optional pretty-print via `pino-pretty` transport for development
 * - Written to stdout unless `config.destination` names another descriptor
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const destination = config.destination ?? 1;
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "ecosort",
      version: process.env["APP_VERSION"] ?? "dev",
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination({ dest: destination, sync: true }));
}
