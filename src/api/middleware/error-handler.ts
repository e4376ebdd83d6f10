// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "../env.js";
import {
  ClassifierContractError,
  ImageDecodeError,
  ReportExportError,
  UploadValidationError,
} from "../../core/errors.js";

/**
 * Build the Hono `onError` handler that maps thrown errors to JSON
 * responses.
 *
 * With `isProduction`, messages of server-side failures are replaced with
 * generic text. Upload and decode errors always carry their message because
 * they describe the client's own input.
 *
 * Mapping:
 * - `HTTPException`           -> its own response
 * - `UploadValidationError`   -> 400 Bad Request
 * - `ImageDecodeError`        -> 400 Bad Request
 * - `ClassifierContractError` -> 502 Bad Gateway
 * - `ReportExportError`       -> 500 Internal Server Error
 * - Everything else           -> 500 Internal Server Error
 */
export function createErrorHandler(
  isProduction: boolean,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof UploadValidationError) {
      return c.json({ error: err.message, type: "upload_validation_error" }, 400);
    }

    if (err instanceof ImageDecodeError) {
      return c.json({ error: err.message, type: "image_decode_error" }, 400);
    }

    c.get("logger").error({ err }, "request failed");

    if (err instanceof ClassifierContractError) {
      return c.json(
        {
          error: isProduction ? "Classifier returned an invalid result" : err.message,
          type: "classifier_contract_error",
        },
        502,
      );
    }

    if (err instanceof ReportExportError) {
      return c.json(
        {
          error: isProduction ? "Report could not be generated" : err.message,
          type: "report_export_error",
        },
        500,
      );
    }

    return c.json(
      { error: isProduction ? "Internal server error" : err.message, type: "internal_error" },
      500,
    );
  };
}
