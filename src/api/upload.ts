// ---------------------------------------------------------------------------
// Multipart image upload extraction.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import type { AppEnv } from "./env.js";
import { UploadValidationError } from "../core/errors.js";

/** Multipart field that carries the photo. */
export const IMAGE_FIELD = "image";

export interface UploadedImage {
  bytes: Buffer;
  fileName: string;
}

/**
 * Read the image file from a multipart request body.
 *
 * @throws UploadValidationError when the field is absent, is plain text, or
 *   holds an empty file.
 */
export async function readUploadedImage(c: Context<AppEnv>): Promise<UploadedImage> {
  const body = await c.req.parseBody();
  const value = body[IMAGE_FIELD];

  if (value === undefined || typeof value === "string" || Array.isArray(value)) {
    throw new UploadValidationError(`Expected one file in multipart field "${IMAGE_FIELD}"`);
  }

  if (value.size === 0) {
    throw new UploadValidationError("Uploaded file is empty");
  }

  return {
    bytes: Buffer.from(await value.arrayBuffer()),
    fileName: value.name,
  };
}
