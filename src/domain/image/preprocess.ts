// ---------------------------------------------------------------------------
// Image preprocessing: decode, convert to RGB, resize and normalise into the
// classifier's input tensor.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import bmp from "bmp-js";
import sharp from "sharp";
import type { ImageTensor } from "../../core/types.js";
import { MODEL_INPUT_CHANNELS, MODEL_INPUT_SIZE } from "../../core/types.js";
import { ImageDecodeError } from "../../core/errors.js";

/** A file path or the raw bytes of an encoded image. */
export type ImageSource = string | Buffer | Uint8Array;

export interface PreprocessOptions {
  /** Square edge length of the output, in pixels. */
  size?: number;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// libvips has no BMP loader; those files are decoded here and handed over raw.
function isBmp(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x42 && bytes[1] === 0x4d;
}

function decodeBmp(bytes: Buffer): sharp.Sharp {
  const { width, height, data } = bmp.decode(bytes);

  // Decoder output is ABGR per pixel.
  const rgb = Buffer.alloc(width * height * 3);
  for (let src = 0, dst = 0; dst < rgb.length; src += 4, dst += 3) {
    rgb[dst] = data[src + 3];
    rgb[dst + 1] = data[src + 2];
    rgb[dst + 2] = data[src + 1];
  }

  return sharp(rgb, { raw: { width, height, channels: 3 } });
}

/** Open `source` for sharp, reading files first so BMP can be recognised. */
async function openImage(source: ImageSource): Promise<sharp.Sharp> {
  const bytes = typeof source === "string" ? await fs.promises.readFile(source) : Buffer.from(source);
  return isBmp(bytes) ? decodeBmp(bytes) : sharp(bytes);
}

/**
 * Decode an image and return it as a `[1, size, size, 3]` float tensor with
 * values in `[0, 1]`.
 *
 * Accepts anything sharp decodes plus uncompressed BMP. The image is
 * stretched to the square without preserving aspect ratio, using the
 * Lanczos-3 kernel. Alpha is dropped and greyscale or CMYK input is converted
 * to sRGB.
 *
 * @throws ImageDecodeError when the source is unreadable or not an image.
 */
export async function preprocessImage(
  source: ImageSource,
  options: PreprocessOptions = {},
): Promise<ImageTensor> {
  const size = options.size ?? MODEL_INPUT_SIZE;

  let pixels: Buffer;
  let channels: number;
  try {
    const image = await openImage(source);
    const { data, info } = await image
      .removeAlpha()
      .toColourspace("srgb")
      .resize(size, size, { fit: "fill", kernel: sharp.kernel.lanczos3 })
      .raw()
      .toBuffer({ resolveWithObject: true });
    pixels = data;
    channels = info.channels;
  } catch (err) {
    throw new ImageDecodeError(describe(err), { cause: err });
  }

  if (channels !== MODEL_INPUT_CHANNELS) {
    throw new ImageDecodeError(`expected ${MODEL_INPUT_CHANNELS} channels, got ${channels}`);
  }

  const data = new Float32Array(pixels.length);
  for (let i = 0; i < pixels.length; i++) {
    data[i] = pixels[i] / 255;
  }

  return { data, shape: [1, size, size, MODEL_INPUT_CHANNELS] };
}

/**
 * Re-encode an image as JPEG that fits inside a `maxEdge` square, for
 * embedding in reports.
 *
 * @throws ImageDecodeError when the source is unreadable or not an image.
 */
export async function toEmbeddableJpeg(source: ImageSource, maxEdge = 600): Promise<Buffer> {
  try {
    const image = await openImage(source);
    return await image
      .removeAlpha()
      .toColourspace("srgb")
      .resize(maxEdge, maxEdge, { fit: "inside", kernel: sharp.kernel.lanczos3 })
      .jpeg({ quality: 90 })
      .toBuffer();
  } catch (err) {
    throw new ImageDecodeError(describe(err), { cause: err });
  }
}
