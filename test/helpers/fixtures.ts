// ---------------------------------------------------------------------------
// Shared test fixtures: stub classifier, generated images, silent logger.
// ---------------------------------------------------------------------------

import pino from "pino";
import sharp from "sharp";

import type { ImageTensor } from "../../src/core/types.js";
import { WASTE_LABELS } from "../../src/core/types.js";
import type { WasteClassifier } from "../../src/classifier/classifier.js";
import type { KnowledgeBase } from "../../src/knowledge/knowledge-base.js";
import { loadKnowledgeBase } from "../../src/knowledge/knowledge-base.js";

export const FACTS_PATH = "config/waste-facts.yaml";

export const silentLogger = pino({ level: "silent" });

export function loadFacts(): KnowledgeBase {
  return loadKnowledgeBase(FACTS_PATH);
}

/** Classifier double that returns a fixed vector and records its inputs. */
export class StubClassifier implements WasteClassifier {
  readonly modelId = "stub/model.json";
  readonly calls: ImageTensor[] = [];

  constructor(
    private readonly output: readonly number[],
    readonly labels: readonly string[] = WASTE_LABELS,
  ) {}

  async predict(input: ImageTensor): Promise<number[]> {
    this.calls.push(input);
    return [...this.output];
  }
}

/** One-hot vector over the standard labels. */
export function oneHot(index: number, length = WASTE_LABELS.length): number[] {
  return Array.from({ length }, (_, i) => (i === index ? 1 : 0));
}

export function uniform(length = WASTE_LABELS.length): number[] {
  return Array.from({ length }, () => 1 / length);
}

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/** Solid-colour image encoded as PNG or JPEG. */
export async function makeImage(
  width = 320,
  height = 240,
  color: Rgb = { r: 200, g: 30, b: 30 },
  format: "png" | "jpeg" = "png",
): Promise<Buffer> {
  const image = sharp({ create: { width, height, channels: 3, background: color } });
  return format === "png" ? image.png().toBuffer() : image.jpeg().toBuffer();
}

/** Solid-colour 24-bit uncompressed BMP, rows stored bottom-up. */
export function makeBmp(width: number, height: number, color: Rgb): Buffer {
  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const pixelBytes = rowSize * height;
  const file = Buffer.alloc(54 + pixelBytes);

  file.write("BM", 0, "latin1");
  file.writeUInt32LE(file.length, 2);
  file.writeUInt32LE(54, 10);
  file.writeUInt32LE(40, 14);
  file.writeInt32LE(width, 18);
  file.writeInt32LE(height, 22);
  file.writeUInt16LE(1, 26);
  file.writeUInt16LE(24, 28);
  file.writeUInt32LE(0, 30);
  file.writeUInt32LE(pixelBytes, 34);
  file.writeInt32LE(2835, 38);
  file.writeInt32LE(2835, 42);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const offset = 54 + y * rowSize + x * 3;
      file[offset] = color.b;
      file[offset + 1] = color.g;
      file[offset + 2] = color.r;
    }
  }
  return file;
}

/** Multipart body with the image under the `image` field. */
export function uploadForm(bytes: Buffer, fileName = "photo.png", type = "image/png"): FormData {
  const form = new FormData();
  form.append("image", new Blob([bytes], { type }), fileName);
  return form;
}
