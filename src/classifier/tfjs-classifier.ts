// ---------------------------------------------------------------------------
// TensorFlow.js classifier adapter.
// Loads a layers model (model.json + weight shards) from disk and runs it on
// the pure-JS CPU backend.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import * as tf from "@tensorflow/tfjs";
import type pino from "pino";
import type { ImageTensor } from "../core/types.js";
import { WASTE_LABELS } from "../core/types.js";
import { ClassifierContractError, ModelLoadError } from "../core/errors.js";
import type { WasteClassifier } from "./classifier.js";
import { assertProbabilityVector } from "./classifier.js";

/**
 * Fetch function handed to `tf.io.http` so that model.json and its weight
 * shards are read from the local filesystem instead of over the network.
 */
async function readFromDisk(input: string | URL | Request): Promise<Response> {
  const bytes = await fs.promises.readFile(input instanceof Request ? input.url : input);
  return new Response(bytes, { status: 200 });
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TfjsWasteClassifier implements WasteClassifier {
  readonly modelId: string;
  readonly labels: readonly string[];
  private readonly model: tf.LayersModel;

  private constructor(model: tf.LayersModel, modelId: string, labels: readonly string[]) {
    this.model = model;
    this.modelId = modelId;
    this.labels = labels;
  }

  /**
   * Load the model at `modelPath` (path to its `model.json`).
   *
   * @throws ModelLoadError when the file is missing, unparsable, or its
   *   output width does not match the label count.
   */
  static async load(
    modelPath: string,
    labels: readonly string[] = WASTE_LABELS,
    logger?: pino.Logger,
  ): Promise<TfjsWasteClassifier> {
    const resolved = path.resolve(modelPath);

    try {
      await fs.promises.access(resolved, fs.constants.R_OK);
    } catch (err) {
      throw new ModelLoadError(modelPath, "file not found or not readable", { cause: err });
    }

    let model: tf.LayersModel;
    try {
      await tf.setBackend("cpu");
      await tf.ready();
      model = await tf.loadLayersModel(tf.io.http(resolved, { fetchFunc: readFromDisk }));
    } catch (err) {
      throw new ModelLoadError(modelPath, describe(err), { cause: err });
    }

    const outputWidth = model.outputs[0]?.shape.at(-1);
    if (outputWidth !== labels.length) {
      model.dispose();
      throw new ModelLoadError(
        modelPath,
        `model emits ${String(outputWidth)} classes but ${labels.length} labels are configured`,
      );
    }

    const modelId = `${path.basename(path.dirname(resolved))}/${path.basename(resolved)}`;
    logger?.info({ modelId, backend: tf.getBackend(), classes: labels.length }, "model loaded");

    return new TfjsWasteClassifier(model, modelId, labels);
  }

  async predict(input: ImageTensor): Promise<number[]> {
    const output = tf.tidy(() => {
      const batch = tf.tensor4d(input.data, [...input.shape]);
      const result = this.model.predict(batch);
      if (Array.isArray(result)) {
        throw new ClassifierContractError(`Model has ${result.length} outputs, expected 1`);
      }
      return result;
    });

    let probabilities: number[];
    try {
      probabilities = Array.from(await output.data());
    } finally {
      output.dispose();
    }

    assertProbabilityVector(probabilities, this.labels.length);
    return probabilities;
  }

  dispose(): void {
    this.model.dispose();
  }
}
