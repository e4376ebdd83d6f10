// ---------------------------------------------------------------------------
// ClassificationPipeline: image in, report out.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { WasteReport } from "../core/types.js";
import type { WasteClassifier } from "../classifier/classifier.js";
import { assertProbabilityVector } from "../classifier/classifier.js";
import type { KnowledgeBase } from "../knowledge/knowledge-base.js";
import type { ImageSource } from "../domain/image/preprocess.js";
import { preprocessImage } from "../domain/image/preprocess.js";
import { buildReport, interpretPrediction } from "../domain/interpret.js";

/**
 * Runs preprocess → predict → interpret → report for one image.
 *
 * The classifier and knowledge base are fixed at construction and shared by
 * every call; nothing is retained between calls.
 */
export class ClassificationPipeline {
  constructor(
    readonly classifier: WasteClassifier,
    readonly knowledge: KnowledgeBase,
    private readonly logger: pino.Logger,
  ) {}

  get modelId(): string {
    return this.classifier.modelId;
  }

  /**
   * @throws ImageDecodeError when the image cannot be read.
   * @throws ClassifierContractError when the model output is not a
   *   probability vector over the classifier's labels.
   */
  async classify(source: ImageSource, logger: pino.Logger = this.logger): Promise<WasteReport> {
    const start = Date.now();

    const tensor = await preprocessImage(source);
    const probabilities = await this.classifier.predict(tensor);
    assertProbabilityVector(probabilities, this.classifier.labels.length);

    const prediction = interpretPrediction(probabilities, this.classifier.labels);
    const report = buildReport(prediction, this.knowledge);

    if (!report.known) {
      logger.warn({ label: prediction.label }, "predicted label has no knowledge-base entry");
    }

    logger.info(
      {
        label: prediction.label,
        confidence: Number(prediction.confidence.toFixed(2)),
        durationMs: Date.now() - start,
      },
      "image classified",
    );

    return report;
  }
}
