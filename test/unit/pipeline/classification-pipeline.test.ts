// ---------------------------------------------------------------------------
// Tests for the end-to-end classification pipeline with a stub classifier.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { ClassifierContractError, ImageDecodeError } from "../../../src/core/errors.js";
import { ClassificationPipeline } from "../../../src/pipeline/classification-pipeline.js";
import { formatConfidence } from "../../../src/domain/interpret.js";
import {
  StubClassifier,
  loadFacts,
  makeImage,
  oneHot,
  silentLogger,
  uniform,
} from "../../helpers/fixtures.js";

const knowledge = loadFacts();

describe("ClassificationPipeline", () => {
  it("classifies a battery photo with full confidence", async () => {
    const classifier = new StubClassifier(oneHot(0));
    const pipeline = new ClassificationPipeline(classifier, knowledge, silentLogger);

    const report = await pipeline.classify(await makeImage(640, 480));

    expect(report.prediction.label).toBe("battery");
    expect(formatConfidence(report.prediction.confidence)).toBe("100.00");
    expect(report.recyclabilityScore).toBe(10);
    expect(report.facts.carbonSaving).toBe("8.0 kg/kg");
    expect(report.known).toBe(true);
  });

  it("feeds the classifier a single 224x224 RGB image", async () => {
    const classifier = new StubClassifier(uniform());
    const pipeline = new ClassificationPipeline(classifier, knowledge, silentLogger);

    await pipeline.classify(await makeImage(50, 900, { r: 0, g: 0, b: 255 }, "jpeg"));

    expect(classifier.calls).toHaveLength(1);
    expect(classifier.calls[0]?.shape).toEqual([1, 224, 224, 3]);
  });

  it("resolves a uniform prediction to the first label", async () => {
    const pipeline = new ClassificationPipeline(new StubClassifier(uniform()), knowledge, silentLogger);

    const report = await pipeline.classify(await makeImage());

    expect(report.prediction.label).toBe("battery");
    expect(formatConfidence(report.prediction.confidence)).toBe("8.33");
  });

  it("rejects classifier output that is not a probability vector", async () => {
    const pipeline = new ClassificationPipeline(
      new StubClassifier([0.5, 0.5]),
      knowledge,
      silentLogger,
    );

    await expect(pipeline.classify(await makeImage())).rejects.toBeInstanceOf(
      ClassifierContractError,
    );
  });

  it("fails with ImageDecodeError before calling the classifier", async () => {
    const classifier = new StubClassifier(oneHot(0));
    const pipeline = new ClassificationPipeline(classifier, knowledge, silentLogger);

    await expect(pipeline.classify(Buffer.from("corrupt"))).rejects.toBeInstanceOf(
      ImageDecodeError,
    );
    expect(classifier.calls).toHaveLength(0);
  });

  it("reports N/A facts for a label the knowledge base lacks", async () => {
    const classifier = new StubClassifier([0.2, 0.8], ["battery", "Other Trash"]);
    const pipeline = new ClassificationPipeline(classifier, knowledge, silentLogger);

    const report = await pipeline.classify(await makeImage());

    expect(report.prediction.label).toBe("Other Trash");
    expect(report.known).toBe(false);
    expect(report.recyclabilityScore).toBeNull();
    expect(report.facts.description).toBe("N/A");
  });

  it("exposes the classifier's model id", () => {
    const pipeline = new ClassificationPipeline(new StubClassifier(uniform()), knowledge, silentLogger);

    expect(pipeline.modelId).toBe("stub/model.json");
  });
});
