// ---------------------------------------------------------------------------
// Result interpretation: pick the winning class and join it against the
// knowledge base.
// ---------------------------------------------------------------------------

import type { PredictionResult, ReportFacts, WasteReport } from "../core/types.js";
import { ClassifierContractError } from "../core/errors.js";
import type { KnowledgeBase } from "../knowledge/knowledge-base.js";

/** Placeholder shown for any fact the knowledge base cannot supply. */
export const NOT_AVAILABLE = "N/A";

/**
 * Index of the largest entry. Ties resolve to the lowest index.
 *
 * @throws ClassifierContractError for an empty vector.
 */
export function argMax(values: readonly number[]): number {
  if (values.length === 0) {
    throw new ClassifierContractError("Cannot take the arg-max of an empty vector");
  }

  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

export function interpretPrediction(
  probabilities: readonly number[],
  labels: readonly string[],
): PredictionResult {
  if (probabilities.length !== labels.length) {
    throw new ClassifierContractError(
      `Expected ${labels.length} probabilities, got ${probabilities.length}`,
    );
  }

  const index = argMax(probabilities);
  return {
    label: labels[index],
    index,
    confidence: probabilities[index] * 100,
    probabilities: [...probabilities],
    labels: [...labels],
  };
}

function formatMetric(value: number, unit: string): string {
  return `${value.toFixed(1)} ${unit}`;
}

/**
 * Compose the report for a prediction. A label missing from the knowledge
 * base yields "N/A" facts and a null score rather than an error.
 */
export function buildReport(prediction: PredictionResult, knowledge: KnowledgeBase): WasteReport {
  const fact = knowledge.getFact(prediction.label);
  const score = knowledge.getScore(prediction.label);

  const facts: ReportFacts = fact
    ? {
        description: fact.description,
        recycle: fact.recycle,
        hazard: fact.hazard,
        decompositionTime: fact.decompositionTime,
        tip: fact.tip,
        carbonSaving: formatMetric(fact.carbonSavingKgPerKg, "kg/kg"),
        landfillReduction: formatMetric(fact.landfillReductionM3PerTon, "m³/ton"),
      }
    : {
        description: NOT_AVAILABLE,
        recycle: NOT_AVAILABLE,
        hazard: NOT_AVAILABLE,
        decompositionTime: NOT_AVAILABLE,
        tip: NOT_AVAILABLE,
        carbonSaving: NOT_AVAILABLE,
        landfillReduction: NOT_AVAILABLE,
      };

  return {
    prediction,
    facts,
    recyclabilityScore: score,
    known: fact !== null,
  };
}

/** Confidence as printed everywhere: two decimals, no percent sign. */
export function formatConfidence(confidence: number): string {
  return confidence.toFixed(2);
}

/** Score as printed everywhere: `n/100`, or "N/A". */
export function formatScore(score: number | null): string {
  return score === null ? NOT_AVAILABLE : `${score}/100`;
}
