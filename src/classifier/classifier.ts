// ---------------------------------------------------------------------------
// Classifier adapter contract.
// ---------------------------------------------------------------------------

import type { ImageTensor } from "../core/types.js";
import { ClassifierContractError } from "../core/errors.js";

/**
 * A pretrained waste classifier. Implementations are loaded once at startup
 * and shared read-only for the lifetime of the process.
 */
export interface WasteClassifier {
  /** Short identifier printed on reports, e.g. the model file name. */
  readonly modelId: string;
  /** Class labels in output order. */
  readonly labels: readonly string[];
  /**
   * Score one preprocessed image.
   * Resolves to one probability per label, in `labels` order.
   */
  predict(input: ImageTensor): Promise<number[]>;
}

/** Allowed distance of a probability vector's sum from 1. */
export const PROBABILITY_SUM_TOLERANCE = 1e-3;

/**
 * Check that `vector` is a probability distribution over `expectedLength`
 * classes: finite, non-negative entries summing to 1 within tolerance.
 *
 * @throws ClassifierContractError on the first violation found.
 */
export function assertProbabilityVector(
  vector: readonly number[],
  expectedLength: number,
): void {
  if (vector.length !== expectedLength) {
    throw new ClassifierContractError(
      `Expected ${expectedLength} probabilities, got ${vector.length}`,
    );
  }

  let sum = 0;
  for (const [index, value] of vector.entries()) {
    if (!Number.isFinite(value) || value < 0) {
      throw new ClassifierContractError(`Probability at index ${index} is invalid: ${value}`);
    }
    sum += value;
  }

  if (Math.abs(sum - 1) > PROBABILITY_SUM_TOLERANCE) {
    throw new ClassifierContractError(`Probabilities sum to ${sum.toFixed(6)}, expected 1`);
  }
}
