// ---------------------------------------------------------------------------
// Core types for the EcoSort service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Labels ──────────────────────────────────────────────────────────────────

/**
 * The waste categories the classifier emits, in model output order.
 * Index `i` of a probability vector belongs to `WASTE_LABELS[i]`.
 */
export const WASTE_LABELS = [
  "battery",
  "biological",
  "brown-glass",
  "cardboard",
  "clothes",
  "green-glass",
  "metal",
  "paper",
  "plastic",
  "shoes",
  "trash",
  "white-glass",
] as const;

// ── Knowledge base ──────────────────────────────────────────────────────────

/** Static recycling guidance for one waste category. */
export interface WasteFact {
  readonly description: string;
  readonly recycle: string;
  readonly hazard: string;
  readonly decompositionTime: string;
  readonly carbonSavingKgPerKg: number;
  readonly landfillReductionM3PerTon: number;
  readonly tip: string;
}

/** Hand-assigned 0..100 rating of how recyclable a category is. */
export type RecyclabilityScore = number;

// ── Image tensors ───────────────────────────────────────────────────────────

export const MODEL_INPUT_SIZE = 224;
export const MODEL_INPUT_CHANNELS = 3;

export type ImageTensorShape = readonly [1, number, number, number];

/** A batch of one normalised RGB image, laid out NHWC. */
export interface ImageTensor {
  readonly data: Float32Array;
  readonly shape: ImageTensorShape;
}

// ── Prediction & report ─────────────────────────────────────────────────────

export interface PredictionResult {
  /** Label at the arg-max of `probabilities`. */
  readonly label: string;
  readonly index: number;
  /** Probability of `label`, as a percentage (0..100). */
  readonly confidence: number;
  readonly probabilities: readonly number[];
  readonly labels: readonly string[];
}

/**
 * Display-ready facts for a report. Every field is text so that a missing
 * knowledge-base entry degrades to "N/A" placeholders.
 */
export interface ReportFacts {
  readonly description: string;
  readonly recycle: string;
  readonly hazard: string;
  readonly decompositionTime: string;
  readonly tip: string;
  readonly carbonSaving: string;
  readonly landfillReduction: string;
}

export interface WasteReport {
  readonly prediction: PredictionResult;
  readonly facts: ReportFacts;
  readonly recyclabilityScore: RecyclabilityScore | null;
  /** False when the predicted label has no knowledge-base entry. */
  readonly known: boolean;
}

// ── Configuration ───────────────────────────────────────────────────────────

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  /** File descriptor to write to; 1 (stdout) when unset. */
  destination?: number;
}

export interface RateLimitConfig {
  enabled: boolean;
  /** Requests per minute per client on the upload routes. */
  uploadsRpm: number;
  /** Identify clients by proxy headers; only safe behind a proxy that sets them. */
  trustProxy: boolean;
}

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  logLevel: string;
  modelPath: string;
  factsPath: string;
  maxUploadBytes: number;
  rateLimit: RateLimitConfig;
}
