// ---------------------------------------------------------------------------
// Error hierarchy for the EcoSort service.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all EcoSort domain errors.
 */
export class EcoSortError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EcoSortError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Classifier errors ───────────────────────────────────────────────────────

/** The model artifact is missing or cannot be loaded. Fatal at startup. */
export class ModelLoadError extends EcoSortError {
  public readonly modelPath: string;

  constructor(modelPath: string, reason: string, options?: ErrorOptions) {
    super(
      `Could not load model at "${modelPath}": ${reason}. Make sure it is present and valid.`,
      options,
    );
    this.name = "ModelLoadError";
    this.modelPath = modelPath;
  }
}

/** The classifier returned a vector that is not a probability distribution. */
export class ClassifierContractError extends EcoSortError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ClassifierContractError";
  }
}

// ── Input errors ────────────────────────────────────────────────────────────

/** The supplied image could not be read or decoded. */
export class ImageDecodeError extends EcoSortError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`Unable to decode image: ${reason}`, options);
    this.name = "ImageDecodeError";
  }
}

/** An upload request is missing its image or carries an unusable one. */
export class UploadValidationError extends EcoSortError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UploadValidationError";
  }
}

// ── Output errors ───────────────────────────────────────────────────────────

/** The PDF report could not be produced or written. */
export class ReportExportError extends EcoSortError {
  public readonly targetPath: string | null;

  constructor(message: string, targetPath: string | null = null, options?: ErrorOptions) {
    super(message, options);
    this.name = "ReportExportError";
    this.targetPath = targetPath;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends EcoSortError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
