// ---------------------------------------------------------------------------
// Plain-text prediction dashboard for terminal output.
// ---------------------------------------------------------------------------

import type { WasteReport } from "../core/types.js";
import { formatConfidence, formatScore } from "../domain/interpret.js";

export function formatReportText(report: WasteReport): string {
  const { prediction, facts } = report;

  return [
    `Class: ${prediction.label.toUpperCase()}`,
    `Confidence: ${formatConfidence(prediction.confidence)}%`,
    "",
    "Description:",
    facts.description,
    "",
    "How to Recycle:",
    facts.recycle,
    "",
    "Hazard Level:",
    facts.hazard,
    "",
    `Estimated Decomposition Time: ${facts.decompositionTime}`,
    "",
    `Eco Tip: ${facts.tip}`,
    "",
    "Suggested Disposal / Action:",
    "- Segregate from other waste streams.",
    "- Take to local recycling / hazardous collection if applicable.",
    "",
    `Recyclability Score: ${formatScore(report.recyclabilityScore)}`,
    `Carbon saving (kg/kg): ${facts.carbonSaving}`,
    `Landfill reduction (m³/ton): ${facts.landfillReduction}`,
  ].join("\n");
}
