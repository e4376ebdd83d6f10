// ---------------------------------------------------------------------------
// Recyclability donut (SVG).
// ---------------------------------------------------------------------------

import { num, svgDocument } from "./svg.js";

export const RECYCLABLE_COLOR = "#27AE60";
export const REMAINDER_COLOR = "#E5E8E8";

export interface RecyclabilityChartOptions {
  size?: number;
  /** Ring thickness as a fraction of the outer radius. */
  ringWidth?: number;
}

/**
 * Two-wedge donut: `score` in green, `100 - score` in grey, starting at
 * 12 o'clock and running clockwise. A null score draws an empty ring
 * labelled "N/A".
 */
export function renderRecyclabilityChart(
  score: number | null,
  options: RecyclabilityChartOptions = {},
): string {
  const size = options.size ?? 300;
  const ringWidth = options.ringWidth ?? 0.3;

  const center = size / 2;
  const outerRadius = size * 0.4;
  const stroke = outerRadius * ringWidth;
  const radius = outerRadius - stroke / 2;
  const circumference = 2 * Math.PI * radius;

  const value = score === null ? 0 : Math.min(Math.max(score, 0), 100);
  const arc = (value / 100) * circumference;
  const caption = score === null ? "N/A" : `${value}% Recyclable`;

  return svgDocument(size, size, [
    `<circle class="remainder" cx="${num(center)}" cy="${num(center)}" r="${num(radius)}" fill="none" stroke="${REMAINDER_COLOR}" stroke-width="${num(stroke)}"/>`,
    `<circle class="recyclable" cx="${num(center)}" cy="${num(center)}" r="${num(radius)}" fill="none" stroke="${RECYCLABLE_COLOR}" stroke-width="${num(stroke)}" stroke-dasharray="${num(arc)} ${num(circumference)}" transform="rotate(-90 ${num(center)} ${num(center)})"/>`,
    `<text x="${num(center)}" y="${num(center + 6)}" text-anchor="middle" font-size="18" font-weight="bold" fill="#1e8449">${caption}</text>`,
  ]);
}
