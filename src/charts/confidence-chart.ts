// ---------------------------------------------------------------------------
// Confidence distribution bar chart (SVG).
// ---------------------------------------------------------------------------

import { escapeXml, num, svgDocument } from "./svg.js";

export interface ConfidenceChartOptions {
  width?: number;
  height?: number;
  color?: string;
  title?: string;
}

/** Space around the plot area for the title, y ticks and rotated x labels. */
const MARGIN = { top: 34, right: 12, bottom: 84, left: 52 } as const;
const Y_TICKS = [0, 20, 40, 60, 80, 100] as const;

/**
 * Render one bar per class. Bar height is the class probability as a
 * percentage on a fixed 0..100 axis; x labels are rotated 45 degrees.
 */
export function renderConfidenceChart(
  probabilities: readonly number[],
  labels: readonly string[],
  options: ConfidenceChartOptions = {},
): string {
  const width = options.width ?? 700;
  const height = options.height ?? 280;
  const color = options.color ?? "#16A085";
  const title = options.title ?? "Confidence distribution across classes";

  const plotWidth = width - MARGIN.left - MARGIN.right;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;
  const plotBottom = MARGIN.top + plotHeight;
  const slot = labels.length > 0 ? plotWidth / labels.length : plotWidth;
  const barWidth = slot * 0.8;

  const body: string[] = [
    `<text x="${num(width / 2)}" y="20" text-anchor="middle" font-size="14" font-weight="bold">${escapeXml(title)}</text>`,
  ];

  for (const tick of Y_TICKS) {
    const y = plotBottom - (tick / 100) * plotHeight;
    body.push(
      `<line x1="${MARGIN.left}" y1="${num(y)}" x2="${width - MARGIN.right}" y2="${num(y)}" stroke="#e5e8e8" stroke-width="1"/>`,
      `<text x="${MARGIN.left - 6}" y="${num(y + 4)}" text-anchor="end" font-size="10">${tick}</text>`,
    );
  }

  body.push(
    `<text x="14" y="${num(MARGIN.top + plotHeight / 2)}" text-anchor="middle" font-size="11" transform="rotate(-90 14 ${num(MARGIN.top + plotHeight / 2)})">Confidence %</text>`,
    `<line x1="${MARGIN.left}" y1="${MARGIN.top}" x2="${MARGIN.left}" y2="${plotBottom}" stroke="#333333" stroke-width="1"/>`,
    `<line x1="${MARGIN.left}" y1="${plotBottom}" x2="${width - MARGIN.right}" y2="${plotBottom}" stroke="#333333" stroke-width="1"/>`,
  );

  labels.forEach((label, i) => {
    const percent = Math.min(Math.max((probabilities[i] ?? 0) * 100, 0), 100);
    const barHeight = (percent / 100) * plotHeight;
    const x = MARGIN.left + i * slot + (slot - barWidth) / 2;
    const center = MARGIN.left + i * slot + slot / 2;
    const labelY = plotBottom + 12;

    body.push(
      `<rect class="bar" data-label="${escapeXml(label)}" data-value="${percent.toFixed(2)}" x="${num(x)}" y="${num(plotBottom - barHeight)}" width="${num(barWidth)}" height="${num(barHeight)}" fill="${color}"/>`,
      `<text x="${num(center)}" y="${num(labelY)}" text-anchor="end" font-size="10" transform="rotate(-45 ${num(center)} ${num(labelY)})">${escapeXml(label)}</text>`,
    );
  });

  return svgDocument(width, height, body);
}
