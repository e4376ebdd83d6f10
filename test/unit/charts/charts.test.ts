// ---------------------------------------------------------------------------
// Tests for the SVG chart renderers and rasterisation.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import sharp from "sharp";

import { WASTE_LABELS } from "../../../src/core/types.js";
import { renderConfidenceChart } from "../../../src/charts/confidence-chart.js";
import {
  RECYCLABLE_COLOR,
  renderRecyclabilityChart,
} from "../../../src/charts/recyclability-chart.js";
import { rasterizeSvg } from "../../../src/charts/rasterize.js";
import { escapeXml, num } from "../../../src/charts/svg.js";
import { oneHot, uniform } from "../../helpers/fixtures.js";

function barValues(svg: string): string[] {
  return [...svg.matchAll(/data-value="([^"]+)"/g)].map((m) => m[1] ?? "");
}

describe("svg helpers", () => {
  it("escapes XML special characters", () => {
    expect(escapeXml(`<a & "b" 'c'>`)).toBe("&lt;a &amp; &quot;b&quot; &#39;c&#39;&gt;");
  });

  it("rounds numbers to two decimals without trailing zeros", () => {
    expect(num(640.8849)).toBe("640.88");
    expect(num(162)).toBe("162");
    expect(num(12.5)).toBe("12.5");
  });
});

describe("renderConfidenceChart", () => {
  it("draws one bar per class in label order", () => {
    const svg = renderConfidenceChart(uniform(), WASTE_LABELS);
    const labels = [...svg.matchAll(/data-label="([^"]+)"/g)].map((m) => m[1]);

    expect(labels).toEqual([...WASTE_LABELS]);
  });

  it("draws a full-height bar for a one-hot prediction", () => {
    const svg = renderConfidenceChart(oneHot(0), WASTE_LABELS);

    expect(barValues(svg)).toEqual(["100.00", ...Array.from({ length: 11 }, () => "0.00")]);
    expect(svg).toContain('data-label="battery" data-value="100.00" x="57.3" y="34" width="42.4" height="162"');
  });

  it("draws equal bars for a uniform prediction", () => {
    const svg = renderConfidenceChart(uniform(), WASTE_LABELS);

    expect(new Set(barValues(svg))).toEqual(new Set(["8.33"]));
  });

  it("rotates the x labels by 45 degrees", () => {
    const svg = renderConfidenceChart(uniform(), WASTE_LABELS);

    expect(svg.match(/rotate\(-45 /g)).toHaveLength(12);
  });

  it("escapes label text", () => {
    const svg = renderConfidenceChart([1], ["<glass & co>"]);

    expect(svg).toContain('data-label="&lt;glass &amp; co&gt;"');
    expect(svg).not.toContain("<glass & co>");
  });

  it("uses the default title and size", () => {
    const svg = renderConfidenceChart(uniform(), WASTE_LABELS);

    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="700" height="280"')).toBe(true);
    expect(svg).toContain(">Confidence distribution across classes</text>");
  });
});

describe("renderRecyclabilityChart", () => {
  it("draws the score as a clockwise arc from 12 o'clock", () => {
    const svg = renderRecyclabilityChart(10);

    expect(svg).toContain(`stroke="${RECYCLABLE_COLOR}"`);
    expect(svg).toContain('stroke-dasharray="64.09 640.88" transform="rotate(-90 150 150)"');
    expect(svg).toContain(">10% Recyclable</text>");
  });

  it("draws an empty ring labelled N/A for a missing score", () => {
    const svg = renderRecyclabilityChart(null);

    expect(svg).toContain('stroke-dasharray="0 640.88"');
    expect(svg).toContain(">N/A</text>");
  });

  it("clamps scores into 0..100", () => {
    expect(renderRecyclabilityChart(150)).toContain(">100% Recyclable</text>");
    expect(renderRecyclabilityChart(-5)).toContain(">0% Recyclable</text>");
  });
});

describe("rasterizeSvg", () => {
  it("renders a chart to a PNG at twice its size", async () => {
    const png = await rasterizeSvg(renderConfidenceChart(uniform(), WASTE_LABELS));
    const meta = await sharp(png).metadata();

    expect(meta.format).toBe("png");
    expect(meta.width).toBe(1400);
    expect(meta.height).toBe(560);
  });
});
