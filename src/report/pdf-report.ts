// ---------------------------------------------------------------------------
// Single-page PDF report.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import PDFDocument from "pdfkit";
import type pino from "pino";
import type { WasteReport } from "../core/types.js";
import { ReportExportError } from "../core/errors.js";
import type { ImageSource } from "../domain/image/preprocess.js";
import { toEmbeddableJpeg } from "../domain/image/preprocess.js";
import { formatConfidence, formatScore } from "../domain/interpret.js";
import { renderConfidenceChart } from "../charts/confidence-chart.js";
import { renderRecyclabilityChart } from "../charts/recyclability-chart.js";
import { rasterizeSvg } from "../charts/rasterize.js";

export const REPORT_TITLE = "EcoSort - Waste Classification Report";
export const REPORT_FILE_NAME = "EcoSort_Report.pdf";

// Letter, in points.
const PAGE_WIDTH = 612;
const LEFT = 40;
const TEXT_WIDTH = PAGE_WIDTH - 2 * LEFT;
const FIGURES_TOP = 300;

export interface ReportExportInput {
  report: WasteReport;
  modelId: string;
  /** The uploaded photo; omitted from the page when null. */
  image: ImageSource | null;
  generatedAt?: Date;
}

export interface ReportExportOptions {
  /** Parent directory for the per-export scratch directory. */
  tmpDir?: string;
  logger?: pino.Logger;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** The labelled fact lines printed under the prediction. */
export function reportFactLines(report: WasteReport): string[] {
  const { facts } = report;
  return [
    `Description: ${facts.description}`,
    `How to Recycle: ${facts.recycle}`,
    `Hazard: ${facts.hazard}`,
    `Estimated Decomposition Time: ${facts.decompositionTime}`,
    `Eco Tip: ${facts.tip}`,
    `Recyclability Score: ${formatScore(report.recyclabilityScore)}`,
    `Carbon saving (kg/kg): ${facts.carbonSaving}`,
    `Landfill reduction (m³/ton): ${facts.landfillReduction}`,
  ];
}

interface PageAssets {
  imagePath: string | null;
  confidencePath: string;
  recyclabilityPath: string;
}

function drawPage(doc: PDFKit.PDFDocument, input: ReportExportInput, assets: PageAssets): void {
  const { report } = input;
  const generatedAt = input.generatedAt ?? new Date();

  doc.font("Helvetica-Bold").fontSize(18).text(REPORT_TITLE, LEFT, 40, { lineBreak: false });

  doc.font("Helvetica").fontSize(10);
  doc.text(`Generated: ${formatTimestamp(generatedAt)}`, LEFT, 66, { lineBreak: false });
  doc.text(`Model: ${input.modelId}`, LEFT, 80, { lineBreak: false });

  doc
    .font("Helvetica-Bold")
    .fontSize(12)
    .text(
      `Predicted Class: ${report.prediction.label.toUpperCase()} (${formatConfidence(report.prediction.confidence)}%)`,
      LEFT,
      104,
      { lineBreak: false },
    );

  doc.font("Helvetica").fontSize(10);
  let y = 124;
  for (const line of reportFactLines(report)) {
    doc.text(line, LEFT, y, { width: TEXT_WIDTH });
    y = doc.y + 4;
  }

  const top = Math.max(FIGURES_TOP, y + 12);
  doc.image(assets.recyclabilityPath, LEFT, top, { fit: [200, 200], align: "center", valign: "center" });
  if (assets.imagePath) {
    doc.image(assets.imagePath, 360, top, { fit: [200, 200], align: "center", valign: "center" });
  }
  doc.image(assets.confidencePath, LEFT, top + 220, { fit: [500, 220], align: "center" });
}

function writePdf(input: ReportExportInput, assets: PageAssets): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument({
      size: "LETTER",
      margin: 0,
      info: { Title: REPORT_TITLE, Creator: "EcoSort" },
    });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    try {
      drawPage(doc, input, assets);
      doc.end();
    } catch (err) {
      reject(err);
    }
  });
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Lay the report out on a single Letter page and return the PDF bytes.
 *
 * Chart rasters and the re-encoded photo are written to a scratch directory
 * under `options.tmpDir` and embedded from there; the directory is removed
 * before this resolves or rejects.
 *
 * @throws ReportExportError when any asset cannot be produced or drawn.
 */
export async function renderReportPdf(
  input: ReportExportInput,
  options: ReportExportOptions = {},
): Promise<Buffer> {
  const workDir = await fs.promises.mkdtemp(
    path.join(options.tmpDir ?? os.tmpdir(), "ecosort-report-"),
  );

  try {
    const { prediction } = input.report;

    const confidencePath = path.join(workDir, "confidence.png");
    await fs.promises.writeFile(
      confidencePath,
      await rasterizeSvg(renderConfidenceChart(prediction.probabilities, prediction.labels)),
    );

    const recyclabilityPath = path.join(workDir, "recyclability.png");
    await fs.promises.writeFile(
      recyclabilityPath,
      await rasterizeSvg(renderRecyclabilityChart(input.report.recyclabilityScore)),
    );

    let imagePath: string | null = null;
    if (input.image !== null) {
      imagePath = path.join(workDir, "upload.jpg");
      await fs.promises.writeFile(imagePath, await toEmbeddableJpeg(input.image));
    }

    return await writePdf(input, { imagePath, confidencePath, recyclabilityPath });
  } catch (err) {
    options.logger?.error({ err }, "report rendering failed");
    throw new ReportExportError(`Failed to build report: ${describe(err)}`, null, { cause: err });
  } finally {
    await fs.promises.rm(workDir, { recursive: true, force: true });
  }
}

/**
 * Render the report and write it to `targetPath`.
 * Nothing is written when rendering fails.
 */
export async function exportReportPdf(
  input: ReportExportInput,
  targetPath: string,
  options: ReportExportOptions = {},
): Promise<void> {
  let pdf: Buffer;
  try {
    pdf = await renderReportPdf(input, options);
  } catch (err) {
    if (err instanceof ReportExportError) {
      throw new ReportExportError(err.message, targetPath, { cause: err.cause });
    }
    throw err;
  }

  try {
    await fs.promises.writeFile(targetPath, pdf);
  } catch (err) {
    throw new ReportExportError(`Cannot write report to "${targetPath}": ${describe(err)}`, targetPath, {
      cause: err,
    });
  }

  options.logger?.info({ targetPath, bytes: pdf.length }, "report saved");
}
