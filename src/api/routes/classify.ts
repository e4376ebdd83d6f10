// ---------------------------------------------------------------------------
// Classification routes: JSON prediction and PDF report for an upload.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";
import { readUploadedImage } from "../upload.js";
import type { ClassificationPipeline } from "../../pipeline/classification-pipeline.js";
import { renderConfidenceChart } from "../../charts/confidence-chart.js";
import { renderRecyclabilityChart } from "../../charts/recyclability-chart.js";
import { REPORT_FILE_NAME, renderReportPdf } from "../../report/pdf-report.js";

/** Dependencies required by classification routes. */
export interface ClassifyRouteDeps {
  pipeline: ClassificationPipeline;
  /** Parent directory for report scratch files; the OS default when unset. */
  tmpDir?: string;
}

/**
 * - `POST /classify` -- multipart `image` → report JSON with SVG charts.
 */
export function classifyRoutes(deps: ClassifyRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post("/", async (c) => {
    const upload = await readUploadedImage(c);
    const report = await deps.pipeline.classify(upload.bytes, c.get("logger"));
    const { prediction } = report;

    return c.json({
      fileName: upload.fileName,
      modelId: deps.pipeline.modelId,
      report,
      charts: {
        confidence: renderConfidenceChart(prediction.probabilities, prediction.labels),
        recyclability: renderRecyclabilityChart(report.recyclabilityScore),
      },
    });
  });

  return app;
}

/**
 * - `POST /report` -- multipart `image` → `application/pdf` attachment.
 */
export function reportRoutes(deps: ClassifyRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post("/", async (c) => {
    const logger = c.get("logger");
    const upload = await readUploadedImage(c);
    const report = await deps.pipeline.classify(upload.bytes, logger);

    const pdf = await renderReportPdf(
      { report, modelId: deps.pipeline.modelId, image: upload.bytes },
      { tmpDir: deps.tmpDir, logger },
    );

    c.header("Content-Type", "application/pdf");
    c.header("Content-Disposition", `attachment; filename="${REPORT_FILE_NAME}"`);
    return c.body(new Uint8Array(pdf), 200);
  });

  return app;
}
