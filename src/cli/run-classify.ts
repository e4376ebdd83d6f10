// ---------------------------------------------------------------------------
// The classify command, independent of the process it runs in.
// ---------------------------------------------------------------------------

import type { AppConfig } from "../core/types.js";
import type { BootstrapOptions, Runtime } from "../app.js";
import { loadConfig } from "../config/config.js";
import { formatReportText } from "../report/text-report.js";
import { exportReportPdf } from "../report/pdf-report.js";
import { parseCliArgs } from "./args.js";

export interface ClassifyCommandIo {
  bootstrap: (config: AppConfig, options: BootstrapOptions) => Promise<Runtime>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
}

/**
 * Classify the image named in `argv`, print the report and optionally save
 * the PDF. Resolves to the process exit code; failures are printed to
 * `stderr` as `Error: <message>`.
 */
export async function runClassify(argv: string[], io: ClassifyCommandIo): Promise<number> {
  try {
    const options = parseCliArgs(argv);

    const env: NodeJS.ProcessEnv = { ECOSORT_LOG_LEVEL: "warn", ...(io.env ?? process.env) };
    if (options.modelPath) env.ECOSORT_MODEL_PATH = options.modelPath;

    const { pipeline, logger } = await io.bootstrap(loadConfig(env), { logToStderr: true });
    const report = await pipeline.classify(options.imagePath);

    io.stdout(
      options.json
        ? JSON.stringify({ modelId: pipeline.modelId, report }, null, 2)
        : formatReportText(report),
    );

    if (options.reportPath) {
      await exportReportPdf(
        { report, modelId: pipeline.modelId, image: options.imagePath },
        options.reportPath,
        { logger },
      );
      io.stdout(`\nReport saved to ${options.reportPath}`);
    }

    return 0;
  } catch (err) {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
