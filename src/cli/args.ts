// ---------------------------------------------------------------------------
// Command-line argument parsing for the classify command.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";
import { EcoSortError } from "../core/errors.js";

export const USAGE = "Usage: ecosort-classify <image> [--report out.pdf] [--json] [--model path]";

export interface CliOptions {
  imagePath: string;
  reportPath: string | null;
  json: boolean;
  modelPath: string | null;
}

/**
 * @throws EcoSortError with the usage line when no image path is given.
 * @throws TypeError from `parseArgs` for unknown flags.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      report: { type: "string" },
      json: { type: "boolean", default: false },
      model: { type: "string" },
    },
  });

  const imagePath = positionals[0];
  if (!imagePath) {
    throw new EcoSortError(USAGE);
  }

  return {
    imagePath,
    reportPath: values.report ?? null,
    json: values.json ?? false,
    modelPath: values.model ?? null,
  };
}
