#!/usr/bin/env node
/**
 * Classify one waste photo from the terminal.
 *
 * Prints the prediction dashboard and, with --report, saves the PDF report.
 * Log lines go to stderr.
 *
 * Usage:
 *   npm run classify -- photo.jpg
 *   npm run classify -- photo.jpg --report report.pdf
 *   npm run classify -- photo.jpg --json
 *
 * Options:
 *   --report <path>  Write the PDF report to <path>
 *   --json           Print the report as JSON instead of text
 *   --model <path>   Override ECOSORT_MODEL_PATH
 */
import { bootstrap } from "../app.js";
import { runClassify } from "./run-classify.js";

process.exitCode = await runClassify(process.argv.slice(2), {
  bootstrap,
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
});
