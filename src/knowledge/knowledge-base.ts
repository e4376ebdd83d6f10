// ---------------------------------------------------------------------------
// Waste knowledge base.
// Reads the facts YAML, validates it with Zod, and exposes read-only lookups
// keyed by classifier label.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";
import type { RecyclabilityScore, WasteFact } from "../core/types.js";
import { WASTE_LABELS } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const WasteFactSchema = z.object({
  description: z.string().min(1),
  recycle: z.string().min(1),
  hazard: z.string().min(1),
  decompositionTime: z.string().min(1),
  carbonSavingKgPerKg: z.number().nonnegative(),
  landfillReductionM3PerTon: z.number().nonnegative(),
  tip: z.string().min(1),
});

export const KnowledgeDocumentSchema = z.object({
  facts: z.record(z.string(), WasteFactSchema),
  recyclability: z.record(z.string(), z.number().int().min(0).max(100)),
  didYouKnow: z.array(z.string().min(1)).default([]),
});

export type KnowledgeDocument = z.infer<typeof KnowledgeDocumentSchema>;

// ── Knowledge base ──────────────────────────────────────────────────────────

export class KnowledgeBase {
  private readonly facts: ReadonlyMap<string, WasteFact>;
  private readonly scores: ReadonlyMap<string, RecyclabilityScore>;
  readonly didYouKnow: readonly string[];

  constructor(document: KnowledgeDocument) {
    this.facts = new Map(
      Object.entries(document.facts).map(([label, fact]) => [label, Object.freeze({ ...fact })]),
    );
    this.scores = new Map(Object.entries(document.recyclability));
    this.didYouKnow = Object.freeze([...document.didYouKnow]);
  }

  /** Labels that have a fact record, in file order. */
  get labels(): string[] {
    return [...this.facts.keys()];
  }

  getFact(label: string): WasteFact | null {
    return this.facts.get(label) ?? null;
  }

  getScore(label: string): RecyclabilityScore | null {
    return this.scores.get(label) ?? null;
  }

  /** Pick one trivia line, or null when the file lists none. */
  randomFact(random: () => number = Math.random): string | null {
    if (this.didYouKnow.length === 0) return null;
    const index = Math.min(
      Math.floor(random() * this.didYouKnow.length),
      this.didYouKnow.length - 1,
    );
    return this.didYouKnow[index] ?? null;
  }
}

// ── Loading ─────────────────────────────────────────────────────────────────

/**
 * Validate a parsed document and check that its fact and score tables cover
 * exactly the given label set.
 */
export function createKnowledgeBase(
  raw: unknown,
  labels: readonly string[] = WASTE_LABELS,
  source = "knowledge base",
): KnowledgeBase {
  const result = KnowledgeDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${source}: ${issues}`);
  }

  const document = result.data;
  checkCoverage("facts", Object.keys(document.facts), labels, source);
  checkCoverage("recyclability", Object.keys(document.recyclability), labels, source);

  return new KnowledgeBase(document);
}

function checkCoverage(
  table: string,
  keys: readonly string[],
  labels: readonly string[],
  source: string,
): void {
  const missing = labels.filter((label) => !keys.includes(label));
  const unknown = keys.filter((key) => !labels.includes(key));

  if (missing.length > 0 || unknown.length > 0) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing ${missing.join(", ")}`);
    if (unknown.length > 0) parts.push(`unknown ${unknown.join(", ")}`);
    throw new ConfigurationError(`Invalid ${source}: ${table} table ${parts.join("; ")}`);
  }
}

/**
 * Read and validate the knowledge-base YAML file.
 * Relative paths resolve against the working directory.
 */
export function loadKnowledgeBase(
  filePath: string,
  labels: readonly string[] = WASTE_LABELS,
): KnowledgeBase {
  const resolved = path.resolve(filePath);

  let content: string;
  try {
    content = fs.readFileSync(resolved, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read knowledge base at "${resolved}"`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new ConfigurationError(`Knowledge base at "${resolved}" is not valid YAML`, {
      cause: err,
    });
  }

  return createKnowledgeBase(parsed, labels, path.basename(resolved));
}
