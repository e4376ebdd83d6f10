// ---------------------------------------------------------------------------
// Knowledge-base routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";
import type { KnowledgeBase } from "../../knowledge/knowledge-base.js";

/** Dependencies required by knowledge routes. */
export interface KnowledgeRouteDeps {
  knowledge: KnowledgeBase;
}

/**
 * Mounts read-only knowledge-base endpoints:
 *
 * - `GET /knowledge`        -- Every category with its facts and score.
 * - `GET /knowledge/:label` -- One category, or 404.
 */
export function knowledgeRoutes(deps: KnowledgeRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { knowledge } = deps;

  app.get("/", (c) => {
    const categories = knowledge.labels.map((label) => ({
      label,
      fact: knowledge.getFact(label),
      recyclabilityScore: knowledge.getScore(label),
    }));

    return c.json({ categories, total: categories.length });
  });

  app.get("/:label", (c) => {
    const label = c.req.param("label");
    const fact = knowledge.getFact(label);

    if (!fact) {
      return c.json({ error: `Unknown waste category: ${label}`, type: "not_found" }, 404);
    }

    return c.json({ label, fact, recyclabilityScore: knowledge.getScore(label) });
  });

  return app;
}
