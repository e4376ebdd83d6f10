// ---------------------------------------------------------------------------
// Tests for the waste knowledge base loader and lookups.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { WASTE_LABELS } from "../../../src/core/types.js";
import { ConfigurationError } from "../../../src/core/errors.js";
import {
  createKnowledgeBase,
  loadKnowledgeBase,
} from "../../../src/knowledge/knowledge-base.js";
import { loadFacts } from "../../helpers/fixtures.js";

const batteryFact = {
  description: "Batteries.",
  recycle: "Return them.",
  hazard: "High.",
  decompositionTime: "100+ years",
  carbonSavingKgPerKg: 8,
  landfillReductionM3PerTon: 0.5,
  tip: "Tape terminals.",
};

describe("shipped knowledge base", () => {
  const knowledge = loadFacts();

  it("has exactly one entry per classifier label", () => {
    expect([...knowledge.labels].sort()).toEqual([...WASTE_LABELS].sort());
  });

  it("has a recyclability score for every classifier label", () => {
    for (const label of WASTE_LABELS) {
      expect(knowledge.getScore(label)).not.toBeNull();
    }
  });

  it("returns the battery facts and score", () => {
    const fact = knowledge.getFact("battery");
    expect(fact?.hazard).toBe("High — toxic if leaked into soil/water.");
    expect(fact?.carbonSavingKgPerKg).toBe(8);
    expect(knowledge.getScore("battery")).toBe(10);
  });

  it("uses the lowercase residual-waste label", () => {
    expect(knowledge.getFact("trash")?.description).toBe(
      "Non-recyclable residual waste (mixed contaminants).",
    );
    expect(knowledge.getFact("Other Trash")).toBeNull();
    expect(knowledge.getScore("Other Trash")).toBeNull();
  });

  it("returns frozen fact records", () => {
    expect(Object.isFrozen(knowledge.getFact("paper"))).toBe(true);
  });

  it("lists did-you-know facts", () => {
    expect(knowledge.didYouKnow).toHaveLength(5);
  });
});

describe("randomFact", () => {
  const knowledge = createKnowledgeBase(
    {
      facts: { battery: batteryFact },
      recyclability: { battery: 10 },
      didYouKnow: ["first", "second", "third"],
    },
    ["battery"],
  );

  it("maps the random source onto the list", () => {
    expect(knowledge.randomFact(() => 0)).toBe("first");
    expect(knowledge.randomFact(() => 0.5)).toBe("second");
    expect(knowledge.randomFact(() => 0.9999)).toBe("third");
  });

  it("returns null when there are no facts", () => {
    const empty = createKnowledgeBase(
      { facts: { battery: batteryFact }, recyclability: { battery: 10 } },
      ["battery"],
    );
    expect(empty.randomFact(() => 0)).toBeNull();
  });
});

describe("createKnowledgeBase validation", () => {
  it("rejects a facts table missing a label", () => {
    expect(() =>
      createKnowledgeBase(
        { facts: { battery: batteryFact }, recyclability: { battery: 10, paper: 96 } },
        ["battery", "paper"],
      ),
    ).toThrow("Invalid knowledge base: facts table missing paper");
  });

  it("rejects a score table with an unknown label", () => {
    expect(() =>
      createKnowledgeBase(
        { facts: { battery: batteryFact }, recyclability: { battery: 10, "Other Trash": 10 } },
        ["battery"],
      ),
    ).toThrow("Invalid knowledge base: recyclability table unknown Other Trash");
  });

  it("rejects a score outside 0..100", () => {
    expect(() =>
      createKnowledgeBase(
        { facts: { battery: batteryFact }, recyclability: { battery: 150 } },
        ["battery"],
      ),
    ).toThrow(ConfigurationError);
  });

  it("rejects a fact with a missing field", () => {
    const { tip: _tip, ...incomplete } = batteryFact;
    expect(() =>
      createKnowledgeBase(
        { facts: { battery: incomplete }, recyclability: { battery: 10 } },
        ["battery"],
      ),
    ).toThrow(/facts\.battery\.tip/);
  });
});

describe("loadKnowledgeBase", () => {
  it("throws ConfigurationError for a missing file", () => {
    expect(() => loadKnowledgeBase("config/does-not-exist.yaml")).toThrow(ConfigurationError);
  });
});
