// ---------------------------------------------------------------------------
// Integration tests for the /knowledge routes.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { createTestApp } from "../../helpers/app.js";

describe("GET /knowledge", () => {
  it("lists every category with its score", async () => {
    const res = await createTestApp().request("/knowledge");

    expect(res.status).toBe(200);

    const body: unknown = await res.json();
    expect(body).toMatchObject({ total: 12 });
    expect(body).toMatchObject({
      categories: expect.arrayContaining([
        expect.objectContaining({ label: "metal", recyclabilityScore: 98 }),
        expect.objectContaining({ label: "trash", recyclabilityScore: 10 }),
      ]),
    });
  });
});

describe("GET /knowledge/:label", () => {
  it("returns one category", async () => {
    const res = await createTestApp().request("/knowledge/battery");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      label: "battery",
      fact: { decompositionTime: "100+ years", carbonSavingKgPerKg: 8 },
      recyclabilityScore: 10,
    });
  });

  it("returns 404 for an unknown category", async () => {
    const res = await createTestApp().request("/knowledge/styrofoam");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "Unknown waste category: styrofoam",
      type: "not_found",
    });
  });
});
