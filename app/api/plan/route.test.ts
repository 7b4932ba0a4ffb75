import { describe, it, expect } from "vitest";
import { POST } from "./route";

function post(body: string): Request {
  return new Request("http://localhost/api/plan", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("POST /api/plan", () => {
  it("returns the full plan for valid settings", async () => {
    const res = await POST(post(JSON.stringify({ settings: { experimentName: "Panel A" } })));

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.settings.experimentName).toBe("Panel A");
    expect(body.settings.intermediatePlannedMass).toBe(1339.2);
    expect(body.intermediate.actualHigh).toBe(685.9);
    expect(body.points).toHaveLength(8);
    expect(body.points[1].massUpper).toBe(89.1);
    expect(body.points[1].massLower).toBe(260.9);
    expect(body.totals.high).toBeCloseTo(1389.6, 6);
  });

  it("applies per-point overrides", async () => {
    const res = await POST(post(JSON.stringify({ overrides: [null, { massUpper: 90, massLower: 260 }] })));

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.points[1].massUpper).toBe(90);
    expect(body.points[1].achievedConcentration).toBeCloseTo(12.62213, 5);
  });

  it("returns 400 with every issue for invalid settings", async () => {
    const res = await POST(post(JSON.stringify({ settings: { high: { density: -1 }, temperature: "warm" } })));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid settings",
      issues: ["temperature must be a finite number", "high.density must be greater than 0"],
    });
  });

  it("returns 400 for a body that is not JSON", async () => {
    const res = await POST(post("{"));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be valid JSON" });
  });
});
