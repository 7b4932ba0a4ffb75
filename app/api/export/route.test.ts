import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { parseWorkbook } from "@/lib/workbook";
import { POST } from "./route";

function post(body: string): Request {
  return new Request("http://localhost/api/export", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("POST /api/export", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date(2024, 4, 6, 9, 7));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the plan as an xlsx attachment", async () => {
    const res = await POST(post(JSON.stringify({ settings: { experimentName: "Panel A", pointCount: 5 } })));

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe(
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
    );
    expect(res.headers.get("Content-Disposition")).toBe("attachment; filename*=UTF-8''Panel%20A_0907.xlsx");

    const imported = parseWorkbook(await res.arrayBuffer());
    expect(imported.settings.experimentName).toBe("Panel A");
    expect(imported.settings.pointCount).toBe(5);
    expect(imported.overrides).toHaveLength(5);
  });

  it("returns 400 for invalid settings", async () => {
    const res = await POST(post(JSON.stringify({ settings: { low: { concentration: 500 } } })));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid settings",
      issues: ["high.concentration must be greater than low.concentration"],
    });
  });

  it("returns 400 for a body that is not JSON", async () => {
    const res = await POST(post("not json"));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be valid JSON" });
  });
});
