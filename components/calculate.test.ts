import { describe, it, expect, vi } from "vitest";
import { defaultSettings } from "@/lib/settings";
import { computePlan, fieldValue, setOverride } from "./calculate";

const now = new Date(2024, 0, 2);

describe("computePlan", () => {
  it("builds a plan for valid settings", () => {
    const plan = computePlan(defaultSettings(now), [{}, { massUpper: 90 }]);
    expect(plan?.points).toHaveLength(8);
    expect(plan?.points[1]?.massUpper).toBe(90);
  });

  it("returns null and warns for settings that cannot be planned", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const settings = { ...defaultSettings(now), low: { concentration: 100, density: 1 } };

    expect(computePlan(settings)).toBeNull();
    expect(warn).toHaveBeenCalledWith("Skipping dilution plan for invalid settings", [
      "high.concentration must be greater than low.concentration",
    ]);
    warn.mockRestore();
  });
});

describe("setOverride", () => {
  it("pads the list up to the edited row", () => {
    expect(setOverride([], 2, { massUpper: 5 })).toEqual([{}, {}, { massUpper: 5 }]);
  });

  it("merges into an existing row without mutating the input", () => {
    const before = [{ massUpper: 5 }];
    const after = setOverride(before, 0, { massLower: 7 });

    expect(after).toEqual([{ massUpper: 5, massLower: 7 }]);
    expect(before).toEqual([{ massUpper: 5 }]);
  });

  it("clears keys set to undefined", () => {
    const after = setOverride([{ massUpper: 5, targetConcentration: 10 }], 0, { massUpper: undefined });
    expect(after).toEqual([{ targetConcentration: 10 }]);
    expect(after[0]).not.toHaveProperty("massUpper");
  });
});

describe("fieldValue", () => {
  it("stores a measured mass at the precision it is shown with", () => {
    expect(fieldValue(179.15, 1)).toBe(179.2);
    expect(fieldValue(12.345, 2)).toBe(12.35);
    expect(fieldValue(179.15)).toBe(179.15);
  });

  it("ignores an empty input", () => {
    expect(fieldValue(NaN, 1)).toBeNull();
  });
});
