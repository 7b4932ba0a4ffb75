import { describe, it, expect } from "vitest";
import { getDensities, waterDensityKgPerM3 } from "./density";
import { roundTo } from "./numbers";

describe("getDensities", () => {
  it("returns water and saline density at typical lab temperatures", () => {
    expect(getDensities(20)).toEqual({ water: 0.99823, saline: 1.0046 });
    expect(getDensities(22)).toEqual({ water: 0.9978, saline: 1.0042 });
    expect(getDensities(25)).toEqual({ water: 0.99708, saline: 1.0035 });
  });

  it("peaks at 1.0 g/cm3 near 4 °C", () => {
    expect(getDensities(4)).toEqual({ water: 1.0, saline: 1.0064 });
  });

  it("derives saline from rounded water density for the whole 0-40 °C range", () => {
    for (let t = 0; t <= 40; t += 0.5) {
      const { water, saline } = getDensities(t);
      expect(saline).toBe(roundTo(water * 1.0064, 4));
    }
  });

  it("extrapolates outside the lab range instead of failing", () => {
    const hot = getDensities(90);
    expect(Number.isFinite(hot.water)).toBe(true);
    expect(hot.water).toBeLessThan(getDensities(40).water);
  });
});

describe("waterDensityKgPerM3", () => {
  it("is in kg/m3", () => {
    expect(waterDensityKgPerM3(22)).toBeCloseTo(997.8003, 3);
  });
});
