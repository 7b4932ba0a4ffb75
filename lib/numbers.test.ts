import { describe, it, expect } from "vitest";
import { clamp, formatFixed, roundTo, toFiniteNumber } from "./numbers";

describe("roundTo", () => {
  it("sends exact ties to the even digit", () => {
    expect(roundTo(1.125, 2)).toBe(1.12);
    expect(roundTo(0.625, 2)).toBe(0.62);
    expect(roundTo(0.875, 2)).toBe(0.88);
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(3.5, 0)).toBe(4);
    expect(roundTo(-0.625, 2)).toBe(-0.62);
  });

  it("rounds on the stored binary value, not the decimal literal", () => {
    // 2.675 is stored as 2.67499999...
    expect(roundTo(2.675, 2)).toBe(2.67);
  });

  it("rounds non-ties to the nearest value", () => {
    expect(roundTo(685.9317073170731, 1)).toBe(685.9);
    expect(roundTo(653.2682926829269, 1)).toBe(653.3);
    expect(roundTo(1339.1525647805392, 1)).toBe(1339.2);
    expect(roundTo(0.99780029, 5)).toBe(0.9978);
    expect(roundTo(42, 2)).toBe(42);
  });

  it("passes non-finite values through", () => {
    expect(roundTo(Infinity, 2)).toBe(Infinity);
    expect(roundTo(NaN, 2)).toBeNaN();
  });
});

describe("clamp", () => {
  it("keeps values inside the bounds", () => {
    expect(clamp(50, 3, 20)).toBe(20);
    expect(clamp(1, 3, 20)).toBe(3);
    expect(clamp(8, 3, 20)).toBe(8);
  });
});

describe("formatFixed", () => {
  it("renders non-finite values as a dash", () => {
    expect(formatFixed(12.495, 1)).toBe("12.5");
    expect(formatFixed(NaN, 2)).toBe("-");
  });
});

describe("toFiniteNumber", () => {
  it("accepts numbers and numeric strings only", () => {
    expect(toFiniteNumber(3.5)).toBe(3.5);
    expect(toFiniteNumber(" 7 ")).toBe(7);
    expect(toFiniteNumber("")).toBeNull();
    expect(toFiniteNumber("abc")).toBeNull();
    expect(toFiniteNumber(Infinity)).toBeNull();
    expect(toFiniteNumber(null)).toBeNull();
  });
});
