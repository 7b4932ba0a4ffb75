import { clamp } from "@/lib/numbers";

/** A stock (or blended) solution as seen by the mixing equations. */
export type Material = {
  concentration: number;
  /** g/cm3, must be > 0. */
  density: number;
};

export type MixResult = {
  massHigh: number;
  massLow: number;
};

/**
 * Theoretical mass split for a two-component blend.
 *
 * Solves for the masses of `high` and `low` whose volume-weighted
 * concentration equals `targetConcentration` while summing to `totalMass`.
 * `high.concentration` is expected to be greater than `low.concentration`.
 * Targets at or beyond either bound saturate to the pure component.
 */
export function solveForward(
  targetConcentration: number,
  totalMass: number,
  high: Material,
  low: Material
): MixResult {
  if (targetConcentration >= high.concentration) {
    return { massHigh: totalMass, massLow: 0 };
  }
  if (targetConcentration <= low.concentration) {
    return { massHigh: 0, massLow: totalMass };
  }

  // Volume weights per unit mass of each component.
  const kHigh = (high.concentration - targetConcentration) / high.density;
  const kLow = (targetConcentration - low.concentration) / low.density;
  if (kHigh + kLow === 0) {
    return { massHigh: 0, massLow: totalMass };
  }

  const massHigh = clamp((totalMass * kLow) / (kHigh + kLow), 0, totalMass);
  return { massHigh, massLow: totalMass - massHigh };
}

function volumes(massHigh: number, massLow: number, high: Material, low: Material) {
  return {
    vHigh: massHigh / high.density,
    vLow: massLow / low.density,
  };
}

/**
 * Concentration actually reached by mixing the given (measured) masses:
 * the volume-weighted average of both components. Zero total volume gives 0.
 */
export function solveInverse(
  massHigh: number,
  massLow: number,
  high: Material,
  low: Material
): number {
  const { vHigh, vLow } = volumes(massHigh, massLow, high, low);
  if (vHigh + vLow === 0) return 0;
  return (vHigh * high.concentration + vLow * low.concentration) / (vHigh + vLow);
}

/** Density of the blend (total mass over total volume); 1.0 when empty. */
export function achievedDensity(
  massHigh: number,
  massLow: number,
  high: Material,
  low: Material
): number {
  const { vHigh, vLow } = volumes(massHigh, massLow, high, low);
  if (vHigh + vLow === 0) return 1.0;
  return (massHigh + massLow) / (vHigh + vLow);
}
