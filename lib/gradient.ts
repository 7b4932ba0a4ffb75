import { resolveMaterial, type MaterialRef, type MaterialSet } from "@/lib/materials";
import { solveForward } from "@/lib/mixing";

// Targets within this distance of the midpoint still count as "at the
// midpoint" and are bounded by intermediate/low.
export const MIDPOINT_EPSILON = 0.0001;

// With fewer than three points one of the two segments has no spacing.
const MIN_POINT_COUNT = 3;

export class GradientPlanError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = "GradientPlanError";
  }
}

export type BoundingPair = {
  upper: MaterialRef;
  lower: MaterialRef;
};

/** One row of the dilution plan before any user edits. */
export type PlannedPoint = BoundingPair & {
  /** 1-based position in the plan. */
  index: number;
  targetConcentration: number;
  theoreticalUpper: number;
  theoreticalLower: number;
};

export type GradientInput = {
  materials: MaterialSet;
  pointCount: number;
  /** Mass prepared for every point. */
  pointTotalMass: number;
};

function assertPointCount(pointCount: number): void {
  if (!Number.isInteger(pointCount) || pointCount < MIN_POINT_COUNT) {
    throw new GradientPlanError(
      `pointCount must be an integer >= ${MIN_POINT_COUNT}, got ${pointCount}`
    );
  }
}

/**
 * Target concentrations for the plan, ascending.
 *
 * The range is split at `midConcentration` into two linear segments:
 *   lower: floor(n / 2) points from cLow (inclusive) towards mid (exclusive)
 *   upper: the remaining points from mid (inclusive) to cHigh (inclusive)
 */
export function planTargets(
  cLow: number,
  cHigh: number,
  midConcentration: number,
  pointCount: number
): number[] {
  assertPointCount(pointCount);

  const midIndex = Math.floor(pointCount / 2);
  const upperCount = pointCount - midIndex;

  const lowerStep = (midConcentration - cLow) / midIndex;
  const upperStep = (cHigh - midConcentration) / (upperCount - 1);

  const lower = Array.from({ length: midIndex }, (_, i) => cLow + i * lowerStep);
  const upper = Array.from({ length: upperCount }, (_, i) => midConcentration + i * upperStep);

  return [...lower, ...upper];
}

export function boundingMaterials(target: number, midConcentration: number): BoundingPair {
  if (target > midConcentration + MIDPOINT_EPSILON) {
    return { upper: "high", lower: "intermediate" };
  }
  return { upper: "intermediate", lower: "low" };
}

/**
 * Full plan: targets, bounding pair per point, and the theoretical mass split
 * used as the editable default for every row. The midpoint is taken from the
 * intermediate material in `materials`.
 */
export function planGradient({ materials, pointCount, pointTotalMass }: GradientInput): PlannedPoint[] {
  const mid = materials.intermediate.concentration;
  const targets = planTargets(materials.low.concentration, materials.high.concentration, mid, pointCount);

  return targets.map((targetConcentration, i) => {
    const pair = boundingMaterials(targetConcentration, mid);
    const split = solveForward(
      targetConcentration,
      pointTotalMass,
      resolveMaterial(pair.upper, materials),
      resolveMaterial(pair.lower, materials)
    );

    return {
      index: i + 1,
      targetConcentration,
      ...pair,
      theoreticalUpper: split.massHigh,
      theoreticalLower: split.massLow,
    };
  });
}
