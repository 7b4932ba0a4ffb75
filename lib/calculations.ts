import { getDensities, type Densities } from "@/lib/density";
import { planGradient, type PlannedPoint } from "@/lib/gradient";
import { materialLabel, resolveMaterial, type MaterialRef, type MaterialSet } from "@/lib/materials";
import { achievedDensity, solveForward, solveInverse } from "@/lib/mixing";
import { roundTo } from "@/lib/numbers";
import type { DilutionSettings, PointOverride, ResolvedSettings } from "@/lib/settings";

// Extra intermediate prepared on top of what the plan consumes.
const INTERMEDIATE_SAFETY_FACTOR = 1.1;
const MIN_INTERMEDIATE_MASS = 100;
// Density assumed for the not-yet-prepared intermediate when sizing it.
const ASSUMED_INTERMEDIATE_DENSITY = 1.0;

export type IntermediateSuggestion = {
  /** Midpoint of the high/low range, rounded to 2 decimals. */
  midpointGuess: number;
  /** Intermediate mass consumed by a plan built around the midpoint guess. */
  intermediateDemand: number;
  /** Demand plus 10%, rounded to 0.1. */
  suggestedMass: number;
  /** Planned total used when the user has not chosen one. */
  defaultPlannedMass: number;
};

export type IntermediateBlend = {
  targetConcentration: number;
  plannedTotalMass: number;
  theoreticalHigh: number;
  theoreticalLow: number;
  actualHigh: number;
  actualLow: number;
  achievedConcentration: number;
  achievedDensity: number;
};

export type GradientPoint = {
  index: number;
  targetConcentration: number;
  upper: MaterialRef;
  lower: MaterialRef;
  theoreticalUpper: number;
  theoreticalLower: number;
  /** Mass actually added (user-measured, or the rounded theoretical value). */
  massUpper: number;
  massLower: number;
  achievedConcentration: number;
};

/** Cumulative mass of each source material consumed by the whole plan. */
export type MaterialTotals = {
  high: number;
  low: number;
  intermediate: number;
};

/** Row shape used for tabular export (spreadsheet / report). */
export type PlanRow = {
  index: number;
  targetConcentration: number;
  upperMaterial: string;
  lowerMaterial: string;
  massUpper: number;
  massLower: number;
  achievedConcentration: number;
};

export type DilutionPlan = {
  settings: ResolvedSettings;
  densities: Densities;
  suggestion: IntermediateSuggestion;
  intermediate: IntermediateBlend;
  points: GradientPoint[];
  totals: MaterialTotals;
};

function intermediateShare(point: Pick<PlannedPoint, "upper" | "lower" | "theoreticalUpper" | "theoreticalLower">): number {
  if (point.upper === "intermediate") return point.theoreticalUpper;
  if (point.lower === "intermediate") return point.theoreticalLower;
  return 0;
}

/**
 * One top-down pass over the whole recipe:
 *   densities -> intermediate sizing -> intermediate blend -> gradient plan
 *   -> per-point user edits -> running totals
 *
 * Every value is derived from the constructor arguments; build a new instance
 * whenever an input changes.
 */
export class DilutionCalculations {
  readonly settings: ResolvedSettings;
  readonly densities: Densities;
  readonly suggestion: IntermediateSuggestion;
  readonly intermediate: IntermediateBlend;
  readonly materials: MaterialSet;
  readonly points: GradientPoint[];
  readonly totals: MaterialTotals;

  constructor(settings: DilutionSettings, overrides: PointOverride[] = []) {
    this.densities = getDensities(settings.temperature);
    this.suggestion = this.suggestIntermediate(settings);

    const intermediateTarget = settings.intermediateTarget ?? this.suggestion.midpointGuess;
    const plannedTotalMass = settings.intermediatePlannedMass ?? this.suggestion.defaultPlannedMass;
    this.intermediate = this.prepareIntermediate(
      settings,
      intermediateTarget,
      plannedTotalMass
    );

    // The blend actually prepared becomes the third source material.
    this.materials = {
      high: settings.high,
      low: settings.low,
      intermediate: {
        concentration: this.intermediate.achievedConcentration,
        density: this.intermediate.achievedDensity,
      },
    };

    const planned = planGradient({
      materials: this.materials,
      pointCount: settings.pointCount,
      pointTotalMass: settings.pointTotalMass,
    });
    this.points = this.applyOverrides(planned, overrides, settings.pointTotalMass);
    this.totals = this.sumTotals();

    this.settings = {
      ...settings,
      intermediateTarget,
      intermediatePlannedMass: plannedTotalMass,
      intermediateActualHigh: this.intermediate.actualHigh,
      intermediateActualLow: this.intermediate.actualLow,
    };
  }

  /** Public accessor used by the UI/export code. */
  toRows(): PlanRow[] {
    return this.points.map((p) => ({
      index: p.index,
      targetConcentration: p.targetConcentration,
      upperMaterial: materialLabel(p.upper),
      lowerMaterial: materialLabel(p.lower),
      massUpper: p.massUpper,
      massLower: p.massLower,
      achievedConcentration: p.achievedConcentration,
    }));
  }

  toJSON(): DilutionPlan {
    return {
      settings: this.settings,
      densities: this.densities,
      suggestion: this.suggestion,
      intermediate: this.intermediate,
      points: this.points,
      totals: this.totals,
    };
  }

  private suggestIntermediate(settings: DilutionSettings): IntermediateSuggestion {
    // Size the intermediate before it exists: plan around the midpoint guess
    // and assume a density of 1.0 for the blend.
    const midpointGuess = roundTo((settings.high.concentration + settings.low.concentration) / 2, 2);
    const guessPlan = planGradient({
      materials: {
        high: settings.high,
        low: settings.low,
        intermediate: { concentration: midpointGuess, density: ASSUMED_INTERMEDIATE_DENSITY },
      },
      pointCount: settings.pointCount,
      pointTotalMass: settings.pointTotalMass,
    });

    const intermediateDemand = guessPlan.reduce((sum, p) => sum + intermediateShare(p), 0);
    const suggestedMass = roundTo(intermediateDemand * INTERMEDIATE_SAFETY_FACTOR, 1);

    return {
      midpointGuess,
      intermediateDemand,
      suggestedMass,
      defaultPlannedMass: Math.max(suggestedMass, MIN_INTERMEDIATE_MASS),
    };
  }

  private prepareIntermediate(
    settings: DilutionSettings,
    targetConcentration: number,
    plannedTotalMass: number
  ): IntermediateBlend {
    const theoretical = solveForward(targetConcentration, plannedTotalMass, settings.high, settings.low);
    const actualHigh = settings.intermediateActualHigh ?? roundTo(theoretical.massHigh, 1);
    const actualLow = settings.intermediateActualLow ?? roundTo(theoretical.massLow, 1);

    return {
      targetConcentration,
      plannedTotalMass,
      theoreticalHigh: theoretical.massHigh,
      theoreticalLow: theoretical.massLow,
      actualHigh,
      actualLow,
      achievedConcentration: solveInverse(actualHigh, actualLow, settings.high, settings.low),
      achievedDensity: achievedDensity(actualHigh, actualLow, settings.high, settings.low),
    };
  }

  private applyOverrides(
    planned: PlannedPoint[],
    overrides: PointOverride[],
    pointTotalMass: number
  ): GradientPoint[] {
    return planned.map((point, i) => {
      const override: PointOverride = overrides[i] ?? {};
      const upper = resolveMaterial(point.upper, this.materials);
      const lower = resolveMaterial(point.lower, this.materials);

      // The bounding pair stays tied to the planned target; an edited target
      // only changes the suggested split.
      const targetConcentration = override.targetConcentration ?? point.targetConcentration;
      const theoretical =
        targetConcentration === point.targetConcentration
          ? { massHigh: point.theoreticalUpper, massLow: point.theoreticalLower }
          : solveForward(targetConcentration, pointTotalMass, upper, lower);

      const massUpper = override.massUpper ?? roundTo(theoretical.massHigh, 1);
      const massLower = override.massLower ?? roundTo(theoretical.massLow, 1);

      return {
        index: point.index,
        targetConcentration,
        upper: point.upper,
        lower: point.lower,
        theoreticalUpper: theoretical.massHigh,
        theoreticalLower: theoretical.massLow,
        massUpper,
        massLower,
        achievedConcentration: solveInverse(massUpper, massLower, upper, lower),
      };
    });
  }

  private sumTotals(): MaterialTotals {
    const totals: MaterialTotals = {
      high: this.intermediate.actualHigh,
      low: this.intermediate.actualLow,
      intermediate: 0,
    };

    for (const p of this.points) {
      if (p.upper === "high") totals.high += p.massUpper;
      if (p.upper === "intermediate") totals.intermediate += p.massUpper;
      if (p.lower === "low") totals.low += p.massLower;
      if (p.lower === "intermediate") totals.intermediate += p.massLower;
    }

    return totals;
  }
}
