"use client";

import { DilutionCalculations } from "@/lib/calculations";
import { roundTo } from "@/lib/numbers";
import { validateSettings, type DilutionSettings, type PointOverride } from "@/lib/settings";

// Shared helper: build the full recipe for the current form state in the same
// way the route handlers do. Returns null (and logs) when the inputs cannot be
// planned, so the UI can keep rendering the form.
export function computePlan(
  settings: DilutionSettings,
  overrides: PointOverride[] = []
): DilutionCalculations | null {
  const issues = validateSettings(settings);
  if (issues.length > 0) {
    console.warn("Skipping dilution plan for invalid settings", issues);
    return null;
  }
  try {
    return new DilutionCalculations(settings, overrides);
  } catch (err) {
    console.error("Error computing dilution plan in computePlan", err);
    return null;
  }
}

const OVERRIDE_KEYS = ["targetConcentration", "massUpper", "massLower"] as const;

/**
 * Write `patch` into row `index` of the overrides list, padding any gap with
 * empty entries. Keys explicitly set to undefined are removed.
 */
export function setOverride(
  overrides: PointOverride[],
  index: number,
  patch: PointOverride
): PointOverride[] {
  const next: PointOverride[] = [...overrides];
  while (next.length <= index) next.push({});

  const merged: PointOverride = { ...next[index] };
  for (const key of OVERRIDE_KEYS) {
    if (!(key in patch)) continue;
    const value = patch[key];
    if (value === undefined) delete merged[key];
    else merged[key] = value;
  }
  next[index] = merged;
  return next;
}

/**
 * Value to store for a numeric field edit. Fields shown to a fixed number of
 * decimals store that same rounded value, so the plan uses what is displayed.
 * Returns null while the input holds no number.
 */
export function fieldValue(raw: number, decimals?: number): number | null {
  if (!Number.isFinite(raw)) return null;
  return decimals === undefined ? raw : roundTo(raw, decimals);
}
