import { roundTo } from "@/lib/numbers";

export type Densities = {
  /** Pure water, g/cm3, 5 decimals. */
  water: number;
  /** Physiological saline (0.9% NaCl), g/cm3, 4 decimals. */
  saline: number;
};

// Saline is approximated as a fixed ratio over pure water at the same
// temperature.
const SALINE_TO_WATER_RATIO = 1.0064;

/**
 * Empirical water density curve (kg/m3) for a temperature in °C. The fit is
 * meaningful for lab ambient temperatures (roughly 0-40 °C); outside that
 * range it simply extrapolates.
 */
export function waterDensityKgPerM3(temperature: number): number {
  return (
    1000 *
    (1 -
      ((temperature + 288.9414) / (508929.2 * (temperature + 68.12963))) *
        (temperature - 3.9863) ** 2)
  );
}

export function getDensities(temperature: number): Densities {
  const water = roundTo(waterDensityKgPerM3(temperature) / 1000, 5);
  const saline = roundTo(water * SALINE_TO_WATER_RATIO, 4);
  return { water, saline };
}
