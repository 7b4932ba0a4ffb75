import dayjs from "dayjs";
import { appConfig } from "@/lib/config";
import type { Material } from "@/lib/mixing";
import { clamp, toFiniteNumber } from "@/lib/numbers";

/**
 * Every user-editable input of a dilution plan. The intermediate fields are
 * optional: when absent the calculation fills in its own suggestion.
 */
export type DilutionSettings = {
  experimentName: string;
  concentrationUnit: string;
  massUnit: string;
  /** Ambient temperature, °C. */
  temperature: number;
  high: Material;
  low: Material;
  pointCount: number;
  pointTotalMass: number;
  intermediateTarget?: number;
  intermediatePlannedMass?: number;
  intermediateActualHigh?: number;
  intermediateActualLow?: number;
};

/** Settings with every intermediate field filled in by the calculation. */
export type ResolvedSettings = Required<DilutionSettings>;

/** User edits to a single gradient row, matched by position. */
export type PointOverride = {
  targetConcentration?: number;
  massUpper?: number;
  massLower?: number;
};

export class SettingsValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid settings: ${issues.join("; ")}`);
    this.name = "SettingsValidationError";
    this.issues = issues;
  }
}

export function defaultExperimentName(now: Date = new Date()): string {
  return `Linear dilution ${dayjs(now).format("YYYYMMDD")}`;
}

export function defaultSettings(now: Date = new Date()): DilutionSettings {
  return {
    experimentName: defaultExperimentName(now),
    concentrationUnit: appConfig.defaultConcentrationUnit,
    massUnit: appConfig.defaultMassUnit,
    temperature: 22.0,
    high: { concentration: 100.0, density: 1.05 },
    low: { concentration: 0.0, density: 1.0 },
    pointCount: appConfig.pointCount.default,
    pointTotalMass: 350,
  };
}

export function normalizePointCount(value: number): number {
  return clamp(Math.round(value), appConfig.pointCount.min, appConfig.pointCount.max);
}

/**
 * Domain checks shared by the JSON parser and the workbook importer. Returns
 * one message per problem; an empty list means the settings are usable.
 */
export function validateSettings(settings: DilutionSettings): string[] {
  const issues: string[] = [];
  if (!(settings.high.density > 0)) issues.push("high.density must be greater than 0");
  if (!(settings.low.density > 0)) issues.push("low.density must be greater than 0");
  if (!(settings.high.concentration > settings.low.concentration)) {
    issues.push("high.concentration must be greater than low.concentration");
  }
  if (settings.pointTotalMass < 0) issues.push("pointTotalMass must not be negative");
  if (settings.intermediatePlannedMass !== undefined && settings.intermediatePlannedMass < 0) {
    issues.push("intermediatePlannedMass must not be negative");
  }
  if (settings.intermediateActualHigh !== undefined && settings.intermediateActualHigh < 0) {
    issues.push("intermediateActualHigh must not be negative");
  }
  if (settings.intermediateActualLow !== undefined && settings.intermediateActualLow < 0) {
    issues.push("intermediateActualLow must not be negative");
  }
  return issues;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Small field readers used by parseSettings. Each records an issue and
// returns the fallback when the value is present but unusable.

function readNumber(
  source: Record<string, unknown>,
  key: string,
  path: string,
  issues: string[],
  fallback: number
): number {
  const raw = source[key];
  if (raw === undefined || raw === null) return fallback;
  const value = toFiniteNumber(raw);
  if (value === null) {
    issues.push(`${path} must be a finite number`);
    return fallback;
  }
  return value;
}

function readOptionalNumber(
  source: Record<string, unknown>,
  key: string,
  issues: string[]
): number | undefined {
  const raw = source[key];
  if (raw === undefined || raw === null) return undefined;
  const value = toFiniteNumber(raw);
  if (value === null) {
    issues.push(`${key} must be a finite number`);
    return undefined;
  }
  return value;
}

function readString(
  source: Record<string, unknown>,
  key: string,
  issues: string[],
  fallback: string
): string {
  const raw = source[key];
  if (raw === undefined || raw === null) return fallback;
  if (typeof raw !== "string") {
    issues.push(`${key} must be a string`);
    return fallback;
  }
  return raw.trim() === "" ? fallback : raw;
}

function readMaterial(
  source: Record<string, unknown>,
  key: "high" | "low",
  issues: string[],
  fallback: Material
): Material {
  const raw = source[key];
  if (raw === undefined || raw === null) return fallback;
  if (!isRecord(raw)) {
    issues.push(`${key} must be an object with concentration and density`);
    return fallback;
  }
  return {
    concentration: readNumber(raw, "concentration", `${key}.concentration`, issues, fallback.concentration),
    density: readNumber(raw, "density", `${key}.density`, issues, fallback.density),
  };
}

/**
 * Validate a settings payload (e.g. a JSON request body). Missing fields take
 * their defaults; unknown fields are ignored. Throws SettingsValidationError
 * listing every problem found.
 */
export function parseSettings(input: unknown, now: Date = new Date()): DilutionSettings {
  const defaults = defaultSettings(now);
  if (input === undefined || input === null) return defaults;
  if (!isRecord(input)) {
    throw new SettingsValidationError(["settings must be an object"]);
  }

  const issues: string[] = [];
  const settings: DilutionSettings = {
    experimentName: readString(input, "experimentName", issues, defaults.experimentName),
    concentrationUnit: readString(input, "concentrationUnit", issues, defaults.concentrationUnit),
    massUnit: readString(input, "massUnit", issues, defaults.massUnit),
    temperature: readNumber(input, "temperature", "temperature", issues, defaults.temperature),
    high: readMaterial(input, "high", issues, defaults.high),
    low: readMaterial(input, "low", issues, defaults.low),
    pointCount: normalizePointCount(
      readNumber(input, "pointCount", "pointCount", issues, defaults.pointCount)
    ),
    pointTotalMass: readNumber(input, "pointTotalMass", "pointTotalMass", issues, defaults.pointTotalMass),
    intermediateTarget: readOptionalNumber(input, "intermediateTarget", issues),
    intermediatePlannedMass: readOptionalNumber(input, "intermediatePlannedMass", issues),
    intermediateActualHigh: readOptionalNumber(input, "intermediateActualHigh", issues),
    intermediateActualLow: readOptionalNumber(input, "intermediateActualLow", issues),
  };

  issues.push(...validateSettings(settings));
  if (issues.length > 0) {
    throw new SettingsValidationError(issues);
  }
  return settings;
}

/** Validate the per-row overrides array that accompanies a settings payload. */
export function parseOverrides(input: unknown): PointOverride[] {
  if (input === undefined || input === null) return [];
  if (!Array.isArray(input)) {
    throw new SettingsValidationError(["overrides must be an array"]);
  }

  const issues: string[] = [];
  const overrides = input.map<PointOverride>((entry, i) => {
    if (entry === null || entry === undefined) return {};
    if (!isRecord(entry)) {
      issues.push(`overrides[${i}] must be an object`);
      return {};
    }
    const override: PointOverride = {};
    const target = readOptionalNumber(entry, "targetConcentration", issues);
    const massUpper = readOptionalNumber(entry, "massUpper", issues);
    const massLower = readOptionalNumber(entry, "massLower", issues);
    if (target !== undefined) override.targetConcentration = target;
    if (massUpper !== undefined) {
      if (massUpper < 0) issues.push(`overrides[${i}].massUpper must not be negative`);
      override.massUpper = massUpper;
    }
    if (massLower !== undefined) {
      if (massLower < 0) issues.push(`overrides[${i}].massLower must not be negative`);
      override.massLower = massLower;
    }
    return override;
  });

  if (issues.length > 0) {
    throw new SettingsValidationError(issues);
  }
  return overrides;
}

// ---------------------------------------------------------------------------
// Key/value settings record (the "Settings" sheet of an exported workbook)
// ---------------------------------------------------------------------------

export const SETTINGS_RECORD_KEYS = {
  version: "Program Version",
  experimentName: "Experiment",
  concentrationUnit: "Concentration Unit",
  massUnit: "Mass Unit",
  temperature: "Ambient Temperature",
  highConcentration: "High Concentration",
  highDensity: "High Density",
  lowConcentration: "Low Concentration",
  lowDensity: "Low Density",
  pointCount: "Point Count",
  pointTotalMass: "Point Total Mass",
  intermediateTarget: "Intermediate Target Concentration",
  intermediatePlannedMass: "Intermediate Planned Mass",
  intermediateActualHigh: "Intermediate Actual High",
  intermediateActualLow: "Intermediate Actual Low",
} as const;

export type SettingsRecordEntry = [label: string, value: string | number];

export function settingsToRecord(settings: ResolvedSettings, version: string): SettingsRecordEntry[] {
  const k = SETTINGS_RECORD_KEYS;
  return [
    [k.version, version],
    [k.experimentName, settings.experimentName],
    [k.concentrationUnit, settings.concentrationUnit],
    [k.massUnit, settings.massUnit],
    [k.temperature, settings.temperature],
    [k.highConcentration, settings.high.concentration],
    [k.highDensity, settings.high.density],
    [k.lowConcentration, settings.low.concentration],
    [k.lowDensity, settings.low.density],
    [k.pointCount, settings.pointCount],
    [k.pointTotalMass, settings.pointTotalMass],
    [k.intermediateTarget, settings.intermediateTarget],
    [k.intermediatePlannedMass, settings.intermediatePlannedMass],
    [k.intermediateActualHigh, settings.intermediateActualHigh],
    [k.intermediateActualLow, settings.intermediateActualLow],
  ];
}

/**
 * Rebuild settings from an imported key/value record. Keys that are missing
 * or not numeric fall back to the defaults; the program version is ignored.
 * `fallbackName` (typically the imported file's base name) is used when the
 * record carries no experiment name.
 */
export function settingsFromRecord(
  record: ReadonlyMap<string, unknown>,
  fallbackName?: string,
  now: Date = new Date()
): DilutionSettings {
  const defaults = defaultSettings(now);
  const k = SETTINGS_RECORD_KEYS;

  const num = (key: string, fallback: number): number => toFiniteNumber(record.get(key)) ?? fallback;
  const optionalNum = (key: string): number | undefined => toFiniteNumber(record.get(key)) ?? undefined;
  const str = (key: string, fallback: string): string => {
    const value = record.get(key);
    if (typeof value === "number") return String(value);
    return typeof value === "string" && value.trim() !== "" ? value : fallback;
  };

  return {
    experimentName: str(k.experimentName, fallbackName || defaults.experimentName),
    concentrationUnit: str(k.concentrationUnit, defaults.concentrationUnit),
    massUnit: str(k.massUnit, defaults.massUnit),
    temperature: num(k.temperature, defaults.temperature),
    high: {
      concentration: num(k.highConcentration, defaults.high.concentration),
      density: num(k.highDensity, defaults.high.density),
    },
    low: {
      concentration: num(k.lowConcentration, defaults.low.concentration),
      density: num(k.lowDensity, defaults.low.density),
    },
    pointCount: normalizePointCount(num(k.pointCount, defaults.pointCount)),
    pointTotalMass: num(k.pointTotalMass, defaults.pointTotalMass),
    intermediateTarget: optionalNum(k.intermediateTarget),
    intermediatePlannedMass: optionalNum(k.intermediatePlannedMass),
    intermediateActualHigh: optionalNum(k.intermediateActualHigh),
    intermediateActualLow: optionalNum(k.intermediateActualLow),
  };
}

/** Body accepted by the plan and export route handlers. */
export function parsePlanRequest(body: unknown): { settings: DilutionSettings; overrides: PointOverride[] } {
  if (body === undefined || body === null) {
    return { settings: parseSettings(undefined), overrides: [] };
  }
  if (!isRecord(body)) {
    throw new SettingsValidationError(["request body must be an object"]);
  }
  return {
    settings: parseSettings(body.settings),
    overrides: parseOverrides(body.overrides),
  };
}
