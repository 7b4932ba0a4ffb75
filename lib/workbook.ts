import dayjs from "dayjs";
import { read, utils, write, type WorkBook, type WorkSheet } from "xlsx";
import type { DilutionCalculations } from "@/lib/calculations";
import { appConfig } from "@/lib/config";
import { toFiniteNumber } from "@/lib/numbers";
import {
  settingsFromRecord,
  settingsToRecord,
  validateSettings,
  type DilutionSettings,
  type PointOverride,
} from "@/lib/settings";

export const SETTINGS_SHEET = "Settings";
export const PLAN_SHEET = "Gradient Plan";

// Column definitions for the plan sheet. Headers are what the user sees;
// keys are properties on PlanRow.
export const PLAN_COLUMNS = [
  { header: "Index", key: "index" },
  { header: "Target Concentration", key: "targetConcentration" },
  { header: "Upper Material", key: "upperMaterial" },
  { header: "Lower Material", key: "lowerMaterial" },
  { header: "Upper Mass", key: "massUpper" },
  { header: "Lower Mass", key: "massLower" },
  { header: "Achieved Concentration", key: "achievedConcentration" },
] as const;

const SETTINGS_COLUMNS = { parameter: "Parameter", value: "Value" } as const;

export class WorkbookImportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WorkbookImportError";
  }
}

export type ImportedPlan = {
  settings: DilutionSettings;
  overrides: PointOverride[];
};

type Cell = string | number | boolean | null;

export function buildWorkbook(calculations: DilutionCalculations, version: string = appConfig.version): WorkBook {
  const workbook = utils.book_new();

  const settingsData: Cell[][] = [[SETTINGS_COLUMNS.parameter, SETTINGS_COLUMNS.value]];
  for (const [label, value] of settingsToRecord(calculations.settings, version)) {
    settingsData.push([label, value]);
  }
  utils.book_append_sheet(workbook, utils.aoa_to_sheet(settingsData), SETTINGS_SHEET);

  // Values are written unrounded so that re-importing reproduces the same
  // achieved concentrations.
  const planData: Cell[][] = [PLAN_COLUMNS.map((c) => c.header)];
  for (const row of calculations.toRows()) {
    planData.push(PLAN_COLUMNS.map((c) => row[c.key]));
  }
  utils.book_append_sheet(workbook, utils.aoa_to_sheet(planData), PLAN_SHEET);

  return workbook;
}

/** Serialize to .xlsx bytes (browser download or HTTP response body). */
export function workbookToArrayBuffer(workbook: WorkBook): ArrayBuffer {
  const out: ArrayBuffer = write(workbook, { type: "array", bookType: "xlsx" });
  return out;
}

export function exportFileName(settings: Pick<DilutionSettings, "experimentName">, now: Date = new Date()): string {
  return `${settings.experimentName}_${dayjs(now).format("HHmm")}.xlsx`;
}

function sheetRows(workbook: WorkBook, name: string): Cell[][] {
  const sheet: WorkSheet | undefined = workbook.Sheets[name];
  if (!sheet) {
    throw new WorkbookImportError(`Missing sheet "${name}"`);
  }
  return utils.sheet_to_json<Cell[]>(sheet, { header: 1, defval: null, blankrows: false });
}

function columnIndex(header: Cell[], name: string, sheet: string): number {
  const idx = header.findIndex((cell) => typeof cell === "string" && cell.trim() === name);
  if (idx === -1) {
    throw new WorkbookImportError(`Sheet "${sheet}" is missing the "${name}" column`);
  }
  return idx;
}

function baseName(fileName: string | undefined): string | undefined {
  if (!fileName) return undefined;
  const trimmed = fileName.replace(/\.[^./\\]+$/, "").trim();
  return trimmed === "" ? undefined : trimmed;
}

function readSettings(workbook: WorkBook, fileName: string | undefined, now: Date): DilutionSettings {
  const [header = [], ...rows] = sheetRows(workbook, SETTINGS_SHEET);
  const keyCol = columnIndex(header, SETTINGS_COLUMNS.parameter, SETTINGS_SHEET);
  const valueCol = columnIndex(header, SETTINGS_COLUMNS.value, SETTINGS_SHEET);

  const record = new Map<string, unknown>();
  for (const row of rows) {
    const key = row[keyCol];
    if (typeof key !== "string") continue;
    record.set(key.trim(), row[valueCol] ?? null);
  }

  const settings = settingsFromRecord(record, baseName(fileName), now);
  const issues = validateSettings(settings);
  if (issues.length > 0) {
    throw new WorkbookImportError(`Invalid settings in sheet "${SETTINGS_SHEET}": ${issues.join("; ")}`);
  }
  return settings;
}

function readOverrides(workbook: WorkBook): PointOverride[] {
  const [header = [], ...rows] = sheetRows(workbook, PLAN_SHEET);
  const targetCol = columnIndex(header, "Target Concentration", PLAN_SHEET);
  const upperCol = columnIndex(header, "Upper Mass", PLAN_SHEET);
  const lowerCol = columnIndex(header, "Lower Mass", PLAN_SHEET);

  return rows.map((row) => {
    const override: PointOverride = {};
    const target = toFiniteNumber(row[targetCol]);
    const massUpper = toFiniteNumber(row[upperCol]);
    const massLower = toFiniteNumber(row[lowerCol]);
    if (target !== null) override.targetConcentration = target;
    if (massUpper !== null) override.massUpper = Math.max(0, massUpper);
    if (massLower !== null) override.massLower = Math.max(0, massLower);
    return override;
  });
}

/**
 * Read an exported workbook back into settings plus per-row overrides.
 * Missing sheets or columns raise WorkbookImportError; individual settings
 * that are absent fall back to their defaults.
 */
export function parseWorkbook(
  data: ArrayBuffer | Uint8Array,
  fileName?: string,
  now: Date = new Date()
): ImportedPlan {
  let workbook: WorkBook;
  try {
    workbook = read(data, { type: "array" });
  } catch (err) {
    throw new WorkbookImportError("Unable to read the file as a workbook", { cause: err });
  }

  return {
    settings: readSettings(workbook, fileName, now),
    overrides: readOverrides(workbook),
  };
}
