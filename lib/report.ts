import dayjs from "dayjs";
import type { DilutionCalculations } from "@/lib/calculations";
import { tableRow } from "@/lib/markdown";
import { materialLabel } from "@/lib/materials";
import { formatFixed } from "@/lib/numbers";
import type { DilutionSettings } from "@/lib/settings";

export type ReportTable = {
  headers: string[];
  rows: string[][];
};

export type ReportMetadataItem = {
  label: string;
  value: string;
};

/** Print-ready content of a preparation record: header plus two tables. */
export type DilutionReport = {
  title: string;
  metadata: ReportMetadataItem[];
  intermediateTable: ReportTable;
  gradientTable: ReportTable;
};

export type ReportOptions = {
  version: string;
  exportedAt: Date;
};

export const REPORT_TITLE = "Linearity Sample Preparation Record";

// Concentrations are reported to 0.01, masses to 0.1.
const conc = (value: number) => formatFixed(value, 2);
const mass = (value: number) => formatFixed(value, 1);
const density = (value: number) => formatFixed(value, 4);

export function buildReport(calculations: DilutionCalculations, options: ReportOptions): DilutionReport {
  const { settings, densities, intermediate, totals } = calculations;
  const cu = settings.concentrationUnit;
  const mu = settings.massUnit;

  const metadata: ReportMetadataItem[] = [
    { label: "Program version", value: options.version },
    { label: "Experiment", value: settings.experimentName },
    { label: "Ambient temperature", value: `${settings.temperature} °C` },
    { label: "Water density", value: `${densities.water} g/cm3` },
    { label: "Saline density", value: `${densities.saline} g/cm3` },
    {
      label: "High material",
      value: `${settings.high.concentration} ${cu} (density: ${density(settings.high.density)})`,
    },
    {
      label: "Low material",
      value: `${settings.low.concentration} ${cu} (density: ${density(settings.low.density)})`,
    },
    {
      label: "Intermediate material",
      value: `${conc(intermediate.achievedConcentration)} ${cu} (density: ${density(intermediate.achievedDensity)})`,
    },
    { label: "High material total", value: `${mass(totals.high)} ${mu}` },
    { label: "Low material total", value: `${mass(totals.low)} ${mu}` },
    { label: "Exported", value: dayjs(options.exportedAt).format("YYYY-MM-DD HH:mm") },
  ];

  const intermediateTable: ReportTable = {
    headers: [
      "Component",
      `Theoretical Mass (${mu})`,
      `Added Mass (${mu})`,
      `Target Concentration (${cu})`,
      `Achieved Concentration (${cu})`,
    ],
    rows: [
      ["High material", mass(intermediate.theoreticalHigh), mass(intermediate.actualHigh), "-", "-"],
      ["Low material", mass(intermediate.theoreticalLow), mass(intermediate.actualLow), "-", "-"],
      [
        "Total (intermediate)",
        mass(intermediate.theoreticalHigh + intermediate.theoreticalLow),
        mass(intermediate.actualHigh + intermediate.actualLow),
        conc(intermediate.targetConcentration),
        conc(intermediate.achievedConcentration),
      ],
    ],
  };

  const gradientTable: ReportTable = {
    headers: [
      "Index",
      `Target Concentration (${cu})`,
      "Upper Material",
      "Lower Material",
      `Upper Mass (${mu})`,
      `Lower Mass (${mu})`,
      `Achieved Concentration (${cu})`,
    ],
    rows: calculations.points.map((p) => [
      String(p.index),
      conc(p.targetConcentration),
      materialLabel(p.upper),
      materialLabel(p.lower),
      mass(p.massUpper),
      mass(p.massLower),
      conc(p.achievedConcentration),
    ]),
  };

  return { title: REPORT_TITLE, metadata, intermediateTable, gradientTable };
}

export function reportFileName(settings: Pick<DilutionSettings, "experimentName">, now: Date = new Date()): string {
  return `Report_${settings.experimentName}_${dayjs(now).format("HHmm")}`;
}

function markdownTable(table: ReportTable): string[] {
  return [
    tableRow(table.headers),
    tableRow(table.headers.map(() => "---")),
    ...table.rows.map(tableRow),
  ];
}

/** Plain-text rendition of the report, offered as a .md download. */
export function reportToMarkdown(report: DilutionReport): string {
  return [
    `# ${report.title}`,
    "",
    ...report.metadata.map((item) => `- ${item.label}: ${item.value}`),
    "",
    "## 1. Intermediate Preparation",
    "",
    ...markdownTable(report.intermediateTable),
    "",
    "## 2. Gradient Dilution Plan",
    "",
    ...markdownTable(report.gradientTable),
    "",
  ].join("\n");
}
