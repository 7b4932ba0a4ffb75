import { describe, it, expect } from "vitest";
import { DilutionCalculations } from "./calculations";
import { parseMarkdown } from "./markdown";
import { buildReport, REPORT_TITLE, reportFileName, reportToMarkdown } from "./report";
import { defaultSettings } from "./settings";

const now = new Date(2024, 0, 2, 3, 4);
const calc = new DilutionCalculations({ ...defaultSettings(now), experimentName: "Panel A" });
const report = buildReport(calc, { version: "v-test", exportedAt: now });

describe("buildReport", () => {
  it("summarizes the run in the header", () => {
    expect(report.title).toBe(REPORT_TITLE);
    expect(report.metadata).toEqual([
      { label: "Program version", value: "v-test" },
      { label: "Experiment", value: "Panel A" },
      { label: "Ambient temperature", value: "22 °C" },
      { label: "Water density", value: "0.9978 g/cm3" },
      { label: "Saline density", value: "1.0042 g/cm3" },
      { label: "High material", value: "100 mg/L (density: 1.0500)" },
      { label: "Low material", value: "0 mg/L (density: 1.0000)" },
      { label: "Intermediate material", value: "50.00 mg/L (density: 1.0250)" },
      { label: "High material total", value: "1389.6 mg" },
      { label: "Low material total", value: "1522.9 mg" },
      { label: "Exported", value: "2024-01-02 03:04" },
    ]);
  });

  it("lists the intermediate components and their total", () => {
    expect(report.intermediateTable.headers).toEqual([
      "Component",
      "Theoretical Mass (mg)",
      "Added Mass (mg)",
      "Target Concentration (mg/L)",
      "Achieved Concentration (mg/L)",
    ]);
    expect(report.intermediateTable.rows).toEqual([
      ["High material", "685.9", "685.9", "-", "-"],
      ["Low material", "653.3", "653.3", "-", "-"],
      ["Total (intermediate)", "1339.2", "1339.2", "50.00", "50.00"],
    ]);
  });

  it("formats one gradient row per point", () => {
    const { rows } = report.gradientTable;
    expect(rows).toHaveLength(8);
    expect(rows[0]).toEqual(["1", "0.00", "Intermediate", "Low", "0.0", "350.0", "0.00"]);
    expect(rows[1]).toEqual(["2", "12.50", "Intermediate", "Low", "89.1", "260.9", "12.50"]);
    expect(rows[5]).toEqual(["6", "66.67", "High", "Intermediate", "118.5", "231.5", "66.66"]);
  });
});

describe("reportToMarkdown", () => {
  const lines = reportToMarkdown(report).split("\n");

  it("starts with the title and metadata list", () => {
    expect(lines[0]).toBe(`# ${REPORT_TITLE}`);
    expect(lines[2]).toBe("- Program version: v-test");
    expect(lines[12]).toBe("- Exported: 2024-01-02 03:04");
  });

  it("renders both tables as pipe tables", () => {
    expect(lines).toContain("## 1. Intermediate Preparation");
    expect(lines).toContain("## 2. Gradient Dilution Plan");
    expect(lines).toContain("| Total (intermediate) | 1339.2 | 1339.2 | 50.00 | 50.00 |");
    expect(lines).toContain("| --- | --- | --- | --- | --- | --- | --- |");
    expect(lines).toContain("| 2 | 12.50 | Intermediate | Low | 89.1 | 260.9 | 12.50 |");
  });
});

describe("reportToMarkdown tables", () => {
  const piped = new DilutionCalculations({ ...defaultSettings(now), concentrationUnit: "mg|L" });
  const pipedReport = buildReport(piped, { version: "v-test", exportedAt: now });
  const markdown = reportToMarkdown(pipedReport);

  it("escapes pipes inside cells", () => {
    expect(markdown.split("\n")).toContain(
      "| Component | Theoretical Mass (mg) | Added Mass (mg) | Target Concentration (mg\\|L) | Achieved Concentration (mg\\|L) |"
    );
  });

  it("parses back into the report's tables", () => {
    const tables = parseMarkdown(markdown).filter((block) => block.kind === "table");
    expect(tables).toEqual([
      { kind: "table", ...pipedReport.intermediateTable },
      { kind: "table", ...pipedReport.gradientTable },
    ]);
  });
});

describe("reportFileName", () => {
  it("stamps the experiment name with the time", () => {
    expect(reportFileName({ experimentName: "Panel A" }, now)).toBe("Report_Panel A_0304");
  });
});
