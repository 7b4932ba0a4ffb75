"use client";

import { useMemo, useRef, useState, type ChangeEvent } from "react";
import { Download, FileText, Printer, RotateCcw, Upload } from "lucide-react";
import { writeFile as writeXLSXFile } from "xlsx";
import { computePlan, fieldValue, setOverride } from "@/components/calculate";
import { MarkdownBlocks } from "@/components/MarkdownBlocks";
import { appConfig } from "@/lib/config";
import { materialLabel } from "@/lib/materials";
import type { Material } from "@/lib/mixing";
import { formatFixed, roundTo } from "@/lib/numbers";
import { parseMarkdown } from "@/lib/markdown";
import { buildReport, reportFileName, reportToMarkdown } from "@/lib/report";
import {
  defaultSettings,
  normalizePointCount,
  type DilutionSettings,
  type PointOverride,
} from "@/lib/settings";
import { buildWorkbook, exportFileName, parseWorkbook, WorkbookImportError } from "@/lib/workbook";

type Notice = { kind: "success" | "error"; text: string };

type NumberFieldProps = {
  label: string;
  value: number;
  onChange: (value: number) => void;
  step?: number;
  min?: number;
  max?: number;
  decimals?: number;
  hideLabel?: boolean;
};

function NumberField({ label, value, onChange, step = 0.1, min, max, decimals, hideLabel }: NumberFieldProps) {
  const display = decimals === undefined ? value : roundTo(value, decimals);
  return (
    <label className="flex flex-col gap-1 text-sm">
      <span className={hideLabel ? "sr-only" : "text-neutral-500"}>{label}</span>
      <input
        className="rounded-md border px-2 py-1"
        type="number"
        value={Number.isFinite(display) ? display : ""}
        step={step}
        min={min}
        max={max}
        onChange={(e) => {
          const next = fieldValue(e.target.valueAsNumber, decimals);
          if (next !== null) onChange(next);
        }}
      />
    </label>
  );
}

function TextField({ label, value, onChange }: { label: string; value: string; onChange: (value: string) => void }) {
  return (
    <label className="flex flex-col gap-1 text-sm">
      <span className="text-neutral-500">{label}</span>
      <input className="rounded-md border px-2 py-1" value={value} onChange={(e) => onChange(e.target.value)} />
    </label>
  );
}

function downloadText(text: string, fileName: string) {
  const blob = new Blob([text], { type: "text/markdown;charset=utf-8" });
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  a.click();
  URL.revokeObjectURL(url);
}

export default function DilutionPlanner() {
  const [settings, setSettings] = useState<DilutionSettings>(() => defaultSettings());
  const [overrides, setOverrides] = useState<PointOverride[]>([]);
  const [notice, setNotice] = useState<Notice | null>(null);
  const [showReport, setShowReport] = useState(false);
  const fileInputRef = useRef<HTMLInputElement | null>(null);

  const plan = useMemo(() => computePlan(settings, overrides), [settings, overrides]);

  // The preview renders the same Markdown that "Download report" saves.
  const reportBlocks = useMemo(() => {
    if (!plan || !showReport) return null;
    return parseMarkdown(reportToMarkdown(buildReport(plan, { version: appConfig.version, exportedAt: new Date() })));
  }, [plan, showReport]);

  const cu = settings.concentrationUnit;
  const mu = settings.massUnit;

  const update = (patch: Partial<DilutionSettings>) => setSettings((prev) => ({ ...prev, ...patch }));
  const updateMaterial = (key: "high" | "low", patch: Partial<Material>) =>
    setSettings((prev) => ({ ...prev, [key]: { ...prev[key], ...patch } }));
  const updatePoint = (index: number, patch: PointOverride) =>
    setOverrides((prev) => setOverride(prev, index, patch));

  const handleResetEdits = () => {
    setOverrides([]);
    update({ intermediateActualHigh: undefined, intermediateActualLow: undefined });
  };

  const handleImport = async (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    event.target.value = "";
    if (!file) return;

    try {
      const imported = parseWorkbook(await file.arrayBuffer(), file.name);
      setSettings(imported.settings);
      setOverrides(imported.overrides);
      setNotice({ kind: "success", text: "Workbook imported." });
    } catch (err) {
      console.error("Error importing workbook", err);
      const text = err instanceof WorkbookImportError ? err.message : "Unable to import the selected file.";
      setNotice({ kind: "error", text: `Import failed: ${text}` });
    }
  };

  const handleExportWorkbook = () => {
    if (!plan) {
      alert("Nothing to export: the current inputs do not produce a plan.");
      return;
    }
    writeXLSXFile(buildWorkbook(plan), exportFileName(plan.settings));
  };

  const handleDownloadReport = () => {
    if (!plan) {
      alert("Nothing to export: the current inputs do not produce a plan.");
      return;
    }
    const md = reportToMarkdown(buildReport(plan, { version: appConfig.version, exportedAt: new Date() }));
    downloadText(md, `${reportFileName(plan.settings)}.md`);
  };

  return (
    <div className="grid gap-6 p-6 lg:grid-cols-[420px_1fr] print:block print:p-0">
      <aside className="space-y-4 print:hidden">
        <h2 className="text-lg font-semibold">Settings</h2>

        <div className="flex gap-2">
          <button
            className="inline-flex items-center gap-1 rounded-md border px-3 py-1 text-sm"
            onClick={() => fileInputRef.current?.click()}
          >
            <Upload className="h-4 w-4" /> Import XLSX
          </button>
          <input ref={fileInputRef} className="hidden" type="file" accept=".xlsx" onChange={(e) => void handleImport(e)} />
          <button
            className="inline-flex items-center gap-1 rounded-md border px-3 py-1 text-sm"
            onClick={handleResetEdits}
          >
            <RotateCcw className="h-4 w-4" /> Reset edits
          </button>
        </div>

        {notice && (
          <p className={notice.kind === "error" ? "text-sm text-red-500" : "text-sm text-green-600"}>{notice.text}</p>
        )}

        <TextField label="Experiment" value={settings.experimentName} onChange={(v) => update({ experimentName: v })} />
        <div className="grid grid-cols-2 gap-3">
          <TextField label="Concentration unit" value={cu} onChange={(v) => update({ concentrationUnit: v })} />
          <TextField label="Mass unit" value={mu} onChange={(v) => update({ massUnit: v })} />
        </div>

        <NumberField
          label="Ambient temperature (°C)"
          value={settings.temperature}
          step={0.5}
          onChange={(v) => update({ temperature: v })}
        />
        {plan && (
          <div className="grid grid-cols-2 gap-3 text-sm">
            <span>Water density: <code>{plan.densities.water}</code></span>
            <span>Saline density: <code>{plan.densities.saline}</code></span>
          </div>
        )}

        <h3 className="font-medium">Materials</h3>
        <div className="grid grid-cols-2 gap-3">
          <NumberField
            label={`High concentration (${cu})`}
            value={settings.high.concentration}
            onChange={(v) => updateMaterial("high", { concentration: v })}
          />
          <NumberField
            label="High density (g/cm3)"
            value={settings.high.density}
            step={0.0001}
            onChange={(v) => updateMaterial("high", { density: v })}
          />
          <NumberField
            label={`Low concentration (${cu})`}
            value={settings.low.concentration}
            onChange={(v) => updateMaterial("low", { concentration: v })}
          />
          <NumberField
            label="Low density (g/cm3)"
            value={settings.low.density}
            step={0.0001}
            onChange={(v) => updateMaterial("low", { density: v })}
          />
          <NumberField
            label="Points (incl. endpoints)"
            value={settings.pointCount}
            step={1}
            min={appConfig.pointCount.min}
            max={appConfig.pointCount.max}
            onChange={(v) => update({ pointCount: normalizePointCount(v) })}
          />
          <NumberField
            label={`Mass per point (${mu})`}
            value={settings.pointTotalMass}
            step={5}
            min={0}
            onChange={(v) => update({ pointTotalMass: v })}
          />
        </div>
      </aside>

      <main className="space-y-6">
        {!plan && (
          <p className="text-red-500 print:hidden">
            These inputs cannot be planned. Check that the high concentration is above the low one and that both
            densities are positive.
          </p>
        )}

        {plan && !showReport && (
          <>
            <section className="space-y-3 rounded-lg border p-4">
              <h2 className="text-lg font-semibold">1. Intermediate preparation</h2>
              <div className="grid gap-4 md:grid-cols-2">
                <div className="space-y-3">
                  <NumberField
                    label={`Intermediate target (${cu})`}
                    value={plan.intermediate.targetConcentration}
                    onChange={(v) => update({ intermediateTarget: v })}
                  />
                  <NumberField
                    label={`Planned total (suggested: demand × 1.1 = ${formatFixed(plan.suggestion.suggestedMass, 1)})`}
                    value={plan.intermediate.plannedTotalMass}
                    step={10}
                    min={0}
                    onChange={(v) => update({ intermediatePlannedMass: v })}
                  />
                  <p className="rounded-md bg-blue-50 p-2 text-sm">
                    Suggested: high {formatFixed(plan.intermediate.theoreticalHigh, 1)} + low{" "}
                    {formatFixed(plan.intermediate.theoreticalLow, 1)} (plan demand:{" "}
                    {formatFixed(plan.suggestion.intermediateDemand, 1)})
                  </p>
                </div>
                <div className="space-y-3">
                  <NumberField
                    label="High material added (measured)"
                    value={plan.intermediate.actualHigh}
                    min={0}
                    decimals={1}
                    onChange={(v) => update({ intermediateActualHigh: v })}
                  />
                  <NumberField
                    label="Low material added (measured)"
                    value={plan.intermediate.actualLow}
                    min={0}
                    decimals={1}
                    onChange={(v) => update({ intermediateActualLow: v })}
                  />
                  <p className="rounded-md bg-amber-50 p-2 text-sm">
                    Achieved intermediate: concentration{" "}
                    <strong>{formatFixed(plan.intermediate.achievedConcentration, 2)}</strong>, density{" "}
                    <strong>{formatFixed(plan.intermediate.achievedDensity, 4)}</strong>
                  </p>
                </div>
              </div>
            </section>

            <section className="space-y-3">
              <h2 className="text-lg font-semibold">2. Gradient dilution plan</h2>
              <table className="w-full text-sm">
                <thead>
                  <tr className="text-left">
                    <th>#</th>
                    <th>Target ({cu})</th>
                    <th>Material A</th>
                    <th>Material B</th>
                    <th>A added ({mu})</th>
                    <th>B added ({mu})</th>
                    <th>Achieved ({cu})</th>
                  </tr>
                </thead>
                <tbody>
                  {plan.points.map((p, i) => (
                    <tr key={p.index}>
                      <td>{p.index}</td>
                      <td>
                        <NumberField
                          label={`Target ${p.index}`}
                          hideLabel
                          value={p.targetConcentration}
                          decimals={2}
                          onChange={(v) => updatePoint(i, { targetConcentration: v })}
                        />
                      </td>
                      <td>{materialLabel(p.upper)}</td>
                      <td>{materialLabel(p.lower)}</td>
                      <td>
                        <NumberField
                          label={`A added ${p.index}`}
                          hideLabel
                          value={p.massUpper}
                          min={0}
                          decimals={1}
                          onChange={(v) => updatePoint(i, { massUpper: v })}
                        />
                      </td>
                      <td>
                        <NumberField
                          label={`B added ${p.index}`}
                          hideLabel
                          value={p.massLower}
                          min={0}
                          decimals={1}
                          onChange={(v) => updatePoint(i, { massLower: v })}
                        />
                      </td>
                      <td className="font-semibold">{formatFixed(p.achievedConcentration, 2)}</td>
                    </tr>
                  ))}
                </tbody>
              </table>
              <p className="text-sm text-neutral-500">
                Totals: high {formatFixed(plan.totals.high, 1)} {mu}, low {formatFixed(plan.totals.low, 1)} {mu},
                intermediate {formatFixed(plan.totals.intermediate, 1)} {mu}
              </p>
            </section>
          </>
        )}

        {reportBlocks && (
          <article className="mx-auto max-w-4xl space-y-2 bg-white p-8 print:p-0">
            <MarkdownBlocks blocks={reportBlocks} />
          </article>
        )}

        <div className="flex flex-wrap gap-2 print:hidden">
          <button
            className="inline-flex items-center gap-1 rounded-md border px-3 py-1 text-sm"
            onClick={handleExportWorkbook}
          >
            <Download className="h-4 w-4" /> Export XLSX
          </button>
          <button
            className="inline-flex items-center gap-1 rounded-md border px-3 py-1 text-sm"
            onClick={() => setShowReport((v) => !v)}
          >
            <FileText className="h-4 w-4" /> {showReport ? "Back to plan" : "Show report"}
          </button>
          {showReport && (
            <>
              <button
                className="inline-flex items-center gap-1 rounded-md border px-3 py-1 text-sm"
                onClick={() => window.print()}
              >
                <Printer className="h-4 w-4" /> Print
              </button>
              <button
                className="inline-flex items-center gap-1 rounded-md border px-3 py-1 text-sm"
                onClick={handleDownloadReport}
              >
                <Download className="h-4 w-4" /> Download report (.md)
              </button>
            </>
          )}
        </div>
      </main>
    </div>
  );
}
