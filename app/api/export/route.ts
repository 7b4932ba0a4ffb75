import { NextResponse } from "next/server";
import { DilutionCalculations } from "@/lib/calculations";
import { parsePlanRequest, SettingsValidationError } from "@/lib/settings";
import { buildWorkbook, exportFileName, workbookToArrayBuffer } from "@/lib/workbook";

const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: "Request body must be valid JSON" }, { status: 400 });
  }

  try {
    const { settings, overrides } = parsePlanRequest(body);
    const plan = new DilutionCalculations(settings, overrides);
    const xlsx = workbookToArrayBuffer(buildWorkbook(plan));
    const fileName = encodeURIComponent(exportFileName(plan.settings));

    return new NextResponse(xlsx, {
      status: 200,
      headers: {
        "Content-Type": XLSX_MIME,
        "Content-Disposition": `attachment; filename*=UTF-8''${fileName}`,
      },
    });
  } catch (err) {
    if (err instanceof SettingsValidationError) {
      return NextResponse.json({ error: "Invalid settings", issues: err.issues }, { status: 400 });
    }
    console.error("Error exporting dilution plan", err);
    return NextResponse.json({ error: "Unable to export dilution plan" }, { status: 500 });
  }
}
