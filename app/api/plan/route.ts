import { NextResponse } from "next/server";
import { DilutionCalculations } from "@/lib/calculations";
import { GradientPlanError } from "@/lib/gradient";
import { parsePlanRequest, SettingsValidationError } from "@/lib/settings";

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
    return NextResponse.json(plan.toJSON());
  } catch (err) {
    if (err instanceof SettingsValidationError) {
      return NextResponse.json({ error: "Invalid settings", issues: err.issues }, { status: 400 });
    }
    if (err instanceof GradientPlanError) {
      return NextResponse.json({ error: err.message }, { status: 400 });
    }
    console.error("Error computing dilution plan", err);
    return NextResponse.json({ error: "Unable to compute dilution plan" }, { status: 500 });
  }
}
