// Public (client-visible) configuration. Every value has a default so the
// planner works without any .env file.

function readEnv(value: string | undefined, fallback: string): string {
  return value && value.trim() !== "" ? value.trim() : fallback;
}

export const appConfig = {
  version: readEnv(process.env.NEXT_PUBLIC_APP_VERSION, "v0.1.0"),
  defaultConcentrationUnit: readEnv(process.env.NEXT_PUBLIC_DEFAULT_CONCENTRATION_UNIT, "mg/L"),
  defaultMassUnit: readEnv(process.env.NEXT_PUBLIC_DEFAULT_MASS_UNIT, "mg"),
  pointCount: {
    min: 3,
    max: 20,
    default: 8,
  },
} as const;
