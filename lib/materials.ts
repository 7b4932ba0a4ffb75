import type { Material } from "@/lib/mixing";

export const MATERIAL_REFS = ["high", "low", "intermediate"] as const;

/**
 * Which source material a gradient point draws from. The intermediate blend
 * is a mixture of high and low that is then used as a material in its own
 * right.
 */
export type MaterialRef = (typeof MATERIAL_REFS)[number];

export type MaterialSet = Record<MaterialRef, Material>;

const MATERIAL_LABELS: Record<MaterialRef, string> = {
  high: "High",
  low: "Low",
  intermediate: "Intermediate",
};

export function resolveMaterial(ref: MaterialRef, materials: MaterialSet): Material {
  return materials[ref];
}

export function materialLabel(ref: MaterialRef): string {
  return MATERIAL_LABELS[ref];
}

