/**
 * Round to a fixed number of decimal places. Exact ties on the stored binary
 * value go to the even digit, so 0.625 -> 0.62 and 0.875 -> 0.88, while
 * 2.675 (stored just below the tie) -> 2.67.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;
  const magnitude = Math.abs(value);
  // toFixed only expands plain digits below 1e21; larger values have no fraction.
  if (magnitude >= 1e21) return value;

  // Up to 100 fraction digits is the full binary expansion for the magnitudes
  // this app handles.
  const [whole, fraction = ""] = magnitude.toFixed(100).split(".");
  const kept = fraction.slice(0, decimals);
  const rest = fraction.slice(decimals);

  let digits = BigInt(whole + kept);
  const first = rest.charAt(0);
  const tail = rest.slice(1);
  const exactTie = first === "5" && /^0*$/.test(tail);
  if (first > "5" || (first === "5" && !exactTie) || (exactTie && digits % 2n === 1n)) {
    digits += 1n;
  }

  const sign = value < 0 ? "-" : "";
  return Number(`${sign}${digits}e-${decimals}`);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/** Fixed-decimal display string; non-finite values render as "-". */
export function formatFixed(value: number, decimals: number): string {
  return Number.isFinite(value) ? value.toFixed(decimals) : "-";
}

/**
 * Coerce a spreadsheet or JSON cell into a finite number. Numeric strings
 * (as written by some spreadsheet tools) are accepted; anything else yields
 * null so the caller can decide on a fallback.
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
