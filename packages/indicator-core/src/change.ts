import type { ChangeClassification } from "./contracts";

/**
 * Maps a signed delta to a display direction. Absent or non-finite deltas are
 * `unknown`; only an exact zero is `flat`.
 */
export function classifyChange(delta: number | null | undefined): ChangeClassification {
  if (delta === null || delta === undefined || !Number.isFinite(delta)) {
    return { direction: "unknown" };
  }
  if (delta === 0) {
    return { direction: "flat", magnitude: 0 };
  }
  return {
    direction: delta > 0 ? "up" : "down",
    magnitude: Math.abs(delta),
  };
}
