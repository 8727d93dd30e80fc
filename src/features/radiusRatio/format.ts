import type { StabilityInterval, StabilityTable } from "./types";

export function formatRatio(value: number, decimals = 3): string {
  if (value === Number.POSITIVE_INFINITY) {
    return "∞";
  }
  return value.toFixed(decimals);
}

export function formatInterval(interval: StabilityInterval, decimals = 3): string {
  return `[${formatRatio(interval.lowerBound, decimals)}, ${formatRatio(interval.upperBound, decimals)})`;
}

/** e.g. `0.000 (NC=2) | 0.155 (NC=3) | …` */
export function formatThresholdMarkers(table: StabilityTable, decimals = 3): string {
  return table
    .map((row) => `${formatRatio(row.lowerBound, decimals)} (NC=${row.coordinationNumber})`)
    .join(" | ");
}

/** Sentence case: only the first character is raised, so "close-packed" reads "Close-packed". */
export function capitalise(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
