import type { SliderRange } from "./config";
import type { StabilityInterval, StabilityTable } from "./types";

export type CurvePoint = {
  anion: number;
  ratio: number;
};

export type StabilityBand = {
  interval: StabilityInterval;
  y1: number;
  y2: number;
  color: string;
};

const MAX_CURVE_POINTS = 5000;
const MAX_DECIMAL_PLACES = 12;

export const BAND_COLORS = ["#ffe3e3", "#ffdddd", "#ddeedd", "#ddddff", "#f0e6dd", "#f5ddec"];

/**
 * Samples r/R for a fixed cation radius across the anion slider range.
 * Anion values are generated from integer steps so 0.1 + k·0.01 does not drift.
 */
export function sampleRatioCurve(cationRadius: number, range: Pick<SliderRange, "min" | "max" | "step">): CurvePoint[] {
  if (!(cationRadius > 0) || !(range.step > 0) || range.max < range.min) {
    return [];
  }
  const scale = 10 ** Math.max(decimalPlaces(range.step), decimalPlaces(range.min));
  let start = Math.round(range.min * scale);
  if (start / scale < range.min) {
    start += 1;
  }
  let end = Math.round(range.max * scale);
  if (end / scale > range.max) {
    end -= 1;
  }
  const stride = Math.max(1, Math.round(range.step * scale), Math.ceil((end - start) / MAX_CURVE_POINTS));
  const points: CurvePoint[] = [];
  for (let tick = start; tick <= end; tick += stride) {
    const anion = tick / scale;
    if (anion > 0) {
      points.push({ anion, ratio: cationRadius / anion });
    }
  }
  return points;
}

function decimalPlaces(value: number): number {
  if (value === 0) {
    return 0;
  }
  for (let places = 0; places < MAX_DECIMAL_PLACES; places += 1) {
    const scaled = value * 10 ** places;
    const rounded = Math.round(scaled);
    if (rounded !== 0 && Math.abs(scaled - rounded) < 1e-9 * Math.max(1, Math.abs(scaled))) {
      return places;
    }
  }
  return MAX_DECIMAL_PLACES;
}

/** Shaded bands for a chart whose ratio axis stops at `yMax`. */
export function buildStabilityBands(table: StabilityTable, yMax: number): StabilityBand[] {
  return table
    .filter((row) => row.lowerBound < yMax)
    .map((row, index) => ({
      interval: row,
      y1: row.lowerBound,
      y2: Math.min(row.upperBound, yMax),
      color: BAND_COLORS[index % BAND_COLORS.length],
    }));
}

export function scalePosition(ratio: number, scaleMax: number): number {
  if (!(scaleMax > 0) || !Number.isFinite(ratio) || ratio <= 0) {
    return 0;
  }
  return Math.min(ratio / scaleMax, 1);
}
