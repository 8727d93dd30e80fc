import { ClassificationError } from "./errors";
import { STABILITY_TABLE } from "./stabilityTable";
import type { ClassificationResult, StabilityInterval, StabilityTable } from "./types";

/** The last row is open-ended: an `Infinity` upper bound also admits a ratio that overflowed to `Infinity`. */
export function findInterval(ratio: number, table: StabilityTable): StabilityInterval | null {
  if (Number.isNaN(ratio)) {
    return null;
  }
  return (
    table.find(
      (row) =>
        ratio >= row.lowerBound && (ratio < row.upperBound || row.upperBound === Number.POSITIVE_INFINITY),
    ) ?? null
  );
}

export function classifyRatio(ratio: number, table: StabilityTable = STABILITY_TABLE): ClassificationResult {
  const interval = findInterval(ratio, table);
  if (!interval) {
    throw new ClassificationError("UnclassifiableRatio", `Ratio ${ratio} matches no stability interval`);
  }
  return {
    ratio,
    coordinationNumber: interval.coordinationNumber,
    geometryName: interval.geometryName,
    interval,
  };
}

export function classify(
  cationRadius: number,
  anionRadius: number,
  table: StabilityTable = STABILITY_TABLE,
): ClassificationResult {
  if (!Number.isFinite(cationRadius) || cationRadius <= 0) {
    throw new ClassificationError("InvalidInput", `Cation radius must be positive, got ${cationRadius}`, "cation");
  }
  if (!Number.isFinite(anionRadius) || anionRadius < 0) {
    throw new ClassificationError("InvalidInput", `Anion radius must be positive, got ${anionRadius}`, "anion");
  }
  if (anionRadius === 0) {
    throw new ClassificationError("DivisionByZero", "Anion radius is zero; r/R is undefined", "anion");
  }
  return classifyRatio(cationRadius / anionRadius, table);
}
