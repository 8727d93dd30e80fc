import { ClassificationError } from "./errors";
import type { StabilityInterval, StabilityTable } from "./types";

function interval(row: StabilityInterval): StabilityInterval {
  return Object.freeze({ ...row });
}

/**
 * Pauling radius-ratio limits. Each lower bound is the smallest r/R at which
 * the cation still touches every surrounding anion in that geometry.
 */
export const STABILITY_TABLE: StabilityTable = Object.freeze([
  interval({ lowerBound: 0, upperBound: 0.155, coordinationNumber: 2, geometryName: "linear", polyhedron: "dumbbell" }),
  interval({
    lowerBound: 0.155,
    upperBound: 0.225,
    coordinationNumber: 3,
    geometryName: "triangular planar",
    polyhedron: "equilateral triangle",
  }),
  interval({
    lowerBound: 0.225,
    upperBound: 0.414,
    coordinationNumber: 4,
    geometryName: "tetrahedral",
    polyhedron: "tetrahedron",
  }),
  interval({
    lowerBound: 0.414,
    upperBound: 0.732,
    coordinationNumber: 6,
    geometryName: "octahedral",
    polyhedron: "octahedron",
  }),
  interval({ lowerBound: 0.732, upperBound: 1, coordinationNumber: 8, geometryName: "cubic", polyhedron: "cube" }),
  interval({
    lowerBound: 1,
    upperBound: Number.POSITIVE_INFINITY,
    coordinationNumber: 12,
    geometryName: "close-packed",
    polyhedron: "cuboctahedron",
  }),
]);

/**
 * Throws `InvalidTable` unless the rows partition [0, ∞): sorted, contiguous,
 * non-empty, and with a coordination number that never decreases.
 */
export function assertPartition(table: StabilityTable): void {
  if (!table.length) {
    throw new ClassificationError("InvalidTable", "Stability table is empty");
  }
  const first = table[0];
  const last = table[table.length - 1];
  if (first.lowerBound !== 0) {
    throw new ClassificationError("InvalidTable", `First interval starts at ${first.lowerBound}, expected 0`);
  }
  if (last.upperBound !== Number.POSITIVE_INFINITY) {
    throw new ClassificationError("InvalidTable", `Last interval ends at ${last.upperBound}, expected Infinity`);
  }
  table.forEach((row, index) => {
    if (!(row.upperBound > row.lowerBound)) {
      throw new ClassificationError(
        "InvalidTable",
        `Interval ${index} is empty: [${row.lowerBound}, ${row.upperBound})`,
      );
    }
    const next = table[index + 1];
    if (!next) {
      return;
    }
    if (row.upperBound !== next.lowerBound) {
      throw new ClassificationError(
        "InvalidTable",
        `Intervals ${index} and ${index + 1} are not contiguous: ${row.upperBound} vs ${next.lowerBound}`,
      );
    }
    if (next.coordinationNumber < row.coordinationNumber) {
      throw new ClassificationError(
        "InvalidTable",
        `Coordination number decreases between intervals ${index} and ${index + 1}`,
      );
    }
  });
}

assertPartition(STABILITY_TABLE);
