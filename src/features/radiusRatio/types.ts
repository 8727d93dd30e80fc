export type CoordinationNumber = 2 | 3 | 4 | 6 | 8 | 12;

export type GeometryName =
  | "linear"
  | "triangular planar"
  | "tetrahedral"
  | "octahedral"
  | "cubic"
  | "close-packed";

/** One row of the threshold table: `[lowerBound, upperBound)`. */
export type StabilityInterval = {
  readonly lowerBound: number;
  readonly upperBound: number;
  readonly coordinationNumber: CoordinationNumber;
  readonly geometryName: GeometryName;
  readonly polyhedron: string;
};

export type StabilityTable = ReadonlyArray<StabilityInterval>;

export type ClassificationResult = {
  ratio: number;
  coordinationNumber: CoordinationNumber;
  geometryName: GeometryName;
  interval: StabilityInterval;
};
