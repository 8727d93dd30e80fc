export { classify, classifyRatio, findInterval } from "./classifier";
export { ClassificationError, describeClassificationError, isClassificationError } from "./errors";
export type { ClassificationErrorCode, RadiusField } from "./errors";
export { STABILITY_TABLE, assertPartition } from "./stabilityTable";
export type {
  ClassificationResult,
  CoordinationNumber,
  GeometryName,
  StabilityInterval,
  StabilityTable,
} from "./types";
