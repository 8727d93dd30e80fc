export type ClassificationErrorCode =
  | "InvalidInput"
  | "DivisionByZero"
  | "UnclassifiableRatio"
  | "InvalidTable";

export type RadiusField = "cation" | "anion";

export class ClassificationError extends Error {
  public readonly code: ClassificationErrorCode;
  public readonly field?: RadiusField;

  constructor(code: ClassificationErrorCode, message: string, field?: RadiusField) {
    super(message);
    this.name = "ClassificationError";
    this.code = code;
    this.field = field;
  }
}

export function isClassificationError(value: unknown): value is ClassificationError {
  return value instanceof ClassificationError;
}

const FIELD_LABELS: Record<RadiusField, string> = {
  cation: "cation radius (r)",
  anion: "anion radius (R)",
};

/** Text shown in the tool's status line; `error.message` stays developer-facing. */
export function describeClassificationError(error: ClassificationError): string {
  switch (error.code) {
    case "InvalidInput":
      return error.field
        ? `The ${FIELD_LABELS[error.field]} must be a positive length.`
        : "Both radii must be positive lengths.";
    case "DivisionByZero":
      return "The anion radius (R) is zero, so r/R is undefined.";
    case "UnclassifiableRatio":
      return "This ratio does not fall inside any stability interval.";
    case "InvalidTable":
    default:
      return "The stability table is inconsistent; classification is unavailable.";
  }
}
