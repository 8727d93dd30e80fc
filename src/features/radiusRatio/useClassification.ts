import { useMemo } from "react";
import { classify } from "./classifier";
import { ClassificationError, describeClassificationError } from "./errors";
import type { ClassificationResult } from "./types";

export type ClassificationOutcome =
  | { kind: "ok"; result: ClassificationResult }
  | { kind: "error"; error: ClassificationError; message: string };

/** Blank or non-numeric text becomes NaN, which `classify` rejects as invalid input. */
export function parseRadius(text: string): number {
  const trimmed = text.trim();
  return trimmed ? Number(trimmed) : Number.NaN;
}

export function evaluate(cationText: string, anionText: string): ClassificationOutcome {
  try {
    return { kind: "ok", result: classify(parseRadius(cationText), parseRadius(anionText)) };
  } catch (error) {
    if (error instanceof ClassificationError) {
      return { kind: "error", error, message: describeClassificationError(error) };
    }
    throw error;
  }
}

export function useClassification(cationText: string, anionText: string): ClassificationOutcome {
  return useMemo(() => evaluate(cationText, anionText), [cationText, anionText]);
}
