import { describe, expect, it } from "vitest";
import { classify, classifyRatio, findInterval } from "../../src/features/radiusRatio/classifier";
import { ClassificationError, describeClassificationError } from "../../src/features/radiusRatio/errors";
import { STABILITY_TABLE } from "../../src/features/radiusRatio/stabilityTable";

function captureError(fn: () => void): ClassificationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ClassificationError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a ClassificationError");
}

describe("classify", () => {
  it.each([
    [0.3, 1, 4, "tetrahedral"],
    [0.5, 1, 6, "octahedral"],
    [0.9, 1, 8, "cubic"],
    [1, 1, 12, "close-packed"],
    [0.1, 1, 2, "linear"],
    [0.2, 1, 3, "triangular planar"],
  ])("classifies r=%s, R=%s as NC %s (%s)", (cation, anion, nc, geometry) => {
    const result = classify(cation, anion);
    expect(result.coordinationNumber).toBe(nc);
    expect(result.geometryName).toBe(geometry);
    expect(result.ratio).toBeCloseTo(cation / anion);
  });

  it("returns the matched interval from the table", () => {
    const result = classify(0.5, 1);
    expect(result.interval).toBe(STABILITY_TABLE[3]);
    expect(classify(1, 1).interval.upperBound).toBe(Number.POSITIVE_INFINITY);
  });

  it("classifies a cation larger than the anion", () => {
    const result = classify(2, 1);
    expect(result.ratio).toBe(2);
    expect(result.coordinationNumber).toBe(12);
  });

  it("puts a ratio that overflows to Infinity in the close-packed interval", () => {
    const result = classify(1e308, 1e-10);
    expect(result.ratio).toBe(Number.POSITIVE_INFINITY);
    expect(result.coordinationNumber).toBe(12);
    expect(result.interval).toBe(STABILITY_TABLE[5]);
    expect(classifyRatio(Number.POSITIVE_INFINITY).geometryName).toBe("close-packed");
  });

  it("is deterministic", () => {
    const first = classify(0.45, 1.2);
    const second = classify(0.45, 1.2);
    expect(second).toEqual(first);
    expect(second.interval).toBe(first.interval);
  });

  it("fails with DivisionByZero for a zero anion radius", () => {
    const error = captureError(() => classify(1, 0));
    expect(error.code).toBe("DivisionByZero");
    expect(error.field).toBe("anion");
  });

  it("fails with InvalidInput for a non-positive cation radius", () => {
    expect(captureError(() => classify(-1, 2))).toMatchObject({ code: "InvalidInput", field: "cation" });
    expect(captureError(() => classify(0, 1))).toMatchObject({ code: "InvalidInput", field: "cation" });
    expect(captureError(() => classify(0, 0))).toMatchObject({ code: "InvalidInput", field: "cation" });
  });

  it("fails with InvalidInput for a negative or non-finite anion radius", () => {
    expect(captureError(() => classify(1, -2))).toMatchObject({ code: "InvalidInput", field: "anion" });
    expect(captureError(() => classify(1, Number.POSITIVE_INFINITY))).toMatchObject({
      code: "InvalidInput",
      field: "anion",
    });
  });

  it("fails with InvalidInput for NaN", () => {
    expect(captureError(() => classify(Number.NaN, 1)).code).toBe("InvalidInput");
  });

  it("reports UnclassifiableRatio when the table has a gap", () => {
    const gapped = STABILITY_TABLE.filter((row) => row.coordinationNumber !== 3);
    expect(captureError(() => classify(0.2, 1, gapped)).code).toBe("UnclassifiableRatio");
  });
});

describe("classifyRatio", () => {
  it.each([
    [0, 2],
    [0.1549, 2],
    [0.155, 3],
    [0.225, 4],
    [0.414, 6],
    [0.7319, 6],
    [0.732, 8],
    [0.999, 8],
    [1, 12],
    [1e6, 12],
  ])("puts ratio %s in NC %s", (ratio, nc) => {
    expect(classifyRatio(ratio).coordinationNumber).toBe(nc);
  });

  it("rejects negative and NaN ratios", () => {
    expect(captureError(() => classifyRatio(-0.1)).code).toBe("UnclassifiableRatio");
    expect(captureError(() => classifyRatio(Number.NEGATIVE_INFINITY)).code).toBe("UnclassifiableRatio");
    expect(captureError(() => classifyRatio(Number.NaN)).code).toBe("UnclassifiableRatio");
  });

  it("matches exactly one interval for every sampled ratio", () => {
    const ratios = [
      ...Array.from({ length: 3001 }, (_, index) => index / 1000),
      ...STABILITY_TABLE.map((row) => row.lowerBound),
    ];
    let previousNc = 0;
    for (const ratio of ratios.sort((a, b) => a - b)) {
      const matches = STABILITY_TABLE.filter((row) => ratio >= row.lowerBound && ratio < row.upperBound);
      expect(matches).toHaveLength(1);
      expect(findInterval(ratio, STABILITY_TABLE)).toBe(matches[0]);
      const { coordinationNumber } = classifyRatio(ratio);
      expect(coordinationNumber).toBeGreaterThanOrEqual(previousNc);
      previousNc = coordinationNumber;
    }
  });
});

describe("describeClassificationError", () => {
  it("explains a zero anion radius", () => {
    expect(describeClassificationError(captureError(() => classify(1, 0)))).toBe(
      "The anion radius (R) is zero, so r/R is undefined.",
    );
  });

  it("names the offending radius", () => {
    expect(describeClassificationError(captureError(() => classify(-1, 2)))).toBe(
      "The cation radius (r) must be a positive length.",
    );
    expect(describeClassificationError(captureError(() => classify(1, -2)))).toBe(
      "The anion radius (R) must be a positive length.",
    );
  });

  it("explains an unmatched ratio", () => {
    expect(describeClassificationError(captureError(() => classifyRatio(-0.1)))).toBe(
      "This ratio does not fall inside any stability interval.",
    );
  });

  it("explains an inconsistent table", () => {
    expect(describeClassificationError(new ClassificationError("InvalidTable", "Stability table is empty"))).toBe(
      "The stability table is inconsistent; classification is unavailable.",
    );
  });

  it("falls back to a generic message without a field", () => {
    expect(describeClassificationError(new ClassificationError("InvalidInput", "bad"))).toBe(
      "Both radii must be positive lengths.",
    );
  });
});
