import { render, screen } from "@testing-library/react";
import { describe, expect, it } from "vitest";
import { RatioChart } from "../../src/features/radiusRatio/components/RatioChart";
import { buildStabilityBands, sampleRatioCurve } from "../../src/features/radiusRatio/curve";
import { STABILITY_TABLE } from "../../src/features/radiusRatio/stabilityTable";

const range = { min: 0.1, max: 2.5, step: 0.01 };

describe("RatioChart", () => {
  it("renders a placeholder when there is no curve", () => {
    render(<RatioChart title="Empty chart" points={[]} bands={[]} yMax={1.1} currentRatio={null} currentAnion={null} />);
    expect(screen.getByRole("heading", { name: "Empty chart" })).toBeInTheDocument();
    expect(screen.getByText(/no chart data available yet/i)).toBeInTheDocument();
  });

  it("renders the figure and a legend for the current values", () => {
    render(
      <RatioChart
        title="Zoom view"
        description="r/R between 0 and 1.1."
        points={sampleRatioCurve(1, range)}
        bands={buildStabilityBands(STABILITY_TABLE, 1.1)}
        yMax={1.1}
        clampY
        currentRatio={0.5}
        currentAnion={2}
        decimals={2}
      />,
    );

    expect(screen.getByRole("figure", { name: "Zoom view chart" })).toBeInTheDocument();
    const legend = screen.getByRole("list", { name: "Zoom view legend" });
    expect(Array.from(legend.querySelectorAll("li"), (item) => item.textContent)).toEqual([
      "r/R curve",
      "Current value (0.50)",
      "Current R (2.00 Å)",
      "NC 2",
      "NC 3",
      "NC 4",
      "NC 6",
      "NC 8",
      "NC 12",
    ]);
  });

  it("omits the current-value markers when classification failed", () => {
    render(
      <RatioChart
        title="Full view"
        points={sampleRatioCurve(1, range)}
        bands={buildStabilityBands(STABILITY_TABLE, 10)}
        yMax={10}
        currentRatio={null}
        currentAnion={null}
      />,
    );
    expect(screen.queryByText(/current value/i)).not.toBeInTheDocument();
    expect(screen.queryByText(/current r \(/i)).not.toBeInTheDocument();
  });
});
