import { scalePosition } from "../curve";
import { formatRatio, formatThresholdMarkers } from "../format";
import type { StabilityTable } from "../types";

type RatioScaleProps = {
  ratio: number | null;
  scaleMax: number;
  table: StabilityTable;
  decimals: number;
};

export function RatioScale({ ratio, scaleMax, table, decimals }: RatioScaleProps) {
  const position = ratio === null ? 0 : scalePosition(ratio, scaleMax);
  const label = ratio === null ? "Current r/R is unavailable" : `Current r/R (${formatRatio(ratio, decimals)}) on the scale`;

  return (
    <div className="ratio-scale">
      <p className="form-field__label" id="ratio-scale-label">
        {label}
      </p>
      <progress className="ratio-scale__bar" aria-labelledby="ratio-scale-label" value={position} max={1} />
      <p className="form-field__hint" data-role="threshold-markers">
        Thresholds: {formatThresholdMarkers(table, decimals)}
      </p>
    </div>
  );
}
