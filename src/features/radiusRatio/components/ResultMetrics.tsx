import { capitalise, formatRatio } from "../format";
import type { ClassificationOutcome } from "../useClassification";

const EMPTY = "—";

export function ResultMetrics({ outcome, decimals }: { outcome: ClassificationOutcome; decimals: number }) {
  const result = outcome.kind === "ok" ? outcome.result : null;
  const metrics = [
    { key: "ratio", label: "r/R ratio", value: result ? formatRatio(result.ratio, decimals) : EMPTY },
    { key: "nc", label: "Coordination number (NC)", value: result ? String(result.coordinationNumber) : EMPTY },
    { key: "geometry", label: "Geometry", value: result ? capitalise(result.geometryName) : EMPTY },
  ];

  return (
    <dl className="metric-grid" aria-label="Classification result">
      {metrics.map((metric) => (
        <div key={metric.key} className="metric-grid__item" data-metric={metric.key}>
          <dt className="metric-grid__label">{metric.label}</dt>
          <dd className="metric-grid__value">{metric.value}</dd>
        </div>
      ))}
    </dl>
  );
}
