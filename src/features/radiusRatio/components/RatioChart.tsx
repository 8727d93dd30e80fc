import {
  CartesianGrid,
  Line,
  LineChart,
  ReferenceArea,
  ReferenceLine,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import type { CurvePoint, StabilityBand } from "../curve";
import { formatRatio } from "../format";

type RatioChartProps = {
  title: string;
  description?: string;
  points: CurvePoint[];
  bands: StabilityBand[];
  yMax: number;
  clampY?: boolean;
  currentRatio: number | null;
  currentAnion: number | null;
  decimals?: number;
};

export function RatioChart({
  title,
  description,
  points,
  bands,
  yMax,
  clampY = false,
  currentRatio,
  currentAnion,
  decimals = 3,
}: RatioChartProps) {
  const headingId = `chart-panel-${slugify(title)}`;

  if (!points.length) {
    return (
      <section className="chart-panel chart-panel--empty" aria-labelledby={headingId}>
        <h3 id={headingId} className="chart-panel__title">
          {title}
        </h3>
        {description ? <p className="chart-panel__description">{description}</p> : null}
        <p className="chart-panel__empty">No chart data available yet.</p>
      </section>
    );
  }

  const xMin = points[0].anion;
  const xMax = points[points.length - 1].anion;

  return (
    <section className="chart-panel" aria-labelledby={headingId}>
      <div className="chart-panel__header">
        <h3 id={headingId} className="chart-panel__title">
          {title}
        </h3>
        {description ? <p className="chart-panel__description">{description}</p> : null}
      </div>
      <div className="chart-panel__figure" role="figure" aria-label={`${title} chart`}>
        <ResponsiveContainer width="100%" height={320}>
          <LineChart data={points} margin={{ top: 12, right: 12, bottom: 24, left: 12 }}>
            <CartesianGrid strokeDasharray="4 4" stroke="rgba(255,255,255,0.08)" />
            {bands.map((band) => (
              <ReferenceArea
                key={band.interval.coordinationNumber}
                y1={band.y1}
                y2={band.y2}
                fill={band.color}
                fillOpacity={0.2}
                ifOverflow="hidden"
              />
            ))}
            <XAxis
              type="number"
              dataKey="anion"
              domain={[xMin, xMax]}
              tickFormatter={(value: number) => value.toFixed(1)}
              label={{ value: "Anion radius R [Å]", position: "insideBottom", offset: -12 }}
            />
            <YAxis
              type="number"
              domain={[0, yMax]}
              allowDataOverflow={clampY}
              tickFormatter={(value: number) => value.toFixed(2)}
              label={{ value: "r/R", angle: -90, position: "insideLeft" }}
            />
            <Tooltip
              labelFormatter={(label: number) => `R = ${label} Å`}
              formatter={(value) => (typeof value === "number" ? formatRatio(value, decimals) : String(value))}
            />
            <Line type="monotone" dataKey="ratio" name="r/R" stroke="#63d5ff" strokeWidth={2} dot={false} />
            {currentRatio !== null ? (
              <ReferenceLine y={currentRatio} stroke="#ff6b6b" strokeDasharray="6 4" ifOverflow="hidden" />
            ) : null}
            {currentAnion !== null ? (
              <ReferenceLine x={currentAnion} stroke="#3fb950" strokeDasharray="6 4" ifOverflow="hidden" />
            ) : null}
          </LineChart>
        </ResponsiveContainer>
      </div>
      <ul className="chart-panel__legend" aria-label={`${title} legend`}>
        <li>r/R curve</li>
        {currentRatio !== null ? <li>Current value ({formatRatio(currentRatio, decimals)})</li> : null}
        {currentAnion !== null ? <li>Current R ({currentAnion.toFixed(2)} Å)</li> : null}
        {bands.map((band) => (
          <li key={band.interval.coordinationNumber}>
            <span className="chart-panel__swatch" style={{ background: band.color }} aria-hidden="true" />
            NC {band.interval.coordinationNumber}
          </li>
        ))}
      </ul>
    </section>
  );
}

function slugify(value: string) {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/(^-|-$)/g, "");
}
