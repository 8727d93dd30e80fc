import { capitalise, formatInterval } from "../format";
import type { StabilityInterval, StabilityTable } from "../types";

type ThresholdTableProps = {
  table: StabilityTable;
  active: StabilityInterval | null;
  decimals: number;
};

export function ThresholdTable({ table, active, decimals }: ThresholdTableProps) {
  return (
    <table className="data-table threshold-table">
      <caption className="sr-only">Stability thresholds for each coordination number</caption>
      <thead>
        <tr>
          <th scope="col">NC</th>
          <th scope="col">Geometry</th>
          <th scope="col">Polyhedron</th>
          <th scope="col">r/R range</th>
        </tr>
      </thead>
      <tbody>
        {table.map((row) => {
          const isActive = row === active;
          return (
            <tr
              key={row.coordinationNumber}
              className={isActive ? "threshold-table__row is-active" : "threshold-table__row"}
              aria-current={isActive ? "true" : undefined}
            >
              <td>{row.coordinationNumber}</td>
              <td>{capitalise(row.geometryName)}</td>
              <td>{row.polyhedron}</td>
              <td>{formatInterval(row, decimals)}</td>
            </tr>
          );
        })}
      </tbody>
    </table>
  );
}
