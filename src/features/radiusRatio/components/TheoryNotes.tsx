export function TheoryNotes() {
  return (
    <details className="surface-muted theory-notes">
      <summary className="form-section__title">Theory and limitations</summary>
      <h3>Model basis</h3>
      <ul>
        <li>
          The limits (0.155, 0.225, 0.414, 0.732, 1.000) are geometric thresholds for ions treated as hard spheres in
          contact.
        </li>
        <li>
          Each lower bound is the <strong>minimum</strong> r/R at which the cation still touches every anion around it
          in that geometry.
        </li>
      </ul>
      <h3>Reading the result</h3>
      <ul>
        <li>
          Below the lower bound for an NC the cation is too small for that geometry and the structure tends to a lower
          NC with fewer neighbours.
        </li>
        <li>Inside an interval the geometry is geometrically stable: the ions touch without overlapping.</li>
        <li>An r/R above 1 only happens when the cation is larger than the anion, which is rare in ionic solids.</li>
      </ul>
      <h3>Limitations</h3>
      <ol>
        <li>Real ions are not rigid spheres and can be polarised.</li>
        <li>Covalent character gives bonds a direction the geometric rule ignores.</li>
        <li>Actual stability depends on the total lattice energy, not only on geometric contact.</li>
      </ol>
      <p>
        <strong>Classic example:</strong> for r/R ≈ 0.55 (NaCl) the simulator predicts NC = 6 (octahedral), which
        matches the rock-salt structure.
      </p>
    </details>
  );
}
