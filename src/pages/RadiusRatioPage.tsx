import { useEffect, useMemo, useRef, useState } from "react";
import radiusRatioIcon from "../assets/radius_ratio_icon.svg";
import { SettingsModal, type SettingsField } from "../components/SettingsModal";
import { StatusMessage } from "../components/StatusMessage";
import { ToolShell, ToolShellIntro } from "../components/ToolShell";
import { RadiusControl } from "../features/radiusRatio/components/RadiusControl";
import { RatioChart } from "../features/radiusRatio/components/RatioChart";
import { RatioScale } from "../features/radiusRatio/components/RatioScale";
import { ResultMetrics } from "../features/radiusRatio/components/ResultMetrics";
import { TheoryNotes } from "../features/radiusRatio/components/TheoryNotes";
import { ThresholdTable } from "../features/radiusRatio/components/ThresholdTable";
import { RADIUS_RATIO_SLUG, resolveRadiusRatioConfig } from "../features/radiusRatio/config";
import { buildStabilityBands, sampleRatioCurve } from "../features/radiusRatio/curve";
import { STABILITY_TABLE } from "../features/radiusRatio";
import { parseRadius, useClassification } from "../features/radiusRatio/useClassification";
import { usePluginSettings } from "../hooks/usePluginSettings";
import { useStatus } from "../hooks/useStatus";
import { useToolSettings } from "../hooks/useToolSettings";

type RadiusRatioPreferences = {
  decimals: number;
  showZoomChart: boolean;
  scaleMax: number;
};

const DEFAULT_PREFERENCES: RadiusRatioPreferences = {
  decimals: 3,
  showZoomChart: true,
  scaleMax: 1.1,
};

const SETTINGS_FIELDS: SettingsField[] = [
  {
    key: "decimals",
    label: "Displayed decimals",
    type: "number",
    min: 0,
    max: 6,
    step: 1,
    description: "Precision of r/R in the metrics, table and charts.",
  },
  {
    key: "showZoomChart",
    label: "Show zoom chart",
    type: "boolean",
    description: "Adds a second chart with the ratio axis limited to the scale maximum.",
  },
  {
    key: "scaleMax",
    label: "Scale maximum (r/R)",
    type: "number",
    min: 0.5,
    max: 5,
    step: 0.1,
    description: "Ratio that fills the position bar and tops the zoom chart.",
  },
];

function sanitiseDecimals(value: unknown): number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 6
    ? value
    : DEFAULT_PREFERENCES.decimals;
}

function sanitiseScaleMax(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : DEFAULT_PREFERENCES.scaleMax;
}

export default function RadiusRatioPage() {
  const pluginConfig = usePluginSettings(RADIUS_RATIO_SLUG);
  const config = useMemo(() => resolveRadiusRatioConfig(pluginConfig), [pluginConfig]);
  const { settings: preferences, updateSetting, resetSettings } = useToolSettings<RadiusRatioPreferences>(
    DEFAULT_PREFERENCES,
  );
  const [settingsOpen, setSettingsOpen] = useState(false);

  const [cationText, setCationText] = useState(() => String(config.cation.default));
  const [anionText, setAnionText] = useState(() => String(config.anion.default));
  const outcome = useClassification(cationText, anionText);
  const result = outcome.kind === "ok" ? outcome.result : null;

  const decimals = sanitiseDecimals(preferences.decimals);
  const scaleMax = sanitiseScaleMax(preferences.scaleMax);

  const status = useStatus(
    { message: "Move the sliders to explore r/R", level: "info" },
    { context: "Radius Ratio · Classifier" },
  );
  const setStatusRef = useRef(status.setStatus);
  useEffect(() => {
    setStatusRef.current = status.setStatus;
  }, [status.setStatus]);

  const statusKey =
    outcome.kind === "ok"
      ? `nc:${outcome.result.coordinationNumber}`
      : `error:${outcome.error.code}:${outcome.error.field ?? ""}`;
  const lastStatusKey = useRef<string | null>(null);
  useEffect(() => {
    if (lastStatusKey.current === statusKey) {
      return;
    }
    lastStatusKey.current = statusKey;
    if (outcome.kind === "error") {
      setStatusRef.current(outcome.message, "error");
      return;
    }
    setStatusRef.current(
      `Predicted NC ${outcome.result.coordinationNumber} (${outcome.result.geometryName})`,
      "success",
    );
  }, [outcome, statusKey]);

  const cationValue = parseRadius(cationText);
  const anionValue = parseRadius(anionText);
  const points = useMemo(() => sampleRatioCurve(cationValue, config.anion), [cationValue, config.anion]);
  const fullYMax = useMemo(() => {
    const peak = points.reduce((max, point) => Math.max(max, point.ratio), 0);
    return Math.max(Math.ceil(peak * 10) / 10, scaleMax);
  }, [points, scaleMax]);
  const fullBands = useMemo(() => buildStabilityBands(STABILITY_TABLE, fullYMax), [fullYMax]);
  const zoomBands = useMemo(() => buildStabilityBands(STABILITY_TABLE, scaleMax), [scaleMax]);
  const currentAnion = result ? anionValue : null;
  const curveDescription = Number.isFinite(cationValue)
    ? `r/R as R varies, for r = ${cationValue} Å.`
    : "r/R as R varies for the current cation radius.";

  const handlePreferenceChange = (key: string, value: unknown) => {
    if (key === "showZoomChart") {
      updateSetting(key, Boolean(value));
      return;
    }
    if (key === "decimals" || key === "scaleMax") {
      updateSetting(key, typeof value === "number" ? value : Number.NaN);
    }
  };

  const resetRadii = () => {
    setCationText(String(config.cation.default));
    setAnionText(String(config.anion.default));
  };

  return (
    <section className="shell surface-block" aria-labelledby="radius-ratio-title">
      <ToolShell
        intro={
          <ToolShellIntro
            icon={radiusRatioIcon}
            titleId="radius-ratio-title"
            category="Crystal Chemistry"
            title="Radius ratio and coordination number"
            summary="See how the ratio between the cation radius (r) and the anion radius (R) sets the stable coordination number (NC) of an ionic solid under the hard-sphere model."
            bullets={[
              "Pauling radius-ratio limits from linear (NC 2) to close-packed (NC 12)",
              "Live threshold table and position scale for the current r/R",
              "Charts of r/R against R with shaded stability bands",
            ]}
            actions={
              <>
                <button className="btn btn--ghost" type="button" onClick={() => setSettingsOpen(true)}>
                  ⚙️ Settings
                </button>
                <a className="btn btn--subtle" data-keep-theme href={config.docs}>
                  Read radius ratio guide
                </a>
              </>
            }
          />
        }
        workspace={
          <div className="tool-shell__workspace">
            <form
              id="radius-form"
              className="surface-muted form-grid"
              aria-label="Ionic radii"
              onSubmit={(event) => event.preventDefault()}
            >
              <p className="form-field__hint">Values in ångströms (Å).</p>
              <div className="input-grid">
                <RadiusControl
                  id="cation-radius"
                  label="Cation radius (r) [Å]"
                  hint="Radius of the central cation."
                  range={config.cation}
                  value={cationText}
                  invalid={outcome.kind === "error" && outcome.error.field === "cation"}
                  onChange={setCationText}
                />
                <RadiusControl
                  id="anion-radius"
                  label="Anion radius (R) [Å]"
                  hint="Vary the anion size and watch r/R and NC change."
                  range={config.anion}
                  value={anionText}
                  invalid={outcome.kind === "error" && outcome.error.field === "anion"}
                  onChange={setAnionText}
                />
              </div>
              <div className="form-actions">
                <button className="btn btn--ghost" type="button" onClick={resetRadii}>
                  Reset radii
                </button>
              </div>
              <StatusMessage status={status.status} />
            </form>

            <section className="surface-muted" aria-labelledby="radius-result-title">
              <h2 id="radius-result-title" className="form-section__title">
                Classification
              </h2>
              <ResultMetrics outcome={outcome} decimals={decimals} />
            </section>

            <section className="surface-muted" aria-labelledby="radius-thresholds-title">
              <h2 id="radius-thresholds-title" className="form-section__title">
                Stability thresholds for each NC
              </h2>
              <ThresholdTable table={STABILITY_TABLE} active={result?.interval ?? null} decimals={decimals} />
              <RatioScale ratio={result?.ratio ?? null} scaleMax={scaleMax} table={STABILITY_TABLE} decimals={decimals} />
            </section>

            <section className="surface-muted chart-grid" aria-labelledby="radius-charts-title">
              <h2 id="radius-charts-title" className="form-section__title">
                r/R against R
              </h2>
              <RatioChart
                title="Full view"
                description={curveDescription}
                points={points}
                bands={fullBands}
                yMax={fullYMax}
                currentRatio={result?.ratio ?? null}
                currentAnion={currentAnion}
                decimals={decimals}
              />
              {preferences.showZoomChart ? (
                <RatioChart
                  title="Zoom view"
                  description={`r/R between 0 and ${scaleMax}.`}
                  points={points}
                  bands={zoomBands}
                  yMax={scaleMax}
                  clampY
                  currentRatio={result?.ratio ?? null}
                  currentAnion={currentAnion}
                  decimals={decimals}
                />
              ) : null}
            </section>

            <TheoryNotes />
            <p className="form-field__hint">Based on Pauling&apos;s radius-ratio rules. For teaching use.</p>
          </div>
        }
      />
      <SettingsModal
        isOpen={settingsOpen}
        title="Radius ratio preferences"
        description="Adjust displayed precision and chart options."
        fields={SETTINGS_FIELDS}
        values={preferences}
        onChange={handlePreferenceChange}
        onReset={() => resetSettings()}
        onClose={() => setSettingsOpen(false)}
      />
    </section>
  );
}
