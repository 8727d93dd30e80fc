import { useMemo } from "react";
import { Link, useParams } from "react-router-dom";
import ErrorPage from "./ErrorPage";
import { useAppContext } from "../contexts/AppContext";
import { STABILITY_TABLE } from "../features/radiusRatio";
import { resolveRadiusRatioConfig } from "../features/radiusRatio/config";
import { formatInterval } from "../features/radiusRatio/format";
import { usePluginSettings } from "../hooks/usePluginSettings";
import type { ToolManifest } from "../types";

type Section = {
  heading: string;
  ordered?: string[];
  unordered?: string[];
  body?: string;
  hint?: string;
};

type HelpContent = {
  category: string;
  title: string;
  subtitle: string;
  sections: Section[];
  directory?: ToolManifest[];
};

type BuilderOptions = {
  settings: Record<string, unknown> | undefined;
  manifests: ToolManifest[];
  siteDescription?: string;
  currentTheme: string;
};

type HelpBuilder = (options: BuilderOptions) => HelpContent;

const HELP_BUILDERS: Record<string, HelpBuilder> = {
  radius_ratio: ({ settings }) => {
    const { cation, anion } = resolveRadiusRatioConfig(settings);
    return {
      category: "Crystal chemistry",
      title: "Radius ratio guidance",
      subtitle:
        "Predict the coordination number of an ionic solid from the ratio of the cation radius to the anion radius, using Pauling's hard-sphere limits.",
      sections: [
        {
          heading: "Using the workspace",
          ordered: [
            `Set the cation radius r (${cation.min}–${cation.max} Å) with the slider or type an exact value.`,
            `Vary the anion radius R (${anion.min}–${anion.max} Å) and watch r/R, NC and geometry update.`,
            "The highlighted row of the threshold table is the interval containing the current ratio.",
            "The charts plot r/R against R for the current r; the dashed lines mark the current values.",
          ],
        },
        {
          heading: "Stability thresholds",
          body: "Each interval includes its lower bound and excludes its upper bound.",
          unordered: STABILITY_TABLE.map(
            (row) => `NC ${row.coordinationNumber} (${row.geometryName}): r/R in ${formatInterval(row)}`,
          ),
        },
        {
          heading: "Input errors",
          unordered: [
            "Radii are lengths: a cation radius of zero or below is rejected.",
            "An anion radius of zero leaves r/R undefined; no classification is shown.",
            "While an input is invalid the table, scale and charts show no highlight.",
          ],
          hint: "Every status change is recorded in the activity log at the bottom of the page.",
        },
        {
          heading: "Preferences",
          unordered: [
            "Displayed decimals: precision of r/R in metrics, table and charts (0–6).",
            "Show zoom chart: toggles the chart whose ratio axis stops at the scale maximum.",
            "Scale maximum: the r/R that fills the position bar (1.1 by default).",
          ],
        },
      ],
    };
  },
  overview: ({ manifests, siteDescription, currentTheme }) => ({
    category: "Documentation hub",
    title: "Help center",
    subtitle: siteDescription ?? "Guides for each simulator in this workspace.",
    sections: [
      {
        heading: "Configuration",
        body:
          "Site name, themes and per-tool settings come from the app-state block in index.html. Tool settings are validated field by field; invalid values fall back to the defaults.",
        unordered: [`Current theme: ${currentTheme || "default"}.`, "Preferences changed in a tool last until the page reloads."],
      },
    ],
    directory: manifests,
  }),
};

export default function HelpPage() {
  const { slug } = useParams<{ slug: string }>();
  const effectiveSlug = slug ?? "overview";
  const { manifests, siteSettings, currentTheme } = useAppContext();
  const settings = usePluginSettings(effectiveSlug);

  const builder = Object.hasOwn(HELP_BUILDERS, effectiveSlug) ? HELP_BUILDERS[effectiveSlug] : undefined;
  const content = useMemo(() => {
    if (!builder) {
      return null;
    }
    return builder({ settings, manifests, siteDescription: siteSettings.description, currentTheme });
  }, [builder, currentTheme, manifests, settings, siteSettings.description]);

  if (!content) {
    return <ErrorPage status={404} title="Help not found" message="This help article is unavailable." />;
  }

  return (
    <section className="shell surface-block help-content" aria-labelledby={`help-${effectiveSlug}-title`}>
      <header>
        <p className="tool-card__category">{content.category}</p>
        <h1 id={`help-${effectiveSlug}-title`} className="section-heading">
          {content.title}
        </h1>
        <p className="hero__subtitle">{content.subtitle}</p>
      </header>
      {content.sections.map((section) => (
        <article key={section.heading} className="surface-muted help-section">
          <h2>{section.heading}</h2>
          {section.body ? <p>{section.body}</p> : null}
          {section.ordered ? (
            <ol>
              {section.ordered.map((item) => (
                <li key={item}>{item}</li>
              ))}
            </ol>
          ) : null}
          {section.unordered ? (
            <ul className="list-reset">
              {section.unordered.map((item) => (
                <li key={item}>{item}</li>
              ))}
            </ul>
          ) : null}
          {section.hint ? <p className="form-field__hint">{section.hint}</p> : null}
        </article>
      ))}
      {content.directory?.length ? (
        <section aria-labelledby="help-directory-title">
          <h2 id="help-directory-title">Tool directory</h2>
          <div className="help-grid">
            {content.directory.map((entry) => (
              <article key={entry.slug} className="surface-muted help-section">
                <h3>{entry.title}</h3>
                <p className="hero__subtitle">{entry.summary}</p>
                <div className="tool-card__actions">
                  <Link className="btn" data-keep-theme to={`/tools/${entry.slug}`}>
                    Open tool
                  </Link>
                  <Link className="btn btn--subtle" data-keep-theme to={`/help/${entry.slug}`}>
                    Help
                  </Link>
                </div>
              </article>
            ))}
          </div>
        </section>
      ) : null}
    </section>
  );
}
