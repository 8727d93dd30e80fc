import { ReactNode, useEffect, useMemo, useState } from "react";
import { Link, useLocation } from "react-router-dom";
import { useAppContext } from "../contexts/AppContext";
import { LogWindow } from "./LogWindow";

const DEFAULT_SITE_NAME = "Radius Ratio Lab";

export function Layout({ children }: { children: ReactNode }) {
  const { manifests, currentTheme, themeOptions, setTheme, siteSettings } = useAppContext();
  const [navOpen, setNavOpen] = useState(false);
  const location = useLocation();
  const helpHref = siteSettings.help_overview ?? "/help/overview";
  const siteName = siteSettings.name ?? DEFAULT_SITE_NAME;

  const options = useMemo(
    () => Object.entries(themeOptions).map(([key, meta]) => ({ key, label: meta.label ?? key })),
    [themeOptions],
  );

  useEffect(() => {
    setNavOpen(false);
  }, [location.pathname]);

  return (
    <>
      <a className="skip-link" href="#main">
        Skip to main content
      </a>
      <header className="site-header" role="banner">
        <div className="shell">
          <div className="header-top">
            <Link className="brand__link" data-keep-theme to="/">
              <span className="brand__title">{siteName}</span>
              <span className="brand__subtitle">Crystal chemistry sandbox</span>
            </Link>
            <div className="header-actions">
              {options.length > 1 ? (
                <label className="theme-picker">
                  <span className="theme-picker__label">Theme</span>
                  <select name="theme" value={currentTheme} onChange={(event) => setTheme(event.target.value)}>
                    {options.map((option) => (
                      <option key={option.key} value={option.key}>
                        {option.label}
                      </option>
                    ))}
                  </select>
                </label>
              ) : null}
              <button
                className="nav-toggle"
                type="button"
                aria-expanded={navOpen}
                aria-controls="primary-nav"
                onClick={() => setNavOpen((prev) => !prev)}
              >
                Menu
              </button>
            </div>
          </div>
          <nav id="primary-nav" className={`site-nav${navOpen ? " is-open" : ""}`} aria-label="Primary">
            <ul className="nav-list">
              {manifests.map((tool) => (
                <li className="nav-list__item" key={tool.slug}>
                  <Link className="nav-list__link" data-keep-theme to={`/tools/${tool.slug}`}>
                    {tool.title}
                  </Link>
                </li>
              ))}
              <li className="nav-list__item">
                <Link className="nav-list__link" data-keep-theme to={helpHref}>
                  Help
                </Link>
              </li>
            </ul>
          </nav>
        </div>
      </header>
      <main id="main" className="site-main" tabIndex={-1}>
        {children}
      </main>
      <LogWindow />
      <footer className="site-footer" role="contentinfo">
        <div className="shell">
          <p className="site-footer__tagline">
            {siteSettings.description ?? "Hard-sphere packing rules for ionic solids"}
          </p>
          <p className="site-footer__meta">&copy; {siteName}</p>
        </div>
      </footer>
    </>
  );
}
