import { createContext, useContext } from "react";
import type { InitialState, SiteSettings, ThemeOptions, ToolManifest } from "../types";

export type AppContextValue = InitialState & {
  setTheme: (theme: string) => void;
};

export const AppContext = createContext<AppContextValue | null>(null);

export function useAppContext(): AppContextValue {
  const value = useContext(AppContext);
  if (!value) {
    throw new Error("AppContext is unavailable");
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

function readOptionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function normaliseManifest(raw: unknown): ToolManifest | null {
  if (!isRecord(raw)) {
    return null;
  }
  const slug = readString(raw.slug).trim();
  if (!slug) {
    return null;
  }
  return {
    slug,
    title: readString(raw.title, slug),
    summary: readString(raw.summary),
    category: readString(raw.category).trim() || "Tools",
    tags: Array.isArray(raw.tags) ? raw.tags.filter((tag): tag is string => typeof tag === "string") : [],
  };
}

function normaliseThemeOptions(raw: unknown): ThemeOptions {
  if (!isRecord(raw)) {
    return {};
  }
  const options: ThemeOptions = {};
  for (const [key, meta] of Object.entries(raw)) {
    options[key] = { label: isRecord(meta) ? readOptionalString(meta.label) : undefined };
  }
  return options;
}

function normaliseSiteSettings(raw: unknown): SiteSettings {
  if (!isRecord(raw)) {
    return {};
  }
  return {
    name: readOptionalString(raw.name),
    description: readOptionalString(raw.description),
    help_overview: readOptionalString(raw.help_overview),
  };
}

function normalisePluginSettings(raw: unknown): Record<string, Record<string, unknown>> {
  if (!isRecord(raw)) {
    return {};
  }
  const settings: Record<string, Record<string, unknown>> = {};
  for (const [slug, value] of Object.entries(raw)) {
    if (isRecord(value)) {
      settings[slug] = value;
    }
  }
  return settings;
}

/** Accepts the parsed `#app-state` JSON and fills every missing field. */
export function normaliseInitialState(raw: unknown): InitialState {
  const state = isRecord(raw) ? raw : {};
  const themeOptions = normaliseThemeOptions(state.themeOptions);
  const defaultTheme = readString(state.defaultTheme) || Object.keys(themeOptions)[0] || "";
  const manifests = Array.isArray(state.manifests) ? state.manifests : [];
  return {
    currentTheme: readString(state.currentTheme) || defaultTheme,
    defaultTheme,
    themeOptions,
    siteSettings: normaliseSiteSettings(state.siteSettings),
    manifests: manifests
      .map((manifest) => normaliseManifest(manifest))
      .filter((manifest): manifest is ToolManifest => manifest !== null),
    pluginSettings: normalisePluginSettings(state.pluginSettings),
  };
}
