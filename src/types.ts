export type ThemeOptions = Record<string, { label?: string }>;

export type ToolManifest = {
  slug: string;
  title: string;
  summary: string;
  category: string;
  tags: string[];
};

export type SiteSettings = {
  name?: string;
  description?: string;
  help_overview?: string;
};

export type InitialState = {
  currentTheme: string;
  defaultTheme: string;
  themeOptions: ThemeOptions;
  siteSettings: SiteSettings;
  manifests: ToolManifest[];
  pluginSettings: Record<string, Record<string, unknown>>;
};

export type StatusLevel = "info" | "success" | "error" | "warning" | "progress";

export type StatusState = {
  message: string;
  level: StatusLevel;
};
