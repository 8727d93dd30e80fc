import { useAppContext } from "../contexts/AppContext";

/** Raw `pluginSettings[slug]`; each tool validates its own shape. */
export function usePluginSettings(slug: string): Record<string, unknown> | undefined {
  const { pluginSettings } = useAppContext();
  return pluginSettings[slug];
}
