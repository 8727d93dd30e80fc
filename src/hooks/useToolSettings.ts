import { useCallback, useState } from "react";

type SettingsState<T> = {
  settings: T;
  updateSetting: <K extends keyof T>(key: K, value: T[K]) => void;
  resetSettings: () => void;
};

/** In-memory preferences for a tool page; nothing is persisted between visits. */
export function useToolSettings<T extends Record<string, unknown>>(defaults: T): SettingsState<T> {
  const [settings, setSettings] = useState<T>(() => ({ ...defaults }));

  const updateSetting = useCallback(<K extends keyof T>(key: K, value: T[K]) => {
    setSettings((current) => ({ ...current, [key]: value }));
  }, []);

  const resetSettings = useCallback(() => {
    setSettings({ ...defaults });
  }, [defaults]);

  return { settings, updateSetting, resetSettings };
}
