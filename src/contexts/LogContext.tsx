import { ReactNode, createContext, useCallback, useContext, useMemo, useState } from "react";
import type { StatusLevel } from "../types";

export const MAX_LOG_ENTRIES = 50;

export type LogEntry = {
  id: number;
  timestamp: string;
  message: string;
  level: StatusLevel;
  context?: string;
};

type LogContextValue = {
  entries: LogEntry[];
  push: (message: string, level?: StatusLevel, context?: string) => void;
  clear: () => void;
};

const LogContext = createContext<LogContextValue | null>(null);

let idCounter = 0;

export function useLog(): LogContextValue {
  const value = useContext(LogContext);
  if (!value) {
    throw new Error("LogContext is unavailable");
  }
  return value;
}

export function LogProvider({ children }: { children: ReactNode }) {
  const [entries, setEntries] = useState<LogEntry[]>([]);

  const push = useCallback((message: string, level: StatusLevel = "info", context?: string) => {
    const trimmed = message.trim();
    if (!trimmed) {
      return;
    }
    idCounter += 1;
    const entry: LogEntry = {
      id: idCounter,
      timestamp: new Date().toLocaleTimeString([], { hour12: false }),
      message: trimmed,
      level,
      context,
    };
    setEntries((prev) => [...prev, entry].slice(-MAX_LOG_ENTRIES));
  }, []);

  const clear = useCallback(() => {
    setEntries([]);
  }, []);

  const value = useMemo<LogContextValue>(() => ({ entries, push, clear }), [entries, push, clear]);

  return <LogContext.Provider value={value}>{children}</LogContext.Provider>;
}
