import { useCallback, useState } from "react";
import { useLog } from "../contexts/LogContext";
import type { StatusLevel, StatusState } from "../types";

type Options = {
  context?: string;
};

/** Status line for one tool; every non-empty message is also written to the activity log. */
export function useStatus(initial?: StatusState, options?: Options) {
  const [status, setStatusState] = useState<StatusState | null>(initial ?? null);
  const { push } = useLog();
  const context = options?.context;

  const setStatus = useCallback(
    (message: string, level: StatusLevel = "info") => {
      if (!message) {
        setStatusState(null);
        return;
      }
      setStatusState({ message, level });
      push(message, level, context);
    },
    [push, context],
  );

  const resetStatus = useCallback(() => {
    setStatusState(null);
  }, []);

  return { status, setStatus, resetStatus } as const;
}
