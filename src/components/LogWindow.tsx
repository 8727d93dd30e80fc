import { useState } from "react";
import { useLog } from "../contexts/LogContext";
import type { StatusLevel } from "../types";

const LEVEL_CLASS: Record<StatusLevel, string> = {
  info: "log-window__entry--info",
  success: "log-window__entry--success",
  error: "log-window__entry--error",
  warning: "log-window__entry--warning",
  progress: "log-window__entry--progress",
};

export function LogWindow() {
  const { entries, clear } = useLog();
  const [isCollapsed, setCollapsed] = useState(true);

  return (
    <section className="log-window" data-state={isCollapsed ? "collapsed" : "open"} aria-label="Activity log">
      <header className="log-window__header">
        <button
          className="log-window__toggle"
          type="button"
          aria-expanded={!isCollapsed}
          aria-controls="log-window-list"
          onClick={() => setCollapsed((prev) => !prev)}
        >
          <span className="log-window__title">Activity log</span>
          <span className="log-window__count">{entries.length}</span>
        </button>
        <button className="log-window__action" type="button" onClick={clear} disabled={entries.length === 0}>
          Clear
        </button>
      </header>
      <ol id="log-window-list" className="log-window__list" hidden={isCollapsed}>
        {entries.map((entry) => (
          <li key={entry.id} className={`log-window__entry ${LEVEL_CLASS[entry.level]}`}>
            <span className="log-window__time">{entry.timestamp}</span>
            <p className="log-window__message">
              {entry.context ? `${entry.context}: ` : ""}
              {entry.message}
            </p>
          </li>
        ))}
      </ol>
      {entries.length === 0 ? <p className="log-window__empty">No recent activity yet.</p> : null}
    </section>
  );
}
