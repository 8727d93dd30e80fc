import React from "react";
import ReactDOM from "react-dom/client";
import App from "./App";
import { AppContext, normaliseInitialState } from "./contexts/AppContext";
import { LogProvider } from "./contexts/LogContext";
import type { InitialState } from "./types";
import "./styles/core.css";

function getInitialState(): InitialState {
  const script = document.getElementById("app-state");
  if (!script?.textContent) {
    throw new Error("Missing initial application state");
  }
  const raw: unknown = JSON.parse(script.textContent);
  return normaliseInitialState(raw);
}

const initial = getInitialState();

const container = document.getElementById("root");
if (!container) {
  throw new Error("Missing root element");
}

const root = ReactDOM.createRoot(container);

function AppWrapper() {
  const [currentTheme, setCurrentTheme] = React.useState(initial.currentTheme);

  return (
    <AppContext.Provider value={{ ...initial, currentTheme, setTheme: setCurrentTheme }}>
      <LogProvider>
        <App />
      </LogProvider>
    </AppContext.Provider>
  );
}

root.render(
  <React.StrictMode>
    <AppWrapper />
  </React.StrictMode>,
);
