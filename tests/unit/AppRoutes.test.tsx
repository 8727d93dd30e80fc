import { render, screen } from "@testing-library/react";
import { MemoryRouter } from "react-router-dom";
import { describe, expect, it, vi } from "vitest";
import { AppRoutes } from "../../src/App";
import { AppContext, type AppContextValue } from "../../src/contexts/AppContext";
import { LogProvider } from "../../src/contexts/LogContext";

function renderAt(path: string) {
  const value: AppContextValue = {
    currentTheme: "night",
    defaultTheme: "night",
    themeOptions: { night: { label: "Night" } },
    manifests: [
      {
        slug: "radius_ratio",
        title: "Radius ratio",
        summary: "Predict NC from r/R.",
        category: "Crystal Chemistry",
        tags: [],
      },
    ],
    siteSettings: { name: "Radius Ratio Lab", help_overview: "/help/overview" },
    pluginSettings: {},
    setTheme: vi.fn(),
  };

  return render(
    <AppContext.Provider value={value}>
      <LogProvider>
        <MemoryRouter initialEntries={[path]}>
          <AppRoutes />
        </MemoryRouter>
      </LogProvider>
    </AppContext.Provider>,
  );
}

describe("AppRoutes", () => {
  it("redirects the root to the simulator", () => {
    renderAt("/");
    expect(screen.getByRole("heading", { level: 1, name: "Radius ratio and coordination number" })).toBeInTheDocument();
    expect(document.documentElement).toHaveAttribute("data-theme", "night");
  });

  it("renders the radius ratio guide with the threshold list", () => {
    renderAt("/help/radius_ratio");
    expect(screen.getByRole("heading", { level: 1, name: "Radius ratio guidance" })).toBeInTheDocument();
    expect(screen.getByText("NC 6 (octahedral): r/R in [0.414, 0.732)")).toBeInTheDocument();
    expect(screen.getByText("NC 12 (close-packed): r/R in [1.000, ∞)")).toBeInTheDocument();
  });

  it("lists tools on the help overview", () => {
    renderAt("/help/overview");
    expect(screen.getByRole("heading", { level: 3, name: "Radius ratio" })).toBeInTheDocument();
  });

  it("renders a 404 for unknown help articles and routes", () => {
    renderAt("/help/unknown");
    expect(screen.getByRole("heading", { level: 1, name: "404: Help not found" })).toBeInTheDocument();
  });

  it("renders a 404 for unknown routes", () => {
    renderAt("/nowhere");
    expect(screen.getByRole("heading", { level: 1, name: "404: Page not found" })).toBeInTheDocument();
  });
});
