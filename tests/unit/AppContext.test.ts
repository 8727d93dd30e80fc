import { describe, expect, it } from "vitest";
import { normaliseInitialState } from "../../src/contexts/AppContext";

describe("normaliseInitialState", () => {
  it("fills every field for an empty payload", () => {
    expect(normaliseInitialState(null)).toEqual({
      currentTheme: "",
      defaultTheme: "",
      themeOptions: {},
      siteSettings: { name: undefined, description: undefined, help_overview: undefined },
      manifests: [],
      pluginSettings: {},
    });
  });

  it("keeps valid manifests and plugin settings only", () => {
    const state = normaliseInitialState({
      defaultTheme: "paper",
      themeOptions: { paper: { label: "Paper" }, night: {} },
      manifests: [
        { slug: "radius_ratio", title: "Radius ratio", summary: "r/R to NC", tags: ["pauling", 4] },
        { title: "No slug" },
        "broken",
      ],
      pluginSettings: { radius_ratio: { docs: "/help/radius_ratio" }, broken: 3 },
    });

    expect(state.currentTheme).toBe("paper");
    expect(state.themeOptions).toEqual({ paper: { label: "Paper" }, night: { label: undefined } });
    expect(state.manifests).toEqual([
      { slug: "radius_ratio", title: "Radius ratio", summary: "r/R to NC", category: "Tools", tags: ["pauling"] },
    ]);
    expect(state.pluginSettings).toEqual({ radius_ratio: { docs: "/help/radius_ratio" } });
  });

  it("falls back to the first theme option", () => {
    const state = normaliseInitialState({ themeOptions: { night: { label: "Night" } } });
    expect(state.defaultTheme).toBe("night");
    expect(state.currentTheme).toBe("night");
  });
});
