import { useEffect } from "react";

function updateThemeLinks(theme: string) {
  const anchors = document.querySelectorAll<HTMLAnchorElement>("[data-keep-theme]");
  anchors.forEach((anchor) => {
    const href = anchor.getAttribute("href");
    if (!href || !href.startsWith("/") || href.startsWith("//")) {
      return;
    }
    const url = new URL(href, window.location.origin);
    url.searchParams.set("theme", theme);
    anchor.setAttribute("href", `${url.pathname}${url.search}${url.hash}`);
  });
}

/** Applies `data-theme` to <html> and carries `?theme=` through same-origin links. */
export function useTheme(theme: string) {
  useEffect(() => {
    if (!theme) {
      return;
    }
    document.documentElement.setAttribute("data-theme", theme);
    updateThemeLinks(theme);
    const url = new URL(window.location.href);
    url.searchParams.set("theme", theme);
    window.history.replaceState(window.history.state, "", `${url.pathname}${url.search}${url.hash}`);
  }, [theme]);
}
