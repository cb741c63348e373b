import {
  createContext,
  featureSurface,
  navigationSurface,
  startApp,
} from "./context.ts";

declare global {
  interface Window {
    spaNav?: ReturnType<typeof navigationSurface>;
    dashboardFeatures?: ReturnType<typeof featureSurface>;
  }
}

document.addEventListener("DOMContentLoaded", () => {
  const ctx = createContext({
    win: window,
    fetch: window.fetch.bind(window),
    log: console,
    assign: (url) => window.location.assign(url),
    reload: () => window.location.reload(),
  });
  startApp(ctx);
  window.spaNav = navigationSurface(ctx.router);
  window.dashboardFeatures = featureSurface(ctx);
});
