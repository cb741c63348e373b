import { byId, type HostWindow, isElement, listen } from "../util/util.ts";

/** Widths at or below which the sidebar overlays the content */
export const mobileWidth = 768;

/**
 * Mobile sidebar toggling
 *
 * @returns Function removing the listeners, `undefined` on pages without a sidebar
 */
export const initSidebar = (win: HostWindow): (() => void) | undefined => {
  const { document } = win,
    toggle = byId(document, "mobileToggle"),
    sidebar = byId(document, "sidebar"),
    main = byId(document, "mainContent");
  if (!toggle || !sidebar || !main) return;

  const close = () => {
      sidebar.classList.remove("show");
      main.classList.remove("expanded");
      toggle.setAttribute("aria-expanded", "false");
    },
    subs = [
      listen(toggle, "click", () => {
        sidebar.classList.toggle("show");
        main.classList.toggle("expanded");
        toggle.setAttribute(
          "aria-expanded",
          String(sidebar.classList.contains("show")),
        );
      }),
      listen(document, "click", (e) => {
        const { target } = e;
        if (
          win.innerWidth <= mobileWidth && isElement(target) &&
          !sidebar.contains(target) && !toggle.contains(target) &&
          sidebar.classList.contains("show")
        ) close();
      }),
      listen(sidebar, "keydown", (e) => {
        if (e.key === "Escape" && win.innerWidth <= mobileWidth) {
          close();
          toggle.focus();
        }
      }),
    ];
  return () => subs.forEach((unsub) => unsub());
};
