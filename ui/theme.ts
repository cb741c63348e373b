import { byId, eventType, type HostWindow, listen } from "../util/util.ts";

export type Theme = "light" | "dark";

export const themeStorageKey = "theme";
export const darkThemeClass = "dark-theme";

/** Dispatched on window whenever the theme is set */
export const themeChanged = eventType<{ theme: Theme }>({
  type: "themeChanged",
  cancelable: false,
});

export const readTheme = (win: HostWindow): Theme =>
  win.localStorage.getItem(themeStorageKey) === "dark" ? "dark" : "light";

/** Apply and persist `theme` */
export const setTheme = (win: HostWindow, theme: Theme): void => {
  const { document } = win,
    dark = theme === "dark",
    toggle = byId(document, "themeToggle") ?? byId(document, "authThemeToggle"),
    icon = byId(document, "themeIcon") ?? byId(document, "authThemeIcon");

  document.body.classList.toggle(darkThemeClass, dark);
  if (icon && toggle) {
    icon.className = dark ? "fas fa-sun" : "fas fa-moon";
    toggle.title = dark ? "Switch to light mode" : "Switch to dark mode";
  }
  win.localStorage.setItem(themeStorageKey, theme);
  win.dispatchEvent(themeChanged(win, { theme }));
};

/**
 * Restore the saved theme and switch it on toggle clicks
 *
 * Does nothing on pages without a theme toggle.
 *
 * @returns Function removing the listener
 */
export const initTheme = (win: HostWindow): (() => void) | undefined => {
  const { document } = win,
    toggle = byId(document, "themeToggle") ?? byId(document, "authThemeToggle");
  if (!toggle) return;

  setTheme(win, readTheme(win));
  return listen(toggle, "click", () =>
    setTheme(
      win,
      document.body.classList.contains(darkThemeClass) ? "light" : "dark",
    ));
};
