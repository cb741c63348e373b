import { byId, escapeHtml, type HostWindow, listen } from "../util/util.ts";

export const searchDebounce = 300;
export const minQueryLength = 3;

export const searchUrl = (query: string): string =>
  `/dashboard/search/?q=${encodeURIComponent(query)}`;

/** Fill `#searchSuggestions` for `query` */
export const showSuggestions = (doc: Document, query: string): void => {
  const suggestions = byId(doc, "searchSuggestions");
  if (suggestions) {
    suggestions.innerHTML =
      `<div class="search-suggestion"><i class="fas fa-search me-2"></i>Search for "${
        escapeHtml(query)
      }"</div>`;
    suggestions.style.display = "block";
  }
};

/**
 * Global search box
 *
 * @param navigate Navigation used on Enter
 * @returns Function removing the listeners, `undefined` without a search box
 */
export const initSearch = (
  win: HostWindow,
  navigate: (url: string) => void,
  delay: number = searchDebounce,
): (() => void) | undefined => {
  const { document } = win,
    input = byId<HTMLInputElement>(document, "globalSearch");
  if (!input) return;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const subs = [
    listen(input, "input", () => {
      const query = input.value;
      clearTimeout(timer);
      timer = setTimeout(() => {
        if (query.length >= minQueryLength) showSuggestions(document, query);
      }, delay);
    }),
    listen(input, "keydown", (e) => {
      if (e.key === "Enter" && input.value.trim()) {
        e.preventDefault();
        navigate(searchUrl(input.value));
      }
    }),
  ];
  return () => {
    clearTimeout(timer);
    subs.forEach((unsub) => unsub());
  };
};
