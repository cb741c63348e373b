import {
  detach,
  eventType,
  type HostWindow,
  isElement,
  listen,
  type Logger,
  NULL,
  preventDefault,
  querySelector,
  timeout,
} from "../util/util.ts";
import { PageCache } from "./cache.ts";
import {
  defaultInterceptOptions,
  type InterceptOptions,
  type SectionTable,
  sections,
  shouldIntercept,
} from "./policy.ts";
import {
  addLinkLoadingState,
  applyTitles,
  contentSelector,
  LoadingOverlay,
  parsePage,
  removeLinkLoadingStates,
  transitionContent,
  updateActiveNavigation,
} from "./view.ts";

/** Dispatched on the document once new page content is in place */
export const pageLoaded = eventType<{ url: string }>({ type: "spa:pageLoaded" });

export const navigationError = "Failed to load page. Please try again.";

export type RouterOptions = InterceptOptions & {
  readonly cacheSize: number;
  /** Delay before the loading overlay shows up */
  readonly loadingDelay: number;
  readonly exitDelay: number;
  readonly enterDelay: number;
  /** Upper bound of the random delay before each critical page preloads */
  readonly preloadJitter: number;
  readonly criticalPages: readonly string[];
  readonly sections: SectionTable;
};

export const defaultRouterOptions: RouterOptions = {
  ...defaultInterceptOptions,
  cacheSize: 10,
  loadingDelay: 100,
  exitDelay: 300,
  enterDelay: 400,
  preloadJitter: 2000,
  criticalPages: [
    "/dashboard/",
    "/dashboard/analytics/",
    "/dashboard/submit-influencer/",
    "/dashboard/settings/",
  ],
  sections,
};

export type RouterHost = {
  readonly win: HostWindow;
  readonly fetch: typeof fetch;
  readonly log: Logger;
  /** Full native page load, used as the failure fallback */
  readonly assign: (url: string) => void;
  readonly notify: { showError(message: string): unknown };
  /** Reattach page-level widgets to freshly injected content */
  readonly reinitialize?: (content: Element) => void;
  readonly random?: () => number;
};

/** Non-success response to a page fetch */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = "HttpError";
  }
}

export type RouterState = {
  currentPage: string;
  isLoading: boolean;
  loadingTimer: ReturnType<typeof setTimeout> | null;
};

export class Router {
  readonly options: RouterOptions;
  readonly cache: PageCache;
  readonly state: RouterState;
  readonly #host: RouterHost;
  readonly #requests: Record<string, Promise<string> | undefined> = {};
  #overlay?: LoadingOverlay;

  constructor(host: RouterHost, options: Partial<RouterOptions> = {}) {
    this.#host = host;
    this.options = { ...defaultRouterOptions, ...options };
    this.cache = new PageCache(this.options.cacheSize);
    this.state = {
      currentPage: host.win.location.pathname,
      isLoading: false,
      loadingTimer: NULL,
    };
  }

  /**
   * Key a URL the way the cache and the history know it
   *
   * Relative URLs resolve against the current page. Same-origin URLs lose
   * their origin, so `https://host/dashboard/` and `/dashboard/` designate the
   * same page.
   */
  toPath(url: string): string {
    const { location } = this.#host.win,
      parsed = new URL(url, location.href);
    return parsed.origin === location.origin
      ? parsed.pathname + parsed.search + parsed.hash
      : parsed.href;
  }

  shouldIntercept(link: Element | null): link is Element {
    return !!link && shouldIntercept(
      { href: link.getAttribute("href"), target: link.getAttribute("target") },
      this.#host.win.location.href,
      this.options,
    );
  }

  /**
   * Navigate in-app to `url`
   *
   * Skipped while another navigation is in flight or when `url` is the
   * current page. On failure the user is notified and, unless replaying
   * history, the browser loads `url` natively.
   *
   * @param url Destination
   * @param addToHistory Push a history entry; `false` when replaying back/forward
   * @returns Whether new content is in place
   */
  async navigate(url: string, addToHistory = true): Promise<boolean> {
    const { state } = this,
      { win, log, notify, assign } = this.#host,
      path = this.toPath(url);
    if (state.isLoading || path === state.currentPage) return false;

    state.isLoading = true;
    this.#showLoading();

    try {
      const html = await this.fetchContent(path);
      await this.updatePage(html, path);
      if (addToHistory) win.history.pushState({ path }, "", path);
      state.currentPage = path;
      updateActiveNavigation(win.document, path, this.options.sections);
      return true;
    } catch (e) {
      log.error("Navigation error:", e);
      notify.showError(navigationError);
      if (addToHistory) assign(path);
      return false;
    } finally {
      state.isLoading = false;
      this.#hideLoading();
      removeLinkLoadingStates(win.document);
    }
  }

  /**
   * Page HTML from the cache, or from the network as a partial request
   *
   * Concurrent requests for one path share a single fetch.
   *
   * @throws {HttpError} on non-success responses
   */
  fetchContent(url: string): Promise<string> {
    const path = this.toPath(url),
      cached = this.cache.get(path),
      requests = this.#requests;
    if (cached != null) return Promise.resolve(cached);

    return requests[path] ??= this.#request(path).finally(() => {
      delete requests[path];
    });
  }

  async #request(path: string): Promise<string> {
    const res = await this.#host.fetch(path, {
      headers: {
        "X-Requested-With": "XMLHttpRequest",
        "Accept": "text/html,application/xhtml+xml",
      },
    });
    if (!res.ok) throw new HttpError(res.status, res.statusText);

    const html = await res.text();
    this.cache.set(path, html);
    return html;
  }

  async updatePage(html: string, url: string): Promise<void> {
    const { win, reinitialize } = this.#host,
      doc = win.document,
      page = parsePage(win, html, url);

    applyTitles(doc, page);
    await transitionContent(doc, page.content, url, this.options);

    const content = querySelector(contentSelector, doc);
    if (content) reinitialize?.(content);
    doc.dispatchEvent(pageLoaded(win, { url }));

    win.scrollTo({ top: 0, behavior: "smooth" });
  }

  /** Warm the cache for `url`; failures are only logged */
  async preload(url: string): Promise<void> {
    const path = this.toPath(url);
    if (this.cache.has(path) || this.state.isLoading) return;
    try {
      await this.fetchContent(path);
    } catch (e) {
      this.#host.log.debug("Preload failed for:", path, e);
    }
  }

  preloadCriticalPages(): void {
    const { criticalPages, preloadJitter } = this.options,
      { log, random = Math.random } = this.#host;
    for (const page of criticalPages) {
      detach(
        timeout(random() * preloadJitter).then(() => this.preload(page)),
        log,
        "Critical page preload failed",
      );
    }
  }

  clearCache(): void {
    this.cache.clear();
  }

  isPageCached(url: string): boolean {
    return this.cache.has(this.toPath(url));
  }

  /**
   * Take over link clicks, link hovers and history replays
   *
   * @returns Function removing every listener
   */
  start(): () => void {
    const { win, log } = this.#host,
      doc = win.document,
      { currentPage } = this.state;

    this.#overlay ??= new LoadingOverlay(doc);
    win.history.replaceState({ path: currentPage }, "", currentPage);

    const closestLink = (t: EventTarget | null) =>
        isElement(t) ? t.closest("a[href]") : NULL,
      subs = [
        listen(doc, "click", (e) => {
          const link = closestLink(e.target);
          if (
            !e.defaultPrevented && !e.ctrlKey && !e.metaKey && !e.shiftKey &&
            this.shouldIntercept(link)
          ) {
            preventDefault(e);
            addLinkLoadingState(doc, link);
            detach(
              this.navigate(link.getAttribute("href") ?? ""),
              log,
              "Navigation failed",
            );
          }
        }),
        listen(doc, "mouseover", (e) => {
          const link = closestLink(e.target);
          if (this.shouldIntercept(link)) {
            detach(
              this.preload(link.getAttribute("href") ?? ""),
              log,
              "Preload failed",
            );
          }
        }),
        listen(win, "popstate", () => {
          const path = readPath(win.history.state);
          if (path) detach(this.navigate(path, false), log, "Navigation failed");
        }),
      ];

    this.preloadCriticalPages();

    return () => subs.forEach((unsub) => unsub());
  }

  #showLoading(): void {
    const { state } = this;
    this.#clearLoadingTimer();
    state.loadingTimer = setTimeout(() => {
      state.loadingTimer = NULL;
      if (state.isLoading) this.#overlay?.show();
    }, this.options.loadingDelay);
  }

  #hideLoading(): void {
    this.#clearLoadingTimer();
    this.#overlay?.hide();
  }

  #clearLoadingTimer(): void {
    if (this.state.loadingTimer != NULL) {
      clearTimeout(this.state.loadingTimer);
      this.state.loadingTimer = NULL;
    }
  }
}

const readPath = (state: unknown): string | null =>
  typeof state === "object" && state != NULL && "path" in state &&
    typeof state.path === "string"
    ? state.path
    : NULL;
