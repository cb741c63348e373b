import assert from "node:assert/strict";
import { mock, test } from "node:test";
import {
  dashboardWindow,
  mockLogger,
  pageHtml,
  routeFetch,
  tick,
  waitFor,
} from "../testing/dom.ts";
import {
  HttpError,
  navigationError,
  pageLoaded,
  Router,
  type RouterOptions,
} from "./router.ts";
import { PageStructureError } from "./view.ts";

const layout = `<nav id="sidebar">
  <a class="nav-link active" href="/dashboard/">Home</a>
  <a class="nav-link" href="/dashboard/analytics/">Analytics</a>
  <a href="https://elsewhere.test/dashboard/">Elsewhere</a>
  <a href="/auth/login/">Login</a>
</nav><h1 class="page-title">Home</h1><main class="page-content"><p>Home</p></main>`;

const page = (name: string) => () =>
  new Response(pageHtml(name, `<p>${name}</p>`, name));

const setup = (
  routes: Parameters<typeof routeFetch>[0],
  options: Partial<RouterOptions> = {},
  body = layout,
  path?: string,
) => {
  const win = dashboardWindow(body, path),
    fetch = routeFetch(routes),
    log = mockLogger(),
    assign = mock.fn((_url: string) => {}),
    showError = mock.fn((_message: string) => {}),
    reinitialize = mock.fn((_content: Element) => {}),
    router = new Router(
      { win, fetch, log, assign, notify: { showError }, reinitialize, random: () => 0 },
      {
        loadingDelay: 0,
        exitDelay: 0,
        enterDelay: 0,
        criticalPages: [],
        ...options,
      },
    );
  return { win, fetch, log, assign, showError, reinitialize, router };
};

test("navigate swaps content, caches the page and pushes history", async () => {
  const { win, fetch, router, reinitialize } = setup({
    "/dashboard/analytics/": page("Analytics"),
  });
  const { document } = win;
  const loaded = mock.fn((_e: Event) => {});
  document.addEventListener(pageLoaded.type, loaded);

  assert.equal(await router.navigate("/dashboard/analytics/"), true);

  assert.equal(fetch.mock.callCount(), 1);
  assert.deepEqual(fetch.mock.calls[0]?.arguments, [
    "/dashboard/analytics/",
    {
      headers: {
        "X-Requested-With": "XMLHttpRequest",
        "Accept": "text/html,application/xhtml+xml",
      },
    },
  ]);
  assert.equal(router.isPageCached("/dashboard/analytics/"), true);
  assert.equal(router.state.currentPage, "/dashboard/analytics/");
  assert.equal(router.state.isLoading, false);
  assert.deepEqual(win.history.state, { path: "/dashboard/analytics/" });
  assert.equal(win.location.pathname, "/dashboard/analytics/");
  assert.equal(document.title, "Analytics");
  assert.equal(document.querySelector(".page-title")?.textContent, "Analytics");
  assert.equal(document.querySelector(".page-content")?.innerHTML, "<p>Analytics</p>");
  assert.equal(
    document.querySelector('a[href="/dashboard/analytics/"]')?.classList.contains("active"),
    true,
  );
  assert.equal(reinitialize.mock.callCount(), 1);
  assert.equal(loaded.mock.callCount(), 1);
  const event = loaded.mock.calls[0]?.arguments[0];
  assert.ok(event instanceof win.CustomEvent);
  assert.deepEqual(event.detail, { url: "/dashboard/analytics/" });
  await tick();
});

test("navigating to the current page does nothing", async () => {
  const { fetch, router, win } = setup({});
  const length = win.history.length;
  assert.equal(await router.navigate("/dashboard/"), false);
  assert.equal(await router.navigate("https://dashboard.test/dashboard/"), false);
  assert.equal(fetch.mock.callCount(), 0);
  assert.equal(win.history.length, length);
});

test("navigations are dropped while one is in flight", async () => {
  const { fetch, router } = setup({
    "/dashboard/analytics/": page("Analytics"),
    "/dashboard/settings/": page("Settings"),
  });
  const first = router.navigate("/dashboard/analytics/");
  assert.equal(router.state.isLoading, true);
  assert.equal(await router.navigate("/dashboard/settings/"), false);
  assert.equal(await first, true);
  assert.equal(fetch.mock.callCount(), 1);
  assert.equal(router.state.currentPage, "/dashboard/analytics/");
  await tick();
});

test("cached pages are not fetched again", async () => {
  const { fetch, router } = setup({ "/dashboard/analytics/": page("Analytics") });
  await router.preload("/dashboard/analytics/");
  assert.equal(await router.navigate("/dashboard/analytics/"), true);
  assert.equal(fetch.mock.callCount(), 1);
  await tick();
});

test("failed navigation notifies and falls back to a native load", async () => {
  const { router, assign, showError, log, win } = setup({
    "/dashboard/broken/": () =>
      new Response("", { status: 500, statusText: "Internal Server Error" }),
  });

  assert.equal(await router.navigate("/dashboard/broken/"), false);

  assert.deepEqual(showError.mock.calls[0]?.arguments, [navigationError]);
  assert.deepEqual(assign.mock.calls[0]?.arguments, ["/dashboard/broken/"]);
  const [message, error] = log.error.mock.calls[0]?.arguments ?? [];
  assert.equal(message, "Navigation error:");
  assert.ok(error instanceof HttpError);
  assert.equal(error.message, "HTTP 500: Internal Server Error");
  assert.equal(router.state.isLoading, false);
  assert.equal(router.state.currentPage, "/dashboard/");
  assert.equal(win.location.pathname, "/dashboard/");
});

test("failed history replay does not load natively", async () => {
  const { router, assign, showError } = setup({});
  assert.equal(await router.navigate("/dashboard/missing/", false), false);
  assert.equal(showError.mock.callCount(), 1);
  assert.equal(assign.mock.callCount(), 0);
});

test("pages without content container fail navigation", async () => {
  const { router, assign, log } = setup({
    "/dashboard/bare/": () => new Response("<html><body><p>Bare</p></body></html>"),
  });
  assert.equal(await router.navigate("/dashboard/bare/"), false);
  assert.ok(log.error.mock.calls[0]?.arguments[1] instanceof PageStructureError);
  assert.deepEqual(assign.mock.calls[0]?.arguments, ["/dashboard/bare/"]);
});

test("preload failures are only logged at debug level", async () => {
  const { router, log, showError } = setup({});
  await router.preload("/dashboard/missing/");
  assert.equal(router.isPageCached("/dashboard/missing/"), false);
  assert.equal(log.debug.mock.calls[0]?.arguments[0], "Preload failed for:");
  assert.equal(log.debug.mock.calls[0]?.arguments[1], "/dashboard/missing/");
  assert.equal(log.error.mock.callCount(), 0);
  assert.equal(showError.mock.callCount(), 0);
});

test("concurrent requests for a page share one fetch", async () => {
  let respond = (_res: Response) => {}, held = true;
  const { router, fetch } = setup({
    "/dashboard/analytics/": () =>
      held
        ? new Promise<Response>((resolve) => {
          respond = resolve;
        })
        : page("Analytics")(),
  });
  const first = router.preload("/dashboard/analytics/"),
    second = router.preload("https://dashboard.test/dashboard/analytics/"),
    navigation = router.navigate("/dashboard/analytics/");
  await tick();
  assert.equal(fetch.mock.callCount(), 1);

  held = false;
  respond(page("Analytics")());
  await Promise.all([first, second]);
  assert.equal(await navigation, true);
  assert.equal(fetch.mock.callCount(), 1);
  assert.equal(router.isPageCached("/dashboard/analytics/"), true);

  router.clearCache();
  await router.preload("/dashboard/analytics/");
  assert.equal(fetch.mock.callCount(), 2);
  await tick();
});

test("clearCache drops every page", async () => {
  const { router } = setup({ "/dashboard/analytics/": page("Analytics") });
  await router.preload("/dashboard/analytics/");
  router.clearCache();
  assert.equal(router.isPageCached("/dashboard/analytics/"), false);
});

test("start intercepts dashboard link clicks", async () => {
  const { win, router, fetch } = setup({ "/dashboard/analytics/": page("Analytics") });
  const { document } = win;
  const stop = router.start();
  assert.deepEqual(win.history.state, { path: "/dashboard/" });

  const link = document.querySelector<HTMLAnchorElement>(
    'a[href="/dashboard/analytics/"]',
  );
  assert.ok(link);
  link.click();
  assert.equal(link.classList.contains("spa-loading"), true);
  assert.equal(document.getElementById("sidebar")?.classList.contains("spa-updating"), true);

  await waitFor(() => router.state.currentPage === "/dashboard/analytics/");
  await waitFor(() => !link.classList.contains("spa-loading"));
  assert.equal(fetch.mock.callCount(), 1);
  assert.equal(win.location.pathname, "/dashboard/analytics/");
  stop();
  await tick();
});

test("relative links resolve against the current page", async () => {
  const { win, router, fetch } = setup(
    { "/dashboard/influencers/detail/5/": page("Detail") },
    {},
    `${layout}<a id="detail" href="detail/5/">Detail</a>`,
    "/dashboard/influencers/",
  );
  const stop = router.start();
  assert.equal(router.toPath("detail/5/"), "/dashboard/influencers/detail/5/");
  assert.equal(router.toPath("../"), "/dashboard/");

  const link = win.document.getElementById("detail");
  assert.ok(link);
  assert.equal(router.shouldIntercept(link), true);
  link.click();

  await waitFor(() => router.state.currentPage === "/dashboard/influencers/detail/5/");
  assert.equal(fetch.mock.calls[0]?.arguments[0], "/dashboard/influencers/detail/5/");
  assert.equal(win.location.pathname, "/dashboard/influencers/detail/5/");
  stop();
  await tick();
});

test("a relative href repeating the prefix keeps the current directory", async () => {
  const { win, router, fetch, assign } = setup(
    { "/dashboard/dashboard/x/": page("Nested") },
    {},
    `${layout}<a id="nested" href="dashboard/x/">Nested</a>`,
  );
  const stop = router.start();
  win.document.getElementById("nested")?.click();

  await waitFor(() => router.state.currentPage === "/dashboard/dashboard/x/");
  assert.equal(fetch.mock.calls[0]?.arguments[0], "/dashboard/dashboard/x/");
  assert.equal(assign.mock.callCount(), 0);
  stop();
  await tick();
});

test("modified, external and excluded clicks are left to the browser", () => {
  const { win, router, fetch } = setup({});
  const { document } = win;
  const stop = router.start();
  const click = (selector: string, init: MouseEventInit = {}) =>
    document.querySelector(selector)?.dispatchEvent(
      new win.MouseEvent("click", { bubbles: true, cancelable: true, ...init }),
    );

  assert.equal(click('a[href="/dashboard/analytics/"]', { ctrlKey: true }), true);
  assert.equal(click('a[href="/dashboard/analytics/"]', { metaKey: true }), true);
  assert.equal(click('a[href^="https://elsewhere"]'), true);
  assert.equal(click('a[href="/auth/login/"]'), true);
  assert.equal(fetch.mock.callCount(), 0);
  stop();
});

test("popstate replays the recorded path without pushing history", async () => {
  const { win, router, fetch, assign } = setup({
    "/dashboard/settings/": page("Settings"),
  });
  const stop = router.start();
  const length = win.history.length;

  win.history.replaceState({ path: "/dashboard/settings/" }, "", "/dashboard/settings/");
  win.dispatchEvent(new win.Event("popstate"));

  await waitFor(() => router.state.currentPage === "/dashboard/settings/");
  assert.equal(fetch.mock.calls[0]?.arguments[0], "/dashboard/settings/");
  assert.equal(win.history.length, length);
  assert.equal(assign.mock.callCount(), 0);
  stop();
  await tick();
});

test("loading overlay shows only while a navigation is slow", async () => {
  let respond = (_res: Response) => {};
  const { win, router } = setup({
    "/dashboard/analytics/": () =>
      new Promise<Response>((resolve) => {
        respond = resolve;
      }),
  });
  const stop = router.start();
  const overlay = win.document.getElementById("spa-loading-overlay");
  assert.ok(overlay);

  const navigation = router.navigate("/dashboard/analytics/");
  assert.equal(overlay.style.display, "");
  await waitFor(() => overlay.style.display === "flex");

  respond(page("Analytics")());
  assert.equal(await navigation, true);
  assert.equal(overlay.style.display, "none");
  assert.equal(router.state.loadingTimer, null);
  stop();
  await tick();
});

test("critical pages are preloaded at startup", async () => {
  const { router, fetch } = setup(
    {
      "/dashboard/analytics/": page("Analytics"),
      "/dashboard/settings/": page("Settings"),
    },
    { criticalPages: ["/dashboard/analytics/", "/dashboard/settings/"] },
  );
  const stop = router.start();
  await waitFor(() =>
    router.isPageCached("/dashboard/analytics/") &&
    router.isPageCached("/dashboard/settings/")
  );
  assert.equal(fetch.mock.callCount(), 2);
  stop();
});
