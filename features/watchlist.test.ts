import assert from "node:assert/strict";
import { test } from "node:test";
import { json, waitFor } from "../testing/dom.ts";
import { featureHost, sentJson } from "../testing/host.ts";
import {
  parseWatchlist,
  toggleAction,
  Watchlist,
  WatchlistStore,
} from "./watchlist.ts";

const buttons = `
<button data-watchlist-btn data-influencer-id="7"></button>
<button data-watchlist-btn data-icon-only data-influencer-id="9"></button>`;

test("toggleAction decides from the store", () => {
  const store = new WatchlistStore();
  store.save(1, 11);
  store.save(2);
  assert.deepEqual(toggleAction(store, 1), { kind: "remove", entryId: 11 });
  assert.deepEqual(toggleAction(store, 2), { kind: "known" });
  assert.deepEqual(toggleAction(store, 3), { kind: "add" });
});

test("parseWatchlist skips malformed items", () => {
  assert.deepEqual(
    parseWatchlist({
      watchlist: [
        { id: 11, influencer: { id: 1 } },
        { id: "12", influencer: { id: 2 } },
        { id: 13 },
        null,
      ],
    }),
    [[1, 11]],
  );
  assert.deepEqual(parseWatchlist({}), []);
});

test("load fills the store and renders buttons", async () => {
  const { host, win } = featureHost({
    body: buttons,
    routes: {
      "/api/v1/watchlist/": () =>
        json({ watchlist: [{ id: 70, influencer: { id: 7 } }] }),
    },
  });
  const watchlist = new Watchlist(host);
  await watchlist.load();

  assert.equal(watchlist.store.entryId(7), 70);
  const [saved, iconOnly] = win.document.querySelectorAll("button");
  assert.ok(saved && iconOnly);
  assert.equal(saved.innerHTML, '<i class="fas fa-star"></i> Saved');
  assert.equal(saved.className, "btn-warning");
  assert.equal(saved.title, "Remove from watchlist");
  assert.equal(saved.dataset.watchlistId, "70");
  assert.equal(saved.dataset.watchlistState, "saved");
  assert.equal(iconOnly.innerHTML, '<i class="far fa-star"></i>');
  assert.equal(iconOnly.classList.contains("is-saved"), false);
  assert.equal(iconOnly.dataset.watchlistState, "unsaved");
});

test("only the store is public", () => {
  const { host } = featureHost({});
  const store = new WatchlistStore();
  const watchlist = new Watchlist(host, store);
  assert.deepEqual(Object.keys(watchlist), ["store"]);
  assert.equal(watchlist.store, store);
});

test("anonymous users are not loaded", async () => {
  const { host, fetch } = featureHost({ config: { authenticated: false } });
  await new Watchlist(host).load();
  assert.equal(fetch.mock.callCount(), 0);
});

test("add saves the entry and confirms", async () => {
  const { host, fetch, notify } = featureHost({
    body: buttons,
    routes: { "/api/v1/watchlist/": () => json({ watchlist_id: 90 }, 201) },
  });
  const watchlist = new Watchlist(host);

  assert.equal(await watchlist.add(9, "solid caller"), true);
  assert.deepEqual(sentJson(fetch.mock.calls[0]?.arguments[1]), {
    influencer_id: 9,
    notes: "solid caller",
  });
  assert.equal(watchlist.store.entryId(9), 90);
  assert.deepEqual(notify.mock.calls[0]?.arguments, ["Added to watchlist!", "success"]);
  const icon = host.win.document.querySelector("[data-icon-only]");
  assert.equal(icon?.classList.contains("is-saved"), true);
});

test("add sends anonymous users to login", async () => {
  const { host, fetch, notify, assign } = featureHost({
    path: "/dashboard/leaderboard/",
    config: { authenticated: false },
  });
  assert.equal(await new Watchlist(host).add(9), false);
  assert.equal(fetch.mock.callCount(), 0);
  assert.deepEqual(notify.mock.calls[0]?.arguments, [
    "Please login to save influencers",
    "warning",
  ]);
  assert.deepEqual(assign.mock.calls[0]?.arguments, [
    "/auth/login/?next=%2Fdashboard%2Fleaderboard%2F",
  ]);
});

test("add reports server errors", async () => {
  const { host, notify } = featureHost({
    routes: { "/api/v1/watchlist/": () => json({ error: "Already in watchlist" }, 400) },
  });
  const watchlist = new Watchlist(host);
  assert.equal(await watchlist.add(9), false);
  assert.equal(watchlist.store.has(9), false);
  assert.deepEqual(notify.mock.calls[0]?.arguments, ["Already in watchlist", "error"]);
});

test("remove reloads the watchlist page", async () => {
  const { host, fetch, notify, reload } = featureHost({
    path: "/dashboard/watchlist/",
    routes: { "/api/v1/watchlist/70/": () => json({ success: true }) },
  });
  const watchlist = new Watchlist(host);
  watchlist.store.save(7, 70);

  assert.equal(await watchlist.remove(70, 7), true);
  assert.equal(fetch.mock.calls[0]?.arguments[1]?.method, "DELETE");
  assert.equal(watchlist.store.has(7), false);
  assert.deepEqual(notify.mock.calls[0]?.arguments, ["Removed from watchlist", "success"]);
  assert.equal(reload.mock.callCount(), 1);
});

test("clicks on watchlist buttons toggle", async () => {
  const { host, win, fetch, notify } = featureHost({
    body: buttons,
    routes: { "/api/v1/watchlist/": () => json({ watchlist_id: 71 }, 201) },
  });
  const watchlist = new Watchlist(host);
  const stop = watchlist.listen();
  const button = win.document.querySelector<HTMLButtonElement>('[data-influencer-id="7"]');
  assert.ok(button);

  button.click();
  await waitFor(() => button.dataset.watchlistState === "saved");
  assert.equal(fetch.mock.callCount(), 1);

  watchlist.store.save(7);
  button.click();
  await waitFor(() => notify.mock.callCount() === 2);
  assert.deepEqual(notify.mock.calls[1]?.arguments, ["Already in watchlist", "info"]);
  stop();
});
