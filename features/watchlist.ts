import {
  isArray,
  isElement,
  isNumber,
  isRecord,
  listen,
  preventDefault,
  querySelectorAll,
} from "../util/util.ts";
import { type FeatureHost, redirectToLogin } from "./host.ts";

export const watchlistButtonSelector = "[data-watchlist-btn]";

/** Influencers saved by the user, with their watchlist entry ids */
export class WatchlistStore {
  readonly #entries = new Map<number, number | undefined>();

  get size(): number {
    return this.#entries.size;
  }

  has(influencerId: number): boolean {
    return this.#entries.has(influencerId);
  }

  entryId(influencerId: number): number | undefined {
    return this.#entries.get(influencerId);
  }

  save(influencerId: number, entryId?: number): void {
    this.#entries.set(influencerId, entryId);
  }

  forget(influencerId: number): void {
    this.#entries.delete(influencerId);
  }

  replace(
    entries: Iterable<readonly [influencerId: number, entryId: number]>,
  ): void {
    this.#entries.clear();
    for (const [influencerId, entryId] of entries) {
      this.#entries.set(influencerId, entryId);
    }
  }
}

export type ToggleAction =
  | { readonly kind: "add" }
  | { readonly kind: "remove"; readonly entryId: number }
  | { readonly kind: "known" };

/** What a click on a watchlist button for `influencerId` does */
export const toggleAction = (
  store: WatchlistStore,
  influencerId: number,
): ToggleAction => {
  if (!store.has(influencerId)) return { kind: "add" };
  const entryId = store.entryId(influencerId);
  return entryId ? { kind: "remove", entryId } : { kind: "known" };
};

/**
 * Pairs of `[influencer id, entry id]` from a watchlist listing
 *
 * Malformed items are skipped.
 */
export const parseWatchlist = (
  data: Record<string, unknown>,
): Array<[number, number]> =>
  isArray(data.watchlist)
    ? data.watchlist.flatMap((item: unknown): Array<[number, number]> =>
      isRecord(item) && isNumber(item.id) && isRecord(item.influencer) &&
        isNumber(item.influencer.id)
        ? [[item.influencer.id, item.id]]
        : []
    )
    : [];

const readInfluencerId = (el: Element): number =>
  parseInt(el.getAttribute("data-influencer-id") ?? "", 10);

export class Watchlist {
  readonly store: WatchlistStore;
  readonly #host: FeatureHost;

  constructor(host: FeatureHost, store: WatchlistStore = new WatchlistStore()) {
    this.#host = host;
    this.store = store;
  }

  async load(): Promise<void> {
    const { config, api } = this.#host;
    if (!config.authenticated) return;

    const res = await api.request(
      "GET",
      "/watchlist/",
      "Failed to load watchlist",
    );
    if (res.ok) {
      this.store.replace(parseWatchlist(res.data));
      this.renderButtons();
    } else {
      this.#host.log.error("Error loading watchlist:", res.error);
    }
  }

  async add(influencerId: number, notes = ""): Promise<boolean> {
    const host = this.#host,
      { notifier } = host;
    if (!host.config.authenticated) {
      notifier.notify("Please login to save influencers", "warning");
      redirectToLogin(host);
      return false;
    }

    const res = await host.api.request(
      "POST",
      "/watchlist/",
      "Failed to add to watchlist",
      { influencer_id: influencerId, notes },
    );
    if (!res.ok) {
      notifier.notify(res.error, "error");
      return false;
    }

    const { watchlist_id } = res.data;
    this.store.save(
      influencerId,
      isNumber(watchlist_id) ? watchlist_id : undefined,
    );
    this.renderButtons();
    notifier.notify("Added to watchlist!", "success");
    return true;
  }

  async remove(entryId: number, influencerId: number): Promise<boolean> {
    const host = this.#host;
    if (!host.config.authenticated) return false;

    const res = await host.api.request(
      "DELETE",
      `/watchlist/${entryId}/`,
      "Failed to remove from watchlist",
    );
    if (!res.ok) {
      host.notifier.notify(res.error, "error");
      return false;
    }

    this.store.forget(influencerId);
    this.renderButtons();
    host.notifier.notify("Removed from watchlist", "success");
    if (host.win.location.pathname.includes("watchlist")) host.reload();
    return true;
  }

  /** Add or remove the influencer a watchlist button stands for */
  async toggle(button: Element): Promise<void> {
    const influencerId = readInfluencerId(button);
    if (Number.isNaN(influencerId)) return;

    const action = toggleAction(this.store, influencerId);
    switch (action.kind) {
      case "add":
        await this.add(influencerId);
        break;
      case "remove":
        await this.remove(action.entryId, influencerId);
        break;
      case "known":
        this.#host.notifier.notify("Already in watchlist", "info");
    }
  }

  /** Reflect saved state on every watchlist button under `root` */
  renderButtons(root: ParentNode = this.#host.win.document): void {
    querySelectorAll(watchlistButtonSelector, root).forEach((btn) => {
      const influencerId = readInfluencerId(btn),
        saved = this.store.has(influencerId),
        { classList, dataset } = btn;

      if (btn.hasAttribute("data-icon-only")) {
        btn.innerHTML = saved
          ? '<i class="fas fa-star"></i>'
          : '<i class="far fa-star"></i>';
        classList.toggle("is-saved", saved);
      } else if (saved) {
        btn.innerHTML = '<i class="fas fa-star"></i> Saved';
        classList.remove("btn-outline-primary");
        classList.add("btn-warning");
      } else {
        btn.innerHTML = '<i class="far fa-star"></i> Save';
        classList.remove("btn-warning");
        classList.add("btn-outline-primary");
      }
      btn.title = saved ? "Remove from watchlist" : "Save to watchlist";

      if (saved) {
        dataset.watchlistId = String(this.store.entryId(influencerId) ?? "");
        dataset.watchlistState = "saved";
      } else {
        delete dataset.watchlistId;
        dataset.watchlistState = "unsaved";
      }
    });
  }

  /**
   * Handle clicks on watchlist buttons, including buttons injected later
   *
   * @returns Function removing the listener
   */
  listen(): () => void {
    const { win, log } = this.#host;
    return listen(win.document, "click", (e) => {
      const button = isElement(e.target) &&
        e.target.closest(watchlistButtonSelector);
      if (button) {
        preventDefault(e);
        this.toggle(button).catch((err: unknown) =>
          log.error("Watchlist toggle failed:", err)
        );
      }
    });
  }
}
