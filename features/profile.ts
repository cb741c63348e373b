import {
  createElement,
  escapeHtml,
  isArray,
  isElement,
  isNumber,
  isString,
  listen,
  NULL,
  querySelector,
} from "../util/util.ts";
import type { FeatureHost } from "./host.ts";
import type { Watchlist } from "./watchlist.ts";

export type MiniProfile = {
  readonly id: number;
  readonly channel_name: string;
  readonly platform: string;
  readonly total_calls: number;
  readonly accuracy: number;
  readonly avg_return: number;
  readonly asset_focus: readonly string[];
  readonly recent_performance: string;
};

export const profileTargetSelector =
  "[data-influencer-id]:not([data-watchlist-btn])";

const hoverDelay = 300;
const leaveDelay = 200;

export const parseMiniProfile = (
  data: Record<string, unknown>,
): MiniProfile | null => {
  const {
    id,
    channel_name,
    platform,
    total_calls,
    accuracy,
    avg_return,
    asset_focus,
    recent_performance,
  } = data;
  if (
    !isNumber(id) || !isString(channel_name) || !isNumber(total_calls) ||
    !isNumber(accuracy) || !isNumber(avg_return)
  ) return NULL;
  return {
    id,
    channel_name,
    platform: isString(platform) ? platform : "",
    total_calls,
    accuracy,
    avg_return,
    asset_focus: isArray(asset_focus)
      ? asset_focus.filter(isString)
      : isString(asset_focus) && asset_focus
      ? [asset_focus]
      : [],
    recent_performance: isString(recent_performance) ? recent_performance : "",
  };
};

export const renderMiniProfile = (profile: MiniProfile): string => {
  const assetFocus = profile.asset_focus.length
    ? profile.asset_focus.join(", ")
    : "N/A";
  return `<div class="mini-profile-header"><div class="d-flex align-items-center gap-2"><div class="avatar-circle avatar-circle-sm hero-gradient-primary">${
    escapeHtml(profile.channel_name.charAt(0).toUpperCase())
  }</div><div><div class="fw-bold">${
    escapeHtml(profile.channel_name)
  }</div><div class="text-muted small">${
    escapeHtml(profile.platform)
  }</div></div></div><button class="btn-close-mini" data-profile-close>&times;</button></div><div class="mini-profile-stats"><div class="stat-item"><div class="stat-label">Total Calls</div><div class="stat-value">${profile.total_calls}</div></div><div class="stat-item"><div class="stat-label">Accuracy</div><div class="stat-value text-success">${profile.accuracy}%</div></div><div class="stat-item"><div class="stat-label">Avg Return</div><div class="stat-value">${
    profile.avg_return > 0 ? "+" : ""
  }${profile.avg_return}%</div></div></div><div class="mini-profile-details"><div class="mb-2"><strong>Asset Focus:</strong> ${
    escapeHtml(assetFocus)
  }</div><div class="mb-2"><strong>Recent Performance:</strong> <span class="badge badge-info">${
    escapeHtml(profile.recent_performance)
  }</span></div></div><div class="mini-profile-actions"><button class="btn btn-sm btn-primary" data-profile-save><i class="fas fa-star"></i> Save</button><button class="btn btn-sm btn-secondary" data-profile-view>View Profile</button></div>`;
};

/** Hover cards on influencer names, with a per-page-load profile cache */
export class MiniProfiles {
  readonly cache = new Map<number, MiniProfile>();
  readonly #host: FeatureHost;
  readonly #watchlist: Pick<Watchlist, "add">;
  #tooltip: HTMLElement | null = NULL;
  #hoverTimer: ReturnType<typeof setTimeout> | undefined;

  constructor(host: FeatureHost, watchlist: Pick<Watchlist, "add">) {
    this.#host = host;
    this.#watchlist = watchlist;
  }

  get tooltip(): HTMLElement | null {
    return this.#tooltip;
  }

  /** Cached profile, fetched once per influencer */
  async fetch(influencerId: number): Promise<MiniProfile | null> {
    const cached = this.cache.get(influencerId);
    if (cached) return cached;

    const res = await this.#host.api.request(
      "GET",
      `/influencer/${influencerId}/mini-profile/`,
      "Failed to fetch profile",
    );
    const profile = res.ok ? parseMiniProfile(res.data) : NULL;
    if (profile) this.cache.set(influencerId, profile);
    else this.#host.log.error("Error loading mini profile:", influencerId);
    return profile;
  }

  async show(influencerId: number, target: Element): Promise<void> {
    const profile = await this.fetch(influencerId);
    if (profile) this.display(profile, target);
  }

  display(profile: MiniProfile, target: Element): HTMLElement {
    this.hide();
    const { win } = this.#host,
      { document } = win,
      tooltip = createElement(
        document,
        "div",
        "mini-profile-tooltip",
        renderMiniProfile(profile),
      ),
      rect = target.getBoundingClientRect(),
      { style } = tooltip;

    style.position = "fixed";
    style.top = `${rect.bottom + 10}px`;
    style.left = `${rect.left}px`;
    style.zIndex = "10000";

    const on = (selector: string, cb: () => void) => {
      const el = querySelector(selector, tooltip);
      if (el) listen(el, "click", cb);
    };
    on("[data-profile-close]", () => this.hide());
    on("[data-profile-save]", () => {
      this.#watchlist.add(profile.id).catch((e: unknown) =>
        this.#host.log.error("Error adding to watchlist:", e)
      );
    });
    on(
      "[data-profile-view]",
      () => this.#host.assign(`/dashboard/influencer/${profile.id}/`),
    );
    listen(tooltip, "mouseleave", () =>
      setTimeout(() => {
        if (!target.matches(":hover")) this.hide();
      }, leaveDelay));

    document.body.append(tooltip);
    return this.#tooltip = tooltip;
  }

  hide(): void {
    this.#tooltip?.remove();
    this.#tooltip = NULL;
  }

  /**
   * Show cards after hovering influencer names
   *
   * @returns Function removing the listeners
   */
  listen(): () => void {
    const { win, log } = this.#host,
      doc = win.document,
      targetOf = (t: EventTarget | null) =>
        isElement(t) ? t.closest(profileTargetSelector) : NULL,
      subs = [
        listen(doc, "mouseover", (e) => {
          const target = targetOf(e.target),
            influencerId = parseInt(
              target?.getAttribute("data-influencer-id") ?? "",
              10,
            );
          if (target && !Number.isNaN(influencerId)) {
            clearTimeout(this.#hoverTimer);
            this.#hoverTimer = setTimeout(() => {
              this.show(influencerId, target).catch((err: unknown) =>
                log.error("Error loading mini profile:", err)
              );
            }, hoverDelay);
          }
        }),
        listen(doc, "mouseout", (e) => {
          if (targetOf(e.target)) {
            clearTimeout(this.#hoverTimer);
            setTimeout(() => {
              if (this.#tooltip && !this.#tooltip.matches(":hover")) {
                this.hide();
              }
            }, leaveDelay);
          }
        }),
      ];
    return () => subs.forEach((unsub) => unsub());
  }
}
