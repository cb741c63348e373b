import { type PageConfig, readPageConfig } from "../config/config.ts";
import { ApiClient } from "../features/api.ts";
import type { FeatureHost } from "../features/host.ts";
import { MiniProfiles } from "../features/profile.ts";
import { AbuseReports, type ReportType } from "../features/report.ts";
import { ReturnSimulator } from "../features/simulation.ts";
import { Watchlist, WatchlistStore } from "../features/watchlist.ts";
import { Router, type RouterOptions } from "../router/router.ts";
import { initAlerts } from "../ui/alerts.ts";
import { initForms, markFilledControls, setButtonLoading } from "../ui/forms.ts";
import {
  defaultNotifyTimings,
  type NotificationType,
  Notifier,
  type NotifyTimings,
} from "../ui/notify.ts";
import { initAnchorScroll } from "../ui/scroll.ts";
import { initSearch } from "../ui/search.ts";
import { initSidebar } from "../ui/sidebar.ts";
import { initTables, markSortableHeaders } from "../ui/table.ts";
import { initTheme } from "../ui/theme.ts";
import { initWidgets } from "../ui/widgets.ts";
import { detach, type HostWindow, type Logger, NULL } from "../util/util.ts";

export type ContextOptions = {
  readonly win: HostWindow;
  readonly fetch: typeof fetch;
  readonly log: Logger;
  /** Native page load */
  readonly assign: (url: string) => void;
  readonly reload: () => void;
  readonly config?: PageConfig;
  readonly router?: Partial<RouterOptions>;
  readonly notify?: NotifyTimings;
  readonly random?: () => number;
};

/** Everything living for one page load */
export type AppContext = {
  readonly notifier: Notifier;
  readonly router: Router;
  readonly watchlist: Watchlist;
  readonly reports: AbuseReports;
  readonly simulator: ReturnSimulator;
  /** `null` unless the page enables mini-profiles */
  readonly profiles: MiniProfiles | null;
} & FeatureHost;

/** Build the application context; nothing listens until {@linkcode startApp} */
export const createContext = (
  {
    win,
    fetch,
    log,
    assign,
    reload,
    config = readPageConfig(win),
    router: routerOptions,
    notify = defaultNotifyTimings,
    random,
  }: ContextOptions,
): AppContext => {
  const notifier = new Notifier(win, notify),
    host: FeatureHost = {
      win,
      config,
      api: new ApiClient(config, fetch, log),
      notifier,
      log,
      assign,
      reload,
    },
    watchlist = new Watchlist(host, new WatchlistStore());

  return {
    ...host,
    notifier,
    watchlist,
    reports: new AbuseReports(host),
    simulator: new ReturnSimulator(host),
    profiles: config.miniProfiles ? new MiniProfiles(host, watchlist) : NULL,
    router: new Router({
      win,
      fetch,
      log,
      assign,
      notify: notifier,
      random,
      reinitialize: (content) => {
        watchlist.renderButtons(content);
        markFilledControls(content);
        markSortableHeaders(content);
        initWidgets(win, content);
      },
    }, routerOptions),
  };
};

/**
 * Attach every listener and start the router
 *
 * Feature listeners go first so that their `preventDefault` is seen by the
 * router's click handler.
 *
 * @returns Function removing every listener
 */
export const startApp = (ctx: AppContext): () => void => {
  const { win, log, watchlist, profiles, router, assign } = ctx,
    doc = win.document,
    subs = [
      watchlist.listen(),
      profiles?.listen(),
      initTheme(win),
      initSidebar(win),
      initTables(doc),
      initForms(doc),
      initSearch(win, assign),
      initAlerts(win),
      initAnchorScroll(doc),
      router.start(),
    ];

  initWidgets(win);
  detach(watchlist.load(), log, "Error loading watchlist:");
  log.debug("Dashboard client started on", router.state.currentPage);

  return () => subs.forEach((unsub) => unsub?.());
};

/** Navigation API other scripts reach through `window.spaNav` */
export const navigationSurface = (router: Router) => ({
  navigate: (url: string): Promise<boolean> => router.navigate(url),
  clearCache: (): void => router.clearCache(),
  preloadUrl: (url: string): Promise<void> => router.preload(url),
  isPageCached: (url: string): boolean => router.isPageCached(url),
});

/** Feature API templates call through `window.dashboardFeatures` */
export const featureSurface = (
  { watchlist, reports, simulator, profiles, notifier }: AppContext,
) => ({
  addToWatchlist: (influencerId: number, notes?: string): Promise<boolean> =>
    watchlist.add(influencerId, notes),
  removeFromWatchlist: (
    entryId: number,
    influencerId: number,
  ): Promise<boolean> => watchlist.remove(entryId, influencerId),
  showReportModal: (type: ReportType, id: number, name: string): HTMLElement =>
    reports.open(type, id, name),
  closeReportModal: (): void => reports.close(),
  showSimulationModal: (influencerId: number, name: string): HTMLElement =>
    simulator.open(influencerId, name),
  closeSimulationModal: (): void => simulator.close(),
  runSimulation: (influencerId: number) => simulator.run(influencerId),
  hideMiniProfile: (): void => profiles?.hide(),
  showNotification: (message: string, type?: NotificationType): HTMLElement =>
    notifier.notify(message, type),
  setButtonLoading,
});
