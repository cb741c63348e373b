export type InterceptOptions = {
  /** Path segment every in-app page lives under */
  readonly prefix: string;
  /** Path segments that always navigate natively */
  readonly excluded: readonly string[];
};

export const defaultInterceptOptions: InterceptOptions = {
  prefix: "/dashboard/",
  excluded: ["/auth/", "/logout/"],
};

export type LinkInfo = {
  readonly href: string | null;
  readonly target?: string | null;
};

const parseURL = (href: string, base?: string | URL): URL | null => {
  try {
    return new URL(href, base);
  } catch {
    return null;
  }
};

/**
 * Decide whether a link is navigated in-app
 *
 * @param link Raw `href` and `target` attributes
 * @param base Current page URL, which relative links resolve against
 * @returns `true` when the router should take over the navigation
 */
export const shouldIntercept = (
  { href, target }: LinkInfo,
  base: string,
  { prefix, excluded }: InterceptOptions = defaultInterceptOptions,
): boolean => {
  if (!href || target === "_blank") return false;
  const page = parseURL(base),
    url = page && parseURL(href, page);
  return !!page && !!url &&
    url.origin === page.origin &&
    url.pathname.includes(prefix) &&
    !excluded.some((segment) => url.pathname.includes(segment));
};

export type SectionTable = ReadonlyArray<
  readonly [pattern: string, name: string]
>;

/** Known dashboard sections, in matching order */
export const sections: SectionTable = [
  ["/dashboard/", "home"],
  ["/dashboard/analytics/", "analytics"],
  ["/dashboard/leaderboard/", "leaderboard"],
  ["/dashboard/trending-kols/", "trending_kols"],
  ["/dashboard/submit-influencer/", "submit_influencer"],
  ["/dashboard/watchlist/", "watchlist"],
  ["/dashboard/alerts/", "alerts"],
  ["/dashboard/submissions-tracking/", "submissions_tracking"],
  ["/dashboard/settings/", "settings"],
  ["/dashboard/admin-management/", "admin_management"],
];

/**
 * First section whose pattern is contained in `url`
 *
 * The table is walked in order and the walk stops at the first pattern found,
 * so `/dashboard/` wins for every dashboard page.
 */
export const matchSection = (
  url: string,
  table: SectionTable = sections,
): readonly [pattern: string, name: string] | undefined =>
  table.find(([pattern]) => url.includes(pattern));
