import { type HostWindow, querySelectorAll } from "../util/util.ts";

/** Alerts closing by themselves */
export const transientAlertSelector = ".alert:not(.alert-permanent)";

export const alertDismissDelay = 5000;

/**
 * Close the transient alerts the page loaded with after `delay`
 *
 * Bootstrap's `Alert` closes them when the page loads it, otherwise they are
 * removed. Alerts added later, like error banners or dialog notes, stay.
 *
 * @returns Function cancelling the dismissal
 */
export const initAlerts = (
  win: HostWindow,
  delay = alertDismissDelay,
): () => void => {
  const alerts = querySelectorAll(transientAlertSelector, win.document),
    timer = setTimeout(() => {
      const Alert = win.bootstrap?.Alert;
      alerts.forEach((el) => Alert ? new Alert(el).close() : el.remove());
    }, delay);
  return () => clearTimeout(timer);
};
