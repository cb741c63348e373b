import {
  type HostWindow,
  querySelectorAll,
  type WidgetConstructor,
} from "../util/util.ts";

export const tooltipSelector = '[data-bs-toggle="tooltip"]';
export const popoverSelector = '[data-bs-toggle="popover"]';

const attach = (
  Widget: WidgetConstructor | undefined,
  selector: string,
  root: ParentNode,
) => {
  if (Widget) querySelectorAll(selector, root).forEach((el) => new Widget(el));
};

/**
 * Attach the page's Bootstrap tooltips and popovers under `root` and redraw
 * its charts
 *
 * Each piece runs only when the page loaded the library behind it.
 */
export const initWidgets = (
  win: HostWindow,
  root: ParentNode = win.document,
): void => {
  const { bootstrap, Chart, initializeCharts } = win;
  if (bootstrap) {
    attach(bootstrap.Tooltip, tooltipSelector, root);
    attach(bootstrap.Popover, popoverSelector, root);
  }
  if (Chart && typeof initializeCharts === "function") initializeCharts();
};
