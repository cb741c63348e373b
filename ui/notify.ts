import {
  createElement,
  escapeHtml,
  type HostWindow,
  listen,
  querySelector,
} from "../util/util.ts";

export type NotificationType = "success" | "error" | "warning" | "info";

export type NotifyTimings = {
  /** Delay before a toast slides in */
  readonly toastIn: number;
  /** Time a toast stays visible */
  readonly toastDuration: number;
  /** Fade-out time before a toast is removed */
  readonly toastOut: number;
  /** Time before an error banner removes itself */
  readonly bannerDuration: number;
};

export const defaultNotifyTimings: NotifyTimings = {
  toastIn: 100,
  toastDuration: 3000,
  toastOut: 300,
  bannerDuration: 5000,
};

const icons: Record<NotificationType, string> = {
  success: "check-circle",
  error: "exclamation-circle",
  warning: "exclamation-triangle",
  info: "info-circle",
};

export class Notifier {
  readonly #win: HostWindow;
  readonly #timings: NotifyTimings;

  constructor(win: HostWindow, timings: NotifyTimings = defaultNotifyTimings) {
    this.#win = win;
    this.#timings = timings;
  }

  /**
   * Show a transient toast
   *
   * @returns Toast element, removed from the document once faded out
   */
  notify(message: string, type: NotificationType = "info"): HTMLElement {
    const { document } = this.#win,
      { toastIn, toastDuration, toastOut } = this.#timings,
      toast = createElement(
        document,
        "div",
        `toast-notification toast-${type}`,
        `<div class="toast-content"><i class="fas fa-${
          icons[type]
        }"></i><span>${escapeHtml(message)}</span></div>`,
      );

    document.body.append(toast);
    setTimeout(() => toast.classList.add("show"), toastIn);
    setTimeout(() => {
      toast.classList.remove("show");
      setTimeout(() => toast.remove(), toastOut);
    }, toastDuration);
    return toast;
  }

  /**
   * Show a dismissible error banner
   *
   * @returns Banner element, removed on close or after a while
   */
  showError(message: string): HTMLElement {
    const { document } = this.#win,
      banner = createElement(
        document,
        "div",
        "alert alert-danger alert-dismissible fade show position-fixed spa-error",
        `<i class="fas fa-exclamation-triangle me-2"></i>${
          escapeHtml(message)
        }<button type="button" class="btn-close" data-bs-dismiss="alert"></button>`,
      ),
      close = querySelector("button", banner),
      dismiss = () => banner.remove();

    if (close) listen(close, "click", dismiss);
    document.body.append(banner);
    setTimeout(dismiss, this.#timings.bannerDuration);
    return banner;
  }
}
