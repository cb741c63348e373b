import type { PageConfig } from "../config/config.ts";
import type { NotificationType } from "../ui/notify.ts";
import type { HostWindow, Logger } from "../util/util.ts";
import type { ApiClient } from "./api.ts";

/** What the feature scripts need from the application context */
export type FeatureHost = {
  readonly win: HostWindow;
  readonly config: PageConfig;
  readonly api: ApiClient;
  readonly notifier: {
    notify(message: string, type?: NotificationType): unknown;
  };
  readonly log: Logger;
  /** Native page load */
  readonly assign: (url: string) => void;
  readonly reload: () => void;
};

/** Send the user to the login page, coming back to the current page after */
export const redirectToLogin = ({ win, assign }: FeatureHost): void =>
  assign("/auth/login/?next=" + encodeURIComponent(win.location.pathname));
