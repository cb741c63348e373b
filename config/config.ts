import {
  type HostWindow,
  isString,
  NULL,
  querySelector,
} from "../util/util.ts";

/** Values the server hands to the client through the rendered page */
export type PageConfig = {
  /** Base path of the JSON API */
  readonly apiBase: string;
  readonly authenticated: boolean;
  readonly csrfToken: string | null;
  /** Hover cards on influencer names */
  readonly miniProfiles: boolean;
};

export const defaultApiBase = "/api/v1";

/**
 * Read a cookie value
 *
 * @param cookies `document.cookie`
 * @param name Cookie name
 * @returns Decoded value, `null` when absent
 */
export const getCookie = (cookies: string, name: string): string | null => {
  for (const cookie of cookies.split(";")) {
    const trimmed = cookie.trim();
    if (trimmed.startsWith(name + "=")) {
      return decodeURIComponent(trimmed.slice(name.length + 1));
    }
  }
  return NULL;
};

const readAuthenticated = (win: HostWindow): boolean => {
  if ("IS_AUTHENTICATED" in win && win.IS_AUTHENTICATED !== undefined) {
    const flag = win.IS_AUTHENTICATED;
    return isString(flag) ? flag === "true" : !!flag;
  }
  const { document } = win,
    bodyState = document.body.dataset.isAuth;
  return bodyState !== undefined
    ? bodyState === "true"
    : document.cookie.includes("sessionid");
};

const readCsrfToken = (doc: Document): string | null =>
  querySelector<HTMLInputElement>("[name=csrfmiddlewaretoken]", doc)?.value ||
  querySelector<HTMLMetaElement>('meta[name="csrf-token"]', doc)?.content ||
  getCookie(doc.cookie, "csrftoken");

/** Read the page configuration once, at document-ready */
export const readPageConfig = (win: HostWindow): PageConfig => {
  const { dataset } = win.document.body;
  return {
    apiBase: dataset.apiBase || defaultApiBase,
    authenticated: readAuthenticated(win),
    csrfToken: readCsrfToken(win.document),
    miniProfiles: dataset.miniProfiles === "true",
  };
};
