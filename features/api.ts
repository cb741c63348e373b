import type { PageConfig } from "../config/config.ts";
import { isRecord, isString, type Logger } from "../util/util.ts";

/** Outcome of an API call: data on success, a displayable error otherwise */
export type ApiResult<T> =
  | { readonly ok: true; readonly status: number; readonly data: T }
  | { readonly ok: false; readonly status?: number; readonly error: string };

export type ApiMethod = "GET" | "POST" | "DELETE";

/** JSON client of the dashboard API, authenticated by the session cookie */
export class ApiClient {
  readonly #config: Pick<PageConfig, "apiBase" | "csrfToken">;
  readonly #fetch: typeof globalThis.fetch;
  readonly #log: Logger;

  constructor(
    config: Pick<PageConfig, "apiBase" | "csrfToken">,
    fetch: typeof globalThis.fetch,
    log: Logger,
  ) {
    this.#config = config;
    this.#fetch = fetch;
    this.#log = log;
  }

  /**
   * Call an endpoint under the API base
   *
   * @param path Path relative to the API base, like `/watchlist/`
   * @param fallback Error shown when the server gives none
   * @param body JSON body
   */
  async request(
    method: ApiMethod,
    path: string,
    fallback: string,
    body?: Record<string, unknown>,
  ): Promise<ApiResult<Record<string, unknown>>> {
    const { apiBase, csrfToken } = this.#config,
      headers: Record<string, string> = {};
    if (csrfToken) headers["X-CSRFToken"] = csrfToken;
    if (body) headers["Content-Type"] = "application/json";

    let res: Response;
    try {
      res = await this.#fetch(apiBase + path, {
        method,
        credentials: "same-origin",
        headers,
        body: body && JSON.stringify(body),
      });
    } catch (e) {
      this.#log.error(`${method} ${path} failed:`, e);
      return { ok: false, error: fallback };
    }

    const data = await readJson(res);
    if (!res.ok) {
      const error = data && isString(data.error) && data.error;
      return { ok: false, status: res.status, error: error || fallback };
    }
    return { ok: true, status: res.status, data: data ?? {} };
  }
}

const readJson = async (
  res: Response,
): Promise<Record<string, unknown> | null> => {
  try {
    const data: unknown = await res.json();
    return isRecord(data) ? data : null;
  } catch {
    return null;
  }
};
